import { CraftQueue } from './craftQueue';
import { CountOverflowError, PlanConsistencyError } from './errors';
import { PlanStep, Recipe } from './recipe';
import { Stack } from './stack';
import { ceilDiv, checkedAdd, checkedMul } from '../utils/checkedMath';

/**
 * Inputs of one plan computation
 */
export interface PlanningState {
  recipes: ReadonlyMap<string, Recipe>;
  target: Stack;
  resources: ReadonlyMap<string, number>;
}

/**
 * Turns the target into the steps that must run, in discovery order.
 *
 * Items are resolved breadth-first by depth: an item is handled only once all
 * shallower demand has been pushed onto it. For each item, demand is covered
 * from crafted surplus first, then from stored resources, then by crafting
 * (or by a raw material step when no recipe exists). Surplus from rounding a
 * craft up to whole repeats is kept for later items in the same computation.
 *
 * The returned steps are not yet in execution order; see `orderSteps`.
 *
 * @param maxDepth - Largest depth the queue may use before compacting
 */
export function resolveDemand(state: PlanningState, maxDepth: number): PlanStep[] {
  const materials = new Map(state.resources);
  const crafted = new Map<string, number>();
  const toCraft = new Map<string, number>([[state.target.item, state.target.count]]);
  const queue = new CraftQueue<string>();
  queue.push(state.target.item, 0);
  const steps: PlanStep[] = [];

  for (let next = queue.popMin(); next !== undefined; next = queue.popMin()) {
    const item = next.key;
    let count = toCraft.get(item);
    if (count === undefined) continue;
    toCraft.delete(item);

    const surplus = crafted.get(item);
    if (surplus !== undefined) {
      const retrieved = Math.min(surplus, count);
      crafted.set(item, surplus - retrieved);
      count -= retrieved;
    }

    const stocked = materials.get(item);
    if (stocked !== undefined) {
      const retrieved = Math.min(stocked, count);
      if (retrieved > 0) {
        steps.push({ recipe: Recipe.inStorage(item), repeats: retrieved });
        materials.set(item, stocked - retrieved);
        count -= retrieved;
      }
    }

    if (count === 0) continue;

    const recipe = state.recipes.get(item);
    if (!recipe) {
      steps.push({ recipe: Recipe.rawMaterial(item), repeats: count });
      continue;
    }

    const perExecution = recipe.result.count;
    const repeats = ceilDiv(count, perExecution);
    const produced = checkedMul(perExecution, repeats);
    steps.push({ recipe, repeats });
    if (produced > count) {
      // Any earlier surplus was drained above, so this cannot overwrite a live amount
      crafted.set(item, produced - count);
    }

    let depth = next.priority;
    if (depth >= maxDepth) {
      depth = queue.compact(depth);
      if (depth >= maxDepth) {
        throw new CountOverflowError(`craft depth exhausted after compaction (limit ${maxDepth})`);
      }
    }
    for (const ingredient of recipe.ingredients) {
      queue.push(ingredient.item, depth + 1);
      const needed = checkedMul(ingredient.count, repeats);
      toCraft.set(ingredient.item, checkedAdd(toCraft.get(ingredient.item) ?? 0, needed));
    }
  }

  if (toCraft.size > 0) {
    throw new PlanConsistencyError(`unresolved demand for: ${Array.from(toCraft.keys()).join(', ')}`);
  }
  return steps;
}
