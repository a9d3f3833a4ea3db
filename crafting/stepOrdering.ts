import { PlanConsistencyError } from './errors';
import { PlanStep } from './recipe';
import { checkedAdd, checkedMul } from '../utils/checkedMath';

/**
 * Merges `step` into `bucket`, keyed by the item it produces
 */
function mergeInto(bucket: Map<string, PlanStep>, step: PlanStep): void {
  const item = step.recipe.result.item;
  const existing = bucket.get(item);
  if (existing) {
    bucket.set(item, { recipe: existing.recipe, repeats: checkedAdd(existing.repeats, step.repeats) });
  } else {
    bucket.set(item, step);
  }
}

/**
 * A step can run once every ingredient was produced by an emitted step, or
 * is covered by stock alone: stocked in sufficient quantity with no pending
 * step still producing it.
 */
function isEligible(
  step: PlanStep,
  available: ReadonlySet<string>,
  fromStorage: ReadonlyMap<string, PlanStep>,
  producedLater: ReadonlySet<string>
): boolean {
  return step.recipe.ingredients.every(ingredient => {
    if (available.has(ingredient.item)) return true;
    if (producedLater.has(ingredient.item)) return false;
    const stocked = fromStorage.get(ingredient.item);
    return (
      stocked !== undefined &&
      checkedMul(stocked.recipe.result.count, stocked.repeats) >= checkedMul(ingredient.count, step.repeats)
    );
  });
}

/**
 * Puts discovered steps into execution order and merges duplicates.
 *
 * Raw materials come first. Crafting steps are then emitted in stages: a
 * stage holds every remaining step whose ingredients are all available, or
 * covered by stock while nothing pending still crafts them. Stocked
 * ingredients are emitted right before the stage that first consumes them.
 * Stocked items no crafting step consumed (the target itself, typically)
 * close the plan.
 */
export function orderSteps(discovered: readonly PlanStep[]): PlanStep[] {
  const ordered: PlanStep[] = [];
  const available = new Set<string>();
  const rawMaterials = new Map<string, PlanStep>();
  const fromStorage = new Map<string, PlanStep>();
  let pending: PlanStep[] = [];

  for (const step of discovered) {
    switch (step.recipe.kind) {
      case 'raw':
        mergeInto(rawMaterials, step);
        break;
      case 'storage':
        mergeInto(fromStorage, step);
        break;
      default:
        pending.push(step);
    }
  }

  for (const [item, step] of rawMaterials) {
    ordered.push(step);
    available.add(item);
  }

  while (pending.length > 0) {
    const stage = new Map<string, PlanStep>();
    const deferred: PlanStep[] = [];
    const producedLater = new Set(pending.map(step => step.recipe.result.item));
    for (const step of pending) {
      if (!isEligible(step, available, fromStorage, producedLater)) {
        deferred.push(step);
        continue;
      }
      for (const ingredient of step.recipe.ingredients) {
        const stocked = fromStorage.get(ingredient.item);
        if (!stocked) continue;
        fromStorage.delete(ingredient.item);
        // Intentionally scaled by the consumer's repeats, not capped at the stocked amount
        ordered.push({ recipe: stocked.recipe, repeats: checkedMul(stocked.repeats, step.repeats) });
        available.add(ingredient.item);
      }
      mergeInto(stage, step);
    }
    if (stage.size === 0) {
      const stuck = deferred.map(step => step.recipe.result.item);
      throw new PlanConsistencyError(`no step can run next; waiting: ${stuck.join(', ')}`);
    }
    for (const [item, step] of stage) {
      ordered.push(step);
      available.add(item);
    }
    pending = deferred;
  }

  for (const step of fromStorage.values()) {
    ordered.push(step);
  }
  return ordered;
}
