import { RecipeCycleError } from './errors';
import { findRecipeCycle } from './cycleGuard';
import { PlanningState, resolveDemand } from './demandResolver';
import { PlanStep, Recipe } from './recipe';
import { PLACEHOLDER_ITEM, Stack } from './stack';
import { orderSteps } from './stepOrdering';
import { checkedAdd } from '../utils/checkedMath';
import { getMaxCraftDepth } from '../utils/config';
import logger from '../utils/logger';

const log = logger.child('calculator');

/**
 * Computes the plan for one state: every step needed to produce the target,
 * in an order where no ingredient is used before it exists.
 *
 * @throws RecipeCycleError when a recipe reachable from the target needs itself
 */
export function computePlan(state: PlanningState, maxDepth: number = getMaxCraftDepth()): PlanStep[] {
  const cycle = findRecipeCycle(state.recipes, state.target.item);
  if (cycle) throw new RecipeCycleError(cycle);
  return orderSteps(resolveDemand(state, maxDepth));
}

/**
 * Works out how to craft a target from a catalog of recipes and a pool of
 * resources that are already available.
 *
 * Every mutation recomputes the whole plan. A mutation whose plan cannot be
 * computed throws and leaves the calculator as it was.
 *
 * @example
 * ```typescript
 * const calculator = new Calculator([
 *   new Recipe(new Stack('Charcoal', 1), 'Furnace', [new Stack('Oak Log', 1)])
 * ]);
 * calculator.setTarget(new Stack('Charcoal', 3));
 * calculator.getSteps();
 * // [{ Raw Material: Oak Log, repeats 3 }, { Furnace: Charcoal, repeats 3 }]
 * ```
 */
export class Calculator {
  private recipes: Map<string, Recipe>;
  private target: Stack = new Stack(PLACEHOLDER_ITEM, 1);
  private hasTarget = false;
  private initialMaterials = new Map<string, number>();
  private steps: PlanStep[] = [];

  /**
   * @param recipes - Initial catalog; later recipes for the same item win
   */
  constructor(recipes: Iterable<Recipe> = []) {
    this.recipes = new Map();
    for (const recipe of recipes) {
      this.recipes.set(recipe.result.item, recipe);
    }
  }

  /**
   * The recipes the calculator knows about
   */
  getRecipes(): Recipe[] {
    return Array.from(this.recipes.values());
  }

  getRecipe(item: string): Recipe | undefined {
    return this.recipes.get(item);
  }

  getTarget(): Stack {
    return this.target;
  }

  /**
   * Resources that are already available, in the order they were first added
   */
  getResources(): Stack[] {
    return Array.from(this.initialMaterials, ([item, count]) => new Stack(item, count));
  }

  /**
   * The steps that turn the available materials into the target
   */
  getSteps(): readonly PlanStep[] {
    return this.steps;
  }

  /**
   * Adds `resource` to what is already available and does not need crafting.
   * Adding an item that is already known increases its count.
   */
  addResource(resource: Stack): void {
    const materials = new Map(this.initialMaterials);
    materials.set(resource.item, checkedAdd(materials.get(resource.item) ?? 0, resource.count));
    this.commit({ initialMaterials: materials });
  }

  /**
   * Sets the recipe for creating `recipe.result.item`
   */
  setRecipe(recipe: Recipe): void {
    this.addRecipes([recipe]);
  }

  /**
   * Uses the given recipes for creating their results. If several recipes
   * produce the same item, the later one overrides the earlier one(s).
   */
  addRecipes(recipes: Iterable<Recipe>): void {
    const catalog = new Map(this.recipes);
    for (const recipe of recipes) {
      catalog.set(recipe.result.item, recipe);
    }
    this.commit({ recipes: catalog });
  }

  setTarget(target: Stack): void {
    this.commit({ target, hasTarget: true });
  }

  private commit(change: {
    recipes?: Map<string, Recipe>;
    target?: Stack;
    hasTarget?: boolean;
    initialMaterials?: Map<string, number>;
  }): void {
    const recipes = change.recipes ?? this.recipes;
    const target = change.target ?? this.target;
    const hasTarget = change.hasTarget ?? this.hasTarget;
    const initialMaterials = change.initialMaterials ?? this.initialMaterials;

    const steps = hasTarget ? computePlan({ recipes, target, resources: initialMaterials }) : [];

    this.recipes = recipes;
    this.target = target;
    this.hasTarget = hasTarget;
    this.initialMaterials = initialMaterials;
    this.steps = steps;
    log.debug(`plan for ${target}: ${steps.length} step(s)`);
  }
}
