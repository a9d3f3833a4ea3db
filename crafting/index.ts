/**
 * Crafting plan engine
 */

export { Calculator, computePlan } from './calculator';
export { Stack, PLACEHOLDER_ITEM } from './stack';
export { Recipe, RecipeKind, PlanStep, RAW_MATERIAL_METHOD, IN_STORAGE_METHOD } from './recipe';
export { CraftQueue, QueueEntry } from './craftQueue';
export { findRecipeCycle } from './cycleGuard';
export { resolveDemand, PlanningState } from './demandResolver';
export { orderSteps } from './stepOrdering';
export {
  CraftingError,
  CraftingErrorCode,
  InvalidStackError,
  InvalidRecipeError,
  CountOverflowError,
  RecipeCycleError,
  PlanConsistencyError
} from './errors';
