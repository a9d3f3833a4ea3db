export type CraftingErrorCode =
  | 'INVALID_STACK'
  | 'INVALID_RECIPE'
  | 'COUNT_OVERFLOW'
  | 'RECIPE_CYCLE'
  | 'PLAN_INCONSISTENT'
  | 'PARSE_ERROR';

export class CraftingError extends Error {
  constructor(
    public readonly code: CraftingErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'CraftingError';
  }
}

export class InvalidStackError extends CraftingError {
  constructor(message: string) {
    super('INVALID_STACK', message);
    this.name = 'InvalidStackError';
  }
}

export class InvalidRecipeError extends CraftingError {
  constructor(message: string) {
    super('INVALID_RECIPE', message);
    this.name = 'InvalidRecipeError';
  }
}

/**
 * A count left the safe integer range. Quantities never wrap.
 */
export class CountOverflowError extends CraftingError {
  constructor(message: string) {
    super('COUNT_OVERFLOW', message);
    this.name = 'CountOverflowError';
  }
}

export class RecipeCycleError extends CraftingError {
  readonly cycle: string[];

  constructor(cycle: string[]) {
    super('RECIPE_CYCLE', `recipe cycle: ${cycle.join(' -> ')}`);
    this.name = 'RecipeCycleError';
    this.cycle = cycle;
  }
}

/**
 * Internal invariant of the planner broke. Not caused by caller input.
 */
export class PlanConsistencyError extends CraftingError {
  constructor(message: string) {
    super('PLAN_INCONSISTENT', message);
    this.name = 'PlanConsistencyError';
  }
}
