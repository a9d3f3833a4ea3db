import { InvalidRecipeError } from './errors';
import { Stack } from './stack';

export const RAW_MATERIAL_METHOD = 'Raw Material';
export const IN_STORAGE_METHOD = 'In Storage';

/**
 * `crafted` recipes come from the catalog; `raw` and `storage` are the
 * pseudo-recipes the calculator emits for unproducible and stocked items.
 */
export type RecipeKind = 'crafted' | 'raw' | 'storage';

/**
 * A known way to produce a stack from a set of other stacks
 */
export class Recipe {
  readonly result: Stack;
  readonly method: string;
  readonly ingredients: readonly Stack[];
  readonly kind: RecipeKind;

  /**
   * @param result - Stack produced by executing the recipe once
   * @param method - How the ingredients are turned into the result (e.g. 'Furnace')
   * @param ingredients - Stacks consumed by executing the recipe once
   */
  constructor(result: Stack, method: string, ingredients: readonly Stack[], kind: RecipeKind = 'crafted') {
    if (kind === 'crafted' && result.count < 1) {
      throw new InvalidRecipeError(`recipe for ${result.item} must produce at least one item`);
    }
    const empty = ingredients.find(ingredient => ingredient.count < 1);
    if (empty) {
      throw new InvalidRecipeError(`ingredient ${empty.item} of ${result.item} must have a count of at least 1`);
    }
    this.result = result;
    this.method = method;
    this.ingredients = Object.freeze([...ingredients]);
    this.kind = kind;
  }

  /**
   * Marks an item that no recipe produces
   */
  static rawMaterial(item: string): Recipe {
    return new Recipe(new Stack(item, 1), RAW_MATERIAL_METHOD, [], 'raw');
  }

  /**
   * Marks an item drawn from the supplied resources
   */
  static inStorage(item: string): Recipe {
    return new Recipe(new Stack(item, 1), IN_STORAGE_METHOD, [], 'storage');
  }

  isPseudo(): boolean {
    return this.kind !== 'crafted';
  }

  equals(other: Recipe): boolean {
    return (
      this.kind === other.kind &&
      this.method === other.method &&
      this.result.equals(other.result) &&
      this.ingredients.length === other.ingredients.length &&
      this.ingredients.every((stack, i) => stack.equals(other.ingredients[i]))
    );
  }
}

/**
 * One entry of a plan: run `recipe` `repeats` times
 */
export interface PlanStep {
  readonly recipe: Recipe;
  readonly repeats: number;
}
