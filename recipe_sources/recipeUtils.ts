/**
 * Recipe processing utilities
 *
 * Helpers for reading minecraft-data recipes: item ids, ingredient counts
 * and the crafting grid a recipe needs.
 */

import { MinecraftData, MinecraftRecipe, RecipeItem } from './types';

/**
 * Gets the item id from any of the recipe item encodings
 *
 * @example
 * ```typescript
 * toItemId(5)             // 5
 * toItemId([5, 2])        // 5
 * toItemId({ id: 5 })     // 5
 * toItemId(null)          // null
 * ```
 */
export function toItemId(item: RecipeItem | undefined): number | null {
  if (item === null || item === undefined) return null;
  if (typeof item === 'number') return item;
  if (Array.isArray(item)) return item[0];
  return item.id;
}

/**
 * Number of items a recipe produces per craft (1 when unspecified)
 */
export function getResultCount(recipe: MinecraftRecipe): number {
  const result = recipe.result;
  if (result !== null && typeof result === 'object' && !Array.isArray(result) && typeof result.count === 'number') {
    return result.count;
  }
  return 1;
}

/**
 * All ingredient ids of a recipe, one entry per grid cell
 */
export function getIngredientIds(recipe: MinecraftRecipe): number[] {
  const cells: RecipeItem[] = [];
  if (recipe.ingredients) {
    cells.push(...recipe.ingredients);
  } else {
    for (const row of recipe.inShape ?? []) cells.push(...row);
  }
  return cells.map(cell => toItemId(cell)).filter((id): id is number => id !== null && id >= 0);
}

/**
 * Counts how many of each ingredient a recipe needs
 *
 * @returns Map of ingredient ID to count, in order of first appearance
 *
 * @example
 * ```typescript
 * const recipe = { inShape: [[1, 1], [2, 2]], result: { id: 3, count: 1 } };
 * getIngredientCounts(recipe); // Map { 1 => 2, 2 => 2 }
 * ```
 */
export function getIngredientCounts(recipe: MinecraftRecipe): Map<number, number> {
  const counts = new Map<number, number>();
  for (const id of getIngredientIds(recipe)) {
    counts.set(id, (counts.get(id) || 0) + 1);
  }
  return counts;
}

/**
 * Checks if a recipe needs a crafting table rather than the 2x2 inventory grid
 *
 * @example
 * ```typescript
 * requiresCraftingTable({ inShape: [[1, 2, 3], [4, 5, 6]], result: 7 }); // true
 * requiresCraftingTable({ ingredients: [1, 2], result: 7 });               // false
 * ```
 */
export function requiresCraftingTable(recipe: MinecraftRecipe): boolean {
  if (recipe.inShape) {
    const tooWide = recipe.inShape.some(row => row.length > 2);
    const tooTall = recipe.inShape.length > 2;
    return tooWide || tooTall;
  }
  if (recipe.ingredients) {
    return getIngredientIds(recipe).length > 4;
  }
  return false;
}

/**
 * Checks if any recipe for `ingredientId` consumes `itemId`
 */
export function hasCircularDependency(mcData: MinecraftData, itemId: number, ingredientId: number): boolean {
  const ingredientRecipes = mcData.recipes[ingredientId] || [];
  return ingredientRecipes.some(r => getIngredientIds(r).includes(itemId));
}

/**
 * A recipe that breaks one kind of item into more items (iron block -> 9 ingots)
 */
export function isUnpackingRecipe(recipe: MinecraftRecipe): boolean {
  const counts = getIngredientCounts(recipe);
  if (counts.size !== 1) return false;
  const [cells] = counts.values();
  return getResultCount(recipe) > cells;
}
