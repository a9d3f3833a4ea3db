import { Recipe } from '../crafting/recipe';
import { Stack } from '../crafting/stack';
import { getUseDisplayNames } from '../utils/config';
import logger from '../utils/logger';
import {
  getIngredientCounts,
  getResultCount,
  hasCircularDependency,
  isUnpackingRecipe,
  requiresCraftingTable,
  toItemId
} from './recipeUtils';
import { FURNACE_METHOD, getFurnaceInputFor, getSmeltedItemNames } from './smeltingConfig';
import { MinecraftData, MinecraftRecipe } from './types';

export const CRAFTING_TABLE_METHOD = 'Crafting Table';
export const INVENTORY_METHOD = 'Inventory';

export interface MinecraftImportOptions {
  /**
   * Label items by display name ('Oak Log') instead of id name ('oak_log')
   */
  useDisplayNames?: boolean;

  /**
   * Add furnace recipes; they replace crafting recipes for the same item
   */
  includeSmelting?: boolean;
}

/**
 * Picks the recipe to use for an item.
 *
 * The first candidate wins unless it unpacks an item that is itself crafted
 * from this one (ingot from block while block comes from ingots), which would
 * make the catalog cyclic.
 */
export function chooseRecipe(mcData: MinecraftData, itemId: number, candidates: readonly MinecraftRecipe[]): MinecraftRecipe | undefined {
  return candidates.find(candidate => {
    const ingredients = Array.from(getIngredientCounts(candidate).keys());
    if (ingredients.length === 0) return false;
    if (!isUnpackingRecipe(candidate)) return true;
    return !ingredients.some(id => hasCircularDependency(mcData, itemId, id));
  });
}

/**
 * Builds a recipe catalog from minecraft-data
 *
 * @example
 * ```typescript
 * const mcData = resolveMinecraftData('1.20.1');
 * if (mcData) calculator.addRecipes(buildRecipesFromMinecraftData(mcData));
 * ```
 */
export function buildRecipesFromMinecraftData(mcData: MinecraftData, options: MinecraftImportOptions = {}): Recipe[] {
  const useDisplayNames = options.useDisplayNames ?? getUseDisplayNames();
  const includeSmelting = options.includeSmelting ?? true;

  const label = (id: number): string => {
    const item = mcData.items[id];
    if (!item) return String(id);
    return useDisplayNames ? item.displayName : item.name;
  };

  const recipes = new Map<string, Recipe>();

  for (const [key, candidates] of Object.entries(mcData.recipes)) {
    const itemId = Number(key);
    if (!candidates || !Number.isInteger(itemId)) continue;
    const chosen = chooseRecipe(mcData, itemId, candidates);
    if (!chosen) continue;

    const resultId = toItemId(chosen.result) ?? itemId;
    const ingredients = Array.from(getIngredientCounts(chosen), ([id, count]) => new Stack(label(id), count));
    const method = requiresCraftingTable(chosen) ? CRAFTING_TABLE_METHOD : INVENTORY_METHOD;
    const recipe = new Recipe(new Stack(label(resultId), getResultCount(chosen)), method, ingredients);
    recipes.set(recipe.result.item, recipe);
  }

  if (includeSmelting) {
    for (const outputName of getSmeltedItemNames()) {
      const inputName = getFurnaceInputFor(outputName);
      const output = mcData.itemsByName[outputName];
      const input = inputName !== undefined ? mcData.itemsByName[inputName] : undefined;
      if (!output || !input) continue;
      const recipe = new Recipe(new Stack(label(output.id), 1), FURNACE_METHOD, [new Stack(label(input.id), 1)]);
      recipes.set(recipe.result.item, recipe);
    }
  }

  logger.debug(`imported ${recipes.size} recipe(s) from minecraft-data`);
  return Array.from(recipes.values());
}
