/**
 * The parts of a minecraft-data instance the recipe importer reads
 */

/**
 * How minecraft-data refers to an item inside a recipe. Depending on the
 * game version this is a bare id, an `[id, metadata]` pair or an object.
 */
export type RecipeItem = number | [number, number] | { id: number; metadata?: number; count?: number } | null;

export interface MinecraftItem {
  id: number;
  name: string;
  displayName: string;
}

export interface MinecraftRecipe {
  result: RecipeItem;
  inShape?: RecipeItem[][];
  ingredients?: RecipeItem[];
}

export interface MinecraftData {
  items: Record<number, MinecraftItem | undefined>;
  itemsByName: Record<string, MinecraftItem | undefined>;
  // Keyed by result item id
  recipes: Record<string, MinecraftRecipe[] | undefined>;
}
