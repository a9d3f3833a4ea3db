export { buildRecipesFromMinecraftData, chooseRecipe, MinecraftImportOptions, CRAFTING_TABLE_METHOD, INVENTORY_METHOD } from './minecraftRecipes';
export { resolveMinecraftData, isMinecraftData } from './mcDataResolver';
export { FURNACE_METHOD } from './smeltingConfig';
export { MinecraftData, MinecraftRecipe, MinecraftItem, RecipeItem } from './types';
