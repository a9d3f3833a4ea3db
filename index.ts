/**
 * Public API: the planning engine, the recipe text format and the minecraft-data importer
 */

export * from './crafting';
export * from './recipe_format';
export * from './recipe_sources';
