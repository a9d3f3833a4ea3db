export { parseRecipes, parseStack, parseCount, RecipeParseError } from './parser';
export { formatStack, formatRecipe, formatRecipes, formatPlan, formatResources } from './serialize';
