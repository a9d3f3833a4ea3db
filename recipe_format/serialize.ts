import { PlanStep, Recipe } from '../crafting/recipe';
import { Stack } from '../crafting/stack';

const INGREDIENT_INDENT = '    ';

export function formatStack(stack: Stack, repeats: number = 1): string {
  return stack.times(repeats).toString();
}

/**
 * Writes a recipe block with every quantity scaled by `repeats`
 *
 * @example
 * ```typescript
 * formatRecipe(shovel, 2);
 * // 'Wooden Shovel (2) (Crafting Table):\n    Oak Wood Planks (2)\n    Stick (4)\n'
 * ```
 */
export function formatRecipe(recipe: Recipe, repeats: number = 1): string {
  const lines = [`${formatStack(recipe.result, repeats)} (${recipe.method}):`];
  for (const ingredient of recipe.ingredients) {
    lines.push(`${INGREDIENT_INDENT}${formatStack(ingredient, repeats)}`);
  }
  return lines.map(line => `${line}\n`).join('');
}

/**
 * Writes recipes separated by blank lines, readable by `parseRecipes`
 */
export function formatRecipes(recipes: readonly Recipe[]): string {
  return recipes.map(recipe => formatRecipe(recipe)).join('\n');
}

/**
 * Writes each step as its recipe scaled by the step's repeat count
 */
export function formatPlan(steps: readonly PlanStep[]): string {
  return steps.map(step => formatRecipe(step.recipe, step.repeats)).join('\n');
}

export function formatResources(resources: readonly Stack[]): string {
  return resources.map(stack => `${stack}\n`).join('');
}
