import * as fs from 'fs';
import { Recipe } from '../crafting/recipe';
import { parseRecipes } from '../recipe_format/parser';
import { getDefaultRecipeMethod } from './config';

/**
 * Reads and parses a recipe file
 *
 * @throws RecipeParseError when the file content is malformed
 */
export function readRecipeFile(filePath: string, defaultMethod: string = getDefaultRecipeMethod()): Recipe[] {
  const text = fs.readFileSync(filePath, 'utf8');
  return parseRecipes(text, defaultMethod);
}

/**
 * Creates or truncates `filePath` and writes `text` to it
 */
export function writeTextFile(filePath: string, text: string): void {
  fs.writeFileSync(filePath, text, 'utf8');
}
