/**
 * Reader for the plain-text recipe format
 *
 * ```text
 * Oak Wood Planks (4): Oak Log (1)
 *
 * Charcoal (1) (Furnace): Oak Log (1)
 *
 * Wooden Shovel (1):
 *     Oak Wood Planks (1)
 *     Stick (2)
 * ```
 */

import { CraftingError } from '../crafting/errors';
import { Recipe } from '../crafting/recipe';
import { Stack } from '../crafting/stack';
import { getDefaultRecipeMethod } from '../utils/config';

export class RecipeParseError extends CraftingError {
  readonly line: number;

  constructor(line: number, message: string) {
    super('PARSE_ERROR', `line ${line}: ${message}`);
    this.name = 'RecipeParseError';
    this.line = line;
  }
}

const COUNT = '([0-9][0-9_]*)';
const STACK_PATTERN = new RegExp(`^([^(]+)\\(${COUNT}\\)$`);
const HEADER_PATTERN = new RegExp(`^([^(]+)\\(${COUNT}\\)(?: \\(([^)]+)\\))?:(.*)$`);
const INDENT_PATTERN = /^[ \t]+/;

interface Line {
  text: string;
  number: number;
  terminated: boolean;
}

/**
 * Reads an unsigned count, ignoring `_` separators
 *
 * @example
 * parseCount('1_000') // 1000
 */
export function parseCount(digits: string): number | null {
  if (!/^[0-9][0-9_]*$/.test(digits)) return null;
  let value = 0;
  for (const ch of digits) {
    if (ch === '_') continue;
    value = value * 10 + (ch.charCodeAt(0) - 48);
    if (!Number.isSafeInteger(value)) return null;
  }
  return value;
}

function toStack(name: string, digits: string, lineNumber: number): Stack {
  const count = parseCount(digits);
  if (count === null) {
    throw new RecipeParseError(lineNumber, `count too large: ${digits}`);
  }
  const item = name.trim();
  if (item.length === 0) {
    throw new RecipeParseError(lineNumber, 'missing item name');
  }
  return new Stack(item, count);
}

function parseStackAt(text: string, lineNumber: number): Stack {
  const match = STACK_PATTERN.exec(text.trim());
  if (!match) {
    throw new RecipeParseError(lineNumber, `expected "<item> (<count>)", got ${JSON.stringify(text.trim())}`);
  }
  return toStack(match[1], match[2], lineNumber);
}

function parseIngredientAt(text: string, lineNumber: number, result: Stack): Stack {
  const ingredient = parseStackAt(text, lineNumber);
  if (ingredient.count === 0) {
    throw new RecipeParseError(lineNumber, `ingredient ${ingredient.item} of ${result.item} must have a count of at least 1`);
  }
  return ingredient;
}

/**
 * Parses a single `Item (count)`, as typed at the shell
 */
export function parseStack(text: string): Stack {
  return parseStackAt(text, 1);
}

function splitLines(text: string): Line[] {
  const lines: Line[] = [];
  const parts = text.split('\n');
  parts.forEach((part, i) => {
    const terminated = i < parts.length - 1;
    // The piece after the final newline is empty for well-formed input
    if (!terminated && part.length === 0) return;
    lines.push({ text: part.endsWith('\r') ? part.slice(0, -1) : part, number: i + 1, terminated });
  });
  return lines;
}

function requireTerminated(line: Line): void {
  if (!line.terminated) {
    throw new RecipeParseError(line.number, 'unterminated block: missing final line break');
  }
}

/**
 * Parses recipe blocks separated by blank lines.
 *
 * @param defaultMethod - Method for recipes that do not name one
 * @throws RecipeParseError on the first malformed line
 */
export function parseRecipes(text: string, defaultMethod: string = getDefaultRecipeMethod()): Recipe[] {
  const lines = splitLines(text);
  const recipes: Recipe[] = [];
  let i = 0;

  while (i < lines.length) {
    const line = lines[i];
    if (line.text.trim().length === 0) {
      i++;
      continue;
    }
    if (INDENT_PATTERN.test(line.text)) {
      throw new RecipeParseError(line.number, 'ingredient line outside of a recipe');
    }

    const header = HEADER_PATTERN.exec(line.text);
    if (!header) {
      throw new RecipeParseError(line.number, `expected "<item> (<count>)[ (<method>)]:", got ${JSON.stringify(line.text)}`);
    }
    const result = toStack(header[1], header[2], line.number);
    if (result.count === 0) {
      throw new RecipeParseError(line.number, `recipe for ${result.item} must produce at least one item`);
    }
    const method = header[3] ?? defaultMethod;
    const rest = header[4];
    const ingredients: Stack[] = [];

    if (rest.length > 0) {
      if (!rest.startsWith(' ')) {
        throw new RecipeParseError(line.number, 'expected a space before the ingredient');
      }
      ingredients.push(parseIngredientAt(rest, line.number, result));
      requireTerminated(line);
      i++;
    } else {
      i++;
      while (i < lines.length && INDENT_PATTERN.test(lines[i].text) && lines[i].text.trim().length > 0) {
        ingredients.push(parseIngredientAt(lines[i].text, lines[i].number, result));
        requireTerminated(lines[i]);
        i++;
      }
      if (ingredients.length === 0) {
        throw new RecipeParseError(line.number, `recipe for ${result.item} has no ingredients`);
      }
    }

    recipes.push(new Recipe(result, method, ingredients));
  }

  return recipes;
}
