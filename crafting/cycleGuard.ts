import { Recipe } from './recipe';

/**
 * Color states for DFS cycle detection
 */
enum Color {
  GRAY = 1, // On the current path
  BLACK = 2 // Fully explored
}

interface Frame {
  item: string;
  next: number;
  ingredients: readonly string[];
}

/**
 * Finds a recipe cycle reachable from `start`.
 *
 * Only items with a catalog recipe are followed; raw materials end a path.
 * The walk is iterative so deep recipe chains do not exhaust the call stack.
 *
 * @returns The cycle as a path that starts and ends on the same item
 *   (e.g. `['A', 'B', 'A']`), or null when the reachable graph is acyclic
 */
export function findRecipeCycle(recipes: ReadonlyMap<string, Recipe>, start: string): string[] | null {
  const color = new Map<string, Color>();
  const path: Frame[] = [];

  const enter = (item: string): void => {
    const recipe = recipes.get(item);
    color.set(item, Color.GRAY);
    path.push({ item, next: 0, ingredients: recipe ? recipe.ingredients.map(s => s.item) : [] });
  };

  if (!recipes.has(start)) return null;
  enter(start);

  while (path.length > 0) {
    const frame = path[path.length - 1];
    if (frame.next >= frame.ingredients.length) {
      color.set(frame.item, Color.BLACK);
      path.pop();
      continue;
    }
    const ingredient = frame.ingredients[frame.next++];
    if (!recipes.has(ingredient)) continue;
    const state = color.get(ingredient);
    if (state === Color.BLACK) continue;
    if (state === Color.GRAY) {
      const from = path.findIndex(f => f.item === ingredient);
      return [...path.slice(from).map(f => f.item), ingredient];
    }
    enter(ingredient);
  }
  return null;
}
