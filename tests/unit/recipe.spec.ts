import { InvalidRecipeError } from '../../crafting/errors';
import { IN_STORAGE_METHOD, RAW_MATERIAL_METHOD, Recipe } from '../../crafting/recipe';
import { Stack } from '../../crafting/stack';

describe('unit: Recipe', () => {
    test('keeps its own copy of the ingredients', () => {
        const ingredients = [new Stack('Oak Log', 1)];
        const recipe = new Recipe(new Stack('Oak Wood Planks', 4), 'Crafting Table', ingredients);
        ingredients.push(new Stack('Stick', 1));
        expect(recipe.ingredients).toHaveLength(1);
        expect(Object.isFrozen(recipe.ingredients)).toBe(true);
    });

    test('catalog recipes are crafted', () => {
        const recipe = new Recipe(new Stack('Charcoal', 1), 'Furnace', [new Stack('Oak Log', 1)]);
        expect(recipe.kind).toBe('crafted');
        expect(recipe.isPseudo()).toBe(false);
    });

    test('rejects a recipe that produces nothing', () => {
        expect(() => new Recipe(new Stack('Charcoal', 0), 'Furnace', [new Stack('Oak Log', 1)])).toThrow(InvalidRecipeError);
    });

    test('rejects an ingredient with a zero count', () => {
        expect(() => new Recipe(new Stack('Widget', 1), 'Crafting Table', [new Stack('Bolt', 0)])).toThrow(
            'ingredient Bolt of Widget must have a count of at least 1'
        );
    });

    test('raw material marker yields one item from nothing', () => {
        const raw = Recipe.rawMaterial('Oak Log');
        expect(raw.result.toString()).toBe('Oak Log (1)');
        expect(raw.method).toBe(RAW_MATERIAL_METHOD);
        expect(raw.ingredients).toEqual([]);
        expect(raw.kind).toBe('raw');
        expect(raw.isPseudo()).toBe(true);
    });

    test('in storage marker yields one item from nothing', () => {
        const stored = Recipe.inStorage('Stick');
        expect(stored.result.toString()).toBe('Stick (1)');
        expect(stored.method).toBe(IN_STORAGE_METHOD);
        expect(stored.kind).toBe('storage');
    });

    test('equality covers kind, method, result and ingredients', () => {
        const a = new Recipe(new Stack('Charcoal', 1), 'Furnace', [new Stack('Oak Log', 1)]);
        expect(a.equals(new Recipe(new Stack('Charcoal', 1), 'Furnace', [new Stack('Oak Log', 1)]))).toBe(true);
        expect(a.equals(new Recipe(new Stack('Charcoal', 1), 'Smoker', [new Stack('Oak Log', 1)]))).toBe(false);
        expect(a.equals(new Recipe(new Stack('Charcoal', 1), 'Furnace', [new Stack('Birch Log', 1)]))).toBe(false);
        expect(Recipe.rawMaterial('Oak Log').equals(new Recipe(new Stack('Oak Log', 1), RAW_MATERIAL_METHOD, []))).toBe(false);
    });
});
