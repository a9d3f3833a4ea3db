import { parseCount, parseRecipes, parseStack, RecipeParseError } from '../../recipe_format/parser';

function parseError(text: string): RecipeParseError | undefined {
    try {
        parseRecipes(text);
    } catch (err) {
        if (err instanceof RecipeParseError) return err;
        throw err;
    }
    return undefined;
}

describe('unit: recipe parser', () => {
    describe('parseCount', () => {
        test('reads digits with underscore separators', () => {
            expect(parseCount('4')).toBe(4);
            expect(parseCount('1_000')).toBe(1000);
            expect(parseCount('1__0')).toBe(10);
        });

        test('rejects malformed or oversized counts', () => {
            expect(parseCount('_1')).toBeNull();
            expect(parseCount('')).toBeNull();
            expect(parseCount('12a')).toBeNull();
            expect(parseCount('99999999999999999')).toBeNull();
        });
    });

    describe('parseStack', () => {
        test('reads an item and a count', () => {
            expect(parseStack('  Stick (2) ').toString()).toBe('Stick (2)');
        });

        test('rejects text without a count', () => {
            expect(() => parseStack('Stick')).toThrow('line 1: expected "<item> (<count>)", got "Stick"');
        });
    });

    describe('parseRecipes', () => {
        test('reads a one-line recipe with the default method', () => {
            const [planks] = parseRecipes('Oak Wood Planks (4): Oak Log (1)\n');
            expect(planks.result.toString()).toBe('Oak Wood Planks (4)');
            expect(planks.method).toBe('Crafting Table');
            expect(planks.ingredients.map(String)).toEqual(['Oak Log (1)']);
            expect(planks.kind).toBe('crafted');
        });

        test('reads an explicit method', () => {
            const [charcoal] = parseRecipes('Charcoal (1) (Furnace): Oak Log (1)\n');
            expect(charcoal.method).toBe('Furnace');
        });

        test('uses the given default method', () => {
            const [charcoal] = parseRecipes('Charcoal (1): Oak Log (1)\n', 'Furnace');
            expect(charcoal.method).toBe('Furnace');
        });

        test('reads indented ingredient lines and blank-line separated blocks', () => {
            const recipes = parseRecipes(
                'Wooden Shovel (1):\n' +
                '    Oak Wood Planks (1)\n' +
                '\tStick (2)\n' +
                '\n' +
                '\n' +
                'Stick (4): Oak Wood Planks (2)\n'
            );
            expect(recipes.map(r => r.result.item)).toEqual(['Wooden Shovel', 'Stick']);
            expect(recipes[0].ingredients.map(String)).toEqual(['Oak Wood Planks (1)', 'Stick (2)']);
        });

        test('accepts CRLF line breaks and separated counts', () => {
            const [stone] = parseRecipes('Stone (1_000) (Furnace): Cobblestone (1_000)\r\n');
            expect(stone.result.toString()).toBe('Stone (1000)');
            expect(stone.ingredients.map(String)).toEqual(['Cobblestone (1000)']);
        });

        test('empty input has no recipes', () => {
            expect(parseRecipes('')).toEqual([]);
            expect(parseRecipes('\n\n')).toEqual([]);
        });

        test('requires a final line break', () => {
            const err = parseError('Charcoal (1): Oak Log (1)');
            expect(err?.line).toBe(1);
            expect(err?.message).toBe('line 1: unterminated block: missing final line break');
        });

        test('reports the line of a malformed header', () => {
            const err = parseError('Stick (4): Oak Wood Planks (2)\n\nTorch (four): Coal (1)\n');
            expect(err?.line).toBe(3);
            expect(err?.code).toBe('PARSE_ERROR');
        });

        test('rejects a recipe without ingredients', () => {
            const err = parseError('Stick (4):\n\nTorch (4): Coal (1)\n');
            expect(err?.message).toBe('line 1: recipe for Stick has no ingredients');
        });

        test('rejects an ingredient line outside of a recipe', () => {
            expect(parseError('    Stick (2)\n')?.message).toBe('line 1: ingredient line outside of a recipe');
        });

        test('rejects a recipe producing nothing', () => {
            expect(parseError('Stick (0): Oak Wood Planks (2)\n')?.message).toBe('line 1: recipe for Stick must produce at least one item');
        });

        test('rejects an ingredient with a zero count', () => {
            expect(parseError('Widget (1): Bolt (0)\n')?.message).toBe('line 1: ingredient Bolt of Widget must have a count of at least 1');
            expect(parseError('Widget (1):\n    Plate (2)\n    Bolt (0)\n')?.line).toBe(3);
        });

        test('rejects a count beyond the safe range', () => {
            expect(parseError('Stick (99999999999999999): Oak Wood Planks (2)\n')?.message).toBe('line 1: count too large: 99999999999999999');
        });

        test('rejects a malformed ingredient on its own line', () => {
            const err = parseError('Wooden Shovel (1):\n    Oak Wood Planks (1)\n    Stick\n');
            expect(err?.line).toBe(3);
        });
    });
});
