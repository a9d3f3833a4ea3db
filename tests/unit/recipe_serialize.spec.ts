import { Calculator } from '../../crafting/calculator';
import { parseRecipes } from '../../recipe_format/parser';
import { formatPlan, formatRecipe, formatRecipes, formatResources, formatStack } from '../../recipe_format/serialize';
import { recipe, stack, woodRecipes } from '../testHelpers';

const shovel = recipe(stack('Wooden Shovel', 1), 'Crafting Table', [stack('Oak Wood Planks', 1), stack('Stick', 2)]);

describe('unit: recipe serializer', () => {
    test('formats a stack scaled by repeats', () => {
        expect(formatStack(stack('Stick', 2), 3)).toBe('Stick (6)');
    });

    test('formats a recipe block with indented ingredients', () => {
        expect(formatRecipe(shovel)).toBe('Wooden Shovel (1) (Crafting Table):\n    Oak Wood Planks (1)\n    Stick (2)\n');
    });

    test('scales every quantity by repeats', () => {
        expect(formatRecipe(shovel, 2)).toBe('Wooden Shovel (2) (Crafting Table):\n    Oak Wood Planks (2)\n    Stick (4)\n');
    });

    test('separates recipes with a blank line', () => {
        const [planks, stick] = woodRecipes();
        expect(formatRecipes([planks, stick])).toBe(
            'Oak Wood Planks (4) (Crafting Table):\n    Oak Log (1)\n' +
            '\n' +
            'Stick (4) (Crafting Table):\n    Oak Wood Planks (2)\n'
        );
    });

    test('formatted recipes parse back to the same recipes', () => {
        const recipes = woodRecipes();
        const parsed = parseRecipes(formatRecipes(recipes));
        expect(parsed).toHaveLength(recipes.length);
        parsed.forEach((r, i) => expect(r.equals(recipes[i])).toBe(true));
    });

    test('formats a plan step by step', () => {
        const calculator = new Calculator([recipe(stack('Charcoal', 1), 'Furnace', [stack('Oak Log', 1)])]);
        calculator.setTarget(stack('Charcoal', 2));
        expect(formatPlan(calculator.getSteps())).toBe('Oak Log (2) (Raw Material):\n\nCharcoal (2) (Furnace):\n    Oak Log (2)\n');
    });

    test('formats resources one per line', () => {
        expect(formatResources([stack('Stick', 1), stack('Oak Log', 3)])).toBe('Stick (1)\nOak Log (3)\n');
        expect(formatResources([])).toBe('');
    });
});
