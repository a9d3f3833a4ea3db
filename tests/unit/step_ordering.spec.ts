import { PlanConsistencyError } from '../../crafting/errors';
import { PlanStep, Recipe } from '../../crafting/recipe';
import { orderSteps } from '../../crafting/stepOrdering';
import { describeSteps, recipe, stack } from '../testHelpers';

const planks = recipe(stack('Oak Wood Planks', 4), 'Crafting Table', [stack('Oak Log', 1)]);
const torch = recipe(stack('Torch', 4), 'Crafting Table', [stack('Coal', 1), stack('Stick', 1)]);

function step(r: Recipe, repeats: number): PlanStep {
    return { recipe: r, repeats };
}

describe('unit: orderSteps', () => {
    test('puts merged raw materials first', () => {
        const ordered = orderSteps([
            step(planks, 1),
            step(Recipe.rawMaterial('Oak Log'), 1),
            step(Recipe.rawMaterial('Oak Log'), 2)
        ]);
        expect(describeSteps(ordered)).toEqual(['Raw Material: Oak Log x3', 'Crafting Table: Oak Wood Planks x1']);
    });

    test('merges steps for the same item that become runnable together', () => {
        const ordered = orderSteps([step(planks, 1), step(Recipe.rawMaterial('Oak Log'), 2), step(planks, 1)]);
        expect(describeSteps(ordered)).toEqual(['Raw Material: Oak Log x2', 'Crafting Table: Oak Wood Planks x2']);
    });

    test('emits a stocked ingredient right before its first consumer, scaled by that step', () => {
        const ordered = orderSteps([
            step(torch, 3),
            step(Recipe.inStorage('Stick'), 3),
            step(Recipe.rawMaterial('Coal'), 3)
        ]);
        expect(describeSteps(ordered)).toEqual([
            'Raw Material: Coal x3',
            'In Storage: Stick x9',
            'Crafting Table: Torch x3'
        ]);
    });

    test('waits for a crafted ingredient when storage alone is short', () => {
        const stick = recipe(stack('Stick', 4), 'Crafting Table', [stack('Oak Wood Planks', 2)]);
        const ordered = orderSteps([
            step(torch, 2),
            step(Recipe.inStorage('Stick'), 1),
            step(stick, 1),
            step(Recipe.inStorage('Oak Wood Planks'), 2),
            step(Recipe.rawMaterial('Coal'), 2)
        ]);
        expect(describeSteps(ordered)).toEqual([
            'Raw Material: Coal x2',
            'In Storage: Oak Wood Planks x2',
            'Crafting Table: Stick x1',
            'In Storage: Stick x2',
            'Crafting Table: Torch x2'
        ]);
    });

    test('stock does not stand in for an ingredient that is still being crafted', () => {
        const rod = recipe(stack('Rod', 1), 'Lathe', [stack('Ore', 1)]);
        const frame = recipe(stack('Frame', 1), 'Bench', [stack('Rod', 2)]);
        const ordered = orderSteps([
            step(frame, 1),
            step(Recipe.inStorage('Rod'), 2),
            step(rod, 2),
            step(Recipe.rawMaterial('Ore'), 2)
        ]);
        expect(describeSteps(ordered)).toEqual([
            'Raw Material: Ore x2',
            'Lathe: Rod x2',
            'In Storage: Rod x2',
            'Bench: Frame x1'
        ]);
    });

    test('closes the plan with stocked items no step consumed', () => {
        const ordered = orderSteps([step(Recipe.inStorage('Stick'), 2)]);
        expect(describeSteps(ordered)).toEqual(['In Storage: Stick x2']);
    });

    test('throws when a step can never run', () => {
        expect(() => orderSteps([step(planks, 1)])).toThrow(PlanConsistencyError);
    });
});
