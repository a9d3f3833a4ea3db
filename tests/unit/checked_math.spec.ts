import { CountOverflowError } from '../../crafting/errors';
import { ceilDiv, checkedAdd, checkedMul, isCount } from '../../utils/checkedMath';

describe('unit: checkedMath', () => {
    test('isCount accepts non-negative safe integers only', () => {
        expect(isCount(0)).toBe(true);
        expect(isCount(Number.MAX_SAFE_INTEGER)).toBe(true);
        expect(isCount(-1)).toBe(false);
        expect(isCount(0.5)).toBe(false);
    });

    test('checkedAdd and checkedMul throw instead of losing precision', () => {
        expect(checkedAdd(2, 3)).toBe(5);
        expect(checkedMul(4, 3)).toBe(12);
        expect(() => checkedAdd(Number.MAX_SAFE_INTEGER, 1)).toThrow(CountOverflowError);
        expect(() => checkedMul(Number.MAX_SAFE_INTEGER, 2)).toThrow(CountOverflowError);
    });

    test('ceilDiv rounds up', () => {
        expect(ceilDiv(0, 4)).toBe(0);
        expect(ceilDiv(1, 4)).toBe(1);
        expect(ceilDiv(4, 4)).toBe(1);
        expect(ceilDiv(5, 4)).toBe(2);
        expect(ceilDiv(10, 1)).toBe(10);
    });

    test('ceilDiv stays exact near the top of the safe range', () => {
        const big = Number.MAX_SAFE_INTEGER;
        expect(ceilDiv(big, 1)).toBe(big);
        expect(ceilDiv(big, 2)).toBe(4503599627370496);
        expect(ceilDiv(big, big)).toBe(1);
    });
});
