import { CountOverflowError } from '../crafting/errors';

/**
 * Integer helpers for item counts. Every result must stay a safe integer.
 */

export function isCount(n: number): boolean {
  return Number.isSafeInteger(n) && n >= 0;
}

export function checkedAdd(a: number, b: number): number {
  const sum = a + b;
  if (!Number.isSafeInteger(sum)) {
    throw new CountOverflowError(`count overflow: ${a} + ${b}`);
  }
  return sum;
}

export function checkedMul(a: number, b: number): number {
  const product = a * b;
  if (!Number.isSafeInteger(product)) {
    throw new CountOverflowError(`count overflow: ${a} * ${b}`);
  }
  return product;
}

/**
 * Smallest `n` with `n * divisor >= dividend`, for counts and a positive divisor.
 *
 * @example
 * ceilDiv(5, 4) // 2
 * ceilDiv(8, 4) // 2
 * ceilDiv(0, 4) // 0
 */
export function ceilDiv(dividend: number, divisor: number): number {
  let quotient = Math.floor(dividend / divisor);
  // Float division can land one off for large operands
  while (quotient * divisor < dividend) quotient++;
  while (quotient > 0 && (quotient - 1) * divisor >= dividend) quotient--;
  return quotient;
}
