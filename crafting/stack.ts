import { InvalidStackError } from './errors';
import { checkedMul, isCount } from '../utils/checkedMath';

/**
 * Item used as the calculator's target before one is set
 */
export const PLACEHOLDER_ITEM = 'Air';

/**
 * A number of items that are all the same item.
 *
 * @example
 * ```typescript
 * const planks = new Stack('Oak Wood Planks', 4);
 * planks.toString(); // 'Oak Wood Planks (4)'
 * ```
 */
export class Stack {
  readonly item: string;
  readonly count: number;

  constructor(item: string, count: number) {
    const name = item.trim();
    if (name.length === 0) {
      throw new InvalidStackError('item name must not be empty');
    }
    if (!isCount(count)) {
      throw new InvalidStackError(`invalid count for ${name}: ${count}`);
    }
    this.item = name;
    this.count = count;
  }

  equals(other: Stack): boolean {
    return this.item === other.item && this.count === other.count;
  }

  /**
   * The same item with its count multiplied by `factor`
   */
  times(factor: number): Stack {
    return new Stack(this.item, checkedMul(this.count, factor));
  }

  toString(): string {
    return `${this.item} (${this.count})`;
  }
}
