import { IncomparableValuesError, InvalidArgumentError, describeValue } from '../errors/index.js';
import {
  Comparator,
  Ordering,
  OrderingStrategy,
  compare,
  defineStrategy,
  invert,
  strategyName,
} from './strategy.js';

// Every combinator returns a fresh strategy and leaves its inputs untouched.
// Component strategies are shared by reference, never copied or owned.

export function thenBy<T>(primary: Comparator<T>, secondary: Comparator<T>): OrderingStrategy<T> {
  const name = `thenBy(${strategyName(primary)}, ${strategyName(secondary)})`;
  return defineStrategy<T>(name, (a, b) => {
    const first = compare(primary, a, b);
    return first !== Ordering.EQUAL ? first : compare(secondary, a, b);
  });
}

export function reversed<T>(strategy: Comparator<T>): OrderingStrategy<T> {
  return defineStrategy<T>(`reversed(${strategyName(strategy)})`, (a, b) => invert(compare(strategy, a, b)));
}

/**
 * Priority-ordered composite: later strategies only break ties left by
 * earlier ones. `composite(a, b, c)` orders like `thenBy(thenBy(a, b), c)`.
 */
export function composite<T>(...strategies: Comparator<T>[]): OrderingStrategy<T> {
  if (strategies.length === 0) {
    throw new InvalidArgumentError('composite() needs at least one strategy', 'strategies');
  }
  const parts = [...strategies];
  const name = parts.length === 1
    ? strategyName(parts[0])
    : `composite(${parts.map(s => strategyName(s)).join(', ')})`;

  return defineStrategy<T>(name, (a, b) => {
    for (const part of parts) {
      const result = compare(part, a, b);
      if (result !== Ordering.EQUAL) return result;
    }
    return Ordering.EQUAL;
  });
}

export interface ByKeyOptions {
  /** Strategy name used in error messages. */
  name?: string;
  /**
   * Where elements whose key is null or undefined go. Without it a missing
   * key makes the pair incomparable.
   */
  nulls?: 'first' | 'last';
}

/**
 * Compare elements by a projection. `extractor` must be pure and total over
 * valid elements.
 */
export function byKey<T, K>(
  extractor: (item: T) => K | null | undefined,
  keyOrdering: Comparator<K>,
  options: ByKeyOptions = {}
): OrderingStrategy<T> {
  const name = options.name ?? `byKey(${strategyName(keyOrdering)})`;

  return defineStrategy<T>(name, (a, b) => {
    const left = extractor(a);
    const right = extractor(b);

    if (left === null || left === undefined || right === null || right === undefined) {
      const leftMissing = left === null || left === undefined;
      const rightMissing = right === null || right === undefined;

      if (options.nulls === undefined) {
        const side = leftMissing ? 'left' : 'right';
        throw new IncomparableValuesError(
          `Strategy "${name}" found no key on the ${side} element ${describeValue(leftMissing ? a : b)}`,
          a,
          b,
          name
        );
      }
      if (leftMissing && rightMissing) return Ordering.EQUAL;
      const missingFirst = options.nulls === 'first';
      return leftMissing === missingFirst ? Ordering.LESS : Ordering.GREATER;
    }

    try {
      return compare(keyOrdering, left, right);
    } catch (error) {
      // Report the elements, not just their keys
      if (error instanceof IncomparableValuesError) {
        throw new IncomparableValuesError(
          `Strategy "${name}" could not compare ${describeValue(a)} and ${describeValue(b)}: ${error.message}`,
          a,
          b,
          name
        );
      }
      throw error;
    }
  });
}
