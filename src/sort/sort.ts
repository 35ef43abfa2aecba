import { InvalidArgumentError } from '../errors/index.js';
import { resolveStrategy } from '../ordering/natural.js';
import { Comparator, Ordering, compare } from '../ordering/strategy.js';

export function requireArray(value: unknown, argument: string): void {
  if (!Array.isArray(value)) {
    throw new InvalidArgumentError(`Expected ${argument} to be an array`, argument);
  }
}

/**
 * Stable in-place sort.
 *
 * Without `strategy` the elements' natural ordering (`compareTo`) is used;
 * if they have none this throws NoOrderingAvailableError.
 *
 * Sorting happens on a working copy that is written back only once every
 * comparison has succeeded, so an error thrown by the strategy leaves
 * `sequence` in its original order.
 *
 * @returns the same array instance, reordered
 */
export function sort<T>(sequence: T[], strategy?: Comparator<T>): T[] {
  requireArray(sequence, 'sequence');
  const comparator = resolveStrategy(sequence, strategy);
  if (sequence.length < 2) {
    return sequence;
  }

  // Array.prototype.sort is stable (ES2019)
  const working = [...sequence].sort((a, b) => compare(comparator, a, b));
  for (let i = 0; i < working.length; i++) {
    sequence[i] = working[i];
  }
  return sequence;
}

/**
 * Copying variant of `sort`: returns a new array, `items` is untouched.
 */
export function sorted<T>(items: readonly T[], strategy?: Comparator<T>): T[] {
  requireArray(items, 'items');
  return sort([...items], strategy);
}

/**
 * Index of the first element that is GREATER than its successor, or -1 when
 * the sequence is already ordered.
 */
export function findUnorderedIndex<T>(sequence: readonly T[], strategy?: Comparator<T>): number {
  requireArray(sequence, 'sequence');
  const comparator = resolveStrategy(sequence, strategy);
  for (let i = 1; i < sequence.length; i++) {
    if (compare(comparator, sequence[i - 1], sequence[i]) === Ordering.GREATER) {
      return i - 1;
    }
  }
  return -1;
}

export function isSorted<T>(sequence: readonly T[], strategy?: Comparator<T>): boolean {
  return findUnorderedIndex(sequence, strategy) === -1;
}
