import { InvalidArgumentError, NoOrderingAvailableError, describeValue } from '../errors/index.js';
import { isNaturallyOrdered, naturalOrder } from '../ordering/natural.js';
import { Comparator, Ordering, compare } from '../ordering/strategy.js';
import { requireArray } from './sort.js';

export interface SearchResult {
  /** Whether an element comparing EQUAL to the target exists. */
  found: boolean;
  /**
   * Index of the first EQUAL element when found, otherwise the index at which
   * the target would have to be inserted to keep the sequence ordered.
   */
  index: number;
}

// Only the target is checked here; `compare` checks each element the search probes.
function resolveForTarget<T>(sequence: readonly T[], target: T, strategy?: Comparator<T>): Comparator<T> {
  requireArray(sequence, 'sequence');
  if (target === null || target === undefined) {
    throw new InvalidArgumentError(`Search target is ${target === null ? 'null' : 'undefined'}`, 'target');
  }
  if (strategy !== undefined) {
    return strategy;
  }
  if (!isNaturallyOrdered(target)) {
    throw new NoOrderingAvailableError(
      `No ordering strategy was given and the target ${describeValue(target)} has no natural ordering`
    );
  }
  return naturalOrder<T>();
}

/**
 * Binary search.
 *
 * Precondition: `sequence` is already ordered by `strategy` (or by natural
 * ordering when none is given). This is not checked; on an unordered
 * sequence the result is meaningless. Absent elements are only detected
 * when the search reaches them.
 */
export function findPosition<T>(
  sequence: readonly T[],
  target: T,
  strategy?: Comparator<T>
): SearchResult {
  const comparator = resolveForTarget(sequence, target, strategy);

  let low = 0;
  let high = sequence.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    if (compare(comparator, sequence[mid], target) === Ordering.LESS) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }

  const found = low < sequence.length && compare(comparator, sequence[low], target) === Ordering.EQUAL;
  return { found, index: low };
}

/**
 * Insert `item` into an ordered sequence after any elements equal to it,
 * so insertion order is kept among equals. Same precondition as
 * `findPosition`.
 *
 * @returns the index the item was inserted at
 */
export function insertSorted<T>(sequence: T[], item: T, strategy?: Comparator<T>): number {
  const comparator = resolveForTarget(sequence, item, strategy);

  let low = 0;
  let high = sequence.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    if (compare(comparator, item, sequence[mid]) === Ordering.LESS) {
      high = mid;
    } else {
      low = mid + 1;
    }
  }

  sequence.splice(low, 0, item);
  return low;
}
