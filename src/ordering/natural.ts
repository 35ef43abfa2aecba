import { InvalidArgumentError, NoOrderingAvailableError, describeValue } from '../errors/index.js';
import { Comparator, OrderingStrategy, defineStrategy } from './strategy.js';

/**
 * Capability a type implements to declare its own default ordering.
 * `compareTo` follows the same sign contract as a strategy.
 */
export interface NaturallyOrdered<T> {
  compareTo(other: T): number;
}

export function isNaturallyOrdered(value: unknown): value is NaturallyOrdered<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'compareTo' in value &&
    typeof value.compareTo === 'function'
  );
}

const NATURAL_ORDER = defineStrategy<unknown>('natural', (a, b) => {
  if (!isNaturallyOrdered(a) || !isNaturallyOrdered(b)) {
    const missing = isNaturallyOrdered(a) ? b : a;
    throw new NoOrderingAvailableError(
      `${describeValue(missing)} does not implement compareTo, so it has no natural ordering`
    );
  }
  return a.compareTo(b);
});

/**
 * Strategy that defers to the elements' own `compareTo`.
 */
export function naturalOrder<T>(): OrderingStrategy<T> {
  return NATURAL_ORDER;
}

/**
 * Pick the strategy a sort or search runs with: the explicit one when given,
 * otherwise the elements' natural ordering. Every element must be present,
 * and without an explicit strategy every element must be naturally ordered.
 */
export function resolveStrategy<T>(
  elements: readonly T[],
  strategy?: Comparator<T>
): Comparator<T> {
  for (let i = 0; i < elements.length; i++) {
    const element = elements[i];
    if (element === null || element === undefined) {
      throw new InvalidArgumentError(
        `Element at index ${i} is ${element === null ? 'null' : 'undefined'}`,
        'sequence'
      );
    }
  }

  if (strategy !== undefined) {
    return strategy;
  }

  const index = elements.findIndex(element => !isNaturallyOrdered(element));
  if (index !== -1) {
    throw new NoOrderingAvailableError(
      `No ordering strategy was given and the element at index ${index} (${describeValue(elements[index])}) has no natural ordering`,
      index
    );
  }
  return naturalOrder<T>();
}
