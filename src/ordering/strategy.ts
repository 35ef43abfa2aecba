import { IncomparableValuesError, InvalidArgumentError, describeValue } from '../errors/index.js';

/**
 * Three-way comparison outcome.
 */
export const Ordering = {
  LESS: -1,
  EQUAL: 0,
  GREATER: 1,
} as const;

export type Ordering = (typeof Ordering)[keyof typeof Ordering];

/**
 * Any function whose result's sign orders `a` relative to `b`.
 * This is the shape `Array.prototype.sort` accepts.
 */
export type Comparator<T> = (a: T, b: T) => number;

/**
 * A comparison strategy over T.
 *
 * Contract (callers must guarantee it, violations give undefined sort results):
 * - strategy(a, a) is EQUAL
 * - strategy(a, b) and strategy(b, a) have opposite signs, or are both EQUAL
 * - LESS is transitive
 * - repeated calls on unchanged inputs return the same result
 *
 * Strategies must not mutate their arguments.
 */
export type OrderingStrategy<T> = (a: T, b: T) => Ordering;

const STRATEGY_NAMES = new WeakMap<Comparator<never>, string>();

export function toOrdering(result: number): Ordering {
  if (result < 0) return Ordering.LESS;
  if (result > 0) return Ordering.GREATER;
  return Ordering.EQUAL;
}

export function invert(ordering: Ordering): Ordering {
  if (ordering === Ordering.LESS) return Ordering.GREATER;
  if (ordering === Ordering.GREATER) return Ordering.LESS;
  return Ordering.EQUAL;
}

export function strategyName(strategy: Comparator<never>): string {
  return STRATEGY_NAMES.get(strategy) ?? (strategy.name || 'anonymous');
}

function requirePresent(value: unknown, argument: 'left' | 'right', name: string): void {
  if (value === null || value === undefined) {
    throw new InvalidArgumentError(
      `Strategy "${name}" received ${value === null ? 'null' : 'undefined'} as its ${argument} argument`,
      argument
    );
  }
}

function evaluate<T>(name: string, comparator: Comparator<T>, a: T, b: T): Ordering {
  requirePresent(a, 'left', name);
  requirePresent(b, 'right', name);

  const result = comparator(a, b);
  if (typeof result !== 'number' || Number.isNaN(result)) {
    throw new IncomparableValuesError(
      `Strategy "${name}" produced no ordering for ${describeValue(a)} and ${describeValue(b)}`,
      a,
      b,
      name
    );
  }
  return toOrdering(result);
}

/**
 * Evaluate `comparator` on a pair with the full contract checks: both
 * arguments present, a numeric result that is not NaN.
 */
export function compare<T>(comparator: Comparator<T>, a: T, b: T): Ordering {
  return evaluate(strategyName(comparator), comparator, a, b);
}

/**
 * Wrap a raw comparator into a named strategy that enforces the contract
 * checks on every call.
 */
export function defineStrategy<T>(name: string, comparator: Comparator<T>): OrderingStrategy<T> {
  const strategy: OrderingStrategy<T> = (a, b) => evaluate(name, comparator, a, b);
  STRATEGY_NAMES.set(strategy, name);
  return strategy;
}
