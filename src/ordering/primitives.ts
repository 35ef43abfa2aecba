import { IncomparableValuesError } from '../errors/index.js';
import { Ordering, OrderingStrategy, defineStrategy } from './strategy.js';

// Explicit three-way comparisons. Subtraction overflows and loses the sign
// for large or non-finite values, so none of these subtract.

function threeWay<V extends number | string | bigint>(a: V, b: V): Ordering {
  if (a < b) return Ordering.LESS;
  if (a > b) return Ordering.GREATER;
  return Ordering.EQUAL;
}

export const compareNumbers: OrderingStrategy<number> = defineStrategy('numbers', (a: number, b: number) => {
  if (Number.isNaN(a) || Number.isNaN(b)) {
    throw new IncomparableValuesError('NaN has no position in a numeric ordering', a, b, 'numbers');
  }
  return threeWay(a, b);
});

export const compareBigInts: OrderingStrategy<bigint> = defineStrategy('bigints', (a: bigint, b: bigint) => threeWay(a, b));

/**
 * Code-unit order, the same order `Array.prototype.sort` uses by default.
 */
export const compareStrings: OrderingStrategy<string> = defineStrategy('strings', (a: string, b: string) => threeWay(a, b));

export const compareBooleans: OrderingStrategy<boolean> = defineStrategy('booleans', (a: boolean, b: boolean) =>
  threeWay(Number(a), Number(b))
);

export const compareDates: OrderingStrategy<Date> = defineStrategy('dates', (a: Date, b: Date) => {
  const left = a.getTime();
  const right = b.getTime();
  if (Number.isNaN(left) || Number.isNaN(right)) {
    throw new IncomparableValuesError('Invalid Date has no position in a date ordering', a, b, 'dates');
  }
  return threeWay(left, right);
});

/**
 * Locale-aware string ordering backed by `Intl.Collator`.
 */
export function compareText(
  locale?: string | string[],
  options?: Intl.CollatorOptions
): OrderingStrategy<string> {
  const collator = new Intl.Collator(locale, options);
  const label = Array.isArray(locale) ? locale.join('|') : locale ?? 'default';
  return defineStrategy(`text(${label})`, (a: string, b: string) => collator.compare(a, b));
}
