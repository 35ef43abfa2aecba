import { describe, it, expect } from 'vitest';
import {
  compareBigInts,
  compareBooleans,
  compareDates,
  compareNumbers,
  compareStrings,
  compareText,
} from '../src/ordering/primitives.js';
import { Ordering } from '../src/ordering/strategy.js';
import { IncomparableValuesError } from '../src/errors/index.js';

describe('Primitive orderings', () => {
  it('orders numbers without overflowing at the extremes', () => {
    expect(compareNumbers(Number.MAX_VALUE, -Number.MAX_VALUE)).toBe(Ordering.GREATER);
    expect(compareNumbers(-Infinity, Infinity)).toBe(Ordering.LESS);
    expect(compareNumbers(0, -0)).toBe(Ordering.EQUAL);
  });

  it('rejects NaN', () => {
    expect(() => compareNumbers(NaN, 1)).toThrow(IncomparableValuesError);
  });

  it('orders bigints beyond the safe integer range', () => {
    const big = 2n ** 64n;
    expect(compareBigInts(big, big + 1n)).toBe(Ordering.LESS);
    expect(compareBigInts(big, big)).toBe(Ordering.EQUAL);
  });

  it('orders strings by code unit', () => {
    expect(compareStrings('B', 'a')).toBe(Ordering.LESS);
    expect(compareStrings('apple', 'apple')).toBe(Ordering.EQUAL);
    expect(compareStrings('b', 'a')).toBe(Ordering.GREATER);
  });

  it('orders text by locale', () => {
    const text = compareText('en');
    expect(text('a', 'B')).toBe(Ordering.LESS);
    expect(text('B', 'a')).toBe(Ordering.GREATER);
  });

  it('honours collator options', () => {
    const numeric = compareText('en', { numeric: true });
    expect(numeric('item2', 'item10')).toBe(Ordering.LESS);
    expect(compareStrings('item2', 'item10')).toBe(Ordering.GREATER);
  });

  it('puts false before true', () => {
    expect(compareBooleans(false, true)).toBe(Ordering.LESS);
    expect(compareBooleans(true, true)).toBe(Ordering.EQUAL);
  });

  it('orders dates by time', () => {
    expect(compareDates(new Date('2020-01-01'), new Date('2021-01-01'))).toBe(Ordering.LESS);
    expect(compareDates(new Date(5), new Date(5))).toBe(Ordering.EQUAL);
  });

  it('rejects invalid dates', () => {
    expect(() => compareDates(new Date('not a date'), new Date(0))).toThrow(IncomparableValuesError);
  });
});
