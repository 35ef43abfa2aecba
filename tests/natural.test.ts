import { describe, it, expect } from 'vitest';
import {
  isNaturallyOrdered,
  naturalOrder,
  resolveStrategy,
} from '../src/ordering/natural.js';
import { Ordering } from '../src/ordering/strategy.js';
import { InvalidArgumentError, NoOrderingAvailableError } from '../src/errors/index.js';
import { Version } from './fixtures.js';

describe('Natural ordering', () => {
  it('detects the compareTo capability', () => {
    expect(isNaturallyOrdered(new Version(1, 0))).toBe(true);
    expect(isNaturallyOrdered({ compareTo: () => 0 })).toBe(true);
    expect(isNaturallyOrdered({ compareTo: 1 })).toBe(false);
    expect(isNaturallyOrdered({ num: 1 })).toBe(false);
    expect(isNaturallyOrdered(42)).toBe(false);
    expect(isNaturallyOrdered('text')).toBe(false);
    expect(isNaturallyOrdered(null)).toBe(false);
  });

  it('delegates to compareTo', () => {
    const order = naturalOrder<Version>();
    expect(order(new Version(1, 2), new Version(1, 10))).toBe(Ordering.LESS);
    expect(order(new Version(2, 0), new Version(1, 10))).toBe(Ordering.GREATER);
    expect(order(new Version(1, 0), new Version(1, 0))).toBe(Ordering.EQUAL);
  });

  it('fails when either side has no natural ordering', () => {
    const order = naturalOrder<unknown>();
    expect(() => order(new Version(1, 0), { major: 1 })).toThrow(NoOrderingAvailableError);
  });
});

describe('resolveStrategy', () => {
  it('prefers an explicit strategy', () => {
    const explicit = () => 0;
    expect(resolveStrategy([{ a: 1 }], explicit)).toBe(explicit);
  });

  it('falls back to natural ordering', () => {
    expect(resolveStrategy([new Version(1, 0)])).toBe(naturalOrder());
  });

  it('reports the first element without a natural ordering', () => {
    try {
      resolveStrategy<unknown>([new Version(1, 0), { num: 1 }]);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(NoOrderingAvailableError);
      expect((error as NoOrderingAvailableError).index).toBe(1);
    }
  });

  it('does not treat primitives as naturally ordered', () => {
    expect(() => resolveStrategy([3, 1, 2])).toThrow(NoOrderingAvailableError);
  });

  it('rejects absent elements even with an explicit strategy', () => {
    expect(() => resolveStrategy([1, undefined, 3], () => 0)).toThrow(InvalidArgumentError);
    expect(() => resolveStrategy([1, undefined, 3], () => 0)).toThrow('Element at index 1 is undefined');
  });

  it('accepts an empty sequence without a strategy', () => {
    expect(resolveStrategy([])).toBe(naturalOrder());
  });
});
