import { describe, it, expect, beforeEach } from 'vitest';
import { findPosition, insertSorted } from '../src/sort/search.js';
import { sorted } from '../src/sort/sort.js';
import { byKey } from '../src/ordering/combinators.js';
import { compareNumbers } from '../src/ordering/primitives.js';
import { Comparator } from '../src/ordering/strategy.js';
import { InvalidArgumentError, NoOrderingAvailableError } from '../src/errors/index.js';
import { Person, Version, byNumber, people } from './fixtures.js';

interface Tagged {
  value: number;
  tag: string;
}

const byValue = byKey((t: Tagged) => t.value, compareNumbers);

describe('findPosition', () => {
  const ordered = sorted(people(), byNumber);

  it('finds an element comparing EQUAL', () => {
    const probe: Person = { num: 32, name: '?', year: 0 };
    expect(findPosition(ordered, probe, byNumber)).toEqual({ found: true, index: 1 });
  });

  it('returns the insertion point on a miss', () => {
    expect(findPosition(ordered, { num: 1, name: '?', year: 0 }, byNumber)).toEqual({ found: false, index: 0 });
    expect(findPosition(ordered, { num: 35, name: '?', year: 0 }, byNumber)).toEqual({ found: false, index: 2 });
    expect(findPosition(ordered, { num: 99, name: '?', year: 0 }, byNumber)).toEqual({ found: false, index: 3 });
  });

  it('returns the first of several equal elements', () => {
    const items: Tagged[] = [
      { value: 1, tag: 'a' },
      { value: 2, tag: 'b' },
      { value: 2, tag: 'c' },
      { value: 2, tag: 'd' },
      { value: 3, tag: 'e' },
    ];
    expect(findPosition(items, { value: 2, tag: '?' }, byValue)).toEqual({ found: true, index: 1 });
  });

  it('handles an empty sequence', () => {
    expect(findPosition<Tagged>([], { value: 1, tag: 'x' }, byValue)).toEqual({ found: false, index: 0 });
  });

  it('rejects an absent target', () => {
    expect(() => findPosition(ordered, undefined as unknown as Person, byNumber)).toThrow(InvalidArgumentError);
  });

  it('needs a strategy or a naturally ordered target', () => {
    expect(() => findPosition<Tagged>([], { value: 1, tag: 'x' })).toThrow(NoOrderingAvailableError);
  });

  it('falls back to natural ordering without a strategy', () => {
    const versions = [new Version(1, 0), new Version(1, 2), new Version(2, 0)];
    expect(findPosition(versions, new Version(1, 2))).toEqual({ found: true, index: 1 });
    expect(findPosition(versions, new Version(1, 5))).toEqual({ found: false, index: 2 });
  });

  it('fails when a probed element has no natural ordering', () => {
    const mixed: unknown[] = [new Version(1, 0), { major: 2, minor: 0 }];
    expect(() => findPosition(mixed, new Version(1, 5))).toThrow(NoOrderingAvailableError);
  });

  describe('absent elements', () => {
    let calls: number;
    const counted: Comparator<Tagged> = (a, b) => {
      calls++;
      return byValue(a, b);
    };

    function withTrailingGap(): Tagged[] {
      const items: Tagged[] = [1, 2, 3, 4, 5, 6, 7].map(value => ({ value, tag: `t${value}` }));
      items.push(undefined as unknown as Tagged);
      return items;
    }

    beforeEach(() => {
      calls = 0;
    });

    it('only compares the elements the search visits', () => {
      expect(findPosition(withTrailingGap(), { value: 0, tag: '?' }, counted)).toEqual({ found: false, index: 0 });
      expect(calls).toBe(5);
    });

    it('rejects an absent element once the search reaches it', () => {
      expect(() => findPosition(withTrailingGap(), { value: 99, tag: '?' }, counted)).toThrow(InvalidArgumentError);
    });
  });
});

describe('insertSorted', () => {
  it('inserts after equal elements', () => {
    const items: Tagged[] = [
      { value: 1, tag: 'a' },
      { value: 2, tag: 'b' },
      { value: 3, tag: 'c' },
    ];
    const index = insertSorted(items, { value: 2, tag: 'new' }, byValue);
    expect(index).toBe(2);
    expect(items.map(t => t.tag)).toEqual(['a', 'b', 'new', 'c']);
  });

  it('appends past the end and prepends before the start', () => {
    const items: Tagged[] = [{ value: 5, tag: 'mid' }];
    expect(insertSorted(items, { value: 9, tag: 'high' }, byValue)).toBe(1);
    expect(insertSorted(items, { value: 0, tag: 'low' }, byValue)).toBe(0);
    expect(items.map(t => t.tag)).toEqual(['low', 'mid', 'high']);
  });

  it('uses natural ordering without a strategy', () => {
    const versions = [new Version(1, 0), new Version(1, 2), new Version(2, 0)];
    const added = new Version(1, 2);
    expect(insertSorted(versions, added)).toBe(2);
    expect(versions[2]).toBe(added);
    expect(versions).toHaveLength(4);
  });

  it('rejects a target without natural ordering when no strategy is given', () => {
    const versions: unknown[] = [new Version(1, 0)];
    expect(() => insertSorted(versions, { major: 1, minor: 1 })).toThrow(NoOrderingAvailableError);
    expect(versions).toHaveLength(1);
  });
});
