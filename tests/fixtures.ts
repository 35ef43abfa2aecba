import { byKey } from '../src/ordering/combinators.js';
import { compareNumbers, compareStrings } from '../src/ordering/primitives.js';
import type { NaturallyOrdered } from '../src/ordering/natural.js';

export interface Person {
  num: number;
  name: string;
  year: number;
}

export function people(): Person[] {
  return [
    { num: 32, name: 'John', year: 1 },
    { num: 42, name: 'Moon', year: 3 },
    { num: 21, name: 'Park', year: 4 },
  ];
}

export const byNumber = byKey((p: Person) => p.num, compareNumbers, { name: 'byNumber' });
export const byYear = byKey((p: Person) => p.year, compareNumbers, { name: 'byYear' });
export const byName = byKey((p: Person) => p.name, compareStrings, { name: 'byName' });

export class Version implements NaturallyOrdered<Version> {
  constructor(readonly major: number, readonly minor: number) {}

  compareTo(other: Version): number {
    if (this.major !== other.major) return this.major < other.major ? -1 : 1;
    if (this.minor !== other.minor) return this.minor < other.minor ? -1 : 1;
    return 0;
  }
}
