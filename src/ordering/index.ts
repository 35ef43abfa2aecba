export { Ordering, compare, defineStrategy, invert, strategyName, toOrdering } from './strategy.js';
export type { Comparator, OrderingStrategy } from './strategy.js';
export { isNaturallyOrdered, naturalOrder, resolveStrategy } from './natural.js';
export type { NaturallyOrdered } from './natural.js';
export {
  compareBigInts,
  compareBooleans,
  compareDates,
  compareNumbers,
  compareStrings,
  compareText,
} from './primitives.js';
export { byKey, composite, reversed, thenBy } from './combinators.js';
export type { ByKeyOptions } from './combinators.js';
export { ComparatorRegistry } from './registry.js';
