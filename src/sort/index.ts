export { findUnorderedIndex, isSorted, sort, sorted } from './sort.js';
export { findPosition, insertSorted } from './search.js';
export type { SearchResult } from './search.js';
