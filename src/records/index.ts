export { getField, fieldOrdering, definitionOrdering, buildRegistry } from './fields.js';
export { loadRecords, dumpRecords } from './loader.js';
export { selectOrdering, sortRecordFile, checkRecordFile } from './operations.js';
export type { SelectedOrdering, SortedRecords, OrderCheck } from './operations.js';
