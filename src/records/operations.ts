import { resolve } from 'path';
import { loadConfig } from '../config/loader.js';
import { NoOrderingAvailableError } from '../errors/index.js';
import { OrderingStrategy } from '../ordering/strategy.js';
import type { Config } from '../schemas/config.js';
import type { DataRecord } from '../schemas/records.js';
import { findUnorderedIndex, sort } from '../sort/sort.js';
import { buildRegistry } from './fields.js';
import { loadRecords } from './loader.js';

export interface SelectedOrdering {
  /** The name list the strategy was resolved from, e.g. "byYear,-byName". */
  spec: string;
  strategy: OrderingStrategy<DataRecord>;
}

export interface SortedRecords {
  ordering: string;
  records: DataRecord[];
}

export interface OrderCheck {
  ordering: string;
  sorted: boolean;
  /** Index of the first record that sorts after its successor, -1 when ordered. */
  firstUnordered: number;
  total: number;
}

/**
 * Pick the ordering named by `by`, falling back to the config's
 * `default_ordering`. Records are plain data and have no natural ordering,
 * so having neither is an error.
 */
export function selectOrdering(config: Config, by?: string): SelectedOrdering {
  const spec = by?.trim() || config.default_ordering;
  if (!spec) {
    throw new NoOrderingAvailableError(
      'No ordering selected. Pass --by <names> or set default_ordering in .ordkit/config.yaml'
    );
  }
  const registry = buildRegistry(config);
  return { spec, strategy: registry.resolve(spec) };
}

export function sortRecordFile(projectPath: string, file: string, by?: string): SortedRecords {
  const config = loadConfig(projectPath);
  const { spec, strategy } = selectOrdering(config, by);
  const records = loadRecords(resolve(projectPath, file));
  return { ordering: spec, records: sort(records, strategy) };
}

export function checkRecordFile(projectPath: string, file: string, by?: string): OrderCheck {
  const config = loadConfig(projectPath);
  const { spec, strategy } = selectOrdering(config, by);
  const records = loadRecords(resolve(projectPath, file));
  const firstUnordered = findUnorderedIndex(records, strategy);
  return {
    ordering: spec,
    sorted: firstUnordered === -1,
    firstUnordered,
    total: records.length,
  };
}
