import { IncomparableValuesError, describeValue } from '../errors/index.js';
import { byKey, composite, reversed } from '../ordering/combinators.js';
import {
  compareBooleans,
  compareDates,
  compareNumbers,
  compareStrings,
  compareText,
} from '../ordering/primitives.js';
import { ComparatorRegistry } from '../ordering/registry.js';
import { Comparator, OrderingStrategy, compare, defineStrategy } from '../ordering/strategy.js';
import type { Config, FieldOrderingSpec, OrderingDefinition } from '../schemas/config.js';
import type { DataRecord } from '../schemas/records.js';

interface FieldHandler<K> {
  /** Returns undefined when the value is not of this field type. */
  coerce(value: unknown): K | undefined;
  ordering: Comparator<K>;
}

/**
 * Read a dot path ("meta.year") from a record. Missing segments, and
 * inherited properties, yield undefined.
 */
export function getField(record: DataRecord, path: string): unknown {
  let current: unknown = record;
  for (const segment of path.split('.')) {
    if (typeof current !== 'object' || current === null || !Object.hasOwn(current, segment)) {
      return undefined;
    }
    current = Reflect.get(current, segment);
  }
  return current;
}

const numberHandler: FieldHandler<number> = {
  coerce: value => (typeof value === 'number' && !Number.isNaN(value) ? value : undefined),
  ordering: compareNumbers,
};

const stringHandler: FieldHandler<string> = {
  coerce: value => (typeof value === 'string' ? value : undefined),
  ordering: compareStrings,
};

const booleanHandler: FieldHandler<boolean> = {
  coerce: value => (typeof value === 'boolean' ? value : undefined),
  ordering: compareBooleans,
};

// js-yaml already turns unquoted timestamps into Date objects
const dateHandler: FieldHandler<Date> = {
  coerce: value => {
    if (!(value instanceof Date) && typeof value !== 'string' && typeof value !== 'number') {
      return undefined;
    }
    const date = value instanceof Date ? value : new Date(value);
    return Number.isNaN(date.getTime()) ? undefined : date;
  },
  ordering: compareDates,
};

function textHandler(locale: string): FieldHandler<string> {
  return { coerce: stringHandler.coerce, ordering: compareText(locale) };
}

function buildFieldStrategy<K>(spec: FieldOrderingSpec, handler: FieldHandler<K>): OrderingStrategy<DataRecord> {
  const name = `${spec.field} ${spec.direction}`;

  const readKey = (record: DataRecord): K | undefined => {
    const raw = getField(record, spec.field);
    return raw === null || raw === undefined ? undefined : handler.coerce(raw);
  };

  // Direction applies to present keys only; null placement stays where `nulls` puts it
  const keyOrdering = spec.direction === 'desc' ? reversed(handler.ordering) : handler.ordering;
  const keyed = byKey(readKey, keyOrdering, { name, nulls: spec.nulls });

  return defineStrategy<DataRecord>(name, (a, b) => {
    for (const record of [a, b]) {
      const raw = getField(record, spec.field);
      if (raw !== null && raw !== undefined && handler.coerce(raw) === undefined) {
        throw new IncomparableValuesError(
          `Strategy "${name}": field "${spec.field}" of ${describeValue(record)} is not a ${spec.type}`,
          a,
          b,
          name
        );
      }
    }
    return compare(keyed, a, b);
  });
}

export function fieldOrdering(spec: FieldOrderingSpec, locale = 'en'): OrderingStrategy<DataRecord> {
  switch (spec.type) {
    case 'number':
      return buildFieldStrategy(spec, numberHandler);
    case 'boolean':
      return buildFieldStrategy(spec, booleanHandler);
    case 'date':
      return buildFieldStrategy(spec, dateHandler);
    case 'text':
      return buildFieldStrategy(spec, textHandler(spec.locale ?? locale));
    case 'string':
    default:
      return buildFieldStrategy(spec, stringHandler);
  }
}

export function definitionOrdering(definition: OrderingDefinition, locale = 'en'): OrderingStrategy<DataRecord> {
  return composite(...definition.keys.map(key => fieldOrdering(key, locale)));
}

/**
 * Registry holding every ordering declared in the config, under its
 * config name.
 */
export function buildRegistry(config: Config): ComparatorRegistry<DataRecord> {
  const registry = new ComparatorRegistry<DataRecord>();
  for (const [name, definition] of Object.entries(config.orderings)) {
    registry.register(name, definitionOrdering(definition, config.locale));
  }
  return registry;
}
