import { existsSync, readFileSync } from 'fs';
import yaml from 'js-yaml';
import { ZodError } from 'zod';
import { formatIssues } from '../config/loader.js';
import { ParseError } from '../errors/index.js';
import { parseRecords, DataRecord } from '../schemas/records.js';

/**
 * Read a YAML or JSON file holding a list of records (or `{ records: [...] }`).
 */
export function loadRecords(filePath: string): DataRecord[] {
  if (!existsSync(filePath)) {
    throw new ParseError(`Record file not found: ${filePath}`, filePath);
  }

  let data: unknown;
  try {
    // JSON is a subset of YAML, one parser covers both
    data = yaml.load(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ParseError(`Could not parse ${filePath}: ${message}`, filePath);
  }

  try {
    return parseRecords(data);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ParseError(
        `${filePath} must contain a list of records or a "records" list: ${formatIssues(error)}`,
        filePath
      );
    }
    throw error;
  }
}

export function dumpRecords(records: DataRecord[], format: 'yaml' | 'json' = 'yaml'): string {
  if (format === 'json') {
    return JSON.stringify(records, null, 2);
  }
  return yaml.dump(records, {
    indent: 2,
    lineWidth: 120,
    noRefs: true,
  });
}
