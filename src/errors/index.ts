export class OrderingError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'OrderingError';
  }
}

export class NoOrderingAvailableError extends OrderingError {
  constructor(message: string, public readonly index?: number) {
    super(message, 'NO_ORDERING_AVAILABLE');
    this.name = 'NoOrderingAvailableError';
  }
}

/**
 * Raised when a strategy cannot produce a three-way result for a pair,
 * e.g. one side is missing the key it compares on.
 */
export class IncomparableValuesError extends OrderingError {
  constructor(
    message: string,
    public readonly left: unknown,
    public readonly right: unknown,
    public readonly strategy?: string
  ) {
    super(message, 'INCOMPARABLE_VALUES');
    this.name = 'IncomparableValuesError';
  }
}

export class InvalidArgumentError extends OrderingError {
  constructor(message: string, public readonly argument?: string) {
    super(message, 'INVALID_ARGUMENT');
    this.name = 'InvalidArgumentError';
  }
}

export class RegistryError extends OrderingError {
  constructor(message: string) {
    super(message, 'REGISTRY_ERROR');
    this.name = 'RegistryError';
  }
}

export class ConfigError extends OrderingError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

export class ParseError extends OrderingError {
  constructor(message: string, public readonly file?: string) {
    super(message, 'PARSE_ERROR');
    this.name = 'ParseError';
  }
}

// Process exit code per error code; anything else exits with 1
const EXIT_CODES: Record<string, number> = {
  NO_ORDERING_AVAILABLE: 10,
  INCOMPARABLE_VALUES: 20,
  INVALID_ARGUMENT: 30,
  REGISTRY_ERROR: 40,
  CONFIG_ERROR: 50,
  PARSE_ERROR: 60,
};

export function exitCodeFor(err: Error): number {
  return err instanceof OrderingError ? EXIT_CODES[err.code] ?? 1 : 1;
}

/**
 * Short, single-line rendering of an element for error messages.
 */
export function describeValue(value: unknown): string {
  if (value === undefined) return 'undefined';
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value === 'bigint') return `${value}n`;
  if (typeof value === 'function') return `[function ${value.name || 'anonymous'}]`;
  if (value instanceof Date) return `Date(${Number.isNaN(value.getTime()) ? 'Invalid' : value.toISOString()})`;
  try {
    const json = JSON.stringify(value);
    if (json === undefined) return String(value);
    return json.length > 80 ? `${json.slice(0, 77)}...` : json;
  } catch {
    // Circular structures
    return Object.prototype.toString.call(value);
  }
}

/**
 * Render an error for the CLI. Incomparable pairs also show the two
 * elements and the strategy that rejected them.
 */
export function formatError(err: Error, format: 'json' | 'text' = 'text'): string {
  const incomparable = err instanceof IncomparableValuesError ? err : undefined;

  if (format === 'json') {
    return JSON.stringify({
      error: err.name,
      message: err.message,
      exitCode: exitCodeFor(err),
      ...(err instanceof OrderingError ? { code: err.code } : {}),
      ...(err instanceof ParseError && err.file ? { file: err.file } : {}),
      ...(incomparable?.strategy ? { strategy: incomparable.strategy } : {}),
      ...(incomparable ? { left: describeValue(incomparable.left), right: describeValue(incomparable.right) } : {}),
    }, null, 2);
  }

  const lines = [`Error [${err.name}]: ${err.message}`];
  if (incomparable) {
    if (incomparable.strategy) lines.push(`  strategy: ${incomparable.strategy}`);
    lines.push(`  left:     ${describeValue(incomparable.left)}`);
    lines.push(`  right:    ${describeValue(incomparable.right)}`);
  }
  return lines.join('\n');
}
