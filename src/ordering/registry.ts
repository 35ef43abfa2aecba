import { RegistryError } from '../errors/index.js';
import { composite, reversed } from './combinators.js';
import { Comparator, OrderingStrategy, defineStrategy } from './strategy.js';

/**
 * Named, reusable strategies for one element type.
 *
 * Entries are immutable once registered; the registry never hands out
 * anything a caller could use to change another caller's ordering.
 */
export class ComparatorRegistry<T> {
  private readonly strategies = new Map<string, OrderingStrategy<T>>();

  register(name: string, strategy: Comparator<T>): this {
    const key = name.trim();
    if (key.length === 0) {
      throw new RegistryError('Ordering name must not be empty');
    }
    if (key.startsWith('-') || key.includes(',')) {
      throw new RegistryError(`Ordering name "${key}" must not start with "-" or contain ","`);
    }
    if (this.strategies.has(key)) {
      throw new RegistryError(`Ordering "${key}" is already registered`);
    }
    this.strategies.set(key, defineStrategy(key, strategy));
    return this;
  }

  get(name: string): OrderingStrategy<T> {
    const strategy = this.strategies.get(name.trim());
    if (!strategy) {
      const known = this.names();
      throw new RegistryError(
        `Unknown ordering "${name}". Known orderings: ${known.length > 0 ? known.join(', ') : '(none)'}`
      );
    }
    return strategy;
  }

  has(name: string): boolean {
    return this.strategies.has(name.trim());
  }

  /** Names in registration order. */
  names(): string[] {
    return [...this.strategies.keys()];
  }

  get size(): number {
    return this.strategies.size;
  }

  /**
   * Build a composite from a list of names, highest priority first.
   * A leading "-" reverses that component: "year,-number".
   */
  resolve(spec: string | readonly string[]): OrderingStrategy<T> {
    const tokens = (typeof spec === 'string' ? spec.split(',') : [...spec])
      .map(token => token.trim())
      .filter(token => token.length > 0);

    if (tokens.length === 0) {
      throw new RegistryError('No ordering names given');
    }

    const parts = tokens.map(token =>
      token.startsWith('-') ? reversed(this.get(token.slice(1))) : this.get(token)
    );
    return parts.length === 1 ? parts[0] : composite(...parts);
  }
}
