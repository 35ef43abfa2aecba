import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../config/index.js';
import { exitCodeFor, formatError } from '../errors/index.js';
import type { Config } from '../schemas/config.js';

interface OrderingsOptions {
  json?: boolean;
}

export function describeOrderings(config: Config): string[] {
  return Object.entries(config.orderings).map(([name, definition]) => {
    const keys = definition.keys
      .map(key => {
        const nulls = key.nulls ? `, nulls ${key.nulls}` : '';
        return `${key.field} (${key.type}, ${key.direction}${nulls})`;
      })
      .join(' → ');
    const marker = name === config.default_ordering ? ' [default]' : '';
    return `${name}${marker}: ${keys}`;
  });
}

export const orderingsCommand = new Command('orderings')
  .description('List the orderings declared in the config')
  .option('--json', 'Output as JSON')
  .action((options: OrderingsOptions) => {
    try {
      const config = loadConfig(process.cwd());

      if (options.json) {
        console.log(JSON.stringify(config.orderings, null, 2));
        return;
      }

      const lines = describeOrderings(config);
      if (lines.length === 0) {
        console.log(chalk.yellow('No orderings configured. Run `ordkit init` to create an example config.'));
        return;
      }
      console.log(chalk.bold('\nConfigured orderings\n'));
      for (const line of lines) {
        console.log(`  ${line}`);
      }
      console.log('');
    } catch (error) {
      if (error instanceof Error) {
        console.error(chalk.red(formatError(error)));
        process.exit(exitCodeFor(error));
      }
      throw error;
    }
  });
