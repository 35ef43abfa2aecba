import { Command } from 'commander';
import chalk from 'chalk';
import { exitCodeFor, formatError } from '../errors/index.js';
import { checkRecordFile, OrderCheck } from '../records/index.js';

interface CheckOptions {
  by?: string;
  json?: boolean;
}

export const checkCommand = new Command('check')
  .description('Check whether a record file is already ordered')
  .argument('<file>', 'Record file to check')
  .option('--by <names>', 'Comma-separated ordering names (default: default_ordering)')
  .option('--json', 'Output as JSON')
  .action((file: string, options: CheckOptions) => {
    let result: OrderCheck;
    try {
      result = checkRecordFile(process.cwd(), file, options.by);
    } catch (error) {
      if (error instanceof Error) {
        console.error(chalk.red(formatError(error, options.json ? 'json' : 'text')));
        process.exit(exitCodeFor(error));
      }
      throw error;
    }

    if (options.json) {
      console.log(JSON.stringify(result, null, 2));
    } else if (result.sorted) {
      console.log(chalk.green(`✓ ${result.total} records are ordered by ${result.ordering}`));
    } else {
      console.log(chalk.yellow(
        `✗ Not ordered by ${result.ordering}: record ${result.firstUnordered} sorts after record ${result.firstUnordered + 1}`
      ));
    }

    if (!result.sorted) {
      process.exit(1);
    }
  });
