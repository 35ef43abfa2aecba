import { Command } from 'commander';
import chalk from 'chalk';
import { exitCodeFor, formatError } from '../errors/index.js';
import { dumpRecords, sortRecordFile } from '../records/index.js';

interface SortOptions {
  by?: string;
  json?: boolean;
}

export const sortCommand = new Command('sort')
  .description('Sort a YAML/JSON record file by configured orderings')
  .argument('<file>', 'Record file: a list of objects, or { records: [...] }')
  .option('--by <names>', 'Comma-separated ordering names, "-name" reverses one (default: default_ordering)')
  .option('--json', 'Output as JSON')
  .action((file: string, options: SortOptions) => {
    try {
      const result = sortRecordFile(process.cwd(), file, options.by);

      if (options.json) {
        console.log(dumpRecords(result.records, 'json'));
      } else {
        console.error(chalk.dim(`# ${result.records.length} records ordered by ${result.ordering}`));
        process.stdout.write(dumpRecords(result.records, 'yaml'));
      }
    } catch (error) {
      if (error instanceof Error) {
        console.error(chalk.red(formatError(error, options.json ? 'json' : 'text')));
        process.exit(exitCodeFor(error));
      }
      throw error;
    }
  });
