import { Command } from 'commander';
import { initCommand } from './commands/init.js';
import { sortCommand } from './commands/sort.js';
import { checkCommand } from './commands/check.js';
import { orderingsCommand } from './commands/orderings.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('ordkit')
    .description('Sort record files with named, composable orderings')
    .version('0.1.0');

  program.addCommand(initCommand);
  program.addCommand(sortCommand);
  program.addCommand(checkCommand);
  program.addCommand(orderingsCommand);

  return program;
}
