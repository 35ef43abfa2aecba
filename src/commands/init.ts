import { Command } from 'commander';
import chalk from 'chalk';
import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import yaml from 'js-yaml';
import { CONFIG_DIR, CONFIG_FILE, configPath } from '../config/index.js';

interface InitOptions {
  force?: boolean;
}

export const DEFAULT_CONFIG = {
  version: '1.0.0',
  locale: 'en',
  default_ordering: 'byNumber',
  orderings: {
    byNumber: {
      description: 'Ascending by the numeric "num" field',
      keys: [{ field: 'num', type: 'number', direction: 'asc' }],
    },
    byYear: {
      description: 'Ascending by "year", records without one last',
      keys: [{ field: 'year', type: 'number', direction: 'asc', nulls: 'last' }],
    },
    byName: {
      description: 'Alphabetical by "name"',
      keys: [{ field: 'name', type: 'text', direction: 'asc' }],
    },
  },
};

/**
 * Write the default config. Returns false when a config already exists and
 * `force` is not set.
 */
export function writeDefaultConfig(projectPath: string, force = false): boolean {
  const path = configPath(projectPath);
  if (existsSync(path) && !force) {
    return false;
  }
  mkdirSync(join(projectPath, CONFIG_DIR), { recursive: true });
  writeFileSync(path, yaml.dump(DEFAULT_CONFIG, { lineWidth: 80 }), 'utf-8');
  return true;
}

export const initCommand = new Command('init')
  .description(`Create ${CONFIG_DIR}/${CONFIG_FILE} with example orderings`)
  .option('--force', 'Overwrite an existing config')
  .action((options: InitOptions) => {
    const projectPath = process.cwd();

    try {
      if (!writeDefaultConfig(projectPath, options.force)) {
        console.error(chalk.red(`Error: ${CONFIG_DIR}/${CONFIG_FILE} already exists. Use --force to overwrite.`));
        process.exit(1);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(chalk.red(`Failed to write ${CONFIG_DIR}/${CONFIG_FILE}: ${message}`));
      process.exit(1);
    }

    console.log(chalk.green(`✓ Created ${CONFIG_DIR}/${CONFIG_FILE}`));
    console.log(chalk.cyan('\nNext steps:'));
    console.log(`  1. Edit ${CONFIG_DIR}/${CONFIG_FILE} to describe your record fields`);
    console.log('  2. Run `ordkit orderings` to list what is configured');
    console.log('  3. Run `ordkit sort records.yaml --by byYear,byName`');
  });
