import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import yaml from 'js-yaml';
import { ZodError } from 'zod';
import { ConfigError } from '../errors/index.js';
import { parseConfig, Config } from '../schemas/config.js';

export const CONFIG_DIR = '.ordkit';
export const CONFIG_FILE = 'config.yaml';

export function configPath(projectPath: string): string {
  return join(projectPath, CONFIG_DIR, CONFIG_FILE);
}

export function formatIssues(error: ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Load `.ordkit/config.yaml` from the project directory. A missing file
 * yields the defaults.
 */
export function loadConfig(projectPath: string): Config {
  const path = configPath(projectPath);
  if (!existsSync(path)) {
    return parseConfig({});
  }

  let data: unknown;
  try {
    data = yaml.load(readFileSync(path, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Could not read ${CONFIG_DIR}/${CONFIG_FILE}: ${message}`);
  }

  try {
    return parseConfig(data);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigError(`Invalid ${CONFIG_DIR}/${CONFIG_FILE}: ${formatIssues(error)}`);
    }
    throw error;
  }
}
