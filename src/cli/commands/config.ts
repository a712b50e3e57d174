import { Command } from 'commander';
import chalk from 'chalk';
import { stringify } from 'yaml';
import { withTrackerRoot } from '../../utils/with-tracker-context.js';
import { loadConfig, saveConfig, getConfigValue, setConfigValue, ConfigError } from '../../config/loader.js';

export const configCommand = new Command('config')
  .description('Manage tracker configuration');

function reportConfigError(action: string, err: unknown): never {
  if (err instanceof ConfigError) {
    console.error(chalk.red(err.message));
  } else {
    console.error(chalk.red(`Failed to ${action} configuration:`), err);
  }
  process.exit(1);
}

/**
 * Interpret a CLI value: JSON first, then booleans and numbers, else the raw string.
 */
export function parseConfigValue(value: string): unknown {
  try {
    return JSON.parse(value);
  } catch {
    if (value.toLowerCase() === 'true') {
      return true;
    }
    if (value.toLowerCase() === 'false') {
      return false;
    }
    if (value.trim() !== '' && !isNaN(Number(value))) {
      return Number(value);
    }
    return value;
  }
}

configCommand
  .command('show')
  .description('Show current configuration')
  .option('--json', 'Output as JSON')
  .action((options: { json?: boolean }) => {
    const { paths } = withTrackerRoot(ctx => ctx);

    let output: string;
    try {
      const config = loadConfig(paths.trackerDir);
      output = options.json ? JSON.stringify(config, null, 2) : stringify(config, { indent: 2 });
    } catch (err) {
      reportConfigError('load', err);
    }
    console.log(output);
  });

configCommand
  .command('get <path>')
  .description('Get a specific configuration value')
  .action((path: string) => {
    const { paths } = withTrackerRoot(ctx => ctx);

    let value: unknown;
    try {
      value = getConfigValue(loadConfig(paths.trackerDir), path);
    } catch (err) {
      reportConfigError('get', err);
    }

    if (value === undefined) {
      console.error(chalk.yellow(`Configuration key not found: ${path}`));
      process.exit(1);
    }

    if (typeof value === 'object') {
      console.log(stringify(value, { indent: 2 }));
    } else {
      console.log(value);
    }
  });

configCommand
  .command('set <path> <value>')
  .description('Set a configuration value')
  .action((path: string, value: string) => {
    const { paths } = withTrackerRoot(ctx => ctx);
    const parsedValue = parseConfigValue(value);

    try {
      const config = loadConfig(paths.trackerDir);
      saveConfig(paths.trackerDir, setConfigValue(config, path, parsedValue));
    } catch (err) {
      reportConfigError('set', err);
    }

    console.log(chalk.green(`Set ${chalk.bold(path)} = ${JSON.stringify(parsedValue)}`));
  });
