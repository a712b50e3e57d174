// Licensed under the Hungry Ghost Hive License. See LICENSE.

import chalk from 'chalk';
import { Command } from 'commander';
import { mkdirSync } from 'fs';
import { createDefaultConfig } from '../../config/loader.js';
import { AuthTypeSchema, InstallationSchema } from '../../config/schema.js';
import { getTrackerPaths, isTrackerWorkspace } from '../../utils/paths.js';

export const initCommand = new Command('init')
  .description('Initialize a tracker workspace in the current directory')
  .requiredOption('--server <url>', 'Instance URL (e.g. https://example.atlassian.net)')
  .option('--login <login>', 'Login for basic auth (email on cloud, username on local installs)')
  .option('--installation <type>', 'Installation type (cloud, local)', 'cloud')
  .option('--auth-type <type>', 'Authentication type (basic, bearer)', 'basic')
  .option('--project <key>', 'Default project key')
  .option('-f, --force', 'Overwrite existing workspace')
  .action(
    (options: {
      server: string;
      login?: string;
      installation: string;
      authType: string;
      project?: string;
      force?: boolean;
    }) => {
      const rootDir = process.cwd();
      const paths = getTrackerPaths(rootDir);

      if (isTrackerWorkspace(rootDir) && !options.force) {
        console.log(chalk.yellow('Tracker workspace already exists in this directory.'));
        console.log(chalk.gray('Use --force to reinitialize.'));
        process.exit(1);
      }

      const installation = InstallationSchema.safeParse(options.installation);
      const authType = AuthTypeSchema.safeParse(options.authType);
      if (!installation.success || !authType.success) {
        console.error(
          chalk.red('Invalid option: --installation must be cloud or local, --auth-type basic or bearer')
        );
        process.exit(1);
      }

      try {
        mkdirSync(paths.trackerDir, { recursive: true });
        createDefaultConfig(paths.trackerDir, {
          server: options.server.replace(/\/+$/, ''),
          login: options.login,
          installation: installation.data,
          authType: authType.data,
          projectKey: options.project,
        });
      } catch (err) {
        console.error(chalk.red('Failed to initialize tracker workspace:'));
        console.error(err instanceof Error ? err.message : String(err));
        process.exit(1);
      }

      console.log(chalk.green('Tracker workspace initialized successfully!'));
      console.log();
      console.log(chalk.bold('Next steps:'));
      console.log(chalk.gray('  1. Store your API token:'));
      console.log(chalk.cyan('     tracker auth set-token <token>'));
      console.log(chalk.gray('  2. View an issue:'));
      console.log(chalk.cyan('     tracker issue view <key>'));
      console.log();
    }
  );
