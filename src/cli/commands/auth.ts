// Licensed under the Hungry Ghost Hive License. See LICENSE.

import chalk from 'chalk';
import { Command } from 'commander';
import { TokenStore, type CredentialType } from '../../auth/token-store.js';
import { loadConfig } from '../../config/loader.js';
import { withTrackerRoot } from '../../utils/with-tracker-context.js';

export const authCommand = new Command('auth').description('Manage API credentials');

authCommand
  .command('set-token')
  .description('Store the API token (and optionally the login) in .tracker/.env')
  .argument('<token>', 'API token or personal access token')
  .option('--login <login>', 'Login to store alongside the token')
  .action(async (token: string, options: { login?: string }) => {
    try {
      const { paths } = withTrackerRoot(ctx => ctx);
      const tokenStore = new TokenStore(paths.envPath);
      await tokenStore.loadFromEnv();
      await tokenStore.setToken('api_token', token);
      if (options.login !== undefined) {
        await tokenStore.setToken('login', options.login);
      }
    } catch (err) {
      console.error(chalk.red('Failed to store credentials:'));
      console.error(chalk.gray(err instanceof Error ? err.message : String(err)));
      process.exit(1);
    }

    console.log(chalk.green('✓ Credentials saved to .tracker/.env'));
  });

authCommand
  .command('status')
  .description('Show which credentials are available')
  .action(async () => {
    let missing: CredentialType[];
    try {
      const { paths } = withTrackerRoot(ctx => ctx);
      const config = loadConfig(paths.trackerDir);
      const tokenStore = new TokenStore(paths.envPath);
      await tokenStore.loadFromEnv();
      tokenStore.loadFromEnvVars();

      const required: CredentialType[] =
        config.auth_type === 'basic' && !config.login ? ['api_token', 'login'] : ['api_token'];
      missing = tokenStore.validateTokens(required);

      console.log(chalk.bold('Server:    ') + config.server);
      console.log(chalk.bold('Auth type: ') + config.auth_type);
      for (const type of required) {
        const icon = missing.includes(type) ? chalk.red('✗') : chalk.green('✓');
        console.log(`  ${icon} ${type}`);
      }
    } catch (err) {
      console.error(chalk.red('Failed to read credentials:'));
      console.error(chalk.gray(err instanceof Error ? err.message : String(err)));
      process.exit(1);
    }

    if (missing.length > 0) {
      console.log(chalk.yellow('Run "tracker auth set-token <token>" to add missing credentials.'));
      process.exit(1);
    }
  });
