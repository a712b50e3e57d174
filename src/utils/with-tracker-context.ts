// Licensed under the Hungry Ghost Hive License. See LICENSE.

import chalk from 'chalk';
import { TokenStore } from '../auth/token-store.js';
import { loadConfig } from '../config/loader.js';
import type { TrackerConfig } from '../config/schema.js';
import { ConfigurationError } from '../errors/index.js';
import { JiraClient, type JiraAuth } from '../integrations/jira/client.js';
import type { IssueApiVersion } from '../integrations/jira/issues.js';
import { findTrackerRoot, getTrackerPaths, type TrackerPaths } from './paths.js';

export interface TrackerRootContext {
  root: string;
  paths: TrackerPaths;
}

export interface TrackerContext extends TrackerRootContext {
  config: TrackerConfig;
  client: JiraClient;
  /** API version for core issue endpoints, derived from the installation type */
  issueApiVersion: IssueApiVersion;
}

function resolveRoot(): TrackerRootContext {
  const root = findTrackerRoot();
  if (!root) {
    console.error(chalk.red('Not in a tracker workspace. Run "tracker init" first.'));
    process.exit(1);
  }
  return { root, paths: getTrackerPaths(root) };
}

/**
 * Build a client from the workspace config and stored credentials.
 * TRACKER_API_TOKEN / TRACKER_LOGIN in the environment override .tracker/.env.
 */
export async function createTrackerClient(
  paths: TrackerPaths,
  config: TrackerConfig
): Promise<JiraClient> {
  const tokenStore = new TokenStore(paths.envPath);
  await tokenStore.loadFromEnv();
  tokenStore.loadFromEnvVars();

  const token = tokenStore.getToken('api_token');
  if (!token) {
    throw new ConfigurationError(
      'No API token available. Run "tracker auth set-token <token>" or set TRACKER_API_TOKEN.'
    );
  }

  let auth: JiraAuth;
  if (config.auth_type === 'bearer') {
    auth = { type: 'bearer', token };
  } else {
    const login = tokenStore.getToken('login') ?? config.login;
    if (!login) {
      throw new ConfigurationError('No login configured for basic auth.');
    }
    auth = { type: 'basic', login, token };
  }

  return new JiraClient({ server: config.server, auth, timeoutMs: config.timeout_ms });
}

export async function withTrackerClient<T>(
  fn: (ctx: TrackerContext) => Promise<T> | T
): Promise<T> {
  const { root, paths } = resolveRoot();
  const config = loadConfig(paths.trackerDir);
  const client = await createTrackerClient(paths, config);
  const issueApiVersion: IssueApiVersion = config.installation === 'local' ? 'v2' : 'v3';
  return fn({ root, paths, config, client, issueApiVersion });
}

export function withTrackerRoot<T>(fn: (ctx: TrackerRootContext) => T): T {
  return fn(resolveRoot());
}
