// Licensed under the Hungry Ghost Hive License. See LICENSE.

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import lock from 'proper-lockfile';
import { ValidationError } from '../errors/index.js';

export type CredentialType = 'api_token' | 'login';

const ENV_KEYS: Record<CredentialType, string> = {
  api_token: 'TRACKER_API_TOKEN',
  login: 'TRACKER_LOGIN',
};

const MANAGED_KEYS = new Set(Object.values(ENV_KEYS));

/** Default lock retry settings */
const LOCK_MAX_RETRIES = 5;
const LOCK_BASE_DELAY_MS = 100;

/**
 * TokenStore keeps tracker credentials in a .env file.
 * Reads and writes hold a file lock so concurrent commands never interleave.
 * Values from the process environment take precedence over the file.
 */
export class TokenStore {
  private tokens: Record<string, string> = {};
  private readonly envPath: string;

  constructor(envPath: string = '.env') {
    this.envPath = envPath;
  }

  /**
   * Load credentials from the .env file under a lock.
   */
  async loadFromEnv(filePath: string = this.envPath): Promise<void> {
    if (!existsSync(filePath)) {
      return;
    }

    let release: (() => Promise<void>) | null = null;
    try {
      release = await this.acquireLockWithRetry(filePath);
      const content = readFileSync(filePath, 'utf-8');
      this.parseEnvContent(content);
    } finally {
      if (release) {
        await release();
      }
    }
  }

  /**
   * Overlay credentials present in process.env
   */
  loadFromEnvVars(env: NodeJS.ProcessEnv = process.env): void {
    for (const key of MANAGED_KEYS) {
      const value = env[key];
      if (value) {
        this.tokens[key] = value;
      }
    }
  }

  getToken(type: CredentialType): string | undefined {
    return this.tokens[ENV_KEYS[type]];
  }

  /**
   * Set a credential and persist it
   */
  async setToken(type: CredentialType, token: string): Promise<void> {
    if (!token.trim()) {
      throw new ValidationError('Token cannot be empty');
    }

    this.tokens[ENV_KEYS[type]] = token.trim();
    await this.writeTokensToFile();
  }

  /**
   * Names of the required credentials that are not set
   */
  validateTokens(required: CredentialType[]): CredentialType[] {
    return required.filter(type => !this.getToken(type));
  }

  /**
   * Acquire a file lock with exponential backoff retry.
   */
  private async acquireLockWithRetry(
    filePath: string,
    options?: { realpath?: boolean }
  ): Promise<() => Promise<void>> {
    let lastError: Error | undefined;
    for (let attempt = 0; attempt <= LOCK_MAX_RETRIES; attempt++) {
      try {
        return await lock.lock(filePath, options);
      } catch (err) {
        lastError = err instanceof Error ? err : new Error(String(err));
        if (attempt < LOCK_MAX_RETRIES) {
          const delay = LOCK_BASE_DELAY_MS * Math.pow(2, attempt);
          await new Promise(resolve => setTimeout(resolve, delay));
        }
      }
    }
    throw lastError ?? new Error(`Could not lock ${filePath}`);
  }

  private parseEnvContent(content: string): void {
    for (const line of content.split('\n')) {
      if (!line.trim() || line.trim().startsWith('#')) {
        continue;
      }

      const match = line.match(/^\s*([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.*)$/);
      if (!match) continue;

      const key = match[1].trim();
      let value = match[2].trim();
      if (
        (value.startsWith('"') && value.endsWith('"')) ||
        (value.startsWith("'") && value.endsWith("'"))
      ) {
        value = value.slice(1, -1);
      }

      if (MANAGED_KEYS.has(key)) {
        this.tokens[key] = value;
      }
    }
  }

  /**
   * Write credentials through a temp file and rename, holding the lock
   */
  private async writeTokensToFile(): Promise<void> {
    const dir = dirname(this.envPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }

    let release: (() => Promise<void>) | null = null;
    try {
      release = await this.acquireLockWithRetry(this.envPath, { realpath: false });

      const existingContent = existsSync(this.envPath) ? readFileSync(this.envPath, 'utf-8') : '';
      const updatedContent = this.mergeWithExisting(existingContent);

      const tempPath = `${this.envPath}.tmp`;
      writeFileSync(tempPath, updatedContent, { encoding: 'utf-8', mode: 0o600 });
      renameSync(tempPath, this.envPath);
    } finally {
      if (release) {
        await release();
      }
    }
  }

  /**
   * Merge credentials into existing .env content, preserving unrelated lines
   */
  private mergeWithExisting(existingContent: string): string {
    const updated = new Set<string>();

    const lines = existingContent === '' ? [] : existingContent.split('\n');
    const updatedLines = lines.map(line => {
      const match = line.match(/^\s*([A-Za-z_][A-Za-z0-9_]*)\s*=/);
      if (match && Object.hasOwn(this.tokens, match[1])) {
        updated.add(match[1]);
        return `${match[1]}=${this.tokens[match[1]]}`;
      }
      return line;
    });

    const newLines = Object.keys(this.tokens)
      .filter(key => !updated.has(key))
      .map(key => `${key}=${this.tokens[key]}`);

    const head = updatedLines.join('\n').trimEnd();
    const all = head === '' ? newLines : [head, ...newLines];
    return all.join('\n') + '\n';
  }
}
