// Licensed under the Hungry Ghost Hive License. See LICENSE.

import { existsSync, mkdtempSync, readFileSync, rmSync, statSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, describe, expect, it } from 'vitest';
import { ValidationError } from '../errors/index.js';
import { TokenStore } from './token-store.js';

const tempDirs: string[] = [];

function createTempDir(): string {
  const dir = mkdtempSync(join(tmpdir(), 'token-store-test-'));
  tempDirs.push(dir);
  return dir;
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    try {
      rmSync(dir, { recursive: true, force: true });
    } catch {
      // Ignore cleanup errors
    }
  }
});

describe('TokenStore', () => {
  describe('loadFromEnv', () => {
    it('should load managed credentials from the .env file', async () => {
      const envPath = join(createTempDir(), '.env');
      writeFileSync(
        envPath,
        '# tracker credentials\nTRACKER_API_TOKEN="test-secret"\nTRACKER_LOGIN=test-user\nOTHER=ignored\n',
        'utf-8'
      );

      const store = new TokenStore(envPath);
      await store.loadFromEnv();

      expect(store.getToken('api_token')).toBe('test-secret');
      expect(store.getToken('login')).toBe('test-user');
    });

    it('should do nothing when the file does not exist', async () => {
      const store = new TokenStore(join(createTempDir(), '.env.missing'));

      await store.loadFromEnv();

      expect(store.getToken('api_token')).toBeUndefined();
    });
  });

  describe('loadFromEnvVars', () => {
    it('should let the environment override the file', async () => {
      const envPath = join(createTempDir(), '.env');
      writeFileSync(envPath, 'TRACKER_API_TOKEN=file-token\nTRACKER_LOGIN=file-user\n', 'utf-8');

      const store = new TokenStore(envPath);
      await store.loadFromEnv();
      store.loadFromEnvVars({ TRACKER_API_TOKEN: 'env-token', TRACKER_LOGIN: '' });

      expect(store.getToken('api_token')).toBe('env-token');
      expect(store.getToken('login')).toBe('file-user');
    });
  });

  describe('setToken', () => {
    it('should write a new file readable only by the owner', async () => {
      const envPath = join(createTempDir(), '.tracker', '.env');
      const store = new TokenStore(envPath);

      await store.setToken('api_token', ' test-secret ');

      expect(readFileSync(envPath, 'utf-8')).toBe('TRACKER_API_TOKEN=test-secret\n');
      expect(statSync(envPath).mode & 0o777).toBe(0o600);
      expect(existsSync(`${envPath}.tmp`)).toBe(false);
    });

    it('should update in place and keep unrelated lines', async () => {
      const envPath = join(createTempDir(), '.env');
      writeFileSync(envPath, '# keep me\nTRACKER_API_TOKEN=old-token\nEDITOR=vim\n', 'utf-8');

      const store = new TokenStore(envPath);
      await store.loadFromEnv();
      await store.setToken('api_token', 'test-secret');
      await store.setToken('login', 'test-user');

      expect(readFileSync(envPath, 'utf-8')).toBe(
        '# keep me\nTRACKER_API_TOKEN=test-secret\nEDITOR=vim\nTRACKER_LOGIN=test-user\n'
      );
    });

    it('should reject an empty token', async () => {
      const store = new TokenStore(join(createTempDir(), '.env'));

      await expect(store.setToken('api_token', '   ')).rejects.toThrow(
        new ValidationError('Token cannot be empty')
      );
    });
  });

  describe('validateTokens', () => {
    it('should list missing credentials', () => {
      const store = new TokenStore(join(createTempDir(), '.env'));
      store.loadFromEnvVars({ TRACKER_API_TOKEN: 'test-secret' });

      expect(store.validateTokens(['api_token', 'login'])).toEqual(['login']);
    });
  });
});
