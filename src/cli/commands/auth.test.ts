// Licensed under the Hungry Ghost Hive License. See LICENSE.

import { mkdirSync, mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';
import { createDefaultConfig } from '../../config/loader.js';

let mockRoot = '';

vi.mock('../../utils/with-tracker-context.js', () => ({
  withTrackerRoot: vi.fn(
    (callback: (ctx: { root: string; paths: { trackerDir: string; envPath: string } }) => unknown) =>
      callback({
        root: mockRoot,
        paths: {
          trackerDir: join(mockRoot, '.tracker'),
          envPath: join(mockRoot, '.tracker', '.env'),
        },
      })
  ),
}));

import { authCommand } from './auth.js';

describe('auth command', () => {
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;
  let exitSpy: MockInstance<typeof process.exit>;

  beforeEach(() => {
    mockRoot = mkdtempSync(join(tmpdir(), 'tracker-auth-test-'));
    mkdirSync(join(mockRoot, '.tracker'));
    createDefaultConfig(join(mockRoot, '.tracker'), {
      server: 'https://tracker.example.test',
      login: 'test-user',
    });
    for (const command of authCommand.commands) {
      for (const option of command.options) {
        command.setOptionValue(option.attributeName(), undefined);
      }
    }
    vi.stubEnv('TRACKER_API_TOKEN', '');
    vi.stubEnv('TRACKER_LOGIN', '');
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called');
    });
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    logSpy.mockRestore();
    errorSpy.mockRestore();
    exitSpy.mockRestore();
    rmSync(mockRoot, { recursive: true, force: true });
  });

  it('should store the token and login in .tracker/.env', async () => {
    await authCommand.parseAsync(['set-token', 'test-secret', '--login', 'test-user'], {
      from: 'user',
    });

    expect(readFileSync(join(mockRoot, '.tracker', '.env'), 'utf-8')).toBe(
      'TRACKER_API_TOKEN=test-secret\nTRACKER_LOGIN=test-user\n'
    );
  });

  it('should report missing credentials with a non-zero exit', async () => {
    await expect(authCommand.parseAsync(['status'], { from: 'user' })).rejects.toThrow(
      'process.exit called'
    );

    expect(exitSpy).toHaveBeenCalledWith(1);
  });

  it('should succeed once the token is stored', async () => {
    await authCommand.parseAsync(['set-token', 'test-secret'], { from: 'user' });
    await authCommand.parseAsync(['status'], { from: 'user' });

    expect(exitSpy).not.toHaveBeenCalled();
  });
});
