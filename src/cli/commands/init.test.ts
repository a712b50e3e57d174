// Licensed under the Hungry Ghost Hive License. See LICENSE.

import { existsSync, mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';
import { loadConfig } from '../../config/loader.js';

let mockRoot = '';

vi.mock('../../utils/paths.js', async importOriginal => {
  const actual = await importOriginal<typeof import('../../utils/paths.js')>();
  return {
    ...actual,
    getTrackerPaths: vi.fn(() => actual.getTrackerPaths(mockRoot)),
    isTrackerWorkspace: vi.fn(() => actual.isTrackerWorkspace(mockRoot)),
  };
});

import { initCommand } from './init.js';

describe('init command', () => {
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;
  let exitSpy: MockInstance<typeof process.exit>;

  beforeEach(() => {
    mockRoot = mkdtempSync(join(tmpdir(), 'tracker-init-test-'));
    for (const option of initCommand.options) {
      initCommand.setOptionValue(option.attributeName(), option.defaultValue);
    }
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called');
    });
  });

  afterEach(() => {
    logSpy.mockRestore();
    errorSpy.mockRestore();
    exitSpy.mockRestore();
    rmSync(mockRoot, { recursive: true, force: true });
  });

  it('should require --server', () => {
    const server = initCommand.options.find(opt => opt.long === '--server');
    expect(server?.mandatory).toBe(true);
  });

  it('should write a validated config', async () => {
    await initCommand.parseAsync(
      ['--server', 'https://tracker.example.test/', '--login', 'test-user', '--project', 'TEST'],
      { from: 'user' }
    );

    const config = loadConfig(join(mockRoot, '.tracker'));
    expect(config.server).toBe('https://tracker.example.test');
    expect(config.login).toBe('test-user');
    expect(config.project.key).toBe('TEST');
    expect(config.installation).toBe('cloud');
  });

  it('should accept a local installation with bearer auth', async () => {
    await initCommand.parseAsync(
      ['--server', 'https://tracker.example.test', '--installation', 'local', '--auth-type', 'bearer'],
      { from: 'user' }
    );

    const config = loadConfig(join(mockRoot, '.tracker'));
    expect(config.installation).toBe('local');
    expect(config.auth_type).toBe('bearer');
  });

  it('should reject an unknown installation type', async () => {
    await expect(
      initCommand.parseAsync(
        ['--server', 'https://tracker.example.test', '--installation', 'datacenter'],
        { from: 'user' }
      )
    ).rejects.toThrow('process.exit called');

    expect(existsSync(join(mockRoot, '.tracker'))).toBe(false);
  });

  it('should refuse to overwrite an existing workspace without --force', async () => {
    await initCommand.parseAsync(
      ['--server', 'https://tracker.example.test', '--login', 'test-user'],
      { from: 'user' }
    );
    initCommand.setOptionValue('force', undefined);

    await expect(
      initCommand.parseAsync(['--server', 'https://other.example.test', '--login', 'test-user'], {
        from: 'user',
      })
    ).rejects.toThrow('process.exit called');

    expect(loadConfig(join(mockRoot, '.tracker')).server).toBe('https://tracker.example.test');
  });
});
