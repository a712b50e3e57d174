// Licensed under the Hungry Ghost Hive License. See LICENSE.

import { existsSync } from 'fs';
import { dirname, join, resolve } from 'path';
import { CONFIG_FILE_NAME } from '../config/loader.js';

export const TRACKER_DIR_NAME = '.tracker';

export interface TrackerPaths {
  root: string;
  trackerDir: string;
  configPath: string;
  envPath: string;
}

export function findTrackerRoot(startDir: string = process.cwd()): string | null {
  let currentDir = resolve(startDir);

  while (true) {
    if (existsSync(join(currentDir, TRACKER_DIR_NAME))) {
      return currentDir;
    }
    const parent = dirname(currentDir);
    if (parent === currentDir) {
      return null;
    }
    currentDir = parent;
  }
}

export function getTrackerPaths(rootDir: string): TrackerPaths {
  const trackerDir = join(rootDir, TRACKER_DIR_NAME);

  return {
    root: rootDir,
    trackerDir,
    configPath: join(trackerDir, CONFIG_FILE_NAME),
    envPath: join(trackerDir, '.env'),
  };
}

export function isTrackerWorkspace(dir: string): boolean {
  return existsSync(join(dir, TRACKER_DIR_NAME));
}
