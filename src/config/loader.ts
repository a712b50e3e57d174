import { existsSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { parse, stringify } from 'yaml';
import type { ZodError } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import {
  generateDefaultConfigYaml,
  TrackerConfigSchema,
  type DefaultConfigOptions,
  type TrackerConfig,
} from './schema.js';

export const CONFIG_FILE_NAME = 'tracker.config.yaml';

export class ConfigError extends ConfigurationError {
  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

function formatIssues(error: ZodError): string {
  return error.errors.map(e => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
}

export function loadConfig(trackerDir: string): TrackerConfig {
  const configPath = join(trackerDir, CONFIG_FILE_NAME);

  if (!existsSync(configPath)) {
    throw new ConfigError(`Config file not found: ${configPath}`);
  }

  const content = readFileSync(configPath, 'utf-8');
  const rawConfig: unknown = parse(content);

  const result = TrackerConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    throw new ConfigError(`Invalid configuration:\n${formatIssues(result.error)}`);
  }

  return result.data;
}

export function saveConfig(trackerDir: string, config: TrackerConfig): void {
  const configPath = join(trackerDir, CONFIG_FILE_NAME);
  const content = stringify(config, { indent: 2 });
  writeFileSync(configPath, content, 'utf-8');
}

export function createDefaultConfig(
  trackerDir: string,
  options: DefaultConfigOptions
): TrackerConfig {
  const configPath = join(trackerDir, CONFIG_FILE_NAME);
  const content = generateDefaultConfigYaml(options);
  writeFileSync(configPath, content, 'utf-8');
  return loadConfig(trackerDir);
}

export function configExists(trackerDir: string): boolean {
  return existsSync(join(trackerDir, CONFIG_FILE_NAME));
}

export function getConfigValue(config: TrackerConfig, path: string): unknown {
  const parts = path.split('.');
  let current: unknown = config;

  for (const part of parts) {
    if (current === null || current === undefined || typeof current !== 'object') {
      return undefined;
    }
    current = (current as Record<string, unknown>)[part];
  }

  return current;
}

export function setConfigValue(config: TrackerConfig, path: string, value: unknown): TrackerConfig {
  const parts = path.split('.');
  const newConfig = JSON.parse(JSON.stringify(config)) as Record<string, unknown>;

  let current = newConfig;
  for (let i = 0; i < parts.length - 1; i++) {
    const part = parts[i];
    if (current[part] === undefined || typeof current[part] !== 'object') {
      current[part] = {};
    }
    current = current[part] as Record<string, unknown>;
  }

  const lastPart = parts[parts.length - 1];
  current[lastPart] = value;

  // Validate the new config
  const result = TrackerConfigSchema.safeParse(newConfig);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration after update:\n${formatIssues(result.error)}`);
  }

  return result.data;
}
