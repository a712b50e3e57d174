// Licensed under the Hungry Ghost Hive License. See LICENSE.

import { z } from 'zod';

// Default project used when a command needs one and none is given
const ProjectConfigSchema = z.object({
  // Project key (e.g., "TEST")
  key: z.string().min(1).optional(),
});

export const InstallationSchema = z.enum(['cloud', 'local']);
export const AuthTypeSchema = z.enum(['basic', 'bearer']);

// Main configuration schema
export const TrackerConfigSchema = z
  .object({
    version: z.string().default('1.0'),
    // Instance URL (e.g., "https://mycompany.atlassian.net")
    server: z.string().url(),
    // Login used with basic auth (email on cloud, username on local installs)
    login: z.string().min(1).optional(),
    // cloud uses API v3 for issue reads and writes, local uses v2
    installation: InstallationSchema.default('cloud'),
    // basic = login + API token, bearer = personal access token
    auth_type: AuthTypeSchema.default('basic'),
    project: ProjectConfigSchema.default({}),
    // Per-request timeout in milliseconds
    timeout_ms: z.number().int().positive().default(15000),
  })
  .superRefine((config, ctx) => {
    if (config.auth_type === 'basic' && !config.login) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['login'],
        message: 'login is required when auth_type is basic',
      });
    }
  });

// Export types
export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
export type TrackerConfig = z.infer<typeof TrackerConfigSchema>;
export type TrackerConfigInput = z.input<typeof TrackerConfigSchema>;
export type Installation = z.infer<typeof InstallationSchema>;
export type AuthType = z.infer<typeof AuthTypeSchema>;

export interface DefaultConfigOptions {
  server: string;
  login?: string;
  installation?: Installation;
  authType?: AuthType;
  projectKey?: string;
}

// Generate initial config YAML content
export function generateDefaultConfigYaml(options: DefaultConfigOptions): string {
  const lines = [
    '# Tracker CLI Configuration',
    'version: "1.0"',
    '',
    '# Instance URL',
    `server: ${options.server}`,
  ];

  if (options.login) {
    lines.push('', '# Login for basic auth (email on cloud, username on local installs)');
    lines.push(`login: ${options.login}`);
  }

  lines.push(
    '',
    '# Installation type (cloud, local)',
    `installation: ${options.installation ?? 'cloud'}`,
    '',
    '# Authentication type (basic, bearer). The token itself lives in .tracker/.env',
    `auth_type: ${options.authType ?? 'basic'}`,
    ''
  );

  if (options.projectKey) {
    lines.push('# Default project', 'project:', `  key: ${options.projectKey}`, '');
  }

  lines.push('# Request timeout in milliseconds', 'timeout_ms: 15000', '');
  return lines.join('\n');
}
