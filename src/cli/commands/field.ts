// Licensed under the Hungry Ghost Hive License. See LICENSE.

import chalk from 'chalk';
import { Command } from 'commander';
import { getFields } from '../../integrations/jira/issues.js';
import type { JiraField } from '../../integrations/jira/types.js';
import { withTrackerClient } from '../../utils/with-tracker-context.js';

export function formatField(field: JiraField): string {
  const type = field.schema?.type ?? '-';
  const kind = field.custom ? chalk.yellow('custom') : chalk.gray('system');
  return `${chalk.cyan(field.id.padEnd(20))} ${field.name.padEnd(32)} ${type.padEnd(10)} ${kind}`;
}

export const fieldCommand = new Command('field').description('Inspect issue fields');

fieldCommand
  .command('list')
  .description('List all system and custom fields')
  .option('--json', 'Output as JSON')
  .action(async (options: { json?: boolean }) => {
    let fields: JiraField[];
    try {
      fields = await withTrackerClient(({ client }) => getFields(client));
    } catch (err) {
      console.error(chalk.red('Failed to fetch fields:'));
      console.error(err instanceof Error ? err.message : String(err));
      process.exit(1);
    }

    if (options.json) {
      console.log(JSON.stringify(fields, null, 2));
      return;
    }

    for (const field of fields) {
      console.log(formatField(field));
    }
    console.log(chalk.gray(`\n${fields.length} field(s)`));
  });
