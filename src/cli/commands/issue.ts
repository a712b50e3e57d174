// Licensed under the Hungry Ghost Hive License. See LICENSE.

import chalk from 'chalk';
import { Command } from 'commander';
import { toTrackerError } from '../../errors/index.js';
import { richTextToPlainText } from '../../integrations/jira/adf-utils.js';
import {
  addIssueComment,
  addIssueWorklog,
  assignIssue,
  getIssue,
  getIssueLinkTypes,
  getIssueRaw,
  getIssueV2,
  getLinkId,
  linkIssue,
  remoteLinkIssue,
  unlinkIssue,
  watchIssue,
} from '../../integrations/jira/issues.js';
import {
  buildRankPayload,
  dispatchRank,
  toRankInstruction,
  type RankInstruction,
  type RankOutcome,
} from '../../integrations/jira/rank.js';
import type { JiraIssue } from '../../integrations/jira/types.js';
import * as logger from '../../utils/logger.js';
import { withTrackerClient } from '../../utils/with-tracker-context.js';

function exitWithError(title: string, err: unknown): never {
  const error = toTrackerError(err);
  console.error(chalk.red(title));
  console.error(error.message);
  logger.debug(`${error.name} (${error.code})`);
  process.exit(1);
}

/**
 * Format an issue for terminal display.
 */
export function formatIssue(issue: JiraIssue, numComments: number): string {
  const lines: string[] = [];
  const { fields } = issue;
  const status = fields.status?.name || 'Unknown';
  const type = fields.issuetype?.name || 'Unknown';
  const priority = fields.priority?.name;
  const assignee = fields.assignee?.displayName ?? 'Unassigned';
  const labels = fields.labels?.length ? fields.labels.join(', ') : undefined;

  lines.push(chalk.bold.cyan(issue.key) + '  ' + chalk.bold(fields.summary));
  lines.push(
    chalk.gray('  Type: ') +
      type +
      chalk.gray('  Status: ') +
      logger.statusColor(status, fields.status?.statusCategory?.key) +
      (priority ? chalk.gray('  Priority: ') + priority : '') +
      chalk.gray('  Assignee: ') +
      assignee
  );

  if (fields.parent) {
    lines.push(chalk.gray('  Parent: ') + fields.parent.key);
  }
  if (labels) {
    lines.push(chalk.gray('  Labels: ') + labels);
  }

  const links = fields.issuelinks ?? [];
  if (links.length > 0) {
    lines.push(chalk.gray('  Links:'));
    for (const link of links) {
      if (link.outwardIssue) {
        lines.push(`    ${link.type.outward} ${chalk.cyan(link.outwardIssue.key)}`);
      } else if (link.inwardIssue) {
        lines.push(`    ${link.type.inward} ${chalk.cyan(link.inwardIssue.key)}`);
      }
    }
  }

  const description = richTextToPlainText(fields.description);
  if (description) {
    lines.push('', chalk.gray('  Description:'));
    for (const line of description.split('\n')) {
      lines.push('    ' + line);
    }
  }

  const comments = fields.comment?.comments ?? [];
  const shown = comments.slice(Math.max(0, comments.length - numComments));
  if (shown.length > 0) {
    lines.push('', chalk.gray(`  Comments (${shown.length} of ${fields.comment?.total ?? comments.length}):`));
    for (const comment of shown) {
      const author = comment.author?.displayName ?? 'Unknown';
      lines.push(`    ${chalk.bold(author)} ${chalk.gray(comment.created)}`);
      for (const line of richTextToPlainText(comment.body).split('\n')) {
        lines.push('      ' + line);
      }
    }
  }

  return lines.join('\n');
}

export const issueCommand = new Command('issue').description('Work with issues');

// ── tracker issue view <key> ────────────────────────────────────────────────

issueCommand
  .command('view')
  .description('Show an issue')
  .argument('<key>', 'Issue key (e.g. TEST-1)')
  .option('-c, --comments <n>', 'Number of recent comments to show', '1')
  .option('--raw', 'Print the raw JSON response')
  .action(async (key: string, options: { comments: string; raw?: boolean }) => {
    const numComments = parseInt(options.comments, 10);
    let output: string;
    try {
      output = await withTrackerClient(async ({ client, issueApiVersion }) => {
        if (options.raw) {
          return getIssueRaw(client, key, issueApiVersion);
        }
        const issue =
          issueApiVersion === 'v2'
            ? await getIssueV2(client, key)
            : await getIssue(client, key, { numComments });
        return formatIssue(issue, Number.isNaN(numComments) ? 0 : numComments);
      });
    } catch (err) {
      exitWithError(`Failed to fetch issue ${key}`, err);
    }
    console.log(output);
  });

// ── tracker issue assign <key> <assignee> ───────────────────────────────────

issueCommand
  .command('assign')
  .description('Assign an issue ("none" to unassign, "default" for the project default)')
  .argument('<key>', 'Issue key')
  .argument('<assignee>', 'Account id (cloud) or username (local), "none" or "default"')
  .action(async (key: string, assignee: string) => {
    try {
      await withTrackerClient(({ client, issueApiVersion }) =>
        assignIssue(client, key, assignee, issueApiVersion)
      );
    } catch (err) {
      exitWithError(`Failed to assign ${key}`, err);
    }
    console.log(chalk.green(`✓ ${key} assigned to ${assignee}`));
  });

// ── tracker issue link / unlink / link-types ───────────────────────────────

issueCommand
  .command('link')
  .description('Link two issues')
  .argument('<inward>', 'Inward issue key')
  .argument('<outward>', 'Outward issue key')
  .argument('<type>', 'Link type name (see "tracker issue link-types")')
  .action(async (inward: string, outward: string, type: string) => {
    try {
      await withTrackerClient(({ client }) => linkIssue(client, inward, outward, type));
    } catch (err) {
      exitWithError(`Failed to link ${inward} and ${outward}`, err);
    }
    console.log(chalk.green(`✓ ${inward} linked to ${outward} (${type})`));
  });

issueCommand
  .command('unlink')
  .description('Remove the link between two issues')
  .argument('<inward>', 'Inward issue key')
  .argument('<outward>', 'Outward issue key')
  .action(async (inward: string, outward: string) => {
    try {
      await withTrackerClient(async ({ client }) => {
        const linkId = await getLinkId(client, inward, outward);
        await unlinkIssue(client, linkId);
      });
    } catch (err) {
      exitWithError(`Failed to unlink ${inward} and ${outward}`, err);
    }
    console.log(chalk.green(`✓ ${inward} unlinked from ${outward}`));
  });

issueCommand
  .command('link-types')
  .description('List available issue link types')
  .action(async () => {
    let output: string[];
    try {
      output = await withTrackerClient(async ({ client }) => {
        const types = await getIssueLinkTypes(client);
        return types.map(
          t => `${chalk.bold(t.name)}  ${chalk.gray(`inward: ${t.inward}, outward: ${t.outward}`)}`
        );
      });
    } catch (err) {
      exitWithError('Failed to fetch link types', err);
    }
    for (const line of output) {
      console.log(line);
    }
  });

issueCommand
  .command('remote-link')
  .description('Attach a web link to an issue')
  .argument('<key>', 'Issue key or id')
  .argument('<url>', 'Link URL')
  .argument('<title>', 'Link title')
  .action(async (key: string, url: string, title: string) => {
    try {
      await withTrackerClient(({ client }) => remoteLinkIssue(client, key, title, url));
    } catch (err) {
      exitWithError(`Failed to add remote link to ${key}`, err);
    }
    console.log(chalk.green(`✓ Remote link added to ${key}`));
  });

// ── tracker issue comment / worklog / watch ────────────────────────────────

issueCommand
  .command('comment')
  .description('Add a comment to an issue')
  .argument('<key>', 'Issue key')
  .argument('<body>', 'Comment text (markdown)')
  .option('--internal', 'Mark the comment as internal (service desk)')
  .action(async (key: string, body: string, options: { internal?: boolean }) => {
    try {
      await withTrackerClient(({ client }) =>
        addIssueComment(client, key, body, options.internal ?? false)
      );
    } catch (err) {
      exitWithError(`Failed to comment on ${key}`, err);
    }
    console.log(chalk.green(`✓ Comment added to ${key}`));
  });

issueCommand
  .command('worklog')
  .description('Log time spent on an issue')
  .argument('<key>', 'Issue key')
  .argument('<timeSpent>', 'Time spent, e.g. "1h 30m"')
  .option('--started <timestamp>', 'Start time, e.g. 2024-01-01T09:00:00.000+0000')
  .option('--comment <text>', 'Worklog comment (markdown)', '')
  .option('--new-estimate <estimate>', 'New remaining estimate, e.g. 1d')
  .action(
    async (
      key: string,
      timeSpent: string,
      options: { started?: string; comment: string; newEstimate?: string }
    ) => {
      try {
        await withTrackerClient(({ client }) =>
          addIssueWorklog(client, key, {
            started: options.started,
            timeSpent,
            comment: options.comment,
            newEstimate: options.newEstimate,
          })
        );
      } catch (err) {
        exitWithError(`Failed to log work on ${key}`, err);
      }
      console.log(chalk.green(`✓ Logged ${timeSpent} on ${key}`));
    }
  );

issueCommand
  .command('watch')
  .description('Add a watcher to an issue')
  .argument('<key>', 'Issue key')
  .argument('<watcher>', 'Account id (cloud) or username (local)')
  .action(async (key: string, watcher: string) => {
    try {
      await withTrackerClient(({ client, issueApiVersion }) =>
        watchIssue(client, key, watcher, issueApiVersion)
      );
    } catch (err) {
      exitWithError(`Failed to add watcher to ${key}`, err);
    }
    console.log(chalk.green(`✓ ${watcher} is now watching ${key}`));
  });

// ── tracker issue rank <keys> ───────────────────────────────────────────────

issueCommand
  .command('rank')
  .description('Rank issues before or after another issue, or first in the backlog')
  .argument('<keys>', 'Issue key or comma-separated keys (e.g. TEST-1,TEST-3)')
  .option('--before <key>', 'Reference issue to rank the target issues before')
  .option('--after <key>', 'Reference issue to rank the target issues after')
  .option('--first', 'Rank the target issues first')
  .addHelpText(
    'after',
    `
Examples:
  $ tracker issue rank TEST-1 --after TEST-2
  $ tracker issue rank TEST-1,TEST-3 --before TEST-4`
  )
  .action(async (keys: string, options: { before?: string; after?: string; first?: boolean }) => {
    let instruction: RankInstruction;
    try {
      instruction = toRankInstruction(keys.split(','), options);
    } catch (err) {
      exitWithError('Invalid rank request', err);
    }

    let outcome: RankOutcome;
    try {
      outcome = await withTrackerClient(({ client }) =>
        dispatchRank(client, buildRankPayload(instruction))
      );
    } catch (err) {
      exitWithError('Failed to rank issues', err);
    }

    // A failed or partial rank is reported, never re-sent.
    switch (outcome.state) {
      case 'succeeded':
        console.log(chalk.green('✓ Issue(s) ranked successfully.'));
        return;
      case 'partially_failed':
        console.error(chalk.yellow(outcome.message));
        if (outcome.responseBody.trim()) {
          console.error(chalk.gray(outcome.responseBody));
        }
        process.exit(1);
      case 'failed':
        exitWithError('Failed to rank issues', outcome.error);
    }
  });
