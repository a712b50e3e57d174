// Licensed under the Hungry Ghost Hive License. See LICENSE.

import {
  OperationalError,
  toTrackerError,
  TrackerError,
  ValidationError,
} from '../../errors/index.js';
import * as logger from '../../utils/logger.js';
import { JSON_HEADERS, type JiraTransport } from './client.js';
import {
  EmptyResponseError,
  formatUnexpectedResponse,
  MultiStatusError,
  readBody,
  statusLine,
} from './response.js';
import type { IssueRankPayload } from './types.js';

/** Where the target issues are placed */
export type RankAnchor =
  | { mode: 'after'; issue: string }
  | { mode: 'before'; issue: string }
  | { mode: 'first' };

/** A validated request to move issues within the backlog */
export interface RankInstruction {
  issues: string[];
  anchor: RankAnchor;
}

/** Raw positional flags as supplied by a caller */
export interface RankFlags {
  before?: string;
  after?: string;
  first?: boolean;
}

/**
 * Result of a single rank dispatch.
 *
 * None of these states is retried here; the operator decides what to resend.
 */
export type RankOutcome =
  | { state: 'succeeded' }
  | { state: 'partially_failed'; statusText: string; message: string; responseBody: string }
  | { state: 'failed'; error: Error };

/**
 * Convert raw flags into a RankInstruction.
 * Throws ValidationError on any invalid combination; nothing is sent.
 */
export function toRankInstruction(issues: string[], flags: RankFlags = {}): RankInstruction {
  if (issues.length === 0) {
    throw new ValidationError('no issues provided to rank');
  }

  const keys: string[] = [];
  const seen = new Set<string>();
  for (const raw of issues) {
    const key = raw.trim();
    if (key === '') {
      throw new ValidationError('issue keys cannot be empty');
    }
    if (seen.has(key)) {
      throw new ValidationError(`duplicate issue key: ${key}`);
    }
    seen.add(key);
    keys.push(key);
  }

  const hasBefore = flags.before !== undefined && flags.before !== '';
  const hasAfter = flags.after !== undefined && flags.after !== '';

  if (flags.first) {
    if (hasBefore || hasAfter) {
      throw new ValidationError(
        'rank first cannot be combined with rankBeforeIssue or rankAfterIssue'
      );
    }
    return { issues: keys, anchor: { mode: 'first' } };
  }
  if (!hasBefore && !hasAfter) {
    throw new ValidationError('either rankBeforeIssue or rankAfterIssue must be specified');
  }
  if (hasBefore && hasAfter) {
    throw new ValidationError('rankBeforeIssue and rankAfterIssue cannot both be specified');
  }

  const mode = hasBefore ? 'before' : 'after';
  const reference = (hasBefore ? flags.before : flags.after)?.trim() ?? '';
  if (reference === '') {
    throw new ValidationError('reference issue key cannot be empty');
  }

  return { issues: keys, anchor: { mode, issue: reference } };
}

/**
 * Build the wire payload. Unset positions are omitted, never sent as "".
 */
export function buildRankPayload(instruction: RankInstruction): IssueRankPayload {
  const payload: IssueRankPayload = { issues: [...instruction.issues] };

  switch (instruction.anchor.mode) {
    case 'before':
      payload.rankBeforeIssue = instruction.anchor.issue;
      break;
    case 'after':
      payload.rankAfterIssue = instruction.anchor.issue;
      break;
    case 'first':
      break;
  }

  return payload;
}

/**
 * Send the payload with PUT /rest/agile/1.0/issue/rank and interpret the status.
 *
 * 204 is success, 207 a partial failure, anything else a failure carrying the
 * parsed error body. Transport errors and bodies that break off midway are
 * reported as failures too; tracker errors keep their own type.
 */
export async function dispatchRank(
  transport: JiraTransport,
  payload: IssueRankPayload
): Promise<RankOutcome> {
  let response: Response | undefined;
  try {
    response = await transport.put('/issue/rank', {
      version: 'agile',
      body: JSON.stringify(payload),
      headers: { ...JSON_HEADERS },
    });
  } catch (err) {
    if (err instanceof TrackerError) {
      return { state: 'failed', error: err };
    }
    const cause = err instanceof Error ? err.message : String(err);
    return {
      state: 'failed',
      error: new OperationalError(`failed to call rank issues API: ${cause}`, { cause: err }),
    };
  }

  if (!response) {
    return { state: 'failed', error: new EmptyResponseError() };
  }

  if (response.status === 204) {
    logger.debug(`Ranked ${payload.issues.join(', ')}`);
    return { state: 'succeeded' };
  }

  try {
    if (response.status === 207) {
      const status = statusLine(response);
      // Per-issue detail is left as an opaque diagnostic.
      const responseBody = await readBody(response);
      return {
        state: 'partially_failed',
        statusText: status,
        message: `rank issues operation resulted in multi-status (some may have failed): ${status}`,
        responseBody,
      };
    }

    return { state: 'failed', error: await formatUnexpectedResponse(response) };
  } catch (err) {
    return { state: 'failed', error: toTrackerError(err) };
  }
}

/**
 * Validate, send and throw unless the rank fully succeeded.
 * A 207 is thrown as MultiStatusError.
 */
export async function rankIssues(
  transport: JiraTransport,
  instruction: RankInstruction
): Promise<void> {
  const outcome = await dispatchRank(transport, buildRankPayload(instruction));

  switch (outcome.state) {
    case 'succeeded':
      return;
    case 'partially_failed':
      throw new MultiStatusError(outcome.message, outcome.statusText, outcome.responseBody);
    case 'failed':
      throw outcome.error;
  }
}
