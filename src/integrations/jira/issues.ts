// Licensed under the Hungry Ghost Hive License. See LICENSE.

import { NotFoundError, OperationalError } from '../../errors/index.js';
import { toAdfDocument } from './adf-utils.js';
import { JSON_HEADERS, type JiraTransport } from './client.js';
import { EmptyResponseError, formatUnexpectedResponse, isRecord, readBody } from './response.js';
import type {
  AddCommentRequest,
  AddWorklogRequest,
  CreateIssueLinkRequest,
  JiraField,
  JiraIssue,
  JiraIssueLinkType,
  RemoteLinkRequest,
} from './types.js';
import { markdownToWiki } from './wiki-markup.js';

/** API versions that expose the core issue endpoints */
export type IssueApiVersion = 'v3' | 'v2';

/** Assignee value that clears the assignee */
export const ASSIGNEE_NONE = 'none';
/** Assignee value that applies the project's default assignee */
export const ASSIGNEE_DEFAULT = 'default';

/** Property key that marks a service-desk comment as internal */
const COMMENT_VISIBILITY_PROPERTY = 'sd.public.comment';

async function expectStatus(response: Response | undefined, expected: number): Promise<Response> {
  if (!response) {
    throw new EmptyResponseError();
  }
  if (response.status !== expected) {
    throw await formatUnexpectedResponse(response);
  }
  return response;
}

async function readJson<T>(response: Response): Promise<T> {
  return JSON.parse(await readBody(response)) as T;
}

function isIssue(value: unknown): value is JiraIssue {
  return isRecord(value) && typeof value.key === 'string' && isRecord(value.fields);
}

function parseIssue(body: string, issueIdOrKey: string): JiraIssue {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (err) {
    throw new OperationalError(`invalid issue response for ${issueIdOrKey}: not JSON`, {
      cause: err,
    });
  }
  if (!isIssue(parsed)) {
    throw new OperationalError(`invalid issue response for ${issueIdOrKey}: missing key or fields`);
  }
  return parsed;
}

function issuePath(issueIdOrKey: string, suffix: string = ''): string {
  return `/issue/${encodeURIComponent(issueIdOrKey)}${suffix}`;
}

/**
 * Fetch an issue and return the body exactly as the server sent it.
 */
export async function getIssueRaw(
  transport: JiraTransport,
  issueIdOrKey: string,
  version: IssueApiVersion = 'v3'
): Promise<string> {
  const response = await expectStatus(
    await transport.get(issuePath(issueIdOrKey), { version }),
    200
  );
  return readBody(response);
}

/**
 * Same as getIssueRaw against the v2 API.
 */
export async function getIssueV2Raw(transport: JiraTransport, issueIdOrKey: string): Promise<string> {
  return getIssueRaw(transport, issueIdOrKey, 'v2');
}

export interface GetIssueOptions {
  /** Number of most recent comments whose bodies are decoded as ADF */
  numComments?: number;
}

/**
 * Fetch an issue from the v3 API.
 *
 * The description and the last `numComments` comment bodies are narrowed to
 * ADF documents; values that are not valid ADF become null.
 */
export async function getIssue(
  transport: JiraTransport,
  issueIdOrKey: string,
  options: GetIssueOptions = {}
): Promise<JiraIssue> {
  const issue = parseIssue(await getIssueRaw(transport, issueIdOrKey, 'v3'), issueIdOrKey);

  issue.fields.description = toAdfDocument(issue.fields.description);

  const comments = issue.fields.comment?.comments ?? [];
  const limit = Math.min(options.numComments ?? 0, comments.length);
  for (let i = comments.length - 1; i >= comments.length - limit; i--) {
    comments[i].body = toAdfDocument(comments[i].body);
  }

  return issue;
}

/**
 * Fetch an issue from the v2 API. Rich text stays as wiki markup.
 */
export async function getIssueV2(transport: JiraTransport, issueIdOrKey: string): Promise<JiraIssue> {
  return parseIssue(await getIssueRaw(transport, issueIdOrKey, 'v2'), issueIdOrKey);
}

/**
 * Assign an issue. `none` unassigns it, `default` hands it to the project default.
 * v3 identifies the user by accountId, v2 by username.
 */
export async function assignIssue(
  transport: JiraTransport,
  issueIdOrKey: string,
  assignee: string,
  version: IssueApiVersion = 'v3'
): Promise<void> {
  let id: string | null;
  switch (assignee) {
    case ASSIGNEE_NONE:
      id = '-1';
      break;
    case ASSIGNEE_DEFAULT:
      id = null;
      break;
    default:
      id = assignee;
  }

  const body = version === 'v2' ? { name: id } : { accountId: id };

  await expectStatus(
    await transport.put(issuePath(issueIdOrKey, '/assignee'), {
      version,
      body: JSON.stringify(body),
      headers: { ...JSON_HEADERS },
    }),
    204
  );
}

/**
 * List the link types configured on the instance.
 */
export async function getIssueLinkTypes(transport: JiraTransport): Promise<JiraIssueLinkType[]> {
  const response = await expectStatus(
    await transport.get('/issueLinkType', { version: 'v2' }),
    200
  );
  const out = await readJson<{ issueLinkTypes?: JiraIssueLinkType[] }>(response);
  return out.issueLinkTypes ?? [];
}

/**
 * Link two issues with the named link type (e.g. "Blocks").
 */
export async function linkIssue(
  transport: JiraTransport,
  inwardIssue: string,
  outwardIssue: string,
  linkType: string
): Promise<void> {
  const request: CreateIssueLinkRequest = {
    inwardIssue: { key: inwardIssue },
    outwardIssue: { key: outwardIssue },
    type: { name: linkType },
  };

  await expectStatus(
    await transport.post('/issueLink', {
      version: 'v2',
      body: JSON.stringify(request),
      headers: { ...JSON_HEADERS },
    }),
    201
  );
}

/**
 * Remove a link by its id.
 */
export async function unlinkIssue(transport: JiraTransport, linkId: string): Promise<void> {
  await expectStatus(
    await transport.delete(`/issueLink/${encodeURIComponent(linkId)}`, {
      version: 'v2',
      headers: { ...JSON_HEADERS },
    }),
    204
  );
}

/**
 * Find the id of the link between two issues, in either direction.
 */
export async function getLinkId(
  transport: JiraTransport,
  inwardIssue: string,
  outwardIssue: string
): Promise<string> {
  const issue = await getIssueV2(transport, inwardIssue);

  for (const link of issue.fields.issuelinks ?? []) {
    if (link.inwardIssue?.key === outwardIssue || link.outwardIssue?.key === outwardIssue) {
      return link.id;
    }
  }
  throw new NotFoundError('no link found between provided issues');
}

/**
 * Add a comment through the v2 API. `internal` hides it from service-desk customers.
 * The text is markdown and is sent as wiki markup.
 */
export async function addIssueComment(
  transport: JiraTransport,
  issueIdOrKey: string,
  comment: string,
  internal: boolean
): Promise<void> {
  const request: AddCommentRequest = {
    body: markdownToWiki(comment),
    properties: [{ key: COMMENT_VISIBILITY_PROPERTY, value: { internal } }],
  };

  await expectStatus(
    await transport.post(issuePath(issueIdOrKey, '/comment'), {
      version: 'v2',
      body: JSON.stringify(request),
      headers: { ...JSON_HEADERS },
    }),
    201
  );
}

export interface AddWorklogOptions {
  /** Start timestamp, e.g. 2024-01-01T01:02:02.000+0200. Empty means "now" on the server. */
  started?: string;
  /** Duration in tracker notation, e.g. "1h 30m" */
  timeSpent: string;
  comment: string;
  /** Replaces the remaining estimate when set, e.g. "1d" */
  newEstimate?: string;
}

/**
 * Log work on an issue. The comment is converted from markdown like issue comments.
 */
export async function addIssueWorklog(
  transport: JiraTransport,
  issueIdOrKey: string,
  options: AddWorklogOptions
): Promise<void> {
  const request: AddWorklogRequest = {
    ...(options.started ? { started: options.started } : {}),
    timeSpent: options.timeSpent,
    comment: markdownToWiki(options.comment),
  };

  let path = issuePath(issueIdOrKey, '/worklog');
  if (options.newEstimate) {
    const params = new URLSearchParams({ adjustEstimate: 'new', newEstimate: options.newEstimate });
    path = `${path}?${params.toString()}`;
  }

  await expectStatus(
    await transport.post(path, {
      version: 'v2',
      body: JSON.stringify(request),
      headers: { ...JSON_HEADERS },
    }),
    201
  );
}

/**
 * List every field configured on the instance, system and custom.
 */
export async function getFields(transport: JiraTransport): Promise<JiraField[]> {
  const response = await expectStatus(
    await transport.get('/field', { version: 'v2', headers: { ...JSON_HEADERS } }),
    200
  );
  return readJson<JiraField[]>(response);
}

/**
 * Attach a web link to an issue.
 */
export async function remoteLinkIssue(
  transport: JiraTransport,
  issueIdOrKey: string,
  title: string,
  url: string
): Promise<void> {
  const request: RemoteLinkRequest = { object: { url, title } };

  await expectStatus(
    await transport.post(issuePath(issueIdOrKey, '/remotelink'), {
      version: 'v2',
      body: JSON.stringify(request),
      headers: { ...JSON_HEADERS },
    }),
    201
  );
}

/**
 * Add a watcher. The body is the bare JSON string of the account id (v3) or username (v2).
 */
export async function watchIssue(
  transport: JiraTransport,
  issueIdOrKey: string,
  watcher: string,
  version: IssueApiVersion = 'v3'
): Promise<void> {
  await expectStatus(
    await transport.post(issuePath(issueIdOrKey, '/watchers'), {
      version,
      body: JSON.stringify(watcher),
      headers: { ...JSON_HEADERS },
    }),
    204
  );
}
