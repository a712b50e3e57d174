// Licensed under the Hungry Ghost Hive License. See LICENSE.

/**
 * TypeScript types for the tracker REST API (v2, v3 and agile 1.0).
 * Covers issues, comments, links, fields, ranking and error bodies.
 */

// ── User ────────────────────────────────────────────────────────────────────

/** Tracker user. Cloud instances identify users by accountId, server ones by name. */
export interface JiraUser {
  accountId?: string;
  name?: string;
  emailAddress?: string;
  displayName: string;
  active: boolean;
  self?: string;
}

// ── ADF (Atlassian Document Format) ─────────────────────────────────────────

/** A node within an Atlassian Document Format document */
export interface AdfNode {
  type: string;
  text?: string;
  attrs?: Record<string, unknown>;
  marks?: AdfMark[];
  content?: AdfNode[];
}

/** Inline mark applied to ADF text nodes */
export interface AdfMark {
  type: string;
  attrs?: Record<string, unknown>;
}

/** Top-level Atlassian Document Format document */
export interface AdfDocument {
  version: 1;
  type: 'doc';
  content: AdfNode[];
}

/** v3 returns rich text as ADF, v2 as plain wiki text */
export type RichText = AdfDocument | string | null;

// ── Issue Status / Priority / Type ──────────────────────────────────────────

export interface JiraStatus {
  id: string;
  name: string;
  statusCategory?: {
    id: number;
    key: string;
    name: string;
  };
}

export interface JiraPriority {
  id: string;
  name: string;
}

export interface JiraIssueType {
  id: string;
  name: string;
  subtask: boolean;
}

// ── Comment ─────────────────────────────────────────────────────────────────

export interface JiraComment {
  id: string;
  author?: JiraUser;
  body: RichText;
  created: string;
  updated?: string;
}

/** Comment page embedded in issue fields */
export interface JiraCommentPage {
  comments: JiraComment[];
  total: number;
  maxResults?: number;
  startAt?: number;
}

// ── Issue Link ──────────────────────────────────────────────────────────────

/** Type of link between issues */
export interface JiraIssueLinkType {
  id: string;
  name: string;
  inward: string;
  outward: string;
  self?: string;
}

/** Minimal issue reference carried by links */
export interface LinkedIssue {
  id: string;
  key: string;
  self?: string;
  fields?: {
    summary?: string;
    status?: JiraStatus;
  };
}

/** A link between two issues, as embedded in issue fields */
export interface JiraIssueLink {
  id: string;
  type: JiraIssueLinkType;
  inwardIssue?: LinkedIssue;
  outwardIssue?: LinkedIssue;
}

// ── Issue ───────────────────────────────────────────────────────────────────

export interface JiraIssueFields {
  summary: string;
  description?: RichText;
  status: JiraStatus;
  priority?: JiraPriority | null;
  issuetype: JiraIssueType;
  assignee?: JiraUser | null;
  reporter?: JiraUser | null;
  labels?: string[];
  created: string;
  updated: string;
  parent?: { id: string; key: string };
  issuelinks?: JiraIssueLink[];
  comment?: JiraCommentPage;
  [key: string]: unknown;
}

export interface JiraIssue {
  id: string;
  key: string;
  self?: string;
  fields: JiraIssueFields;
}

// ── Field ───────────────────────────────────────────────────────────────────

/** A field configured on the instance, from GET /field */
export interface JiraField {
  id: string;
  key?: string;
  name: string;
  custom: boolean;
  schema?: {
    type: string;
    items?: string;
    custom?: string;
    customId?: number;
    system?: string;
  };
}

// ── Requests ────────────────────────────────────────────────────────────────

/** Body for POST /issueLink */
export interface CreateIssueLinkRequest {
  inwardIssue: { key: string };
  outwardIssue: { key: string };
  type: { name: string };
}

/** Body for POST /issue/{key}/comment (v2) */
export interface AddCommentRequest {
  body: string;
  properties: Array<{ key: string; value: { internal: boolean } }>;
}

/** Body for POST /issue/{key}/worklog (v2) */
export interface AddWorklogRequest {
  started?: string;
  timeSpent: string;
  comment: string;
}

/** Body for POST /issue/{key}/remotelink */
export interface RemoteLinkRequest {
  object: { url: string; title: string };
}

/** Body for PUT /rest/agile/1.0/issue/rank */
export interface IssueRankPayload {
  issues: string[];
  rankBeforeIssue?: string;
  rankAfterIssue?: string;
}

// ── Errors ──────────────────────────────────────────────────────────────────

/** Error body returned with 4xx/5xx responses */
export interface JiraErrorBody {
  errorMessages?: string[];
  errors?: Record<string, string>;
  warningMessages?: string[];
}
