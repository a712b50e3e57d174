// Licensed under the Hungry Ghost Hive License. See LICENSE.

import { STATUS_CODES } from 'http';
import { OperationalError, TimeoutError, TrackerError } from '../../errors/index.js';
import type { JiraErrorBody } from './types.js';

/** Minimal view of a fetch Response used when describing a status */
export type StatusLike = Pick<Response, 'status' | 'statusText'>;

/** The transport resolved without a response and without an error */
export class EmptyResponseError extends TrackerError {
  constructor(message: string = 'empty response from server') {
    super(message, 'EMPTY_RESPONSE');
    Object.setPrototypeOf(this, EmptyResponseError.prototype);
  }
}

/** Any status other than the one an operation expects */
export class UnexpectedResponseError extends TrackerError {
  public readonly statusCode: number;
  public readonly status: string;
  public readonly responseBody: string;
  public readonly errors: JiraErrorBody | null;

  constructor(
    message: string,
    statusCode: number,
    status: string,
    responseBody: string,
    errors: JiraErrorBody | null
  ) {
    super(message, 'UNEXPECTED_RESPONSE');
    this.statusCode = statusCode;
    this.status = status;
    this.responseBody = responseBody;
    this.errors = errors;
    Object.setPrototypeOf(this, UnexpectedResponseError.prototype);
  }
}

/**
 * 207 from a batch operation: some items were applied, some were not.
 * The body is kept verbatim for the operator; it is not reconciled.
 */
export class MultiStatusError extends TrackerError {
  public readonly statusCode = 207;
  public readonly status: string;
  public readonly responseBody: string;

  constructor(message: string, status: string, responseBody: string) {
    super(message, 'MULTI_STATUS');
    this.status = status;
    this.responseBody = responseBody;
    Object.setPrototypeOf(this, MultiStatusError.prototype);
  }
}

/**
 * Render "<code> <reason>", e.g. "400 Bad Request".
 * Falls back to the standard reason phrase when the server sent none.
 */
export function statusLine(response: StatusLike): string {
  const reason = response.statusText || STATUS_CODES[response.status] || '';
  return reason ? `${response.status} ${reason}` : String(response.status);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((item): item is string => typeof item === 'string' && item.trim() !== '');
}

function stringMap(value: unknown): Record<string, string> {
  const out: Record<string, string> = {};
  if (!isRecord(value)) return out;
  for (const [field, message] of Object.entries(value)) {
    if (typeof message === 'string' && message.trim() !== '') {
      out[field] = message;
    }
  }
  return out;
}

/**
 * Parse an error body of the form
 * `{"errorMessages": [...], "errors": {field: message}, "warningMessages": [...]}`.
 * Returns null when the text is not JSON or carries none of those fields.
 */
export function parseErrorBody(text: string): JiraErrorBody | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  if (!isRecord(parsed)) return null;

  const errorMessages = stringList(parsed.errorMessages);
  const errors = stringMap(parsed.errors);
  const warningMessages = stringList(parsed.warningMessages);

  if (
    errorMessages.length === 0 &&
    Object.keys(errors).length === 0 &&
    warningMessages.length === 0
  ) {
    return null;
  }

  const body: JiraErrorBody = {};
  if (errorMessages.length > 0) body.errorMessages = errorMessages;
  if (Object.keys(errors).length > 0) body.errors = errors;
  if (warningMessages.length > 0) body.warningMessages = warningMessages;
  return body;
}

/** One line per message, field errors as "field: message" */
export function describeErrorBody(body: JiraErrorBody): string[] {
  const lines: string[] = [];
  for (const message of body.errorMessages ?? []) {
    lines.push(message);
  }
  for (const [field, message] of Object.entries(body.errors ?? {})) {
    lines.push(`${field}: ${message}`);
  }
  for (const message of body.warningMessages ?? []) {
    lines.push(`warning: ${message}`);
  }
  return lines;
}

export function errorName(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'name' in err && typeof err.name === 'string') {
    return err.name;
  }
  return undefined;
}

/** fetch reports network failures as "fetch failed" with the real reason in `cause` */
export function describeCause(err: unknown): string {
  if (err instanceof Error) {
    return err.cause instanceof Error ? `${err.message} (${err.cause.message})` : err.message;
  }
  return String(err);
}

/**
 * Read the whole body. A stream that breaks after the status line arrived is
 * raised as TimeoutError or OperationalError, never as the raw fetch error.
 */
export async function readBody(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (err) {
    const status = statusLine(response);
    if (errorName(err) === 'TimeoutError') {
      throw new TimeoutError(`timed out reading ${status} response body`, { cause: err });
    }
    throw new OperationalError(`failed to read ${status} response body: ${describeCause(err)}`, {
      cause: err,
    });
  }
}

/**
 * Consume the response body and build the error for a status the caller did
 * not expect.
 */
export async function formatUnexpectedResponse(
  response: Response
): Promise<UnexpectedResponseError> {
  const status = statusLine(response);
  const text = await readBody(response);

  if (text.trim() === '') {
    return new UnexpectedResponseError(
      `unexpected response: ${status} with empty body`,
      response.status,
      status,
      text,
      null
    );
  }

  const errors = parseErrorBody(text);
  const lines = errors ? describeErrorBody(errors) : [];
  const message =
    lines.length > 0
      ? [`unexpected response: ${status}`, 'Error:', ...lines.map(line => `  - ${line}`)].join('\n')
      : `unexpected response: ${status}`;

  return new UnexpectedResponseError(message, response.status, status, text, errors);
}
