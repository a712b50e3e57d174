// Licensed under the Hungry Ghost Hive License. See LICENSE.

import { ConfigurationError, OperationalError, TimeoutError } from '../../errors/index.js';
import * as logger from '../../utils/logger.js';
import { describeCause, errorName, statusLine } from './response.js';

/** REST API family a path belongs to */
export type ApiVersion = 'v3' | 'v2' | 'agile';

export type Header = Record<string, string>;

export type HttpMethod = 'GET' | 'PUT' | 'POST' | 'DELETE';

/** Headers sent with every JSON request/response pair */
export const JSON_HEADERS: Readonly<Header> = {
  Accept: 'application/json',
  'Content-Type': 'application/json',
};

export interface SendOptions {
  /** API family; defaults to v3 */
  version?: ApiVersion;
  body?: string;
  headers?: Header;
}

/**
 * Verb-specific send methods over an established connection.
 *
 * A send resolves to the response, rejects with a transport error, or resolves
 * to undefined when the transport produced nothing at all. Callers treat the
 * last case as an anomaly distinct from an empty body.
 */
export interface JiraTransport {
  get(path: string, options?: SendOptions): Promise<Response | undefined>;
  put(path: string, options?: SendOptions): Promise<Response | undefined>;
  post(path: string, options?: SendOptions): Promise<Response | undefined>;
  delete(path: string, options?: SendOptions): Promise<Response | undefined>;
}

export type JiraAuth =
  | { type: 'basic'; login: string; token: string }
  | { type: 'bearer'; token: string };

/** Options for constructing a JiraClient */
export interface JiraClientOptions {
  /** Instance URL, e.g. https://example.atlassian.net */
  server: string;
  auth: JiraAuth;
  /** Per-request timeout in ms. Default: 15000 */
  timeoutMs?: number;
}

const API_PATHS: Record<ApiVersion, string> = {
  v3: '/rest/api/3',
  v2: '/rest/api/2',
  agile: '/rest/agile/1.0',
};

/**
 * fetch-based transport for the tracker REST API.
 *
 * Requests are sent exactly once. Error statuses are returned to the caller
 * and timeouts are thrown as TimeoutError.
 */
export class JiraClient implements JiraTransport {
  private readonly server: string;
  private readonly auth: JiraAuth;
  private readonly timeoutMs: number;

  constructor(options: JiraClientOptions) {
    if (!options.server) {
      throw new ConfigurationError('No server configured. Run "tracker init" first.');
    }
    if (!options.auth.token) {
      throw new ConfigurationError(
        'No API token available. Run "tracker auth set-token" or set TRACKER_API_TOKEN.'
      );
    }
    this.server = options.server.replace(/\/+$/, '');
    this.auth = options.auth;
    this.timeoutMs = options.timeoutMs ?? 15000;
  }

  /**
   * Build the base URL for an API family.
   */
  getBaseUrl(version: ApiVersion = 'v3'): string {
    return `${this.server}${API_PATHS[version]}`;
  }

  get(path: string, options: SendOptions = {}): Promise<Response> {
    return this.send('GET', path, options);
  }

  put(path: string, options: SendOptions = {}): Promise<Response> {
    return this.send('PUT', path, options);
  }

  post(path: string, options: SendOptions = {}): Promise<Response> {
    return this.send('POST', path, options);
  }

  delete(path: string, options: SendOptions = {}): Promise<Response> {
    return this.send('DELETE', path, options);
  }

  private authorizationHeader(): string {
    if (this.auth.type === 'bearer') {
      return `Bearer ${this.auth.token}`;
    }
    const encoded = Buffer.from(`${this.auth.login}:${this.auth.token}`, 'utf8').toString(
      'base64'
    );
    return `Basic ${encoded}`;
  }

  private async send(method: HttpMethod, path: string, options: SendOptions): Promise<Response> {
    const url = `${this.getBaseUrl(options.version)}${path}`;
    const headers: Header = {
      Authorization: this.authorizationHeader(),
      ...options.headers,
    };

    logger.debug(`${method} ${url}`);

    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers,
        body: options.body,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      if (errorName(err) === 'TimeoutError') {
        throw new TimeoutError(`request timed out after ${this.timeoutMs}ms: ${method} ${path}`, {
          cause: err,
        });
      }
      throw new OperationalError(`request failed: ${method} ${path}: ${describeCause(err)}`, {
        cause: err,
      });
    }

    logger.debug(`${method} ${url} -> ${statusLine(response)}`);
    return response;
  }
}
