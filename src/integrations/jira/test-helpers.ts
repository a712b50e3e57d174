// Licensed under the Hungry Ghost Hive License. See LICENSE.

import {
  createServer,
  type IncomingHttpHeaders,
  type OutgoingHttpHeaders,
  type Server,
} from 'http';
import type { AddressInfo } from 'net';
import { JiraClient } from './client.js';

export interface RecordedRequest {
  method: string;
  url: string;
  headers: IncomingHttpHeaders;
  body: string;
}

export interface MockReply {
  status: number;
  statusText?: string;
  body?: string;
  /** Announce a longer body than is sent, then drop the connection */
  truncated?: boolean;
}

export interface MockServer {
  server: Server;
  /** e.g. http://127.0.0.1:54321 */
  url: string;
  requests: RecordedRequest[];
  close(): Promise<void>;
}

/**
 * Start an HTTP server on 127.0.0.1 that records every request and answers
 * with whatever the handler returns. A handler returning null leaves the
 * request hanging until close().
 */
export async function startMockServer(
  handler: (req: RecordedRequest) => MockReply | null
): Promise<MockServer> {
  const requests: RecordedRequest[] = [];

  const server = createServer((req, res) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => {
      const recorded: RecordedRequest = {
        method: req.method ?? '',
        url: req.url ?? '',
        headers: req.headers,
        body: Buffer.concat(chunks).toString('utf8'),
      };
      requests.push(recorded);

      const reply = handler(recorded);
      if (!reply) return;

      const body = reply.body ?? '';
      const headers: OutgoingHttpHeaders = reply.body ? { 'Content-Type': 'application/json' } : {};
      if (reply.truncated) {
        headers['Content-Length'] = Buffer.byteLength(body) + 1000;
      }
      if (reply.statusText) {
        res.writeHead(reply.status, reply.statusText, headers);
      } else {
        res.writeHead(reply.status, headers);
      }
      if (reply.truncated) {
        res.write(body, () => res.destroy());
        return;
      }
      res.end(body);
    });
  });

  await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
  const { port } = server.address() as AddressInfo;

  return {
    server,
    url: `http://127.0.0.1:${port}`,
    requests,
    close: () =>
      new Promise<void>(resolve => {
        server.closeAllConnections();
        server.close(() => resolve());
      }),
  };
}

/**
 * Client pointed at a mock server with placeholder basic credentials.
 */
export function createTestClient(server: MockServer, timeoutMs?: number): JiraClient {
  return new JiraClient({
    server: server.url,
    auth: { type: 'basic', login: 'test-user', token: 'test-secret' },
    timeoutMs,
  });
}
