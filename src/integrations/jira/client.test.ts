// Licensed under the Hungry Ghost Hive License. See LICENSE.

import { afterEach, describe, expect, it } from 'vitest';
import { ConfigurationError, OperationalError, TimeoutError } from '../../errors/index.js';
import { JiraClient, JSON_HEADERS } from './client.js';
import { createTestClient, startMockServer, type MockServer } from './test-helpers.js';

let mock: MockServer | undefined;

afterEach(async () => {
  await mock?.close();
  mock = undefined;
});

describe('JiraClient', () => {
  describe('constructor', () => {
    it('should throw when no server is configured', () => {
      expect(
        () => new JiraClient({ server: '', auth: { type: 'bearer', token: 'test-secret' } })
      ).toThrow(ConfigurationError);
    });

    it('should throw when the token is empty', () => {
      expect(
        () =>
          new JiraClient({
            server: 'https://tracker.example.test',
            auth: { type: 'basic', login: 'test-user', token: '' },
          })
      ).toThrow('No API token available');
    });
  });

  describe('getBaseUrl', () => {
    const client = new JiraClient({
      server: 'https://tracker.example.test/',
      auth: { type: 'bearer', token: 'test-secret' },
    });

    it('should default to the v3 API', () => {
      expect(client.getBaseUrl()).toBe('https://tracker.example.test/rest/api/3');
    });

    it('should build the v2 API base URL', () => {
      expect(client.getBaseUrl('v2')).toBe('https://tracker.example.test/rest/api/2');
    });

    it('should build the agile API base URL', () => {
      expect(client.getBaseUrl('agile')).toBe('https://tracker.example.test/rest/agile/1.0');
    });
  });

  describe('authentication', () => {
    it('should send basic credentials', async () => {
      mock = await startMockServer(() => ({ status: 200, body: '{}' }));
      const client = createTestClient(mock);

      await client.get('/myself');

      const expected = 'Basic ' + Buffer.from('test-user:test-secret').toString('base64');
      expect(mock.requests[0].headers.authorization).toBe(expected);
    });

    it('should send a bearer token', async () => {
      mock = await startMockServer(() => ({ status: 200, body: '{}' }));
      const client = new JiraClient({
        server: mock.url,
        auth: { type: 'bearer', token: 'test-secret' },
      });

      await client.get('/myself');

      expect(mock.requests[0].headers.authorization).toBe('Bearer test-secret');
    });
  });

  describe('send', () => {
    it('should send method, path, body and headers under the chosen API version', async () => {
      mock = await startMockServer(() => ({ status: 201, body: '{"id":"10001"}' }));
      const client = createTestClient(mock);

      const response = await client.post('/issueLink', {
        version: 'v2',
        body: '{"type":{"name":"Blocks"}}',
        headers: { ...JSON_HEADERS },
      });

      expect(response.status).toBe(201);
      expect(await response.text()).toBe('{"id":"10001"}');
      expect(mock.requests).toHaveLength(1);
      expect(mock.requests[0].method).toBe('POST');
      expect(mock.requests[0].url).toBe('/rest/api/2/issueLink');
      expect(mock.requests[0].body).toBe('{"type":{"name":"Blocks"}}');
      expect(mock.requests[0].headers['content-type']).toBe('application/json');
      expect(mock.requests[0].headers.accept).toBe('application/json');
    });

    it('should issue PUT and DELETE requests', async () => {
      mock = await startMockServer(() => ({ status: 204 }));
      const client = createTestClient(mock);

      await client.put('/issue/rank', { version: 'agile', body: '{}' });
      await client.delete('/issueLink/10001', { version: 'v2' });

      expect(mock.requests.map(r => `${r.method} ${r.url}`)).toEqual([
        'PUT /rest/agile/1.0/issue/rank',
        'DELETE /rest/api/2/issueLink/10001',
      ]);
    });

    it('should return error statuses to the caller without retrying', async () => {
      mock = await startMockServer(() => ({
        status: 429,
        body: '{"errorMessages":["Rate limit exceeded"]}',
      }));
      const client = createTestClient(mock);

      const response = await client.get('/issue/TEST-1');

      expect(response.status).toBe(429);
      expect(mock.requests).toHaveLength(1);
    });

    it('should raise TimeoutError when the server does not answer in time', async () => {
      mock = await startMockServer(() => null);
      const client = createTestClient(mock, 50);

      await expect(client.get('/issue/TEST-1')).rejects.toThrow(
        new TimeoutError('request timed out after 50ms: GET /issue/TEST-1')
      );
      expect(mock.requests).toHaveLength(1);
    });

    it('should raise OperationalError when the connection fails', async () => {
      const closed = await startMockServer(() => ({ status: 200 }));
      await closed.close();
      const client = createTestClient(closed);

      const err = await client.get('/myself').catch((e: unknown) => e);

      expect(err).toBeInstanceOf(OperationalError);
      expect(err instanceof Error ? err.message : '').toMatch(/^request failed: GET \/myself: /);
    });
  });
});
