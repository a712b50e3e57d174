// Licensed under the Hungry Ghost Hive License. See LICENSE.

import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';

const transport = vi.hoisted(() => ({
  get: vi.fn(),
  put: vi.fn(),
  post: vi.fn(),
  delete: vi.fn(),
}));

vi.mock('../../utils/with-tracker-context.js', () => ({
  withTrackerClient: vi.fn(async (fn: (ctx: { client: typeof transport }) => unknown) =>
    fn({ client: transport })
  ),
}));

import { fieldCommand } from './field.js';

const FIELDS = [
  { id: 'summary', name: 'Summary', custom: false, schema: { type: 'string', system: 'summary' } },
  { id: 'customfield_10019', name: 'Rank', custom: true, schema: { type: 'any' } },
];

describe('field list', () => {
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    fieldCommand.commands[0].setOptionValue('json', undefined);
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    transport.get.mockImplementation(() =>
      Promise.resolve(new Response(JSON.stringify(FIELDS), { status: 200 }))
    );
  });

  afterEach(() => {
    logSpy.mockRestore();
    transport.get.mockReset();
  });

  it('should fetch fields from the v2 API', async () => {
    await fieldCommand.parseAsync(['list'], { from: 'user' });

    expect(transport.get).toHaveBeenCalledWith('/field', {
      version: 'v2',
      headers: { Accept: 'application/json', 'Content-Type': 'application/json' },
    });
    expect(logSpy).toHaveBeenCalledTimes(3);
    expect(String(logSpy.mock.calls[1][0])).toContain('customfield_10019');
  });

  it('should print JSON with --json', async () => {
    await fieldCommand.parseAsync(['list', '--json'], { from: 'user' });

    expect(logSpy).toHaveBeenCalledWith(JSON.stringify(FIELDS, null, 2));
  });
});
