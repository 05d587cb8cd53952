import { describe, expect, test, vi } from 'vitest';

import { HttpCallbackNotifier, type TaskCallbackEnvelope } from '../src/server/task-callback.js';

const envelope: TaskCallbackEnvelope = {
  task_id: '1772359200000_1',
  status: 'completed',
  result: { output: 'ok' },
  error: null,
  updated_at: '2026-03-01T10:00:00.000Z',
  name: 'digest',
  priority: 2,
};

describe('HttpCallbackNotifier', () => {
  test('posts the envelope as JSON', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(new Response(null, { status: 204 }));
    const notifier = new HttpCallbackNotifier({ fetchImpl, timeoutMs: 500 });

    expect(await notifier.notify('http://hooks.test/done', envelope)).toEqual({ ok: true, error: null });

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe('http://hooks.test/done');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({ 'content-type': 'application/json' });
    expect(init?.body).toBe(JSON.stringify(envelope));
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  test('non-2xx responses report the status and a truncated body', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(new Response('x'.repeat(250), { status: 500 }));
    const notifier = new HttpCallbackNotifier({ fetchImpl });

    expect(await notifier.notify('http://hooks.test/done', envelope)).toEqual({
      ok: false,
      error: `500: ${'x'.repeat(200)}`,
    });
  });

  test('transport errors are reported without retrying', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockRejectedValue(new Error('connect ECONNREFUSED'));
    const notifier = new HttpCallbackNotifier({ fetchImpl });

    expect(await notifier.notify('http://hooks.test/done', envelope)).toEqual({
      ok: false,
      error: 'connect ECONNREFUSED',
    });
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });
});
