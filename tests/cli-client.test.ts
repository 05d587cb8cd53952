import { afterEach, describe, expect, test, vi } from 'vitest';

import {
  cancelTask,
  cleanupExpiredTasks,
  healthcheck,
  listReadyTasks,
  listTasks,
  publishTask,
  triggerSchedulerJob,
} from '../src/cli/client.js';

const apiUrl = 'http://127.0.0.1:31515';

const task = {
  task_id: '1772359200000_1',
  name: 'digest',
  payload: {},
  status: 'pending',
  priority: 2,
  created_at: '2026-03-01T10:00:00.000Z',
  updated_at: '2026-03-01T10:00:00.000Z',
  started_at: null,
  completed_at: null,
  schedule_seconds: null,
  tags: ['mail'],
  result: null,
  error: null,
  retry_count: 0,
  max_retries: 3,
  timeout_seconds: null,
  expires_at: null,
  depends_on: [],
  callback_url: null,
  callback_attempts: 0,
  callback_last_error: null,
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

describe('cli client', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('publishTask posts the JSON body and validates the response', async () => {
    const fetchSpy = vi.spyOn(globalThis, 'fetch').mockResolvedValue(jsonResponse({ task }, 201));

    const response = await publishTask(apiUrl, { name: 'digest', tags: ['mail'] });

    expect(response.task.task_id).toBe('1772359200000_1');
    expect(fetchSpy).toHaveBeenCalledWith(`${apiUrl}/v1/tasks`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({ name: 'digest', tags: ['mail'] }),
    });
  });

  test('listTasks encodes repeated tags and optional filters', async () => {
    const fetchSpy = vi.spyOn(globalThis, 'fetch').mockResolvedValue(jsonResponse({ tasks: [task] }));

    await listTasks(apiUrl, { status: 'pending', tags: ['mail', 'ops'], priorityMin: 3, limit: 10 });

    expect(fetchSpy).toHaveBeenCalledWith(`${apiUrl}/v1/tasks?status=pending&tag=mail&tag=ops&priority_min=3&limit=10`);
  });

  test('listTasks and listReadyTasks omit the query string when there are no filters', async () => {
    const fetchSpy = vi
      .spyOn(globalThis, 'fetch')
      .mockImplementation(async () => jsonResponse({ tasks: [] }));

    await listTasks(apiUrl);
    await listReadyTasks(apiUrl);
    await listReadyTasks(apiUrl, 2);

    expect(fetchSpy.mock.calls.map((call) => call[0])).toEqual([
      `${apiUrl}/v1/tasks`,
      `${apiUrl}/v1/tasks/ready`,
      `${apiUrl}/v1/tasks/ready?limit=2`,
    ]);
  });

  test('task ids are URL-encoded in paths', async () => {
    const fetchSpy = vi.spyOn(globalThis, 'fetch').mockResolvedValue(jsonResponse({ task: { ...task, status: 'cancelled' } }));

    await cancelTask(apiUrl, 'odd id/1');

    expect(fetchSpy).toHaveBeenCalledWith(`${apiUrl}/v1/tasks/odd%20id%2F1/cancel`, { method: 'POST' });
  });

  test('API errors surface the server message', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      jsonResponse({ error: { code: 'task_state_conflict', message: 'task is already cancelled' } }, 409),
    );

    await expect(cancelTask(apiUrl, '1772359200000_1')).rejects.toThrow('task is already cancelled');
  });

  test('non-JSON error bodies fall back to the status code', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(new Response('gateway down', { status: 502 }));

    await expect(cleanupExpiredTasks(apiUrl)).rejects.toThrow('request failed with status 502');
  });

  test('unexpected response shapes are rejected', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(jsonResponse({ cleaned: -1 }));

    await expect(cleanupExpiredTasks(apiUrl)).rejects.toThrow();
  });

  test('triggerSchedulerJob keeps any JSON result', async () => {
    const fetchSpy = vi
      .spyOn(globalThis, 'fetch')
      .mockResolvedValue(jsonResponse({ name: 'heartbeat', result: { ok: true, tasks_total: 4 } }));

    expect(await triggerSchedulerJob(apiUrl, 'heartbeat')).toEqual({
      name: 'heartbeat',
      result: { ok: true, tasks_total: 4 },
    });
    expect(fetchSpy).toHaveBeenCalledWith(`${apiUrl}/v1/scheduler/jobs/heartbeat/trigger`, { method: 'POST' });
  });

  test('healthcheck throws on a failing status', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(new Response('', { status: 503 }));

    await expect(healthcheck(apiUrl)).rejects.toThrow('health check failed with status 503');
  });
});
