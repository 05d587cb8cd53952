import { homedir } from 'node:os';
import { join } from 'node:path';

import { describe, expect, test } from 'vitest';

import { loadConfig, loadEndpointConfigs } from '../src/shared/config.js';

describe('loadConfig', () => {
  test('defaults workspace and sqlite database path under ~/.backlane', () => {
    const config = loadConfig({});

    expect(config.BACKLANE_WORKSPACE_DIR).toBe(join(homedir(), '.backlane'));
    expect(config.BACKLANE_DATABASE_PATH).toBe(join(homedir(), '.backlane', 'backlane.sqlite'));
    expect(config.BACKLANE_HOST).toBe('127.0.0.1');
    expect(config.BACKLANE_PORT).toBe(31515);
    expect(config.BACKLANE_EXECUTOR_POLL_INTERVAL_MS).toBe(1_000);
    expect(config.BACKLANE_EXECUTOR_BATCH_SIZE).toBe(10);
    expect(config.BACKLANE_HEARTBEAT_INTERVAL_SECONDS).toBe(60);
    expect(config.BACKLANE_QUEUE_DRAIN_INTERVAL_SECONDS).toBe(300);
    expect(config.BACKLANE_LLM_PREFERENCE).toEqual([]);
    expect(config.AI_TIMEOUT).toBe(30);
    expect(config.endpoints).toEqual([]);
  });

  test('expands ~ and coerces numeric settings', () => {
    const config = loadConfig({
      BACKLANE_WORKSPACE_DIR: '~/workspace',
      BACKLANE_DATABASE_PATH: '~/.backlane/custom.sqlite',
      BACKLANE_HOST: '0.0.0.0',
      BACKLANE_PORT: '8080',
      BACKLANE_LLM_PREFERENCE: 'deepseek, openai,deepseek,',
    });

    expect(config.BACKLANE_WORKSPACE_DIR).toBe(join(homedir(), 'workspace'));
    expect(config.BACKLANE_DATABASE_PATH).toBe(join(homedir(), '.backlane', 'custom.sqlite'));
    expect(config.BACKLANE_HOST).toBe('0.0.0.0');
    expect(config.BACKLANE_PORT).toBe(8080);
    expect(config.BACKLANE_LLM_PREFERENCE).toEqual(['deepseek', 'openai']);
  });

  test('resolves relative database paths under workspace directory', () => {
    const config = loadConfig({
      BACKLANE_WORKSPACE_DIR: '/tmp/backlane-workspace',
      BACKLANE_DATABASE_PATH: 'state/backlane.sqlite',
    });

    expect(config.BACKLANE_DATABASE_PATH).toBe('/tmp/backlane-workspace/state/backlane.sqlite');
  });

  test('throws on invalid numeric settings', () => {
    expect(() => loadConfig({ BACKLANE_PORT: 'not-a-port' })).toThrow();
    expect(() => loadConfig({ BACKLANE_EXECUTOR_BATCH_SIZE: '0' })).toThrow();
  });
});

describe('loadEndpointConfigs', () => {
  test('registers only providers with an API key and applies overrides', () => {
    const endpoints = loadEndpointConfigs(
      {
        DEEPSEEK_API_KEY: 'test-secret',
        OPENAI_API_KEY: '   ',
        ANTHROPIC_API_KEY: 'test-secret',
        ANTHROPIC_MODEL: 'claude-test',
        ANTHROPIC_PRIORITY: '5',
        ANTHROPIC_RPM: '10',
      },
      20,
    );

    expect(endpoints).toEqual([
      {
        name: 'deepseek',
        baseUrl: 'https://api.deepseek.com/v1',
        apiKey: 'test-secret',
        model: 'deepseek-chat',
        priority: 2,
        maxRequestsPerMinute: 100,
        timeoutSeconds: 20,
      },
      {
        name: 'anthropic',
        baseUrl: 'https://api.anthropic.com/v1',
        apiKey: 'test-secret',
        model: 'claude-test',
        priority: 5,
        maxRequestsPerMinute: 10,
        timeoutSeconds: 20,
      },
    ]);
  });

  test('rejects a malformed base url override', () => {
    expect(() => loadEndpointConfigs({ GROQ_API_KEY: 'test-secret', GROQ_BASE_URL: 'not a url' }, 30)).toThrow();
  });
});
