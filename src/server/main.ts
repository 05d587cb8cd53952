import { EndpointRegistry, registerEndpointsFromConfig } from '../runtime/endpoint-registry.js';
import { ProviderRouter } from '../runtime/provider-router.js';
import { createProviderForEndpoint } from '../runtime/providers.js';
import { loadConfig } from '../shared/config.js';
import { componentLogger, createLogger, resolveLogLevel } from '../shared/logger.js';
import { createApp } from './app.js';
import { IntervalScheduler } from './interval-scheduler.js';
import { runMigrations } from './migrations.js';
import { closeSqliteDatabase, openSqliteDatabase } from './sqlite.js';
import { HttpCallbackNotifier } from './task-callback.js';
import { TaskExecutor } from './task-executor.js';
import { AiCallHandler, HandlerRegistry } from './task-handlers.js';
import { SqliteTaskStore } from './task-store.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const rootLogger = createLogger({
    level: config.BACKLANE_LOG_LEVEL,
    bindings: {
      service: 'backlane',
    },
  });
  const mainLogger = componentLogger(rootLogger, 'server_main');

  const database = openSqliteDatabase(config.BACKLANE_DATABASE_PATH);
  const appliedMigrations = await runMigrations(database);
  if (appliedMigrations.length > 0) {
    mainLogger.info({ event: 'migrations_applied', migrations: appliedMigrations });
  }

  const taskStore = new SqliteTaskStore(database, {
    notifier: new HttpCallbackNotifier({ timeoutMs: config.BACKLANE_CALLBACK_TIMEOUT_MS }),
    logger: componentLogger(rootLogger, 'task_store'),
  });

  const recovered = await taskStore.recoverInterruptedTasks();
  if (recovered > 0) {
    mainLogger.warn({ event: 'interrupted_tasks_requeued', count: recovered });
  }

  const endpointRegistry = new EndpointRegistry({ logger: componentLogger(rootLogger, 'endpoint_registry') });
  registerEndpointsFromConfig(endpointRegistry, config.endpoints);

  const providerLogger = componentLogger(rootLogger, 'providers');
  const router = new ProviderRouter({
    providers: endpointRegistry
      .listEndpoints()
      .sort((left, right) => right.priority - left.priority)
      .map((endpoint) => createProviderForEndpoint(endpoint, providerLogger)),
    registry: endpointRegistry,
    preference: config.BACKLANE_LLM_PREFERENCE,
    logger: componentLogger(rootLogger, 'provider_router'),
  });

  if (config.endpoints.length === 0) {
    mainLogger.warn({
      event: 'no_text_providers_configured',
      message: 'ai_call tasks will be answered by the offline echo provider',
    });
  }

  const handlers = new HandlerRegistry();
  handlers.register(new AiCallHandler(router));

  const executor = new TaskExecutor(taskStore, handlers, {
    pollIntervalMs: config.BACKLANE_EXECUTOR_POLL_INTERVAL_MS,
    batchSize: config.BACKLANE_EXECUTOR_BATCH_SIZE,
    logger: componentLogger(rootLogger, 'task_executor'),
  });

  const scheduler = new IntervalScheduler({ logger: componentLogger(rootLogger, 'scheduler') });
  const heartbeatLogger = componentLogger(rootLogger, 'heartbeat');

  scheduler.addTask(
    'heartbeat',
    config.BACKLANE_HEARTBEAT_INTERVAL_SECONDS,
    async () => {
      const stats = await taskStore.getStats();
      heartbeatLogger.info({
        event: 'heartbeat',
        tasks_total: stats.total,
        tasks_pending: stats.byStatus.pending,
        tasks_running: stats.byStatus.running,
        endpoints: endpointRegistry.getAvailableEndpoints().map((endpoint) => endpoint.name),
      });
      return { ok: true, tasks_total: stats.total };
    },
    { tags: ['system'] },
  );

  scheduler.addTask(
    'queue_drain',
    config.BACKLANE_QUEUE_DRAIN_INTERVAL_SECONDS,
    async () => executor.drainOnce(),
    { tags: ['system', 'tasks'] },
  );

  const app = createApp({
    taskStore,
    scheduler,
    router,
    endpointRegistry,
    logger: rootLogger.child({ component: 'http_server' }),
  });

  let closePromise: Promise<void> | null = null;
  const close = async (signal?: string) => {
    if (closePromise) {
      return closePromise;
    }

    closePromise = (async () => {
      mainLogger.info({ event: 'server_shutdown_started', signal: signal ?? null });
      await scheduler.stop();
      await executor.stop();
      await app.close();
      closeSqliteDatabase(database);
      mainLogger.info({ event: 'server_shutdown_completed', signal: signal ?? null });
    })();

    return closePromise;
  };

  process.once('SIGINT', () => {
    void close('SIGINT').finally(() => process.exit(0));
  });

  process.once('SIGTERM', () => {
    void close('SIGTERM').finally(() => process.exit(0));
  });

  await app.listen({
    port: config.BACKLANE_PORT,
    host: config.BACKLANE_HOST,
  });

  mainLogger.info({
    event: 'server_listening',
    host: config.BACKLANE_HOST,
    port: config.BACKLANE_PORT,
    endpoints: config.endpoints.map((endpoint) => endpoint.name),
  });

  scheduler.start();
  await executor.start();
}

const startupLogger = createLogger({
  level: resolveLogLevel(process.env.BACKLANE_LOG_LEVEL),
  bindings: {
    service: 'backlane',
    component: 'server_main',
  },
});

main().catch((error) => {
  startupLogger.error({
    event: 'server_main_failed',
    err: error instanceof Error ? error : new Error(String(error)),
  });
  process.exit(1);
});
