import { serve } from '@hono/node-server';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { AgentKindRegistry } from './agents/runtime/agent-registry.js';
import { AgentSystem } from './agents/runtime/agent-system.js';
import { PersistenceAdapter, type PersistenceStore } from './agents/runtime/persistence.js';
import { registerBuiltinKinds } from './agents/kinds.js';
import { CompletionReasoner } from './agents/reasoning/completion-reasoner.js';
import { AgentCreatorSink } from './agents/sinks/agent-creator.js';
import { LogSink, type SinkRegistry } from './agents/sinks/consumer-sink.js';
import { CheckpointManager } from './persistence/checkpoints.js';
import { FilePersistenceStore } from './persistence/file-store.js';
import { RedisPersistenceStore } from './persistence/redis-store.js';
import { createGatewayApp } from './routes/mesh.js';
import { createAnthropicCompletion } from './lib/anthropic.js';
import { loadConfig, type MeshConfig } from './lib/config.js';
import { FF_HTTP_GATEWAY_INJECT, FF_REDIS_STATE } from './lib/feature-flags.js';
import logger from './lib/logger.js';
import { getRedisClient, shutdownRedis } from './lib/redis-client.js';

export interface MeshRuntime {
  config: MeshConfig;
  system: AgentSystem;
  sinks: SinkRegistry;
  checkpoints: CheckpointManager;
}

function createStore(config: MeshConfig): PersistenceStore {
  if (FF_REDIS_STATE) {
    const client = getRedisClient(config.redisUrl);
    if (client) {
      logger.info('Persistence: using Redis snapshots');
      return new RedisPersistenceStore(client);
    }
    logger.warn('FF_REDIS_STATE is on but REDIS_URL is not set; falling back to files');
  }
  logger.info({ dir: config.stateDir }, 'Persistence: using file snapshots');
  return new FilePersistenceStore(config.stateDir);
}

/**
 * Wire a system from configuration: kinds, sinks, the completion-backed
 * reasoner, persistence and checkpoints. Nothing is started.
 */
export function createMeshRuntime(config: MeshConfig = loadConfig()): MeshRuntime {
  if (config.logLevel) logger.level = config.logLevel;
  const kinds = new AgentKindRegistry();
  const sinks: SinkRegistry = new Map();
  const system = new AgentSystem({
    workerConcurrency: config.workerConcurrency,
    activationTimeoutMs: config.activationTimeoutMs,
    maxActivationAttempts: config.maxActivationAttempts,
    defaultCache: { capacity: config.cacheCapacity, dedup: config.cacheDedup },
    reasoner: new CompletionReasoner(
      createAnthropicCompletion({
        model: config.model,
        maxTokens: config.maxTokens,
        ...(config.anthropicApiKey !== undefined ? { apiKey: config.anthropicApiKey } : {}),
      }),
    ),
    kinds,
    persistence: new PersistenceAdapter(createStore(config), { autoSync: config.autoSync }),
  });

  sinks.set('log', new LogSink());
  sinks.set('agent-creator', new AgentCreatorSink(system));
  registerBuiltinKinds(kinds, sinks);

  return {
    config,
    system,
    sinks,
    checkpoints: new CheckpointManager(system, config.checkpointDir),
  };
}

let server: ReturnType<typeof serve> | null = null;
let shuttingDown = false;

async function drain(runtime: MeshRuntime): Promise<void> {
  runtime.system.stop();
  await Promise.race([
    runtime.system.whenIdle(),
    new Promise((resolve) => setTimeout(resolve, 5_000)),
  ]);
  const file = await runtime.checkpoints.save('shutdown');
  logger.info({ file }, 'Shutdown checkpoint written');
  await shutdownRedis();
}

function shutdown(runtime: MeshRuntime, signal: string) {
  if (shuttingDown || !server) return;
  shuttingDown = true;
  logger.info({ signal }, 'Graceful shutdown initiated');

  const flush = drain(runtime).catch((err: unknown) => {
    logger.warn({ error: err instanceof Error ? err.message : String(err) }, 'Shutdown flush failed');
  });

  server.close(() => {
    void flush.finally(() => {
      logger.info('HTTP server closed');
      process.exit(0);
    });
  });

  // Force exit after 10s if connections don't drain
  setTimeout(() => {
    logger.warn('Forcing exit after shutdown timeout');
    process.exit(1);
  }, 10_000).unref();
}

export async function startServer(runtime: MeshRuntime = createMeshRuntime()) {
  if (server) return server;

  const latest = await runtime.checkpoints.latest();
  if (latest) {
    const restored = await runtime.checkpoints.load(latest.file);
    logger.info({ file: latest.file, agents: restored.length }, 'Restored latest checkpoint');
  }

  const app = createGatewayApp(runtime.system, { injectEnabled: FF_HTTP_GATEWAY_INJECT });
  const { port } = runtime.config;
  logger.info({ port }, 'Agent mesh gateway starting');
  server = serve({ fetch: app.fetch, port });
  logger.info({ port }, `Gateway running at http://localhost:${port}`);

  process.on('SIGTERM', () => shutdown(runtime, 'SIGTERM'));
  process.on('SIGINT', () => shutdown(runtime, 'SIGINT'));
  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled promise rejection');
    shutdown(runtime, 'UNHANDLED_REJECTION');
  });

  return server;
}

function isMainModule(): boolean {
  const current = fileURLToPath(import.meta.url);
  const entry = process.argv[1];
  if (!entry) return false;
  return path.resolve(entry) === path.resolve(current);
}

if (isMainModule()) {
  startServer().catch((err: unknown) => {
    logger.error({ err }, 'Failed to start agent mesh');
    process.exit(1);
  });
}

export * from './agents/runtime/index.js';
export { registerBuiltinKinds, REASONING_KIND, CONSUMER_KIND, PRODUCER_KIND } from './agents/kinds.js';
export { createProducer, type ProducerHandle, type CreateProducerOptions } from './agents/producer-handle.js';
export { CompletionReasoner, type TextCompletion } from './agents/reasoning/completion-reasoner.js';
export { buildPrompt, type CompletionPrompt } from './agents/reasoning/prompt.js';
export { AgentCreatorSink } from './agents/sinks/agent-creator.js';
export {
  CollectingSink,
  LogSink,
  SinkInputError,
  SinkReasoner,
  type ConsumerSink,
  type SinkContext,
  type SinkRegistry,
} from './agents/sinks/consumer-sink.js';
export { CheckpointManager, type CheckpointInfo } from './persistence/checkpoints.js';
export { FilePersistenceStore } from './persistence/file-store.js';
export { MemoryPersistenceStore } from './persistence/memory-store.js';
export { RedisPersistenceStore, type RedisStateClient } from './persistence/redis-store.js';
export { createGatewayApp, type GatewayOptions } from './routes/mesh.js';
