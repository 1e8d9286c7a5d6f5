import { hostname } from 'node:os';
import { Redis } from 'ioredis';
import { startServer } from '../api/server.js';
import { getEnv } from '../config/env.js';
import { loadSettings } from '../config/settings.js';
import { closePool, getPool } from '../db/client.js';
import { MemoryRepository } from '../db/memoryRepository.js';
import { PgRepository } from '../db/pgRepository.js';
import type { Repository } from '../db/types.js';
import { RedisEventPublisher } from '../lib/redis-streams.js';
import { AnthropicLLMCapability } from '../llm/anthropic.js';
import { errorMessage, getLogger } from '../monitoring/logger.js';
import { Orchestrator } from '../orchestrator/Orchestrator.js';
import { InMemorySessionProvider } from '../sessions/InMemorySessionProvider.js';
import { DryRunSubmissionExecutor } from './stageExecutors/dryRunSubmission.js';
import { LLMAnalysisExecutor } from './stageExecutors/llmAnalysis.js';
import { LLMTailoringExecutor } from './stageExecutors/llmTailoring.js';
import { StageExecutorRegistry } from './stageExecutors/registry.js';

/**
 * ApplyFlow worker entry point
 *
 * Long-running process that:
 * 1. Loads env + orchestrator settings
 * 2. Opens the repository (Postgres when DATABASE_URL is set, memory otherwise)
 * 3. Connects Redis for event streaming when REDIS_URL is set
 * 4. Registers stage executors
 * 5. Recovers in-flight applications and starts the scheduler
 * 6. Serves the control API on APPLYFLOW_API_PORT (default 3200)
 */

function parseWorkerId(): string {
  const arg = process.argv.find((a) => a.startsWith('--worker-id='));
  if (arg) {
    const id = arg.split('=')[1];
    if (!id) {
      throw new Error('--worker-id requires a value (e.g. --worker-id=worker-1)');
    }
    return id;
  }
  // Stable across restarts so claims left by this host are cleared on recovery
  return getEnv().APPLYFLOW_WORKER_ID ?? `worker-${hostname()}`;
}

async function main(): Promise<void> {
  const env = getEnv();
  const workerId = parseWorkerId();
  const logger = getLogger({ workerId });
  logger.info('Worker starting', { workerId, nodeEnv: env.NODE_ENV });

  const settings = loadSettings();

  let repo: Repository;
  if (env.DATABASE_URL) {
    repo = new PgRepository({ pool: getPool(), tablePrefix: env.APPLYFLOW_TABLE_PREFIX });
    logger.info('Using Postgres repository', { tablePrefix: env.APPLYFLOW_TABLE_PREFIX });
  } else {
    repo = new MemoryRepository();
    logger.warn('No DATABASE_URL configured, state will not survive a restart');
  }

  // ── Redis for event streaming ──────────────────────────────────
  let redis: Redis | undefined;
  if (env.REDIS_URL) {
    try {
      redis = new Redis(env.REDIS_URL, {
        maxRetriesPerRequest: 3,
        lazyConnect: true,
        ...(env.REDIS_URL.startsWith('rediss://') && { tls: {} }),
      });
      await redis.connect();
      logger.info('Redis connected for event streaming');
    } catch (err) {
      logger.warn('Redis connection failed, events will not be streamed', { error: errorMessage(err) });
      redis = undefined;
    }
  } else {
    logger.info('No REDIS_URL configured, events will not be streamed');
  }

  // ── Stage executors ────────────────────────────────────────────
  const registry = new StageExecutorRegistry();
  if (env.ANTHROPIC_API_KEY) {
    const llm = new AnthropicLLMCapability({
      apiKey: env.ANTHROPIC_API_KEY,
      models: { analysis: env.APPLYFLOW_ANALYSIS_MODEL, generation: env.APPLYFLOW_GENERATION_MODEL },
    });
    registry.registerAnalysis(new LLMAnalysisExecutor(llm));
    registry.registerTailoring(new LLMTailoringExecutor(llm));
  } else {
    logger.warn('No ANTHROPIC_API_KEY configured, analysis and tailoring will fail');
  }
  if (env.APPLYFLOW_DRY_RUN) {
    registry.registerSubmission(new DryRunSubmissionExecutor());
    logger.info('Dry-run mode: submissions are simulated');
  } else {
    logger.warn('Dry-run disabled and no platform submission executors registered');
  }

  const orchestrator = new Orchestrator({
    repo,
    registry,
    sessionProvider: new InMemorySessionProvider(),
    settings,
    workerId,
    ...(redis && { publisher: new RedisEventPublisher(redis) }),
    logger,
  });

  const report = await orchestrator.start();
  logger.info('Recovery complete', {
    scanned: report.scanned,
    repaired: report.repaired.length,
    interrupted: report.interrupted.length,
    requeued: report.requeued,
  });

  const server = startServer(orchestrator, env.APPLYFLOW_API_PORT);

  const closeConnections = async (): Promise<void> => {
    if (redis) {
      try {
        await redis.quit();
        logger.info('Redis connection closed');
      } catch (err) {
        logger.warn('Redis close failed', { error: errorMessage(err) });
      }
    }
    if (env.DATABASE_URL) {
      try {
        await closePool();
      } catch (err) {
        logger.warn('Postgres pool close failed', { error: errorMessage(err) });
      }
    }
  };

  // Two-phase shutdown handler:
  // - First signal: stop dispatching, drain active stage invocations
  // - Second signal: exit immediately; claims are cleared on the next start
  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      logger.warn('Received second signal, forcing shutdown', { signal });
      await closeConnections();
      logger.info('Worker force-killed', { workerId });
      process.exit(1);
    }

    shuttingDown = true;
    logger.info('Received signal, starting graceful shutdown', { signal });
    logger.info('Press Ctrl-C again to force-kill immediately');
    logger.info('Draining active applications', { active: orchestrator.stats().scheduler.active });

    server.close();
    await orchestrator.stop();
    await closeConnections();

    logger.info('Worker shut down gracefully', { workerId });
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err) => {
      logger.error('Shutdown failed', { signal, error: errorMessage(err) });
      process.exit(1);
    });
  };
  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', { reason: errorMessage(reason) });
  });

  process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception', { error: error.message });
    // Give time for logs to flush, then exit
    setTimeout(() => process.exit(1), 1000);
  });

  logger.info('Worker running', { workerId, workers: settings.workers });
}

main().catch((err) => {
  getLogger().error('Worker fatal error', { error: errorMessage(err) });
  process.exit(1);
});
