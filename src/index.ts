import { config } from './config';
import { buildApp } from './app';
import { AnthropicCompletionClient, CompletionClient } from './domain/ai/service';
import { ConversationRepository } from './domain/conversation/repository';
import { PostgresConversationStore } from './domain/conversation/store';
import { SessionCache } from './domain/session/cache';
import { SessionEngine } from './domain/session/engine';
import { connectCacheBackend } from './infra/cache/client';
import { checkDatabaseHealth, createPool } from './infra/db/client';
import { logger } from './infra/logging/logger';

async function bootstrap() {
  logger.info('Starting session engine bootstrap...');

  const pool = createPool(config.databaseUrl, config.storeTimeoutMs);
  const cacheBackend = await connectCacheBackend(config.redisUrl);
  const cache = new SessionCache(cacheBackend, { timeoutMs: config.cacheTimeoutMs });

  const repository = new ConversationRepository(new PostgresConversationStore(pool), cache, {
    storeTimeoutMs: config.storeTimeoutMs,
  });

  let completion: CompletionClient | null = null;
  if (config.anthropicApiKey) {
    completion = new AnthropicCompletionClient({
      apiKey: config.anthropicApiKey,
      model: config.chatModel,
      maxRequestsPerMinute: config.claudeRpmLimit,
    });
  } else {
    logger.warn('ANTHROPIC_API_KEY not set - replies will use offline fallbacks');
  }

  const engine = new SessionEngine(repository, completion, { analysisModel: config.analysisModel });

  const app = await buildApp({
    engine,
    cache,
    checkStore: () => checkDatabaseHealth(pool),
    apiSecretKey: config.apiSecretKey,
    corsOrigins: config.corsOrigins,
  });

  // Graceful shutdown handler
  let isShuttingDown = false;

  const shutdown = async (signal: string) => {
    if (isShuttingDown) return;
    isShuttingDown = true;

    logger.info({ signal }, 'Received shutdown signal, closing server...');

    try {
      await app.close();
      await pool.end();
      if (cacheBackend) {
        await cacheBackend.close();
      }
      logger.info('Server closed gracefully');
      process.exit(0);
    } catch (err) {
      logger.error({ err }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  try {
    await app.listen({ port: config.port, host: '0.0.0.0' });
    logger.info({ port: config.port, env: config.nodeEnv, cache: cache.enabled }, 'Server started');
  } catch (err) {
    logger.error({ err }, 'Failed to start server');
    process.exit(1);
  }
}

bootstrap().catch((err: unknown) => {
  logger.fatal({ err }, 'Bootstrap failed');
  process.exit(1);
});
