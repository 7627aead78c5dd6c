import { randomUUID } from 'crypto';
import Fastify from 'fastify';
import cors from '@fastify/cors';
import { Logger } from 'pino';
import { ZodError } from 'zod';
import { apiKeyAuth } from './api/middleware/auth';
import { correlationMiddleware } from './api/middleware/correlation';
import { conversationRoutes } from './api/routes/conversations';
import { StoreHealth, healthRoutes } from './api/routes/health';
import { SessionCache } from './domain/session/cache';
import { SessionEngine } from './domain/session/engine';
import { logger as rootLogger } from './infra/logging/logger';
import { isAppError } from './shared/errors';

export interface AppDependencies {
  engine: SessionEngine;
  cache: SessionCache;
  checkStore: () => Promise<StoreHealth>;
  apiSecretKey: string;
  corsOrigins: string[];
  logger?: Logger;
}

export async function buildApp(deps: AppDependencies) {
  const log = deps.logger ?? rootLogger;

  const app = Fastify({
    logger: log,
    requestIdHeader: 'x-correlation-id',
    genReqId: () => randomUUID(),
  });

  // Global error handler
  app.setErrorHandler((error, request, reply) => {
    const correlationId = request.correlationId || request.id;

    if (error instanceof ZodError) {
      return reply.status(400).send({
        success: false,
        error: 'Validation failed',
        details: error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
        correlationId,
      });
    }

    const statusCode = isAppError(error) ? error.statusCode : error.statusCode ?? 500;

    const logPayload = {
      correlationId,
      error: error.message,
      statusCode,
      ...(isAppError(error) ? { code: error.code } : {}),
    };
    if (statusCode >= 500) {
      request.log.error({ ...logPayload, stack: error.stack }, 'Request error');
    } else {
      request.log.warn(logPayload, 'Request rejected');
    }

    // Don't expose internal errors, except the store outage which callers may retry
    const exposed = statusCode < 500 || statusCode === 503;

    return reply.status(statusCode).send({
      success: false,
      error: exposed ? error.message : 'Internal server error',
      ...(isAppError(error) ? { code: error.code } : {}),
      correlationId,
    });
  });

  await app.register(cors, {
    origin: deps.corsOrigins.includes('*') ? true : deps.corsOrigins,
    credentials: true,
  });

  // Correlation ID first so rejected requests still carry it
  await app.register(correlationMiddleware);
  await app.register(apiKeyAuth, { apiSecretKey: deps.apiSecretKey });

  await app.register(healthRoutes, { checkStore: deps.checkStore, cache: deps.cache });
  await app.register(conversationRoutes, { engine: deps.engine });

  return app;
}
