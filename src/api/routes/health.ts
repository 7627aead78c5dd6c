import { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { SessionCache } from '../../domain/session/cache';

const VERSION = process.env.npm_package_version || '0.1.0';

export interface StoreHealth {
  healthy: boolean;
  latencyMs: number;
  connections?: {
    total: number;
    idle: number;
    waiting: number;
  };
}

export interface HealthRouteOptions {
  checkStore: () => Promise<StoreHealth>;
  cache: SessionCache;
}

export const healthRoutes: FastifyPluginAsync<HealthRouteOptions> = async (
  app: FastifyInstance,
  options: HealthRouteOptions
) => {
  const { checkStore, cache } = options;

  // Basic liveness check - always returns 200 if server is running
  app.get('/live', async () => {
    return { status: 'ok' };
  });

  // Readiness depends on the store only; a missing cache is a degraded mode
  app.get('/ready', async (_request, reply) => {
    const [storeHealth, cacheUp] = await Promise.all([checkStore(), cache.ping()]);

    if (!storeHealth.healthy) {
      reply.status(503);
    }

    return {
      status: storeHealth.healthy ? 'ready' : 'not_ready',
      checks: {
        database: storeHealth.healthy ? 'ok' : 'fail',
        cache: cacheStatus(cache.enabled, cacheUp),
      },
    };
  });

  app.get('/health', async (_request, reply) => {
    const cacheStart = Date.now();
    const [storeHealth, cacheUp] = await Promise.all([checkStore(), cache.ping()]);
    const cacheLatencyMs = Date.now() - cacheStart;

    if (!storeHealth.healthy) {
      reply.status(503);
    }

    const memory = process.memoryUsage();

    return {
      status: storeHealth.healthy && (cacheUp || !cache.enabled) ? 'healthy' : 'degraded',
      version: VERSION,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      checks: {
        database: {
          status: storeHealth.healthy ? 'ok' : 'fail',
          latencyMs: storeHealth.latencyMs,
          ...(storeHealth.connections ? { connections: storeHealth.connections } : {}),
        },
        cache: {
          status: cacheStatus(cache.enabled, cacheUp),
          latencyMs: cacheLatencyMs,
        },
      },
      memory: {
        heapUsed: Math.round(memory.heapUsed / 1024 / 1024),
        heapTotal: Math.round(memory.heapTotal / 1024 / 1024),
        rss: Math.round(memory.rss / 1024 / 1024),
      },
    };
  });
};

function cacheStatus(enabled: boolean, up: boolean): 'ok' | 'fail' | 'disabled' {
  if (!enabled) return 'disabled';
  return up ? 'ok' : 'fail';
}
