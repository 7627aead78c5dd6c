import { Pool, QueryResult, QueryResultRow } from 'pg';
import { logger } from '../logging/logger';
import { DatabaseError } from '../../shared/errors';

export function createPool(connectionString: string, statementTimeoutMs: number): Pool {
  const pool = new Pool({
    connectionString,
    max: 20,
    idleTimeoutMillis: 30000,         // Close after 30s idle
    connectionTimeoutMillis: 5000,    // Fail fast on connection
    maxUses: 10000,                   // Refresh connections periodically
    statement_timeout: statementTimeoutMs,
  });

  pool.on('connect', () => {
    logger.debug('New database connection established');
  });

  pool.on('error', (err) => {
    logger.error({ error: err.message }, 'Unexpected database pool error');
  });

  pool.on('remove', () => {
    logger.debug('Database connection removed from pool');
  });

  return pool;
}

// Health check
export async function checkDatabaseHealth(pool: Pool): Promise<{
  healthy: boolean;
  latencyMs: number;
  connections: {
    total: number;
    idle: number;
    waiting: number;
  };
}> {
  const start = Date.now();
  const connections = () => ({
    total: pool.totalCount,
    idle: pool.idleCount,
    waiting: pool.waitingCount,
  });

  try {
    await pool.query('SELECT 1');
    return {
      healthy: true,
      latencyMs: Date.now() - start,
      connections: connections(),
    };
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.warn({ error: err.message }, 'Database health check failed');
    return {
      healthy: false,
      latencyMs: Date.now() - start,
      connections: connections(),
    };
  }
}

// ============================================================================
// Query Helpers
// ============================================================================

export async function query<T extends QueryResultRow = QueryResultRow>(
  db: Pool,
  text: string,
  params?: unknown[]
): Promise<QueryResult<T>> {
  const start = Date.now();

  try {
    const result = await db.query<T>(text, params);
    const duration = Date.now() - start;

    if (duration > 1000) {
      logger.warn({ query: text.substring(0, 100), duration }, 'Slow query detected');
    }

    return result;
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.error({ query: text.substring(0, 100), error: err.message }, 'Query failed');
    throw new DatabaseError(err.message, err);
  }
}

export async function queryOne<T extends QueryResultRow = QueryResultRow>(
  db: Pool,
  text: string,
  params?: unknown[]
): Promise<T | null> {
  const result = await query<T>(db, text, params);
  return result.rows[0] ?? null;
}

export async function queryMany<T extends QueryResultRow = QueryResultRow>(
  db: Pool,
  text: string,
  params?: unknown[]
): Promise<T[]> {
  const result = await query<T>(db, text, params);
  return result.rows;
}
