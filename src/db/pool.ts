import { Pool } from 'pg';
import { DatabaseConfig } from '../config';
import { logger } from '../logger';

export function createPool(config: DatabaseConfig): Pool {
  const pool = new Pool({
    host: config.host,
    port: config.port,
    user: config.user,
    password: config.password,
    database: config.database,
    ssl: config.ssl ? { rejectUnauthorized: true } : undefined,
    max: 4,
    connectionTimeoutMillis: config.connectTimeoutMs,
    idleTimeoutMillis: 30_000,
    statement_timeout: config.statementTimeoutMs,
    query_timeout: config.statementTimeoutMs + 1_000,
    application_name: 'weather-etl',
  });

  // Errors of idle clients are emitted on the pool, not on a query
  pool.on('error', (err) => {
    logger.warn({ err: err.message }, 'Idle database client error');
  });

  return pool;
}
