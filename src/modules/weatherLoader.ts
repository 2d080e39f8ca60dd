import { Pool, PoolClient } from 'pg';
import { LoadError } from '../interfaces/errors';
import { LoadResult } from '../interfaces/results';
import { WeatherReading } from '../interfaces/weatherReading';
import { logger } from '../logger';
import { errorCode, errorMessage } from '../utils/errorMessage';

export interface WeatherLoader {
  load(readings: readonly WeatherReading[]): Promise<LoadResult>;
}

export const INSERT_READING_SQL = `
  INSERT INTO weather (city_name, observed_at, temperature, humidity, description)
  VALUES ($1, $2, $3, $4, $5)
  ON CONFLICT (city_name, observed_at) DO NOTHING
`;

// Transaction-scoped advisory lock: two batches never interleave.
export const LOAD_LOCK_KEY = 4_270_311;

const UNAVAILABLE_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EHOSTUNREACH',
]);

export function classifyDatabaseError(err: unknown): LoadError {
  const code = errorCode(err);
  const detail = errorMessage(err);

  if (code === undefined) {
    // pg reports pool/connect timeouts as plain errors
    return /connect|connection/i.test(detail)
      ? { kind: 'unavailable', detail }
      : { kind: 'unknown', detail };
  }

  if (UNAVAILABLE_CODES.has(code) || code.startsWith('08') || code.startsWith('57P')) {
    return { kind: 'unavailable', detail };
  }
  if (code === '57014') {
    return { kind: 'timeout', detail };
  }
  if (code.startsWith('42')) {
    return { kind: 'schema_mismatch', detail };
  }
  if (code.startsWith('23')) {
    return { kind: 'constraint_violation', detail };
  }

  return { kind: 'unknown', detail };
}

export class PgWeatherLoader implements WeatherLoader {
  constructor(private readonly pool: Pool) {}

  async load(readings: readonly WeatherReading[]): Promise<LoadResult> {
    if (readings.length === 0) {
      return { status: 'success', inserted: 0, duplicates: 0 };
    }

    let client: PoolClient;
    try {
      client = await this.pool.connect();
    } catch (err) {
      const error = classifyDatabaseError(err);
      logger.error({ error }, 'Database connection failed, batch not loaded');
      return { status: 'failed', error };
    }

    let releaseError: Error | undefined;

    try {
      await client.query('BEGIN');
      await client.query('SELECT pg_advisory_xact_lock($1)', [LOAD_LOCK_KEY]);

      let inserted = 0;
      for (const reading of readings) {
        const result = await client.query(INSERT_READING_SQL, [
          reading.cityName,
          reading.observedAt,
          reading.temperature,
          reading.humidity,
          reading.description,
        ]);
        inserted += result.rowCount ?? 0;
      }

      await client.query('COMMIT');

      const duplicates = readings.length - inserted;
      logger.info({ inserted, duplicates }, 'Weather batch committed');

      return { status: 'success', inserted, duplicates };
    } catch (err) {
      const error = classifyDatabaseError(err);
      releaseError = await this.rollback(client);

      logger.error({ error, size: readings.length }, 'Weather batch rolled back');

      return { status: 'failed', error };
    } finally {
      // A client whose rollback failed is in an unknown state: destroy it.
      client.release(releaseError);
    }
  }

  private async rollback(client: PoolClient): Promise<Error | undefined> {
    try {
      await client.query('ROLLBACK');
      return undefined;
    } catch (err) {
      logger.warn({ err }, 'Rollback failed');
      return err instanceof Error ? err : new Error(errorMessage(err));
    }
  }
}
