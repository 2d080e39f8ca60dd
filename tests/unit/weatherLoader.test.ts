import { Pool } from 'pg';
import {
  INSERT_READING_SQL,
  LOAD_LOCK_KEY,
  PgWeatherLoader,
  classifyDatabaseError,
} from '@/modules/weatherLoader';
import { WeatherReading } from '@/interfaces/weatherReading';

jest.mock('@/logger', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

const pgError = (code: string, message: string) => Object.assign(new Error(message), { code });

const reading = (cityName: string, iso = '2026-01-01T00:00:00.000Z'): WeatherReading => ({
  cityName,
  observedAt: new Date(iso),
  temperature: 6.95,
  humidity: 81,
  description: 'light rain',
});

/**
 * Fake pg client:
 * - records every statement
 * - INSERT row counts come from `insertRowCounts`, in order
 * - `failOn` makes the n-th INSERT throw
 */
const createFakeDatabase = (insertRowCounts: number[], failOn?: { insert: number; error: Error }) => {
  const statements: string[] = [];
  let inserts = 0;

  const client = {
    query: jest.fn(async (sql: string) => {
      const statement = sql.trim().split(/\s+/)[0];
      statements.push(statement === 'SELECT' ? 'LOCK' : statement);

      if (statement === 'INSERT') {
        const index = inserts++;
        if (failOn && failOn.insert === index) throw failOn.error;
        return { rowCount: insertRowCounts[index] ?? 0 };
      }
      return { rowCount: null };
    }),
    release: jest.fn(),
  };

  const connect = jest.fn().mockResolvedValue(client);
  const pool = { connect } as unknown as Pool;

  return { pool, client, connect, statements };
};

describe('PgWeatherLoader (unit)', () => {
  /**
   * Purpose:
   * Verifies Core behavior:
   * - empty batch never touches the database
   */
  it('returns immediately for an empty batch', async () => {
    const db = createFakeDatabase([]);

    const result = await new PgWeatherLoader(db.pool).load([]);

    expect(result).toEqual({ status: 'success', inserted: 0, duplicates: 0 });
    expect(db.connect).not.toHaveBeenCalled();
  });

  /**
   * Purpose:
   * Verifies Idempotence + Atomicity:
   * - all inserts run inside one locked transaction
   * - conflicting rows are counted as duplicates
   */
  it('upserts the batch in one transaction and counts duplicates', async () => {
    const db = createFakeDatabase([1, 0]);

    const result = await new PgWeatherLoader(db.pool).load([
      reading('London'),
      reading('Leeds'),
    ]);

    expect(result).toEqual({ status: 'success', inserted: 1, duplicates: 1 });
    expect(db.statements).toEqual(['BEGIN', 'LOCK', 'INSERT', 'INSERT', 'COMMIT']);
    expect(db.client.query).toHaveBeenNthCalledWith(2, 'SELECT pg_advisory_xact_lock($1)', [
      LOAD_LOCK_KEY,
    ]);
    expect(db.client.query).toHaveBeenNthCalledWith(3, INSERT_READING_SQL, [
      'London',
      new Date('2026-01-01T00:00:00.000Z'),
      6.95,
      81,
      'light rain',
    ]);
    expect(db.client.release).toHaveBeenCalledWith(undefined);
  });

  /**
   * Purpose:
   * Verifies Atomicity:
   * - a failure partway through rolls the whole batch back
   * - nothing is committed
   */
  it('rolls back the whole batch when an insert fails', async () => {
    const db = createFakeDatabase([1, 1, 1], {
      insert: 1,
      error: pgError('23514', 'new row violates check constraint "weather_humidity_check"'),
    });

    const result = await new PgWeatherLoader(db.pool).load([
      reading('London'),
      reading('Leeds'),
      reading('York'),
    ]);

    expect(result).toEqual({
      status: 'failed',
      error: {
        kind: 'constraint_violation',
        detail: 'new row violates check constraint "weather_humidity_check"',
      },
    });
    expect(db.statements).toEqual(['BEGIN', 'LOCK', 'INSERT', 'INSERT', 'ROLLBACK']);
    expect(db.client.release).toHaveBeenCalledWith(undefined);
  });

  /**
   * Purpose:
   * Verifies Defensive behavior:
   * - a client whose rollback failed is destroyed, not returned to the pool
   */
  it('destroys the client when rollback fails', async () => {
    const rollbackError = new Error('Connection terminated unexpectedly');
    const db = createFakeDatabase([], {
      insert: 0,
      error: pgError('57P01', 'terminating connection due to administrator command'),
    });
    const query = db.client.query.getMockImplementation();
    db.client.query.mockImplementation(async (sql: string) => {
      if (sql === 'ROLLBACK') throw rollbackError;
      if (!query) throw new Error('query mock missing');
      return query(sql);
    });

    const result = await new PgWeatherLoader(db.pool).load([reading('London')]);

    expect(result).toEqual({
      status: 'failed',
      error: { kind: 'unavailable', detail: 'terminating connection due to administrator command' },
    });
    expect(db.client.release).toHaveBeenCalledWith(rollbackError);
  });

  /**
   * Purpose:
   * Verifies Error handling:
   * - store unavailable before the transaction starts
   */
  it('reports unavailable when no connection can be acquired', async () => {
    const db = createFakeDatabase([]);
    db.connect.mockRejectedValueOnce(pgError('ECONNREFUSED', 'connect ECONNREFUSED 127.0.0.1:5432'));

    const result = await new PgWeatherLoader(db.pool).load([reading('London')]);

    expect(result).toEqual({
      status: 'failed',
      error: { kind: 'unavailable', detail: 'connect ECONNREFUSED 127.0.0.1:5432' },
    });
    expect(db.client.release).not.toHaveBeenCalled();
  });
});

describe('classifyDatabaseError (unit)', () => {
  it.each([
    ['42P01', 'schema_mismatch'],
    ['42703', 'schema_mismatch'],
    ['23505', 'constraint_violation'],
    ['57014', 'timeout'],
    ['08006', 'unavailable'],
    ['57P03', 'unavailable'],
    ['ETIMEDOUT', 'unavailable'],
    ['XX000', 'unknown'],
  ])('classifies code %s as %s', (code, kind) => {
    expect(classifyDatabaseError(pgError(code, 'db error'))).toEqual({ kind, detail: 'db error' });
  });

  it('classifies connection errors without a code as unavailable', () => {
    expect(
      classifyDatabaseError(new Error('Connection terminated due to connection timeout'))
    ).toEqual({
      kind: 'unavailable',
      detail: 'Connection terminated due to connection timeout',
    });
  });

  it('classifies other errors without a code as unknown', () => {
    expect(classifyDatabaseError('boom')).toEqual({ kind: 'unknown', detail: 'boom' });
  });
});
