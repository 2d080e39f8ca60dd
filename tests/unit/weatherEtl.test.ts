import { Pool } from 'pg';
import { EtlConfig } from '@/config';
import { createWeatherEtl } from '@/modules/weatherEtl';

jest.mock('@/logger', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

const config: EtlConfig = {
  env: 'test',
  provider: {
    baseUrl: 'https://weather.example.test/data/2.5/weather',
    apiKey: 'test-key',
    units: 'metric',
    timeoutMs: 1_000,
  },
  database: {
    host: 'localhost',
    port: 5432,
    user: 'weather',
    password: 'test-secret',
    database: 'weather',
    ssl: false,
    statementTimeoutMs: 1_000,
    connectTimeoutMs: 1_000,
  },
  run: {
    cities: [{ name: 'London', query: 'London,GB' }],
    concurrency: 1,
    minIntervalMs: 0,
    retry: { retries: 0, baseDelayMs: 0, factor: 2, maxDelayMs: 0 },
    breaker: { threshold: 3, cooldownMs: 1_000 },
    runTimeoutMs: 1_000,
    failOnPartial: false,
  },
};

describe('createWeatherEtl (unit)', () => {
  let query: jest.Mock;
  let end: jest.Mock;
  let pool: Pool;

  beforeEach(() => {
    query = jest.fn().mockResolvedValue({ rowCount: null });
    end = jest.fn().mockResolvedValue(undefined);
    pool = { query, end } as unknown as Pool;
  });

  it('prepares the schema through the pool', async () => {
    const etl = createWeatherEtl(config, pool);

    await etl.prepare();
    await etl.close();

    expect(query).toHaveBeenCalledTimes(1);
  });

  /**
   * Purpose:
   * Verifies resource cleanup:
   * - the pool is ended once even if close is called again
   */
  it('releases resources only once', async () => {
    const etl = createWeatherEtl(config, pool);

    await etl.close();
    await etl.close();

    expect(end).toHaveBeenCalledTimes(1);
  });
});
