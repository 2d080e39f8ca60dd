import fs from 'fs';
import { Pool } from 'pg';
import { SQL_DIR, listMigrations, migrate } from '@/db/migrate';

jest.mock('@/logger', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

describe('migrate (unit)', () => {
  it('lists the bundled schema scripts in name order', () => {
    expect(listMigrations()).toEqual(['001_create_weather_table.sql']);
  });

  /**
   * Purpose:
   * Verifies schema setup:
   * - each script is sent to the pool once
   * - the weather table carries the uniqueness key used by the loader
   */
  it('applies every script through the pool', async () => {
    const query = jest.fn().mockResolvedValue({ rowCount: null });
    const pool = { query } as unknown as Pool;

    const applied = await migrate(pool);

    expect(applied).toEqual(['001_create_weather_table.sql']);
    expect(query).toHaveBeenCalledTimes(1);

    const sql = fs.readFileSync(`${SQL_DIR}/001_create_weather_table.sql`, 'utf8');
    expect(query).toHaveBeenCalledWith(sql);
    expect(sql).toContain('UNIQUE (city_name, observed_at)');
  });

  it('stops at the first failing script', async () => {
    const pool = {
      query: jest.fn().mockRejectedValue(new Error('permission denied for schema public')),
    } as unknown as Pool;

    await expect(migrate(pool)).rejects.toThrow('permission denied for schema public');
  });
});
