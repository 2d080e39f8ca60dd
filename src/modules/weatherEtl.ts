import { Pool } from 'pg';
import { EtlConfig, loadConfig } from '../config';
import { createPool } from '../db/pool';
import { migrate } from '../db/migrate';
import { RunResult } from '../interfaces/runResult';
import { logger } from '../logger';
import { RunCoordinator } from './runCoordinator';
import { OpenWeatherFetcher, createWeatherApiClient } from './weatherFetcher';
import { PgWeatherLoader } from './weatherLoader';

export interface WeatherEtl {
  prepare(): Promise<void>;
  run(signal?: AbortSignal): Promise<RunResult>;
  close(): Promise<void>;
}

export function createWeatherEtl(
  config: Readonly<EtlConfig>,
  pool: Pool = createPool(config.database)
): WeatherEtl {
  const { axiosClient, httpsAgent } = createWeatherApiClient(config.provider.timeoutMs);

  const coordinator = new RunCoordinator(config.run, {
    fetcher: new OpenWeatherFetcher(axiosClient, config.provider),
    loader: new PgWeatherLoader(pool),
  });

  let closed = false;

  return {
    async prepare() {
      await migrate(pool);
    },

    run(signal?: AbortSignal) {
      return coordinator.run(signal);
    },

    async close() {
      if (closed) return;
      closed = true;

      httpsAgent.destroy();
      await pool.end();
      logger.debug('Weather ETL resources released');
    },
  };
}

/**
 * Single scheduled entry point: configuration comes from the environment,
 * one run is executed, and every resource is released before returning.
 */
export async function runWeatherEtl(signal?: AbortSignal): Promise<RunResult> {
  const etl = createWeatherEtl(loadConfig());

  try {
    await etl.prepare();
    return await etl.run(signal);
  } finally {
    await etl.close();
  }
}
