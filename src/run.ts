#!/usr/bin/env node
import { FatalConfigurationError } from './interfaces/errors';
import { logger } from './logger';
import { runWeatherEtl } from './modules/weatherEtl';

// Exit status for cron-style schedulers: 0 ok, 1 failed run, 2 bad configuration
async function main(): Promise<number> {
  const controller = new AbortController();

  const cancel = (signal: string) => {
    logger.warn(`Received ${signal}, cancelling run`);
    controller.abort(signal);
  };
  process.once('SIGINT', () => cancel('SIGINT'));
  process.once('SIGTERM', () => cancel('SIGTERM'));

  try {
    const result = await runWeatherEtl(controller.signal);
    process.stdout.write(`${JSON.stringify(result)}\n`);
    return result.ok ? 0 : 1;
  } catch (err) {
    if (err instanceof FatalConfigurationError) {
      logger.fatal({ issues: err.issues }, err.message);
      return 2;
    }
    logger.fatal({ err }, 'Weather ETL crashed');
    return 1;
  }
}

main().then((code) => {
  process.exitCode = code;
});
