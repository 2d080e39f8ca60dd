import Bottleneck from 'bottleneck';
import { randomUUID } from 'crypto';
import { RunConfig } from '../config';
import { City } from '../interfaces/city';
import { FetchError } from '../interfaces/errors';
import { FetchResult, LoadResult, TransformResult } from '../interfaces/results';
import { CityOutcome, RunResult, RunStatus } from '../interfaces/runResult';
import { RawObservation, WeatherReading } from '../interfaces/weatherReading';
import { logger } from '../logger';
import { computeBackoffDelay, sleep } from '../utils/backoff';
import { errorCode, errorMessage } from '../utils/errorMessage';
import { CircuitBreaker } from './circuitBreaker';
import { WeatherFetcher } from './weatherFetcher';
import { WeatherLoader } from './weatherLoader';
import { transformObservation } from './weatherTransformer';

export interface RunCoordinatorDeps {
  fetcher: WeatherFetcher;
  loader: WeatherLoader;
  transform?: (raw: RawObservation) => TransformResult;
  now?: () => number;
  createRunId?: () => string;
}

type CityProgress =
  | { status: 'transformed'; reading: WeatherReading; attempts: number }
  | { status: 'settled'; outcome: CityOutcome };

interface RunContext {
  runId: string;
  phase: 'fetching' | 'loading';
  controller: AbortController;
  fatal: boolean;
  cancelled: boolean;
  breaker: CircuitBreaker;
  limiter: Bottleneck;
}

const RETRYABLE_HTTP_STATUS = new Set([408, 425, 429]);

export function isRetryable(error: FetchError): boolean {
  switch (error.kind) {
    case 'timeout':
    case 'network':
    case 'invalid_response':
      return true;
    case 'http':
      return error.status >= 500 || RETRYABLE_HTTP_STATUS.has(error.status);
    default:
      return false;
  }
}

export class RunCoordinator {
  private readonly fetcher: WeatherFetcher;
  private readonly loader: WeatherLoader;
  private readonly transform: (raw: RawObservation) => TransformResult;
  private readonly now: () => number;
  private readonly createRunId: () => string;

  constructor(
    private readonly config: Readonly<RunConfig>,
    deps: RunCoordinatorDeps
  ) {
    this.fetcher = deps.fetcher;
    this.loader = deps.loader;
    this.transform = deps.transform ?? transformObservation;
    this.now = deps.now ?? Date.now;
    this.createRunId = deps.createRunId ?? randomUUID;
  }

  async run(signal?: AbortSignal): Promise<RunResult> {
    const { cities, concurrency, minIntervalMs, breaker, runTimeoutMs } = this.config;
    const startedAt = new Date(this.now()).toISOString();

    const ctx: RunContext = {
      runId: this.createRunId(),
      phase: 'fetching',
      controller: new AbortController(),
      fatal: false,
      cancelled: false,
      breaker: new CircuitBreaker({ ...breaker, now: this.now }),
      limiter: new Bottleneck({ maxConcurrent: concurrency, minTime: minIntervalMs }),
    };

    const onCancel = () => this.abort(ctx, 'cancelled');
    signal?.addEventListener('abort', onCancel, { once: true });
    if (signal?.aborted) onCancel();

    const deadline = setTimeout(() => {
      logger.warn({ runId: ctx.runId, runTimeoutMs }, 'Run deadline exceeded, cancelling');
      onCancel();
    }, runTimeoutMs);

    logger.info({ runId: ctx.runId, cities: cities.length }, 'Weather ETL run started');

    try {
      const progress = await Promise.all(cities.map((city) => this.processCity(city, ctx)));
      const { outcomes, load } = await this.loadBatch(cities, progress, ctx);

      return this.buildResult(ctx, startedAt, outcomes, load);
    } finally {
      clearTimeout(deadline);
      signal?.removeEventListener('abort', onCancel);
    }
  }

  private abort(ctx: RunContext, reason: 'fatal' | 'cancelled'): void {
    // The batch is atomic; once it is issued the run completes as is
    if (ctx.phase === 'loading') {
      logger.warn({ runId: ctx.runId, reason }, 'Abort requested during load, ignored');
      return;
    }

    if (reason === 'fatal') ctx.fatal = true;
    else ctx.cancelled = true;

    if (!ctx.controller.signal.aborted) {
      ctx.controller.abort(reason);
    }
  }

  private skipped(ctx: RunContext): CityProgress {
    return {
      status: 'settled',
      outcome: { status: 'skipped', reason: ctx.cancelled ? 'cancelled' : 'fatal_abort' },
    };
  }

  // Fetching(city) -> Transforming(city), with the retry loop for transient errors
  private async processCity(city: City, ctx: RunContext): Promise<CityProgress> {
    const { retry } = this.config;
    let attempts = 0;

    for (;;) {
      if (ctx.controller.signal.aborted) return this.skipped(ctx);

      attempts++;
      const lastAttempt = attempts > retry.retries;
      const result = await ctx.limiter.schedule(() => this.attemptFetch(city, ctx, lastAttempt));

      if (result.status === 'success') {
        return this.transformCity(city, result.raw, attempts);
      }

      const { error } = result;

      switch (error.kind) {
        case 'cancelled':
          return this.skipped(ctx);
        case 'circuit_open':
          // no request was made for this attempt
          return {
            status: 'settled',
            outcome: { status: 'fetch_failed', attempts: attempts - 1, error },
          };
        case 'unauthorized':
          logger.error(
            { runId: ctx.runId, city: city.name, status: error.status },
            'Provider rejected the API key, aborting run'
          );
          return { status: 'settled', outcome: { status: 'fetch_failed', attempts, error } };
      }

      if (lastAttempt || !isRetryable(error)) {
        logger.warn({ city: city.name, attempts, error }, 'Weather fetch failed');
        return { status: 'settled', outcome: { status: 'fetch_failed', attempts, error } };
      }

      const delayMs = computeBackoffDelay(attempts, retry);
      logger.debug({ city: city.name, attempts, delayMs, error }, 'Retrying weather fetch');

      const waited = await sleep(delayMs, ctx.controller.signal);
      if (!waited) return this.skipped(ctx);
    }
  }

  /**
   * One limiter job. Run-level state (fatal abort, breaker) is updated here,
   * before the limiter hands the slot to the next queued city.
   */
  private async attemptFetch(city: City, ctx: RunContext, lastAttempt: boolean): Promise<FetchResult> {
    if (ctx.controller.signal.aborted) {
      return { status: 'failed', error: { kind: 'cancelled' } };
    }
    if (!ctx.breaker.canCall()) {
      logger.warn({ city: city.name }, 'Circuit breaker open, skipping provider call');
      return { status: 'failed', error: { kind: 'circuit_open' } };
    }

    let result: FetchResult;
    try {
      result = await this.fetcher.fetch(city, ctx.controller.signal);
    } catch (err) {
      logger.error({ city: city.name, err }, 'Fetcher threw unexpectedly');
      result = {
        status: 'failed',
        error: { kind: 'network', code: errorCode(err) ?? 'UNEXPECTED' },
      };
    }

    if (result.status === 'success') {
      ctx.breaker.recordSuccess();
    } else if (result.error.kind === 'unauthorized') {
      this.abort(ctx, 'fatal');
    } else if (lastAttempt && isRetryable(result.error)) {
      ctx.breaker.recordFailure();
    }

    return result;
  }

  private transformCity(city: City, raw: RawObservation, attempts: number): CityProgress {
    const result = this.transform(raw);

    if (result.status === 'failed') {
      logger.warn({ city: city.name, error: result.error }, 'Weather observation rejected');
      return { status: 'settled', outcome: { status: 'transform_failed', error: result.error } };
    }

    return { status: 'transformed', reading: result.reading, attempts };
  }

  private async loadBatch(
    cities: readonly City[],
    progress: CityProgress[],
    ctx: RunContext
  ): Promise<{ outcomes: Map<string, CityOutcome>; load?: LoadResult }> {
    const outcomes = new Map<string, CityOutcome>();
    const pending: Array<{ city: City; reading: WeatherReading; attempts: number }> = [];

    progress.forEach((entry, index) => {
      const city = cities[index];
      if (entry.status === 'settled') outcomes.set(city.name, entry.outcome);
      else pending.push({ city, reading: entry.reading, attempts: entry.attempts });
    });

    if (pending.length === 0) return { outcomes };

    // A cancelled run never issues a batch
    if (ctx.cancelled) {
      for (const { city } of pending) {
        outcomes.set(city.name, { status: 'skipped', reason: 'cancelled' });
      }
      return { outcomes };
    }

    ctx.phase = 'loading';
    const load = await this.safeLoad(pending.map((p) => p.reading));

    for (const { city, reading, attempts } of pending) {
      outcomes.set(
        city.name,
        load.status === 'success'
          ? {
            status: 'success',
            observedAt: reading.observedAt.toISOString(),
            temperature: reading.temperature,
            attempts,
          }
          : { status: 'load_failed', error: load.error }
      );
    }

    return { outcomes, load };
  }

  private async safeLoad(readings: WeatherReading[]): Promise<LoadResult> {
    try {
      return await this.loader.load(readings);
    } catch (err) {
      logger.error({ err }, 'Loader threw unexpectedly');
      return { status: 'failed', error: { kind: 'unknown', detail: errorMessage(err) } };
    }
  }

  private buildResult(
    ctx: RunContext,
    startedAt: string,
    outcomes: Map<string, CityOutcome>,
    load: LoadResult | undefined
  ): RunResult {
    const cities: Record<string, CityOutcome> = {};
    let succeeded = 0;
    let skipped = 0;

    for (const city of this.config.cities) {
      const outcome: CityOutcome = outcomes.get(city.name) ?? { status: 'skipped', reason: 'cancelled' };
      cities[city.name] = outcome;
      if (outcome.status === 'success') succeeded++;
      if (outcome.status === 'skipped') skipped++;
    }

    const total = this.config.cities.length;

    let status: RunStatus;
    if (ctx.cancelled) status = 'cancelled';
    else if (ctx.fatal) status = 'fatal';
    else if (succeeded === total) status = 'success';
    else if (succeeded === 0) status = 'failed';
    else status = 'partial';

    const ok = status === 'success' || (status === 'partial' && !this.config.failOnPartial);

    const result: RunResult = {
      runId: ctx.runId,
      status,
      ok,
      fatal: ctx.fatal,
      startedAt,
      finishedAt: new Date(this.now()).toISOString(),
      cities,
      summary: {
        total,
        succeeded,
        failed: total - succeeded - skipped,
        skipped,
        inserted: load?.status === 'success' ? load.inserted : 0,
        duplicates: load?.status === 'success' ? load.duplicates : 0,
      },
    };

    const log = { runId: result.runId, status, summary: result.summary };
    if (ok) logger.info(log, 'Weather ETL run finished');
    else logger.error({ ...log, cities }, 'Weather ETL run finished with failures');

    return result;
  }
}
