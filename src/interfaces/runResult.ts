import { FetchError, LoadError, TransformError } from './errors';

export type CityOutcome =
  | {
    status: 'success';
    observedAt: string;
    temperature: number;
    attempts: number;
  }
  | {
    status: 'fetch_failed';
    attempts: number;
    error: FetchError;
  }
  | {
    status: 'transform_failed';
    error: TransformError;
  }
  | {
    status: 'load_failed';
    error: LoadError;
  }
  | {
    status: 'skipped';
    reason: 'fatal_abort' | 'cancelled';
  };

export type RunStatus = 'success' | 'partial' | 'failed' | 'fatal' | 'cancelled';

export interface RunSummary {
  total: number;
  succeeded: number;
  failed: number;
  skipped: number;
  inserted: number;
  duplicates: number;
}

export interface RunResult {
  runId: string;
  status: RunStatus;
  ok: boolean;
  fatal: boolean;
  startedAt: string;
  finishedAt: string;
  cities: Record<string, CityOutcome>;
  summary: RunSummary;
}
