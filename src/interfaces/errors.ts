import { z } from 'zod';

export type FetchError =
  | { kind: 'timeout' }
  | { kind: 'http'; status: number }
  | { kind: 'unauthorized'; status: number }
  | { kind: 'invalid_response'; detail: string }
  | { kind: 'network'; code: string }
  | { kind: 'circuit_open' }
  | { kind: 'cancelled' };

export type FetchErrorKind = FetchError['kind'];

export interface TransformError {
  field: string;
  reason: string;
}

export type LoadErrorKind =
  | 'unavailable'
  | 'timeout'
  | 'schema_mismatch'
  | 'constraint_violation'
  | 'unknown';

export interface LoadError {
  kind: LoadErrorKind;
  detail: string;
}

/**
 * Raised while building the run configuration. Nothing can be fetched or
 * stored until the environment is fixed, so this never becomes a RunResult.
 */
export class FatalConfigurationError extends Error {
  readonly issues: z.ZodIssue[];

  constructor(message: string, issues: z.ZodIssue[] = []) {
    super(message);
    this.name = 'FatalConfigurationError';
    this.issues = issues;
  }
}
