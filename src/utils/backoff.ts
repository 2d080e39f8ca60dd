import { setTimeout as delay } from 'node:timers/promises';

export interface BackoffPolicy {
    baseDelayMs: number;
    factor: number;
    maxDelayMs: number;
}

/**
 * Delay before retry number `retry` (1-based):
 * base * factor^(retry - 1), capped at maxDelayMs.
 */
export function computeBackoffDelay(retry: number, policy: BackoffPolicy): number {
    const raw = policy.baseDelayMs * policy.factor ** Math.max(retry - 1, 0);
    return Math.min(raw, policy.maxDelayMs);
}

/**
 * Resolves `true` after `ms`, or `false` as soon as the signal aborts.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
    if (signal?.aborted) return false;
    if (ms <= 0) return true;

    try {
        await delay(ms, undefined, { signal });
        return true;
    } catch (err) {
        if (signal?.aborted) return false;
        throw err;
    }
}
