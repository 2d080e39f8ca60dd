export interface BreakerOptions {
  threshold: number;
  cooldownMs: number;
  now?: () => number;
}

export interface BreakerState {
  consecutiveFailures: number;
  breakerOpenUntil: number;
}

/**
 * Provider breaker owned by a single run: one failure is one city whose
 * retries were exhausted, not one HTTP attempt.
 */
export class CircuitBreaker {
  private consecutiveFailures = 0;
  private breakerOpenUntil = 0;

  private readonly threshold: number;
  private readonly cooldownMs: number;
  private readonly now: () => number;

  constructor({ threshold, cooldownMs, now = Date.now }: BreakerOptions) {
    this.threshold = threshold;
    this.cooldownMs = cooldownMs;
    this.now = now;
  }

  canCall(): boolean {
    return this.now() >= this.breakerOpenUntil;
  }

  recordSuccess(): void {
    this.consecutiveFailures = 0;
    this.breakerOpenUntil = 0;
  }

  recordFailure(): void {
    this.consecutiveFailures++;

    if (this.consecutiveFailures >= this.threshold) {
      this.breakerOpenUntil = this.now() + this.cooldownMs;
    }
  }

  getState(): BreakerState {
    return {
      consecutiveFailures: this.consecutiveFailures,
      breakerOpenUntil: this.breakerOpenUntil,
    };
  }
}
