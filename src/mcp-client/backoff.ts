/**
 * Bounded exponential backoff.
 *
 * Delays never decrease between resets: attempt n waits
 * min(initialDelayMs * multiplier^(n-1), maxDelayMs).
 */
export interface BackoffOptions {
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier?: number;
}

export class BackoffPolicy {
  private attempt = 0;
  private readonly multiplier: number;

  constructor(private readonly options: BackoffOptions) {
    if (options.initialDelayMs <= 0) {
      throw new RangeError('initialDelayMs must be positive');
    }
    if (options.maxDelayMs < options.initialDelayMs) {
      throw new RangeError('maxDelayMs must be at least initialDelayMs');
    }
    this.multiplier = options.multiplier ?? 2;
    if (this.multiplier < 1) {
      throw new RangeError('multiplier must be at least 1');
    }
  }

  /** Failed attempts since the last reset */
  get attempts(): number {
    return this.attempt;
  }

  /** Delay to wait before the next attempt; records one more failure */
  next(): number {
    this.attempt++;
    return this.delayFor(this.attempt);
  }

  /** Delay for the nth consecutive failure (1-based) without recording it */
  delayFor(attempt: number): number {
    const raw = this.options.initialDelayMs * Math.pow(this.multiplier, Math.max(0, attempt - 1));
    return Math.min(raw, this.options.maxDelayMs);
  }

  reset(): void {
    this.attempt = 0;
  }
}
