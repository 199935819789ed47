/**
 * Reconnect backoff: starts at `initialDelayMs`, doubles after every failed
 * attempt, never exceeds `maxDelayMs`. There is no attempt limit.
 */

export interface BackoffOptions {
  initialDelayMs: number;
  maxDelayMs: number;
}

/** Delay before reconnect attempt number `attempt` (0-based) */
export function backoffDelay(attempt: number, options: BackoffOptions): number {
  // 2^attempt overflows to Infinity long after the cap applies
  return Math.min(options.initialDelayMs * Math.pow(2, attempt), options.maxDelayMs);
}

export class Backoff {
  private attempt = 0;

  constructor(private readonly options: BackoffOptions) {}

  /** Delay for the next attempt; advances the attempt counter */
  next(): number {
    const delay = backoffDelay(this.attempt, this.options);
    this.attempt++;
    return delay;
  }

  /** Called once a connection is established */
  reset(): void {
    this.attempt = 0;
  }

  get attempts(): number {
    return this.attempt;
  }
}
