import { clamp } from '../clamp';
import type { BackoffSpec } from './types';

interface ExponentialDelayParams {
  attempt: number;
  baseMS: number;
  maxMS: number;
}

/**
 * `baseMS * 2^attempt`, clamped to [baseMS, maxMS]: 1s, 2s, 4s, ... maxMS
 */
export function calculateExponentialDelay({
  attempt,
  baseMS,
  maxMS,
}: ExponentialDelayParams): number {
  return clamp(baseMS * Math.pow(2, attempt), baseMS, maxMS);
}

/**
 * Restart attempt bookkeeping for one service.
 *
 * ```typescript
 * const backoff = new RestartBackoff({ baseMS: 1000, maxMS: 30000, maxRetries: 5, resetAfterMS: 60000 });
 * backoff.recordAttempt(); // 1000
 * backoff.recordAttempt(); // 2000
 * ```
 */
export class RestartBackoff {
  private spec: BackoffSpec;
  private _attempts = 0;

  constructor(spec: BackoffSpec) {
    this.spec = spec;
  }

  /**
   * Restarts scheduled since the last reset
   */
  public get attempts(): number {
    return this._attempts;
  }

  public get areAttemptsExhausted(): boolean {
    return this._attempts >= this.spec.maxRetries;
  }

  /**
   * Delay the next restart would wait, without consuming an attempt
   */
  public peekDelayMS(): number {
    return calculateExponentialDelay({
      attempt: this._attempts,
      baseMS: this.spec.baseMS,
      maxMS: this.spec.maxMS,
    });
  }

  /**
   * Consumes an attempt and returns how long to wait before it
   */
  public recordAttempt(): number {
    const delay = this.peekDelayMS();
    this._attempts++;
    return delay;
  }

  /**
   * Whether a run of `uptimeMS` was long enough to forget earlier crashes
   */
  public shouldResetAfter(uptimeMS: number): boolean {
    return uptimeMS >= this.spec.resetAfterMS;
  }

  public reset(): void {
    this._attempts = 0;
  }
}
