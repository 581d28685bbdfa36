/**
 * RetryPolicy
 *
 * Backoff schedule for fallback rounds. Round `n` (1-based) waits
 * `baseDelayMs * multiplier^(n-1)` after a failed attempt.
 */

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * setTimeout-based sleep that wakes early when the signal aborts.
 */
export const defaultSleep: SleepFn = (ms, signal) =>
  new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timeoutId);
      resolve();
    };
    const timeoutId = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

export interface RetryPolicyConfig {
  maxRetries: number;
  baseDelayMs: number;
  multiplier: number;
}

const DEFAULT_CONFIG: RetryPolicyConfig = {
  maxRetries: 3,
  baseDelayMs: 500,
  multiplier: 2,
};

export class RetryPolicy {
  readonly maxRetries: number;
  readonly baseDelayMs: number;
  readonly multiplier: number;

  constructor(config: Partial<RetryPolicyConfig> = {}) {
    const merged = { ...DEFAULT_CONFIG, ...config };
    this.maxRetries = merged.maxRetries;
    this.baseDelayMs = merged.baseDelayMs;
    this.multiplier = merged.multiplier;
  }

  delayForRound(round: number): number {
    return this.baseDelayMs * this.multiplier ** (round - 1);
  }

  /**
   * Round numbers 1..maxRetries.
   */
  rounds(): number[] {
    return Array.from({ length: Math.max(0, this.maxRetries) }, (_, i) => i + 1);
  }
}
