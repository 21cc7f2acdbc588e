import { setTimeout as sleep } from 'timers/promises';
import { RateLimitWaitError } from './errors';

// 4500 requests/hour, below GitHub's 5000/hour for authenticated tokens
export const DEFAULT_REQUESTS_PER_SECOND = 1.25;
export const DEFAULT_BURST = 1;

export interface TokenBucketOptions {
  ratePerSecond?: number;
  burst?: number;
  now?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export class TokenBucket {
  readonly ratePerSecond: number;
  readonly burst: number;
  private tokens: number;
  private lastRefill: number;
  private now: () => number;
  private sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(options: TokenBucketOptions = {}) {
    this.ratePerSecond = options.ratePerSecond ?? DEFAULT_REQUESTS_PER_SECOND;
    this.burst = options.burst ?? DEFAULT_BURST;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? ((ms, signal) => sleep(ms, undefined, { signal }));
    this.tokens = this.burst;
    this.lastRefill = this.now();
  }

  get available(): number {
    this.refill();
    return this.tokens;
  }

  /**
   * Take one token, waiting until one is available. The token is reserved up front
   * and handed back if the wait is cancelled.
   */
  async wait(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new RateLimitWaitError(signal.reason);
    }

    this.refill();
    this.tokens -= 1;
    if (this.tokens >= 0) {
      return;
    }

    const delayMs = Math.ceil((-this.tokens / this.ratePerSecond) * 1000);
    try {
      await this.sleep(delayMs, signal);
    } catch (error) {
      this.tokens += 1;
      throw new RateLimitWaitError(signal?.reason ?? error);
    }
  }

  private refill(): void {
    const now = this.now();
    const elapsedSeconds = (now - this.lastRefill) / 1000;
    this.lastRefill = now;
    this.tokens = Math.min(this.burst, this.tokens + elapsedSeconds * this.ratePerSecond);
  }
}
