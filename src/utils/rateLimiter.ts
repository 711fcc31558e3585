import { Mutex } from 'async-mutex';
import { sleep } from './retry.js';

export interface RateLimiter {
  acquire(): Promise<void>;
}

/**
 * Token bucket with continuous refill.
 * Bucket state is only touched under the mutex, so waiters are served in
 * arrival order at the lock.
 */
export class TokenBucketRateLimiter implements RateLimiter {
  private tokens: number;
  private lastRefill: number;
  private readonly mutex = new Mutex();

  /**
   * @param rate - requests per second
   * @param burst - tokens that can accumulate while idle
   */
  constructor(
    private readonly rate: number,
    private readonly burst: number = 1
  ) {
    if (rate <= 0) {
      throw new Error(`Rate must be positive, got ${rate}`);
    }
    if (burst < 1) {
      throw new Error(`Burst must be at least 1, got ${burst}`);
    }
    this.tokens = burst;
    this.lastRefill = performance.now();
  }

  async acquire(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      const now = performance.now();
      const elapsedSeconds = (now - this.lastRefill) / 1000;
      this.tokens = Math.min(this.burst, this.tokens + elapsedSeconds * this.rate);
      this.lastRefill = now;

      if (this.tokens >= 1) {
        this.tokens -= 1;
        return;
      }

      const waitMs = ((1 - this.tokens) / this.rate) * 1000;
      await sleep(waitMs);
      this.tokens = 0;
      this.lastRefill = performance.now();
    });
  }

  getRate(): number {
    return this.rate;
  }
}
