import { sleep } from "./retry.js";

export type TokenBucketOptions = {
  /** Sustained requests per second; 0 or less disables limiting */
  ratePerSec: number;
  /** Tokens available at once. Defaults to ceil(ratePerSec), minimum 1 */
  burst?: number;
  now?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

/**
 * Token bucket shared by every stream of one channel.
 *
 * take() reserves a token immediately (the balance may go negative) and then
 * waits out the deficit, so concurrent callers queue in call order.
 */
export class TokenBucket {
  readonly ratePerSec: number;
  readonly capacity: number;

  private tokens: number;
  private updatedAt: number;
  private readonly now: () => number;
  private readonly wait: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(opts: TokenBucketOptions) {
    this.ratePerSec = opts.ratePerSec;
    this.capacity = Math.max(1, Math.floor(opts.burst ?? Math.ceil(opts.ratePerSec)));
    this.now = opts.now ?? Date.now;
    this.wait = opts.sleep ?? sleep;
    this.tokens = this.capacity;
    this.updatedAt = this.now();
  }

  get available(): number {
    this.refill();
    return this.tokens;
  }

  private refill() {
    const t = this.now();
    const elapsedSec = Math.max(0, t - this.updatedAt) / 1000;
    this.tokens = Math.min(this.capacity, this.tokens + elapsedSec * this.ratePerSec);
    this.updatedAt = t;
  }

  async take(signal?: AbortSignal): Promise<void> {
    if (this.ratePerSec <= 0) return;

    this.refill();
    this.tokens -= 1;
    if (this.tokens >= 0) return;

    const waitMs = Math.ceil((-this.tokens / this.ratePerSec) * 1000);
    try {
      await this.wait(waitMs, signal);
    } catch (err) {
      // give the reservation back so later callers don't wait for a request that never ran
      this.tokens += 1;
      throw err;
    }
  }
}
