import { TooManyRequestsError } from './errors';

interface RateLimiterOptions {
  maxRequestsPerMinute: number;
  maxWaitMs?: number;
  now?: () => number;
}

/**
 * In-memory token bucket guarding calls to the completion service.
 * Per process only; each engine instance gets its own budget.
 */
export class RateLimiter {
  private tokens: number;
  private readonly maxTokens: number;
  private readonly refillRate: number; // tokens per ms
  private readonly maxWaitMs: number;
  private readonly now: () => number;
  private lastRefill: number;

  constructor(options: RateLimiterOptions) {
    this.maxTokens = options.maxRequestsPerMinute;
    this.tokens = this.maxTokens;
    this.refillRate = options.maxRequestsPerMinute / 60000;
    this.maxWaitMs = options.maxWaitMs ?? 30000;
    this.now = options.now ?? Date.now;
    this.lastRefill = this.now();
  }

  /**
   * Take a token, waiting for one if necessary.
   * Throws TooManyRequestsError if the wait would exceed maxWaitMs.
   */
  async acquire(): Promise<void> {
    const waitMs = this.getWaitTime();

    if (waitMs === 0) {
      this.tokens -= 1;
      return;
    }

    if (waitMs > this.maxWaitMs) {
      throw new TooManyRequestsError(
        `Rate limit exceeded. Try again in ${Math.ceil(waitMs / 1000)} seconds`
      );
    }

    // Reserve the token now so concurrent callers queue behind it
    this.tokens -= 1;
    await new Promise<void>((resolve) => setTimeout(resolve, waitMs));
  }

  /**
   * Take a token without waiting. Returns false if none is available.
   */
  tryAcquire(): boolean {
    this.refill();

    if (this.tokens >= 1) {
      this.tokens -= 1;
      return true;
    }

    return false;
  }

  getAvailableTokens(): number {
    this.refill();
    return Math.max(0, Math.floor(this.tokens));
  }

  /**
   * Estimated wait in ms before the next token is available
   */
  getWaitTime(): number {
    this.refill();

    if (this.tokens >= 1) {
      return 0;
    }

    return Math.ceil((1 - this.tokens) / this.refillRate);
  }

  private refill(): void {
    const now = this.now();
    const elapsed = now - this.lastRefill;

    this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.refillRate);
    this.lastRefill = now;
  }
}
