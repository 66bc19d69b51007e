/**
 * Token bucket rate limiter for EDGAR requests.
 * SEC fair access allows at most 10 requests per second per user-agent;
 * extraction runs stay well inside that by going one filing at a time.
 */

export class RateLimiter {
  private tokens: number;
  private lastRefill: number;
  private readonly maxTokens: number;
  private readonly refillRate: number; // tokens per ms

  constructor(requestsPerSecond: number = 10) {
    this.maxTokens = Math.max(1, requestsPerSecond);
    this.tokens = this.maxTokens;
    this.refillRate = requestsPerSecond / 1000;
    this.lastRefill = Date.now();
  }

  private refill(): void {
    const now = Date.now();
    const elapsed = now - this.lastRefill;
    this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.refillRate);
    this.lastRefill = now;
  }

  async acquire(): Promise<void> {
    this.refill();

    if (this.tokens >= 1) {
      this.tokens -= 1;
      return;
    }

    const waitMs = Math.ceil((1 - this.tokens) / this.refillRate);
    await new Promise(resolve => setTimeout(resolve, waitMs));
    this.refill();
    this.tokens -= 1;
  }

  /** Acquire a token, then run the request */
  async schedule<T>(request: () => Promise<T>): Promise<T> {
    await this.acquire();
    return request();
  }
}
