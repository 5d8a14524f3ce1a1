/**
 * Rate Limiter
 *
 * Token bucket rate limiter for throttling analyzer requests.
 */

export class RateLimiter {
    private tokens: number;
    private lastRefill: number;

    /**
     * @param maxTokens - Bucket capacity
     * @param refillRate - Tokens added per second
     * @param now - Clock, injectable for tests
     */
    constructor(
        private readonly maxTokens: number = 100,
        private readonly refillRate: number = 10,
        private readonly now: () => number = Date.now
    ) {
        this.tokens = maxTokens;
        this.lastRefill = now();
    }

    tryAcquire(): boolean {
        this.refill();
        if (this.tokens >= 1) {
            this.tokens--;
            return true;
        }
        return false;
    }

    /** Whole tokens currently available */
    get available(): number {
        this.refill();
        return Math.floor(this.tokens);
    }

    private refill(): void {
        const current = this.now();
        const elapsed = (current - this.lastRefill) / 1000;
        this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.refillRate);
        this.lastRefill = current;
    }
}
