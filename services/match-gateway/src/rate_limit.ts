// Per-tenant token bucket, in memory.
type Bucket = { tokens: number; lastRefillMs: number };

export class TokenBucketLimiter {
  private buckets = new Map<string, Bucket>();

  constructor(
    private readonly rps: number,
    private readonly burst: number,
    private readonly clock: () => number = Date.now
  ) {}

  allow(tenantId: string): boolean {
    const now = this.clock();
    const key = tenantId || "anonymous";
    const b = this.buckets.get(key) ?? { tokens: this.burst, lastRefillMs: now };

    const elapsedSec = (now - b.lastRefillMs) / 1000;
    b.tokens = Math.min(this.burst, b.tokens + elapsedSec * this.rps);
    b.lastRefillMs = now;

    if (b.tokens < 1) {
      this.buckets.set(key, b);
      return false;
    }
    b.tokens -= 1;
    this.buckets.set(key, b);
    return true;
  }
}
