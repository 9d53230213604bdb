export const RATE_LIMIT_WINDOW_MS = 60_000;

export interface AdmissionDecision {
  admitted: boolean;
  /** Milliseconds until the next request from this client would be admitted. */
  retryAfterMs: number;
}

export interface AdmissionPolicy {
  admit(clientId: string, now?: number): AdmissionDecision;
  close(): void;
}

export interface SlidingWindowOptions {
  limit: number;
  windowMs?: number;
  maxClients?: number;
  /** Interval of the idle-key sweep; 0 disables the timer. */
  sweepIntervalMs?: number;
}

/**
 * Per-client sliding window kept as an ordered list of admission timestamps.
 * Each `admit` call evicts expired entries, counts and records in one
 * synchronous pass, so concurrent requests cannot interleave inside it.
 */
export class SlidingWindowRateLimiter implements AdmissionPolicy {
  private readonly buckets = new Map<string, number[]>();
  private readonly limit: number;
  private readonly windowMs: number;
  private readonly maxClients: number;
  private readonly sweepTimer: NodeJS.Timeout | null;

  constructor(options: SlidingWindowOptions) {
    this.limit = options.limit;
    this.windowMs = options.windowMs ?? RATE_LIMIT_WINDOW_MS;
    this.maxClients = options.maxClients ?? 10_000;

    const sweepIntervalMs = options.sweepIntervalMs ?? this.windowMs;
    if (sweepIntervalMs > 0) {
      this.sweepTimer = setInterval(() => this.sweep(), sweepIntervalMs);
      this.sweepTimer.unref();
    } else {
      this.sweepTimer = null;
    }
  }

  admit(clientId: string, now = Date.now()): AdmissionDecision {
    const windowStart = now - this.windowMs;
    const bucket = this.buckets.get(clientId) ?? [];

    while (bucket.length > 0 && (bucket[0] ?? now) < windowStart) {
      bucket.shift();
    }

    // Re-insert so Map iteration order tracks recency for capacity eviction.
    this.buckets.delete(clientId);
    this.buckets.set(clientId, bucket);

    if (bucket.length >= this.limit) {
      const oldest = bucket[0] ?? now;
      return { admitted: false, retryAfterMs: Math.max(0, oldest + this.windowMs - now) };
    }

    bucket.push(now);
    this.evictOverflow();
    return { admitted: true, retryAfterMs: 0 };
  }

  /** Drops clients whose newest entry has left the window. */
  sweep(now = Date.now()): number {
    const windowStart = now - this.windowMs;
    let removed = 0;

    for (const [clientId, bucket] of this.buckets) {
      const newest = bucket[bucket.length - 1];
      if (newest === undefined || newest < windowStart) {
        this.buckets.delete(clientId);
        removed += 1;
      }
    }

    return removed;
  }

  get trackedClients(): number {
    return this.buckets.size;
  }

  close(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
    }
    this.buckets.clear();
  }

  private evictOverflow() {
    while (this.buckets.size > this.maxClients) {
      const leastRecent = this.buckets.keys().next();
      if (leastRecent.done) {
        return;
      }
      this.buckets.delete(leastRecent.value);
    }
  }
}
