export class SlidingWindowRateLimiter {
  private readonly maxEvents: number;
  private readonly windowMs: number;
  private readonly timestamps: number[] = [];

  constructor(maxEvents: number, windowMs: number) {
    this.maxEvents = maxEvents;
    this.windowMs = windowMs;
  }

  allow(nowMs: number = Date.now()): boolean {
    this.prune(nowMs);

    if (this.timestamps.length >= this.maxEvents) {
      return false;
    }

    this.timestamps.push(nowMs);
    return true;
  }

  /** True when no request falls inside the window any more. */
  isIdle(nowMs: number = Date.now()): boolean {
    this.prune(nowMs);
    return this.timestamps.length === 0;
  }

  private prune(nowMs: number): void {
    const threshold = nowMs - this.windowMs;
    while (this.timestamps.length && this.timestamps[0] < threshold) {
      this.timestamps.shift();
    }
  }
}

/**
 * One sliding window per client key (remote address for HTTP). Idle windows
 * are dropped on every `sweepEvery`-th call.
 */
export class KeyedRateLimiter {
  private readonly limiters = new Map<string, SlidingWindowRateLimiter>();
  private readonly maxEvents: number;
  private readonly windowMs: number;
  private readonly sweepEvery: number;
  private calls = 0;

  constructor(maxEvents: number, windowMs: number, sweepEvery = 256) {
    this.maxEvents = maxEvents;
    this.windowMs = windowMs;
    this.sweepEvery = sweepEvery;
  }

  get trackedKeys(): number {
    return this.limiters.size;
  }

  allow(key: string, nowMs: number = Date.now()): boolean {
    this.calls += 1;
    if (this.calls % this.sweepEvery === 0) {
      this.sweep(nowMs);
    }

    let limiter = this.limiters.get(key);
    if (!limiter) {
      limiter = this.create();
      this.limiters.set(key, limiter);
    }
    return limiter.allow(nowMs);
  }

  create(): SlidingWindowRateLimiter {
    return new SlidingWindowRateLimiter(this.maxEvents, this.windowMs);
  }

  private sweep(nowMs: number): void {
    for (const [key, limiter] of this.limiters) {
      if (limiter.isIdle(nowMs)) {
        this.limiters.delete(key);
      }
    }
  }
}
