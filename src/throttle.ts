export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

export interface ThrottleOptions {
  rateLimitMs: number;
  jitterMs: number;
  backoffBaseMs: number;
  backoffCapMs: number;
  clock?: Clock;
  random?: () => number;
}

export class RequestThrottle {
  private readonly options: ThrottleOptions;
  private readonly clock: Clock;
  private readonly random: () => number;
  private lastReturnedAt: number | null = null;

  constructor(options: ThrottleOptions) {
    this.options = options;
    this.clock = options.clock ?? systemClock;
    this.random = options.random ?? Math.random;
  }

  async wait(): Promise<void> {
    if (this.lastReturnedAt !== null) {
      const elapsed = this.clock.now() - this.lastReturnedAt;
      const remaining = Math.max(0, this.options.rateLimitMs - elapsed);
      const delay = remaining + this.jitter();
      if (delay > 0) await this.clock.sleep(delay);
    }
    this.lastReturnedAt = this.clock.now();
  }

  backoffDelay(attempt: number): number {
    const exponential = this.options.backoffBaseMs * 2 ** attempt;
    return Math.min(this.options.backoffCapMs, exponential);
  }

  async backoff(attempt: number): Promise<void> {
    await this.clock.sleep(this.backoffDelay(attempt) + this.jitter());
  }

  private jitter(): number {
    return this.random() * this.options.jitterMs;
  }
}
