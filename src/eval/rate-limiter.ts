/**
 * Request quota for one benchmark run.
 *
 * A sliding one-minute window plus a counter per UTC day. The limiter is a
 * plain value owned by whoever drives the run; nothing is kept at module
 * level, and time comes from an injected clock.
 */

const WINDOW_MS = 60_000;

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

export interface RateLimiterOptions {
  requestsPerMinute: number;
  requestsPerDay: number;
  clock?: Clock;
}

export interface QuotaSnapshot {
  day: string;
  daily_used: number;
  daily_remaining: number;
  minute_remaining: number;
}

function utcDay(ms: number): string {
  return new Date(ms).toISOString().slice(0, 10);
}

export class RateLimiter {
  private readonly clock: Clock;
  private readonly requestsPerMinute: number;
  private readonly requestsPerDay: number;
  private recent: number[] = [];
  private day: string;
  private dailyUsed = 0;

  constructor(opts: RateLimiterOptions) {
    if (opts.requestsPerMinute < 1 || opts.requestsPerDay < 1) {
      throw new Error("Rate limits must allow at least one request");
    }
    this.clock = opts.clock ?? systemClock;
    this.requestsPerMinute = opts.requestsPerMinute;
    this.requestsPerDay = opts.requestsPerDay;
    this.day = utcDay(this.clock.now());
  }

  private refresh(now: number): void {
    const today = utcDay(now);
    if (today !== this.day) {
      this.day = today;
      this.dailyUsed = 0;
    }
    this.recent = this.recent.filter((t) => now - t < WINDOW_MS);
  }

  quota(): QuotaSnapshot {
    this.refresh(this.clock.now());
    return {
      day: this.day,
      daily_used: this.dailyUsed,
      daily_remaining: this.requestsPerDay - this.dailyUsed,
      minute_remaining: this.requestsPerMinute - this.recent.length,
    };
  }

  /**
   * Take one request slot, sleeping until the minute window has room.
   * @returns false, without waiting, when today's quota is spent
   */
  async acquire(): Promise<boolean> {
    let now = this.clock.now();
    this.refresh(now);
    if (this.dailyUsed >= this.requestsPerDay) return false;

    while (this.recent.length >= this.requestsPerMinute) {
      const oldest = this.recent[0];
      await this.clock.sleep(oldest + WINDOW_MS - now);
      now = this.clock.now();
      this.refresh(now);
    }

    this.recent.push(now);
    this.dailyUsed++;
    return true;
  }
}
