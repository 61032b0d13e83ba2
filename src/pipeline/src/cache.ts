export type Clock = () => number;

export interface CacheEntry<T> {
  value: T;
  builtAt: number;
}

export interface CacheInfo {
  ttlMs: number;
  builtAt?: number;
  expiresAt?: number;
  stale: boolean;
}

/**
 * A single value with a build timestamp and a time-to-live.
 * Staleness is only ever checked explicitly; nothing expires behind the caller's back.
 */
export class TableCache<T> {
  private entry: CacheEntry<T> | undefined;

  constructor(
    readonly ttlMs: number,
    private readonly clock: Clock = Date.now
  ) {}

  /**
   * The cached value, or undefined when nothing has been built yet
   */
  peek(): CacheEntry<T> | undefined {
    return this.entry;
  }

  isStale(now: number = this.clock()): boolean {
    return this.entry === undefined || now - this.entry.builtAt >= this.ttlMs;
  }

  /**
   * Build a new value and store it. A failing builder leaves the previous entry untouched.
   */
  async rebuild(builder: () => Promise<T>): Promise<T> {
    const value = await builder();
    this.entry = { value, builtAt: this.clock() };
    return value;
  }

  clear(): void {
    this.entry = undefined;
  }

  info(): CacheInfo {
    const now = this.clock();
    if (!this.entry) {
      return { ttlMs: this.ttlMs, stale: true };
    }
    return {
      ttlMs: this.ttlMs,
      builtAt: this.entry.builtAt,
      expiresAt: this.entry.builtAt + this.ttlMs,
      stale: this.isStale(now),
    };
  }
}
