/**
 * In-process TTL cache for data store reads.
 *
 * Entries expire `ttlSeconds` after they are stored. Concurrent loads of the
 * same key share one pending promise. Invalidation also detaches loads that
 * are still running, so their results are returned to their callers but never
 * stored.
 */

export type Clock = () => number;

interface Entry<T> {
  value: T;
  expiresAt: number;
}

export class QueryCache<T> {
  private entries = new Map<string, Entry<T>>();
  private pending = new Map<string, Promise<T>>();
  private generation = 0;

  constructor(
    private ttlSeconds: number,
    private now: Clock = Date.now
  ) {}

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: T): void {
    if (this.ttlSeconds <= 0) return;
    this.entries.set(key, { value, expiresAt: this.now() + this.ttlSeconds * 1000 });
  }

  /**
   * Return the cached value, or run `load`, cache its result and return it.
   * Failed loads are not cached.
   */
  async getOrLoad(key: string, load: () => Promise<T>): Promise<T> {
    const cached = this.get(key);
    if (cached !== undefined) return cached;

    const inFlight = this.pending.get(key);
    if (inFlight) return inFlight;

    const generation = this.generation;
    const promise = load();
    this.pending.set(key, promise);
    try {
      const value = await promise;
      if (generation === this.generation) this.set(key, value);
      return value;
    } finally {
      if (this.pending.get(key) === promise) this.pending.delete(key);
    }
  }

  invalidate(key: string): void {
    this.generation++;
    this.entries.delete(key);
    this.pending.delete(key);
  }

  invalidatePrefix(prefix: string): void {
    this.generation++;
    for (const map of [this.entries, this.pending]) {
      for (const key of [...map.keys()]) {
        if (key.startsWith(prefix)) map.delete(key);
      }
    }
  }

  clear(): void {
    this.generation++;
    this.entries.clear();
    this.pending.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
