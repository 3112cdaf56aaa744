/**
 * In-memory cache with per-entry expiry. Concurrent loads of one key share a
 * single promise; a rejected load is not stored. Expired entries are swept on
 * write, at most once per TTL period, so keys that are never read again do
 * not pile up.
 */

type Entry<V> = { value: V; expiresAt: number };

export class TtlCache<V> {
  private readonly entries = new Map<string, Entry<V>>();
  private readonly pending = new Map<string, Promise<V>>();
  private nextSweepAt: number;

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now
  ) {
    this.nextSweepAt = now() + ttlMs;
  }

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: V): void {
    const now = this.now();
    if (now >= this.nextSweepAt) this.sweep(now);
    this.entries.set(key, { value, expiresAt: now + this.ttlMs });
  }

  private sweep(now: number): void {
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) this.entries.delete(key);
    }
    this.nextSweepAt = now + this.ttlMs;
  }

  async getOrLoad(key: string, load: () => Promise<V>): Promise<V> {
    const cached = this.get(key);
    if (cached !== undefined) return cached;

    const inFlight = this.pending.get(key);
    if (inFlight) return inFlight;

    const promise = load()
      .then((value) => {
        this.set(key, value);
        return value;
      })
      .finally(() => {
        this.pending.delete(key);
      });
    this.pending.set(key, promise);
    return promise;
  }

  get size(): number {
    return this.entries.size;
  }
}
