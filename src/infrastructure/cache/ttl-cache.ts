import { IClock } from '@application/adaptors/clock.interface';

export type CacheLookupOutcome = 'hit' | 'miss' | 'shared';

export type TtlCacheOptions<K> = {
  ttlMs: number;
  clock: IClock;
  onLookup?: (key: K, outcome: CacheLookupOutcome) => void;
};

type CacheEntry<V> = {
  value: V;
  expiresAt: number;
};

type InFlight<V> = {
  token: object;
  promise: Promise<V>;
};

/**
 * In-process memoisation of a fallible fetch, keyed per `K`.
 *
 * Entries live for `ttlMs` after the fetch that produced them settles. At most
 * one fetch per key is in flight; callers arriving meanwhile share its outcome.
 * Failures are never stored.
 */
export class TtlCache<K, V> {
  private readonly entries = new Map<K, CacheEntry<V>>();
  private readonly inFlight = new Map<K, InFlight<V>>();
  private readonly ttlMs: number;
  private readonly clock: IClock;
  private readonly onLookup?: (key: K, outcome: CacheLookupOutcome) => void;

  constructor(options: TtlCacheOptions<K>) {
    if (!Number.isFinite(options.ttlMs) || options.ttlMs <= 0) {
      throw new RangeError(`ttlMs must be a positive number, got ${options.ttlMs}`);
    }
    this.ttlMs = options.ttlMs;
    this.clock = options.clock;
    this.onLookup = options.onLookup;
  }

  /** Number of live entries; expired ones are dropped on the way. */
  get size(): number {
    const now = this.clock.now();
    for (const [key, entry] of this.entries) {
      if (now >= entry.expiresAt) this.entries.delete(key);
    }
    return this.entries.size;
  }

  /** Returns the live entry for `key`, dropping it once expired. */
  private liveEntry(key: K): CacheEntry<V> | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (this.clock.now() < entry.expiresAt) return entry;
    this.entries.delete(key);
    return undefined;
  }

  getOrFetch(key: K, fetchFn: (key: K) => Promise<V>): Promise<V> {
    const live = this.liveEntry(key);
    if (live) {
      this.onLookup?.(key, 'hit');
      return Promise.resolve(live.value);
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      this.onLookup?.(key, 'shared');
      return pending.promise;
    }

    this.onLookup?.(key, 'miss');
    const token = {};
    const owns = () => this.inFlight.get(key)?.token === token;
    const promise = Promise.resolve()
      .then(() => fetchFn(key))
      .then((value) => {
        // invalidate() may have dropped this flight while it was running
        if (owns()) {
          this.entries.set(key, {
            value,
            expiresAt: this.clock.now() + this.ttlMs,
          });
        }
        return value;
      })
      .finally(() => {
        if (owns()) this.inFlight.delete(key);
      });
    this.inFlight.set(key, { token, promise });
    return promise;
  }

  invalidate(key: K): void {
    this.entries.delete(key);
    this.inFlight.delete(key);
  }

  clear(): void {
    this.entries.clear();
    this.inFlight.clear();
  }
}
