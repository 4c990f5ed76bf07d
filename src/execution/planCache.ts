import { Logger } from '@graphql-hive/logger';

import { devAssert } from '../jsutils/devAssert';

import type { CompiledPlan } from './compiledPlan';

export interface PlanCacheOptions {
  /** Maximum number of plans kept. Defaults to 1000. */
  maxSize?: number;
  /** Time to live of an entry in milliseconds. Entries never expire by default. */
  ttl?: number;
  /** Clock used for expiry. Defaults to `Date.now`. */
  now?: () => number;
  logger?: Logger;
}

export interface PlanCacheEntry<TPlan> {
  readonly signature: string;
  readonly plan: TPlan;
  readonly insertedAt: number;
  lastUsed: number;
}

export interface PlanCacheStats {
  size: number;
  maxSize: number;
  hits: number;
  misses: number;
  evictions: number;
  expirations: number;
  /** Hits over lookups, 0 before the first lookup. */
  hitRate: number;
}

/**
 * A bounded LRU map from operation signature to compiled plan.
 *
 * Recency is the insertion order of the underlying `Map`: a hit re-inserts
 * its entry at the end, and eviction removes the first key. Every update is
 * a single synchronous step.
 */
export class PlanCache<TPlan = CompiledPlan> {
  private readonly _entries = new Map<string, PlanCacheEntry<TPlan>>();
  private readonly _maxSize: number;
  private readonly _ttl: number | undefined;
  private readonly _now: () => number;
  private readonly _logger: Logger;

  private _hits = 0;
  private _misses = 0;
  private _evictions = 0;
  private _expirations = 0;

  constructor(options: PlanCacheOptions = {}) {
    const { maxSize = 1000, ttl, now = Date.now, logger } = options;

    devAssert(
      Number.isInteger(maxSize) && maxSize > 0,
      `Plan cache "maxSize" must be a positive integer, received ${maxSize}.`,
    );
    devAssert(
      ttl === undefined || ttl > 0,
      `Plan cache "ttl" must be a positive number of milliseconds, received ${ttl}.`,
    );

    this._maxSize = maxSize;
    this._ttl = ttl;
    this._now = now;
    this._logger = logger ?? new Logger({ level: false });
  }

  get size(): number {
    return this._entries.size;
  }

  get maxSize(): number {
    return this._maxSize;
  }

  /**
   * Returns the cached plan, refreshing its recency. Expired entries are
   * removed and reported as misses.
   */
  get(signature: string): TPlan | undefined {
    const entry = this._entries.get(signature);
    if (entry === undefined) {
      this._misses++;
      this._logger.debug({ signature }, 'Plan cache miss');
      return;
    }

    const now = this._now();
    if (this._ttl !== undefined && now - entry.insertedAt >= this._ttl) {
      this._entries.delete(signature);
      this._expirations++;
      this._misses++;
      this._logger.debug({ signature }, 'Plan cache entry expired');
      return;
    }

    this._entries.delete(signature);
    entry.lastUsed = now;
    this._entries.set(signature, entry);
    this._hits++;
    this._logger.debug({ signature }, 'Plan cache hit');
    return entry.plan;
  }

  /**
   * Inserts or replaces a plan, evicting the least recently used entries
   * beyond `maxSize`.
   */
  set(signature: string, plan: TPlan): void {
    const now = this._now();
    this._entries.delete(signature);
    this._entries.set(signature, {
      signature,
      plan,
      insertedAt: now,
      lastUsed: now,
    });

    for (const oldest of this._entries.keys()) {
      if (this._entries.size <= this._maxSize) {
        break;
      }
      this._entries.delete(oldest);
      this._evictions++;
      this._logger.debug({ signature: oldest }, 'Plan cache entry evicted');
    }
  }

  has(signature: string): boolean {
    return this._entries.has(signature);
  }

  delete(signature: string): boolean {
    return this._entries.delete(signature);
  }

  /** Removes every entry and resets the statistics. */
  clear(): void {
    this._entries.clear();
    this._hits = 0;
    this._misses = 0;
    this._evictions = 0;
    this._expirations = 0;
  }

  /**
   * Returns the cached plan for the signature, compiling and caching it on a
   * miss. A compile that throws leaves the cache untouched.
   */
  getOrCompile(signature: string, compile: () => TPlan): TPlan {
    const cached = this.get(signature);
    if (cached !== undefined) {
      return cached;
    }

    const plan = compile();
    this.set(signature, plan);
    return plan;
  }

  /** Entries from least to most recently used. */
  entries(): IterableIterator<Readonly<PlanCacheEntry<TPlan>>> {
    return this._entries.values();
  }

  stats(): PlanCacheStats {
    const lookups = this._hits + this._misses;
    return {
      size: this._entries.size,
      maxSize: this._maxSize,
      hits: this._hits,
      misses: this._misses,
      evictions: this._evictions,
      expirations: this._expirations,
      hitRate: lookups === 0 ? 0 : this._hits / lookups,
    };
  }
}
