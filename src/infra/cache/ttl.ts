/**
 * Cache lifetimes: named buckets, raw seconds and absolute expire-at times.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Buckets
// ─────────────────────────────────────────────────────────────────────────────

export const CacheTtl = {
  /** Do not cache at all */
  NONE: 'none',
  SHORT: 'short',
  NORMAL: 'normal',
  MEDIUM: 'medium',
  LONG: 'long',
  X_LONG: 'xlong',
  /** Never expires */
  INDEFINITE: 'indefinite',
} as const;

export type CacheTtlBucket = (typeof CacheTtl)[keyof typeof CacheTtl];

/**
 * A lifetime is a named bucket, a number of seconds, or a point in time.
 */
export type CacheTtlSpec = CacheTtlBucket | number | Date;

/** Seconds per bucket. Negative means "do not store", 0 means "no expiry". */
export type CacheTimes = Readonly<Record<CacheTtlBucket, number>>;

export const DEFAULT_CACHE_TIMES: CacheTimes = {
  none: -1,
  short: 60,
  normal: 300,
  medium: 1200,
  long: 7200,
  xlong: 86400,
  indefinite: 0,
};

const SHORT_LIVED_BUCKETS: ReadonlySet<CacheTtlBucket> = new Set([
  CacheTtl.NONE,
  CacheTtl.SHORT,
  CacheTtl.INDEFINITE,
]);

// ─────────────────────────────────────────────────────────────────────────────
// Resolution
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Merge bucket overrides onto the defaults.
 */
export const createCacheTimes = (overrides: Partial<CacheTimes> = {}): CacheTimes => ({
  ...DEFAULT_CACHE_TIMES,
  ...overrides,
});

/**
 * Resolve a bucket or a raw number of seconds to whole seconds.
 * Fractions round away from zero: 0.5 is one second, -0.5 is "do not store".
 */
export const resolveTtlSeconds = (
  ttl: CacheTtlBucket | number,
  cacheTimes: CacheTimes = DEFAULT_CACHE_TIMES
): number => {
  if (typeof ttl === 'number') {
    if (!Number.isFinite(ttl)) {
      throw new RangeError(`Cache TTL must be a finite number of seconds, got ${String(ttl)}`);
    }
    return ttl > 0 ? Math.ceil(ttl) : Math.floor(ttl);
  }
  return cacheTimes[ttl];
};

/**
 * Lifetimes that get no stale window: their fresh lifetime is already
 * short, nil or unbounded.
 */
export const isShortLivedTtl = (ttl: CacheTtlSpec): boolean => {
  if (ttl instanceof Date) return false;
  if (typeof ttl === 'number') return ttl <= 0;
  return SHORT_LIVED_BUCKETS.has(ttl);
};

/**
 * Longest finite lifetime in a table, in seconds.
 */
export const longestBucketSeconds = (cacheTimes: CacheTimes): number =>
  Math.max(...Object.values(cacheTimes));
