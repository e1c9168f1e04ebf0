export type CacheKey =
  | { kind: 'staged'; ticker: string; start: string; end: string }
  | { kind: 'fundamentals'; ticker: string };

export interface CachePolicy {
  /** Treat any cached entry as stale */
  forceRefresh?: boolean;

  /** Maximum age for expiring artifacts; defaults to the configured TTL */
  ttlMs?: number;

  /** Reference time for age checks */
  now?: Date;
}
