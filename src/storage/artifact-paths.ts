import { join } from 'path';

export type ArtifactZone = 'raw' | 'staged' | 'analytics' | 'fundamentals' | 'cache';

export const ARTIFACT_ZONES: readonly ArtifactZone[] = [
  'raw',
  'staged',
  'analytics',
  'fundamentals',
  'cache',
];

/**
 * Canonical artifact locations. The paths are the contract between
 * pipeline stages: an artifact existing at its path is the cache entry.
 */
export class ArtifactPaths {
  constructor(readonly rootDir: string) {}

  zone(zone: ArtifactZone): string {
    return join(this.rootDir, zone);
  }

  raw(ticker: string): string {
    return join(this.zone('raw'), `${ticker}.parquet`);
  }

  staged(ticker: string, start: string, end: string): string {
    return join(this.zone('staged'), `${ticker}_${start}_${end}.parquet`);
  }

  fact(ticker: string, start: string, end: string): string {
    return join(this.zone('analytics'), `fact_price_${ticker}_${start}_${end}.parquet`);
  }

  dim(ticker: string, start: string, end: string): string {
    return join(this.zone('analytics'), `dim_date_${ticker}_${start}_${end}.parquet`);
  }

  fundamentals(ticker: string): string {
    return join(this.zone('fundamentals'), `${ticker}_fundamentals.parquet`);
  }

  tickerCikMap(): string {
    return join(this.zone('cache'), 'ticker_cik_map.json');
  }
}
