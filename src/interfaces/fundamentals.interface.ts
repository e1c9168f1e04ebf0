/**
 * One fundamental metric as reported by a single source
 */
export interface FundamentalMetric {
  value: number | null;

  /** Provider that supplied the value, e.g. 'Yahoo Finance' or 'SEC EDGAR' */
  source: string;

  /** Filing date of the annual report the value was taken from */
  filed_date?: string;

  /** Period end date of that report */
  end_date?: string;
}

export type FundamentalMetrics = Record<string, FundamentalMetric>;

/**
 * Merged point-in-time fundamentals for one ticker.
 * Replaced wholesale on every refresh.
 */
export interface FundamentalsRecord {
  ticker: string;

  /** ISO 8601 time the record was assembled; the freshness clock */
  timestamp: string;

  metrics: FundamentalMetrics;
}
