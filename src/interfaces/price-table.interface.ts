/**
 * A single cell of a price artifact. Dates are UTC midnight `Date` values.
 */
export type CellValue = string | number | Date | null;

export type PriceRow = Record<string, CellValue>;

/**
 * In-memory form of every price artifact (raw, staged, fact, dimension).
 * Column labels are kept exactly as the upstream wrote them, which may be
 * flat (`Close`) or composite (`('Close', 'AAPL')`).
 */
export interface PriceTable {
  columns: string[];
  rows: PriceRow[];
}

/**
 * Canonical analytics row, one per trading day
 */
export interface FactPriceRow {
  /** Trading day as YYYY-MM-DD */
  date: string;
  ticker: string;
  Open: number | null;
  High: number | null;
  Low: number | null;
  Close: number | null;
  Volume: number | null;
}

export interface DimDateRow {
  date: string;
  year: number;
  month: number;
  day: number;
}

/**
 * Headline numbers for a price window
 */
export interface PriceSummary {
  firstClose: number;
  lastClose: number;
  change: number;
  changePercent: number;
  high: number;
  low: number;
}
