/**
 * Physical encoding of a table's column labels, detected once per artifact.
 *
 * - flat:      `Date`, `Open`, `Close`, ...
 * - composite: `('Close', 'AAPL')`, a (field, ticker) pair serialised as one label
 */
export type ColumnEncoding = { kind: 'flat' } | { kind: 'composite' };

export type LogicalColumn = 'date' | 'open' | 'high' | 'low' | 'close' | 'volume' | 'symbol';

export type PriceField = 'open' | 'high' | 'low' | 'close' | 'volume';

export type OhlcFallback = 'null' | 'close';

export interface SchemaWarning {
  code: 'column-null-filled' | 'ohlc-substituted-by-close';
  column: PriceField;
  message: string;
}

/**
 * Resolved physical label per price field; null when the field is absent.
 */
export interface PriceColumnMapping {
  date: string;
  symbol: string | null;
  open: string | null;
  high: string | null;
  low: string | null;
  close: string | null;
  volume: string | null;
}
