/**
 * Tickers offered to consumers when STOCK_SYMBOLS is not set
 */
export const DEFAULT_STOCK_SYMBOLS =
  'AAPL,MSFT,GOOGL,AMZN,META,TSLA,NVDA,JPM,V,PG,DIS,KO,MCD,INTC,CSCO,VZ,HD,CVX,XOM,JNJ,BAC,WMT,UNH,MA,PFE,T,MRK';

/**
 * Split a comma-separated ticker list into trimmed, upper-cased,
 * de-duplicated and sorted symbols
 */
export function parseTickerList(value: string): string[] {
  const symbols = value
    .split(',')
    .map((s) => s.trim().toUpperCase())
    .filter((s) => s.length > 0);
  return [...new Set(symbols)].sort();
}
