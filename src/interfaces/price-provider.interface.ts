import { PriceTable } from './price-table.interface';

export const PRICE_PROVIDER = Symbol('PRICE_PROVIDER');

/**
 * Upstream source of daily OHLCV history.
 */
export interface PriceProvider {
  readonly name: string;

  /**
   * Fetch daily bars for `ticker` covering `[start, end]`.
   * Returns an empty table when the provider has no data for the window.
   */
  fetchDailyHistory(ticker: string, start: string, end: string): Promise<PriceTable>;
}
