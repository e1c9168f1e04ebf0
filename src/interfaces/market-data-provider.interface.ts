export const MARKET_DATA_PROVIDER = Symbol('MARKET_DATA_PROVIDER');

/**
 * Snapshot of named numeric attributes for a ticker (EPS, beta, ...)
 */
export type MarketSnapshot = Record<string, number>;

export interface MarketDataProvider {
  readonly name: string;

  fetchSnapshot(ticker: string): Promise<MarketSnapshot>;
}
