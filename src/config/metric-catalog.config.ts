/**
 * Fundamentals metric catalogue
 *
 * Market-data keys are looked up across the quoteSummary modules; the
 * first module carrying a numeric value wins. Display names become the
 * metric names stored in the fundamentals artifact.
 */
export const MARKET_DATA_METRICS: Readonly<Record<string, string>> = {
  // Earnings & valuation
  trailingEps: 'EPS',
  forwardEps: 'Forward_EPS',
  pegRatio: 'PEG_Ratio',
  trailingPE: 'PE_Ratio',
  forwardPE: 'Forward_PE',
  priceToBook: 'Price_to_Book',
  priceToSalesTrailing12Months: 'Price_to_Sales',
  marketCap: 'MarketCap',

  // Profitability
  profitMargins: 'Profit_Margin',
  returnOnAssets: 'ROA',
  returnOnEquity: 'ROE',

  // Dividends
  dividendYield: 'Dividend_Yield',
  dividendRate: 'Dividend_Rate',
  payoutRatio: 'Payout_Ratio',

  // Growth
  revenueGrowth: 'Revenue_Growth',
  earningsGrowth: 'Earnings_Growth',

  // Risk & liquidity
  beta: 'Beta',
  debtToEquity: 'Debt_to_Equity',
  currentRatio: 'Current_Ratio',
  quickRatio: 'Quick_Ratio',

  // Trading range
  fiftyTwoWeekHigh: 'Year_High',
  fiftyTwoWeekLow: 'Year_Low',
};

/**
 * Regulatory metrics and the us-gaap concepts that can carry them,
 * in lookup order. The first concept present in the filing facts is used.
 */
export const REGULATORY_METRICS: Readonly<Record<string, readonly string[]>> = {
  Revenue: [
    'Revenue',
    'SalesRevenueNet',
    'Revenues',
    'RevenueFromContractWithCustomerExcludingAssessedTax',
  ],
  NetIncome: ['NetIncomeLoss'],
  TotalAssets: ['Assets'],
  TotalLiabilities: ['Liabilities'],
};

export const MARKET_DATA_SOURCE = 'Yahoo Finance';

export const REGULATORY_SOURCE = 'SEC EDGAR';

/**
 * quoteSummary modules requested for the market-data snapshot
 */
export const QUOTE_SUMMARY_MODULES = ['summaryDetail', 'defaultKeyStatistics', 'financialData', 'price'];
