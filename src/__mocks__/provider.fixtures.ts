/**
 * Chart payload for three sessions; the last bar is a non-trading placeholder
 */
export const CHART_PAYLOAD = {
  chart: {
    result: [
      {
        meta: { symbol: 'AAPL', gmtoffset: -18000 },
        timestamp: [1672756200, 1672842600, 1672929000],
        indicators: {
          quote: [
            {
              open: [130.28, 126.89, null],
              high: [130.9, 128.66, null],
              low: [124.17, 125.08, null],
              close: [125.07, 126.36, null],
              volume: [112117500, 89113600, null],
            },
          ],
          adjclose: [{ adjclose: [124.22, 125.5, null] }],
        },
      },
    ],
    error: null,
  },
};

export const QUOTE_SUMMARY_PAYLOAD = {
  quoteSummary: {
    result: [
      {
        summaryDetail: {
          beta: { raw: 1.29, fmt: '1.29' },
          trailingPE: { raw: 29.7, fmt: '29.70' },
          marketCap: { raw: 2900000000000, fmt: '2.9T' },
          fiftyTwoWeekHigh: { raw: 199.62, fmt: '199.62' },
          currency: 'USD',
          dividendYield: {},
        },
        defaultKeyStatistics: {
          trailingEps: { raw: 6.13, fmt: '6.13' },
          forwardEps: { raw: 7.0, fmt: '7.00' },
          beta: { raw: 1.5, fmt: '1.50' },
        },
        financialData: {
          currentRatio: 0.99,
          profitMargins: { raw: 0.253, fmt: '25.31%' },
        },
      },
    ],
    error: null,
  },
};

function fact(val: number, form: string, filed: string, end: string) {
  return { val, form, filed, end, fp: 'FY' };
}

export const COMPANY_FACTS_PAYLOAD = {
  cik: 320193,
  entityName: 'Example Corp',
  facts: {
    'us-gaap': {
      Revenues: {
        label: 'Revenues',
        units: {
          USD: [
            fact(365817000000, '10-K', '2021-10-29', '2021-09-25'),
            fact(394328000000, '10-K', '2022-10-28', '2022-09-24'),
            fact(119575000000, '10-Q', '2024-02-02', '2023-12-30'),
          ],
        },
      },
      RevenueFromContractWithCustomerExcludingAssessedTax: {
        label: 'Revenue from contracts',
        units: { USD: [fact(383285000000, '10-K', '2023-11-03', '2023-09-30')] },
      },
      NetIncomeLoss: {
        label: 'Net income',
        units: {
          USD: [
            fact(96995000000, '10-K', '2023-11-03', '2023-09-30'),
            fact(99803000000, '10-K', '2023-11-03', '2022-09-24'),
          ],
        },
      },
      Assets: {
        label: 'Assets',
        units: { USD: [fact(352583000000, '10-K', '2023-11-03', '2023-09-30')] },
      },
      Liabilities: {
        label: 'Liabilities',
        units: { USD: [fact(290437000000, '10-Q', '2024-02-02', '2023-12-30')] },
      },
      EntityCommonStockSharesOutstanding: {
        label: 'Shares',
        units: { shares: [fact(15550061000, '10-K', '2023-11-03', '2023-10-20')] },
      },
    },
  },
};

export const TICKER_DIRECTORY_PAYLOAD = {
  '0': { cik_str: 320193, ticker: 'AAPL', title: 'Example Corp' },
  '1': { cik_str: 789019, ticker: 'MSFT', title: 'Sample Software Inc' },
  '2': { cik_str: 'not-a-number', ticker: 'BAD', title: 'Broken Entry' },
  '3': { cik_str: 21344, ticker: 'ko', title: 'Beverage Co' },
};
