import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpService } from '@nestjs/axios';
import { isAxiosError } from 'axios';
import { firstValueFrom } from 'rxjs';
import { PriceProvider } from '../interfaces/price-provider.interface';
import { PriceRow, PriceTable } from '../interfaces/price-table.interface';
import { ProviderUnavailableException } from '../exceptions';
import { addDays, dayToDate, toIsoDay } from '../utils/trading-day';
import { isObject } from '../utils/guards';

export const YAHOO_PRICE_COLUMNS = ['Date', 'Open', 'High', 'Low', 'Close', 'Adj Close', 'Volume'];

interface ChartQuote {
  open?: Array<number | null>;
  high?: Array<number | null>;
  low?: Array<number | null>;
  close?: Array<number | null>;
  volume?: Array<number | null>;
}

/**
 * Subset of the Yahoo Finance v8 chart response the extractor needs
 *
 * @example
 * // { chart: { result: [{ meta: { gmtoffset: -18000 }, timestamp: [1673879400],
 * //   indicators: { quote: [{ open: [...], close: [...] }], adjclose: [{ adjclose: [...] }] } }],
 * //   error: null } }
 */
interface ChartResult {
  meta?: { gmtoffset?: number };
  timestamp?: number[];
  indicators?: {
    quote?: ChartQuote[];
    adjclose?: Array<{ adjclose?: Array<number | null> }>;
  };
}

/**
 * Daily price history from the Yahoo Finance chart API.
 */
@Injectable()
export class YahooPriceProvider implements PriceProvider {
  readonly name = 'Yahoo Finance';
  private readonly logger = new Logger(YahooPriceProvider.name);
  private readonly chartUrl: string;

  constructor(
    private readonly configService: ConfigService,
    private readonly httpService: HttpService,
  ) {
    this.chartUrl = this.configService.get<string>(
      'YAHOO_CHART_URL',
      'https://query1.finance.yahoo.com/v8/finance/chart',
    );
  }

  /**
   * One bounded request for `[start, end]`. The API's end bound is
   * exclusive, so the request runs to the day after `end`.
   * An unknown symbol (HTTP 404) is reported as an empty table.
   */
  async fetchDailyHistory(ticker: string, start: string, end: string): Promise<PriceTable> {
    const url = `${this.chartUrl.replace(/\/$/, '')}/${encodeURIComponent(ticker)}`;
    const params = {
      period1: Math.floor(dayToDate(start).getTime() / 1000),
      period2: Math.floor(dayToDate(addDays(end, 1)).getTime() / 1000),
      interval: '1d',
      events: 'history',
      includeAdjustedClose: true,
    };

    let payload: unknown;
    try {
      const response = await firstValueFrom(this.httpService.get<unknown>(url, { params }));
      payload = response.data;
    } catch (error) {
      if (isAxiosError(error) && error.response?.status === 404) {
        this.logger.warn(`${this.name} has no chart for ${ticker}`);
        return { columns: [...YAHOO_PRICE_COLUMNS], rows: [] };
      }
      throw new ProviderUnavailableException(
        this.name,
        { ticker, start, end },
        isAxiosError(error) ? error.response?.status : undefined,
        error instanceof Error ? error : undefined,
      );
    }

    return parseChart(payload);
  }
}

/**
 * Convert a chart payload into flat-labelled daily rows. Bars whose OHLC
 * values are all missing (non-trading placeholders) are dropped.
 */
export function parseChart(payload: unknown): PriceTable {
  const columns = [...YAHOO_PRICE_COLUMNS];
  const result = firstChartResult(payload);
  if (!result?.timestamp || result.timestamp.length === 0) {
    return { columns, rows: [] };
  }

  const quote = result.indicators?.quote?.[0] ?? {};
  const adjclose = result.indicators?.adjclose?.[0]?.adjclose ?? [];
  const offsetSeconds = result.meta?.gmtoffset ?? 0;

  const rows: PriceRow[] = [];
  result.timestamp.forEach((epochSeconds, index) => {
    const open = quote.open?.[index] ?? null;
    const high = quote.high?.[index] ?? null;
    const low = quote.low?.[index] ?? null;
    const close = quote.close?.[index] ?? null;
    if (open === null && high === null && low === null && close === null) {
      return;
    }

    // Bars are stamped at the exchange open; shift into exchange time for the trading day
    const day = toIsoDay((epochSeconds + offsetSeconds) * 1000);
    if (day === null) {
      return;
    }

    rows.push({
      Date: dayToDate(day),
      Open: open,
      High: high,
      Low: low,
      Close: close,
      'Adj Close': adjclose[index] ?? null,
      Volume: quote.volume?.[index] ?? null,
    });
  });

  return { columns, rows };
}

function firstChartResult(payload: unknown): ChartResult | null {
  if (!isObject(payload) || !isObject(payload.chart)) {
    return null;
  }
  const results = payload.chart.result;
  const first: unknown = Array.isArray(results) ? results[0] : undefined;
  if (!isObject(first)) {
    return null;
  }
  return {
    meta: isObject(first.meta) && typeof first.meta.gmtoffset === 'number'
      ? { gmtoffset: first.meta.gmtoffset }
      : undefined,
    timestamp: numberArray(first.timestamp)?.filter((value): value is number => value !== null),
    indicators: isObject(first.indicators) ? parseIndicators(first.indicators) : undefined,
  };
}

function parseIndicators(indicators: Record<string, unknown>): ChartResult['indicators'] {
  const quotes = Array.isArray(indicators.quote) ? indicators.quote : [];
  const adjcloses = Array.isArray(indicators.adjclose) ? indicators.adjclose : [];
  const quote: unknown = quotes[0];
  const adjclose: unknown = adjcloses[0];

  return {
    quote: isObject(quote)
      ? [
          {
            open: numberArray(quote.open),
            high: numberArray(quote.high),
            low: numberArray(quote.low),
            close: numberArray(quote.close),
            volume: numberArray(quote.volume),
          },
        ]
      : [],
    adjclose: isObject(adjclose) ? [{ adjclose: numberArray(adjclose.adjclose) }] : [],
  };
}

function numberArray(value: unknown): Array<number | null> | undefined {
  if (!Array.isArray(value)) {
    return undefined;
  }
  return value.map((item: unknown) => (typeof item === 'number' && isFinite(item) ? item : null));
}
