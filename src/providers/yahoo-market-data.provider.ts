import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpService } from '@nestjs/axios';
import { isAxiosError } from 'axios';
import { firstValueFrom } from 'rxjs';
import {
  MarketDataProvider,
  MarketSnapshot,
} from '../interfaces/market-data-provider.interface';
import { ProviderUnavailableException } from '../exceptions';
import { MARKET_DATA_SOURCE, QUOTE_SUMMARY_MODULES } from '../config/metric-catalog.config';
import { isObject } from '../utils/guards';

interface YahooSession {
  cookie: string;
  crumb: string;
}

/**
 * Point-in-time ticker attributes from Yahoo Finance quoteSummary.
 *
 * quoteSummary only answers requests that carry a consent cookie and the
 * matching crumb. Both are obtained once per provider instance and dropped
 * when Yahoo rejects them, so the next request negotiates a new pair.
 */
@Injectable()
export class YahooMarketDataProvider implements MarketDataProvider {
  readonly name = MARKET_DATA_SOURCE;
  private readonly logger = new Logger(YahooMarketDataProvider.name);
  private readonly quoteSummaryUrl: string;
  private readonly cookieUrl: string;
  private readonly crumbUrl: string;
  private readonly userAgent: string;
  private session: YahooSession | null = null;

  constructor(
    private readonly configService: ConfigService,
    private readonly httpService: HttpService,
  ) {
    this.quoteSummaryUrl = this.configService
      .get<string>('YAHOO_QUOTE_SUMMARY_URL', 'https://query2.finance.yahoo.com/v10/finance/quoteSummary')
      .replace(/\/$/, '');
    this.cookieUrl = this.configService.get<string>('YAHOO_COOKIE_URL', 'https://fc.yahoo.com');
    this.crumbUrl = this.configService.get<string>(
      'YAHOO_CRUMB_URL',
      'https://query2.finance.yahoo.com/v1/test/getcrumb',
    );
    this.userAgent = this.configService.get<string>('YAHOO_USER_AGENT', 'Mozilla/5.0');
  }

  async fetchSnapshot(ticker: string): Promise<MarketSnapshot> {
    const url = `${this.quoteSummaryUrl}/${encodeURIComponent(ticker)}`;
    try {
      const { cookie, crumb } = await this.getSession();
      const response = await firstValueFrom(
        this.httpService.get<unknown>(url, {
          params: { modules: QUOTE_SUMMARY_MODULES.join(','), crumb },
          headers: { Cookie: cookie, 'User-Agent': this.userAgent },
        }),
      );
      return flattenQuoteSummary(response.data);
    } catch (error) {
      const status = isAxiosError(error) ? error.response?.status : undefined;
      if (status === 401 || status === 403) {
        this.session = null;
      }
      throw new ProviderUnavailableException(
        this.name,
        { ticker },
        status,
        error instanceof Error ? error : undefined,
      );
    }
  }

  private async getSession(): Promise<YahooSession> {
    if (this.session) {
      return this.session;
    }

    // fc.yahoo.com answers 404 but still sets the consent cookie
    const consent = await firstValueFrom(
      this.httpService.get<unknown>(this.cookieUrl, {
        headers: { 'User-Agent': this.userAgent },
        validateStatus: () => true,
      }),
    );
    const setCookie: unknown = consent.headers['set-cookie'];
    const cookie = cookieHeader(setCookie);
    if (!cookie) {
      throw new Error(`No cookie returned by ${this.cookieUrl}`);
    }

    const response = await firstValueFrom(
      this.httpService.get<unknown>(this.crumbUrl, {
        headers: { Cookie: cookie, 'User-Agent': this.userAgent },
        responseType: 'text',
      }),
    );
    const crumb = typeof response.data === 'string' ? response.data.trim() : '';
    if (!crumb) {
      throw new Error(`No crumb returned by ${this.crumbUrl}`);
    }

    this.logger.debug('Negotiated a new Yahoo Finance crumb');
    this.session = { cookie, crumb };
    return this.session;
  }
}

/**
 * Collapse `Set-Cookie` values into one `Cookie` header (name=value pairs only)
 */
export function cookieHeader(setCookie: unknown): string {
  const values = Array.isArray(setCookie) ? setCookie : [setCookie];
  return values
    .filter((value): value is string => typeof value === 'string')
    .map((value) => value.split(';')[0].trim())
    .filter((pair) => pair.includes('='))
    .join('; ');
}

/**
 * Merge the numeric attributes of every returned module into one snapshot.
 * Values come either as plain numbers or as `{ raw, fmt }` pairs; on a
 * key present in several modules, the first module wins.
 */
export function flattenQuoteSummary(payload: unknown): MarketSnapshot {
  const snapshot: MarketSnapshot = {};
  if (!isObject(payload) || !isObject(payload.quoteSummary)) {
    return snapshot;
  }
  const results = payload.quoteSummary.result;
  const first: unknown = Array.isArray(results) ? results[0] : undefined;
  if (!isObject(first)) {
    return snapshot;
  }

  for (const moduleName of QUOTE_SUMMARY_MODULES) {
    const section = first[moduleName];
    if (!isObject(section)) {
      continue;
    }
    for (const [key, raw] of Object.entries(section)) {
      const value = numericValue(raw);
      if (value !== null && !(key in snapshot)) {
        snapshot[key] = value;
      }
    }
  }
  return snapshot;
}

function numericValue(value: unknown): number | null {
  if (typeof value === 'number' && isFinite(value)) {
    return value;
  }
  if (isObject(value) && typeof value.raw === 'number' && isFinite(value.raw)) {
    return value.raw;
  }
  return null;
}
