import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpService } from '@nestjs/axios';
import { isAxiosError } from 'axios';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { firstValueFrom } from 'rxjs';
import {
  RegulatoryFilingsProvider,
  SecFact,
  UsGaapFacts,
} from '../interfaces/regulatory-filings-provider.interface';
import { RequestPacer, SEC_REQUEST_PACER } from '../interfaces/request-pacer.interface';
import { CompanyTickerEntryDto } from '../dto/company-ticker-entry.dto';
import { IdentifierNotFoundException, ProviderUnavailableException } from '../exceptions';
import { ArtifactStoreService } from '../storage/artifact-store.service';
import { REGULATORY_SOURCE } from '../config/metric-catalog.config';
import { isObject } from '../utils/guards';

export type TickerCikMap = Record<string, string>;

/**
 * Company facts from SEC EDGAR's XBRL API.
 *
 * Every request carries the configured contact User-Agent and waits on the
 * request pacer first. The ticker → CIK directory is downloaded once and
 * kept in the cache zone.
 */
@Injectable()
export class SecEdgarProvider implements RegulatoryFilingsProvider {
  readonly name = REGULATORY_SOURCE;
  private readonly logger = new Logger(SecEdgarProvider.name);
  private readonly companyFactsUrl: string;
  private readonly tickerDirectoryUrl: string;
  private readonly userAgent: string;

  constructor(
    private readonly configService: ConfigService,
    private readonly httpService: HttpService,
    private readonly store: ArtifactStoreService,
    @Inject(SEC_REQUEST_PACER) private readonly pacer: RequestPacer,
  ) {
    this.companyFactsUrl = this.configService
      .get<string>('SEC_COMPANY_FACTS_URL', 'https://data.sec.gov/api/xbrl/companyfacts')
      .replace(/\/$/, '');
    this.tickerDirectoryUrl = this.configService.get<string>(
      'SEC_TICKER_DIRECTORY_URL',
      'https://www.sec.gov/files/company_tickers.json',
    );
    this.userAgent = this.configService.get<string>(
      'SEC_USER_AGENT',
      'MarketLake/1.0 (admin@example.com)',
    );
  }

  async fetchCompanyFacts(ticker: string): Promise<UsGaapFacts> {
    const cik = await this.resolveCik(ticker);
    const payload = await this.get(`${this.companyFactsUrl}/CIK${cik}.json`, ticker);
    return parseUsGaapUsd(payload);
  }

  /**
   * 10-digit zero-padded CIK for a ticker
   *
   * @throws IdentifierNotFoundException
   */
  async resolveCik(ticker: string): Promise<string> {
    const map = await this.loadTickerCikMap(ticker);
    const cik = map[ticker.toUpperCase()];
    if (cik === undefined) {
      throw new IdentifierNotFoundException({ ticker });
    }
    return cik;
  }

  /**
   * The cached directory, or a fresh download when no valid cache exists
   */
  async loadTickerCikMap(ticker: string): Promise<TickerCikMap> {
    const path = this.store.paths.tickerCikMap();
    const cached = asTickerCikMap(await this.store.readJson(path));
    if (cached !== null) {
      return cached;
    }

    const directory = await this.get(this.tickerDirectoryUrl, ticker);
    const map = buildTickerCikMap(directory);
    await this.store.writeJson(path, map);
    this.logger.log(`Cached ${Object.keys(map).length} ticker to CIK mappings at ${path}`);
    return map;
  }

  private async get(url: string, ticker: string): Promise<unknown> {
    await this.pacer.pace();
    try {
      const response = await firstValueFrom(
        this.httpService.get<unknown>(url, {
          headers: { 'User-Agent': this.userAgent, Accept: 'application/json' },
        }),
      );
      return response.data;
    } catch (error) {
      throw new ProviderUnavailableException(
        this.name,
        { ticker },
        isAxiosError(error) ? error.response?.status : undefined,
        error instanceof Error ? error : undefined,
      );
    }
  }
}

/**
 * Build the ticker → CIK map from the directory document
 * (`{ "0": { cik_str, ticker, title }, ... }`). Malformed entries are skipped.
 */
export function buildTickerCikMap(directory: unknown): TickerCikMap {
  const map: TickerCikMap = {};
  if (!isObject(directory)) {
    return map;
  }

  for (const entry of Object.values(directory)) {
    if (!isObject(entry)) {
      continue;
    }
    const dto = plainToInstance(CompanyTickerEntryDto, entry);
    if (validateSync(dto).length > 0) {
      continue;
    }
    map[dto.ticker.toUpperCase()] = String(dto.cik_str).padStart(10, '0');
  }
  return map;
}

/**
 * Extract `facts['us-gaap'][concept].units.USD` for every concept,
 * keeping only entries with the fields the metric selection reads.
 */
export function parseUsGaapUsd(payload: unknown): UsGaapFacts {
  const facts: UsGaapFacts = {};
  if (!isObject(payload) || !isObject(payload.facts)) {
    return facts;
  }
  const usGaap = payload.facts['us-gaap'];
  if (!isObject(usGaap)) {
    return facts;
  }

  for (const [concept, definition] of Object.entries(usGaap)) {
    if (!isObject(definition) || !isObject(definition.units)) {
      continue;
    }
    const usd = definition.units['USD'];
    if (!Array.isArray(usd)) {
      continue;
    }
    facts[concept] = usd.map(toSecFact).filter((fact): fact is SecFact => fact !== null);
  }
  return facts;
}

function toSecFact(entry: unknown): SecFact | null {
  if (!isObject(entry)) {
    return null;
  }
  const { end, val, form, filed } = entry;
  if (typeof val !== 'number' || typeof end !== 'string' || typeof filed !== 'string') {
    return null;
  }
  return { end, val, filed, form: typeof form === 'string' ? form : '' };
}

function asTickerCikMap(value: unknown): TickerCikMap | null {
  if (!isObject(value)) {
    return null;
  }
  const map: TickerCikMap = {};
  for (const [ticker, cik] of Object.entries(value)) {
    if (typeof cik !== 'string') {
      return null;
    }
    map[ticker] = cik;
  }
  return map;
}
