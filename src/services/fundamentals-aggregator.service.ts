import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import {
  MARKET_DATA_PROVIDER,
  MarketDataProvider,
} from '../interfaces/market-data-provider.interface';
import {
  REGULATORY_FILINGS_PROVIDER,
  RegulatoryFilingsProvider,
  SecFact,
  UsGaapFacts,
} from '../interfaces/regulatory-filings-provider.interface';
import { FundamentalMetrics, FundamentalsRecord } from '../interfaces/fundamentals.interface';
import { IdentifierNotFoundException } from '../exceptions';
import { CacheResolverService } from '../storage/cache-resolver.service';
import { FundamentalsRepository } from '../storage/fundamentals.repository';
import { MetricsService } from '../metrics/metrics.service';
import { MARKET_DATA_METRICS, REGULATORY_METRICS } from '../config/metric-catalog.config';
import { errorMessage } from '../utils/guards';

const ANNUAL_REPORT_FORM = '10-K';

/**
 * Assembles the fundamentals record of a ticker from the market-data and
 * regulatory-filings providers.
 *
 * Each source is queried independently and a failing source contributes no
 * metrics. On overlapping metric names the regulatory value wins.
 */
@Injectable()
export class FundamentalsAggregatorService {
  private readonly logger = new Logger(FundamentalsAggregatorService.name);

  constructor(
    @Inject(MARKET_DATA_PROVIDER) private readonly marketDataProvider: MarketDataProvider,
    @Inject(REGULATORY_FILINGS_PROVIDER)
    private readonly regulatoryProvider: RegulatoryFilingsProvider,
    private readonly cacheResolver: CacheResolverService,
    private readonly repository: FundamentalsRepository,
    @Optional() private readonly metricsService?: MetricsService,
  ) {}

  /**
   * The persisted record while it is fresh, otherwise a newly aggregated
   * one. Returns null when neither source produced a metric; such a result
   * is not persisted.
   */
  async getOrUpdate(ticker: string, forceUpdate = false): Promise<FundamentalsRecord | null> {
    const cached = await this.cacheResolver.resolveFundamentals(ticker, {
      forceRefresh: forceUpdate,
    });
    if (cached) {
      this.logger.debug(`Using cached fundamentals for ${ticker} from ${cached.timestamp}`);
      return cached;
    }

    this.logger.log(`Fetching fundamentals for ${ticker}`);
    const marketData = await this.getMarketDataMetrics(ticker);
    const regulatory = await this.getRegulatoryMetrics(ticker);
    const metrics = mergeMetrics(marketData, regulatory);

    if (Object.keys(metrics).length === 0) {
      this.logger.warn(`No fundamental data available for ${ticker}`);
      return null;
    }

    const record: FundamentalsRecord = {
      ticker,
      timestamp: new Date().toISOString(),
      metrics,
    };
    await this.repository.save(record);
    return record;
  }

  /**
   * Catalogue metrics from the market-data snapshot; {} on failure
   */
  async getMarketDataMetrics(ticker: string): Promise<FundamentalMetrics> {
    try {
      const snapshot = await this.marketDataProvider.fetchSnapshot(ticker);
      const metrics: FundamentalMetrics = {};
      for (const [key, name] of Object.entries(MARKET_DATA_METRICS)) {
        const value = snapshot[key];
        if (value !== undefined) {
          metrics[name] = { value, source: this.marketDataProvider.name };
        }
      }
      return metrics;
    } catch (error) {
      this.metricsService?.recordProviderFailure(this.marketDataProvider.name);
      this.logger.warn(
        `Error fetching ${this.marketDataProvider.name} data for ${ticker}: ${errorMessage(error)}`,
      );
      return {};
    }
  }

  /**
   * Latest annual-report values from regulatory filings; {} on failure,
   * including an unknown ticker
   */
  async getRegulatoryMetrics(ticker: string): Promise<FundamentalMetrics> {
    try {
      const facts = await this.regulatoryProvider.fetchCompanyFacts(ticker);
      return selectAnnualMetrics(facts, this.regulatoryProvider.name);
    } catch (error) {
      if (error instanceof IdentifierNotFoundException) {
        this.logger.warn(`CIK not found for ${ticker}`);
        return {};
      }
      this.metricsService?.recordProviderFailure(this.regulatoryProvider.name);
      this.logger.warn(
        `Error fetching ${this.regulatoryProvider.name} data for ${ticker}: ${errorMessage(error)}`,
      );
      return {};
    }
  }
}

/**
 * Market data first, regulatory values overwrite on shared names
 */
export function mergeMetrics(
  marketData: FundamentalMetrics,
  regulatory: FundamentalMetrics,
): FundamentalMetrics {
  return { ...marketData, ...regulatory };
}

/**
 * For each regulatory metric, take the first concept present and pick its
 * most recently filed annual report entry
 */
export function selectAnnualMetrics(facts: UsGaapFacts, source: string): FundamentalMetrics {
  const metrics: FundamentalMetrics = {};

  for (const [name, concepts] of Object.entries(REGULATORY_METRICS)) {
    const concept = concepts.find((candidate) => facts[candidate] !== undefined);
    if (concept === undefined) {
      continue;
    }
    const latest = latestFiled(facts[concept].filter((fact) => fact.form === ANNUAL_REPORT_FORM));
    if (latest === null) {
      continue;
    }
    metrics[name] = {
      value: latest.val,
      source,
      filed_date: latest.filed,
      end_date: latest.end,
    };
  }
  return metrics;
}

/**
 * Entry with the lexicographically greatest filing date; the first one on ties
 */
function latestFiled(facts: readonly SecFact[]): SecFact | null {
  let latest: SecFact | null = null;
  for (const fact of facts) {
    if (latest === null || fact.filed > latest.filed) {
      latest = fact;
    }
  }
  return latest;
}
