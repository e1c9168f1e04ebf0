import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PriceExtractorService } from './price-extractor.service';
import { StarSchemaTransformerService } from './star-schema-transformer.service';
import { CacheResolverService } from '../storage/cache-resolver.service';
import { ArtifactStoreService } from '../storage/artifact-store.service';
import { SchemaNormalizer } from '../normalizers/schema.normalizer';
import { NoDataAvailableException } from '../exceptions';
import { PriceDataResult } from '../interfaces/pipeline-result.interface';
import { PriceSummary, PriceTable } from '../interfaces/price-table.interface';
import { DEFAULT_STOCK_SYMBOLS, parseTickerList } from '../config/tracked-tickers.config';
import { toNumber } from '../utils/trading-day';

/**
 * Serves a ticker's price window: staged cache first, otherwise
 * extract then transform.
 */
@Injectable()
export class PricePipelineService {
  private readonly logger = new Logger(PricePipelineService.name);
  private readonly trackedTickers: string[];

  constructor(
    private readonly configService: ConfigService,
    private readonly cacheResolver: CacheResolverService,
    private readonly store: ArtifactStoreService,
    private readonly normalizer: SchemaNormalizer,
    private readonly extractor: PriceExtractorService,
    private readonly transformer: StarSchemaTransformerService,
  ) {
    this.trackedTickers = parseTickerList(
      this.configService.get<string>('STOCK_SYMBOLS', DEFAULT_STOCK_SYMBOLS),
    );
  }

  getTrackedTickers(): string[] {
    return [...this.trackedTickers];
  }

  /**
   * @throws NoDataAvailableException when the provider has nothing for the
   * window and no earlier raw artifact exists
   */
  async getPriceData(ticker: string, start: string, end: string): Promise<PriceDataResult> {
    const key = { kind: 'staged', ticker, start, end } as const;
    if (await this.cacheResolver.isFresh(key)) {
      const table = await this.store.readTable(this.store.paths.staged(ticker, start, end));
      this.logger.debug(`Serving ${ticker} [${start}..${end}] from staged cache`);
      return {
        ticker,
        start,
        end,
        cached: true,
        table: { columns: table.columns, rows: table.rows },
        warnings: [],
        summary: this.summarize(table, ticker),
      };
    }

    await this.extractOrReuseRaw(ticker, start, end);
    const result = await this.transformer.transform(ticker, start, end);
    return {
      ticker,
      start,
      end,
      cached: false,
      table: result.staged,
      fact: result.fact,
      warnings: result.warnings,
      summary: summarizeCloses(
        result.fact.map((row) => ({ close: row.Close, high: row.High, low: row.Low })),
      ),
    };
  }

  /**
   * An empty provider response leaves the previous raw artifact in place;
   * the transform then runs against it
   */
  private async extractOrReuseRaw(ticker: string, start: string, end: string): Promise<void> {
    try {
      await this.extractor.extract(ticker, start, end);
    } catch (error) {
      if (
        error instanceof NoDataAvailableException &&
        (await this.store.exists(this.store.paths.raw(ticker)))
      ) {
        this.logger.warn(`${error.message}; transforming existing raw artifact`);
        return;
      }
      throw error;
    }
  }

  private summarize(table: PriceTable, ticker: string): PriceSummary | null {
    const layout = this.normalizer.inspect(table.columns, { ticker });
    const close = layout.tryResolve('close');
    const high = layout.tryResolve('high');
    const low = layout.tryResolve('low');
    return summarizeCloses(
      table.rows.map((row) => ({
        close: close === null ? null : toNumber(row[close]),
        high: high === null ? null : toNumber(row[high]),
        low: low === null ? null : toNumber(row[low]),
      })),
    );
  }
}

interface PricePoint {
  close: number | null;
  high: number | null;
  low: number | null;
}

/**
 * First/last close, change and range of a window. High and low fall back
 * to close when the window carries no high/low values.
 */
export function summarizeCloses(points: readonly PricePoint[]): PriceSummary | null {
  const closes = points.flatMap((point) => (point.close === null ? [] : [point.close]));
  if (closes.length === 0) {
    return null;
  }
  const highs = points.flatMap((point) => (point.high === null ? [] : [point.high]));
  const lows = points.flatMap((point) => (point.low === null ? [] : [point.low]));

  const firstClose = closes[0];
  const lastClose = closes[closes.length - 1];
  const change = lastClose - firstClose;
  return {
    firstClose,
    lastClose,
    change,
    changePercent: firstClose === 0 ? 0 : (change / firstClose) * 100,
    high: Math.max(...(highs.length > 0 ? highs : closes)),
    low: Math.min(...(lows.length > 0 ? lows : closes)),
  };
}
