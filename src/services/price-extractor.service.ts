import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { PRICE_PROVIDER, PriceProvider } from '../interfaces/price-provider.interface';
import { ExtractionResult } from '../interfaces/pipeline-result.interface';
import { PriceTable } from '../interfaces/price-table.interface';
import { NoDataAvailableException } from '../exceptions';
import { ArtifactStoreService } from '../storage/artifact-store.service';
import { MetricsService } from '../metrics/metrics.service';
import { errorMessage } from '../utils/guards';

export const SYMBOL_COLUMN = 'Symbol';

/**
 * Fetches daily history from the price provider and replaces the
 * ticker's raw artifact with it.
 */
@Injectable()
export class PriceExtractorService {
  private readonly logger = new Logger(PriceExtractorService.name);

  constructor(
    @Inject(PRICE_PROVIDER) private readonly priceProvider: PriceProvider,
    private readonly store: ArtifactStoreService,
    @Optional() private readonly metricsService?: MetricsService,
  ) {}

  /**
   * @throws NoDataAvailableException when the provider returns no rows;
   * nothing is written and any earlier raw artifact stays in place
   * @throws ProviderUnavailableException
   */
  async extract(ticker: string, start: string, end: string): Promise<ExtractionResult> {
    const context = { ticker, start, end };

    let table: PriceTable;
    try {
      table = await this.priceProvider.fetchDailyHistory(ticker, start, end);
    } catch (error) {
      this.metricsService?.recordExtraction('failed');
      this.metricsService?.recordProviderFailure(this.priceProvider.name);
      this.logger.error(
        `Extraction failed for ${ticker} [${start}..${end}]: ${errorMessage(error)}`,
      );
      throw error;
    }

    if (table.rows.length === 0) {
      this.metricsService?.recordExtraction('no_data');
      this.logger.warn(`No data downloaded for ${ticker} between ${start} and ${end}`);
      throw new NoDataAvailableException(context, this.priceProvider.name);
    }

    const withSymbol = ensureSymbolColumn(table, ticker);
    const path = this.store.paths.raw(ticker);
    await this.store.writeTable(path, withSymbol, { [SYMBOL_COLUMN]: 'string' });

    this.metricsService?.recordExtraction('written');
    this.logger.log(`Saved ${withSymbol.rows.length} rows of ${ticker} data to ${path}`);
    return { ticker, path, table: withSymbol };
  }
}

/**
 * Add a `Symbol` column holding the ticker unless a symbol column
 * (any casing) is already present
 */
export function ensureSymbolColumn(table: PriceTable, ticker: string): PriceTable {
  const present = table.columns.some(
    (column) => column.toLowerCase() === SYMBOL_COLUMN.toLowerCase(),
  );
  if (present) {
    return table;
  }
  return {
    columns: [...table.columns, SYMBOL_COLUMN],
    rows: table.rows.map((row) => ({ ...row, [SYMBOL_COLUMN]: ticker })),
  };
}
