import { Injectable, Logger, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SchemaNormalizer } from '../normalizers/schema.normalizer';
import { ArtifactStoreService, ColumnTypes } from '../storage/artifact-store.service';
import { MetricsService } from '../metrics/metrics.service';
import { MissingRawDataException, PipelineContext } from '../exceptions';
import { OhlcFallback, PriceColumnMapping } from '../interfaces/column-layout.interface';
import {
  CellValue,
  DimDateRow,
  FactPriceRow,
  PriceRow,
  PriceTable,
} from '../interfaces/price-table.interface';
import { TransformResult } from '../interfaces/pipeline-result.interface';
import { toIsoDay, toNumber } from '../utils/trading-day';

export const FACT_COLUMNS = ['date', 'ticker', 'Open', 'High', 'Low', 'Close', 'Volume'];

const FACT_TYPES: ColumnTypes = {
  date: 'date',
  ticker: 'string',
  Open: 'double',
  High: 'double',
  Low: 'double',
  Close: 'double',
  Volume: 'double',
};

export const DIM_COLUMNS = ['date', 'year', 'month', 'day'];

const DIM_TYPES: ColumnTypes = { date: 'date', year: 'int32', month: 'int32', day: 'int32' };

/**
 * Derives the staged window, the price fact table and the date dimension
 * from a ticker's raw artifact.
 *
 * All three artifacts of one call are written through a single artifact
 * session and appear together, or not at all.
 */
@Injectable()
export class StarSchemaTransformerService {
  private readonly logger = new Logger(StarSchemaTransformerService.name);
  private readonly ohlcFallback: OhlcFallback;

  constructor(
    private readonly configService: ConfigService,
    private readonly store: ArtifactStoreService,
    private readonly normalizer: SchemaNormalizer,
    @Optional() private readonly metricsService?: MetricsService,
  ) {
    this.ohlcFallback =
      this.configService.get<string>('PRICE_OHLC_FALLBACK', 'null') === 'close' ? 'close' : 'null';
  }

  /**
   * @throws MissingRawDataException when the ticker was never extracted
   * @throws ColumnNotFoundException when the raw artifact has no date column,
   * or neither a close nor a volume column
   */
  async transform(ticker: string, start: string, end: string): Promise<TransformResult> {
    const context: PipelineContext = { ticker, start, end };
    const rawPath = this.store.paths.raw(ticker);
    if (!(await this.store.exists(rawPath))) {
      throw new MissingRawDataException(context, rawPath);
    }

    const paths = {
      staged: this.store.paths.staged(ticker, start, end),
      fact: this.store.paths.fact(ticker, start, end),
      dim: this.store.paths.dim(ticker, start, end),
    };
    const startedAt = process.hrtime.bigint();

    const result = await this.store.withSession(async (session) => {
      const raw = await session.readTable(rawPath);
      const layout = this.normalizer.inspect(raw.columns, context);
      const dateColumn = layout.resolve('date');

      // 1. staged window
      const staged: PriceTable = {
        columns: raw.columns,
        rows: raw.rows.filter((row) => isWithin(row[dateColumn], start, end)),
      };
      await session.writeTable(paths.staged, staged, raw.types);
      this.logger.log(`Staged data written to ${paths.staged}`);

      // 2-3. fact table
      const { mapping, warnings } = this.normalizer.resolvePriceColumns(layout, this.ohlcFallback);
      const fact = staged.rows.flatMap((row) => {
        const factRow = toFactRow(row, mapping, ticker);
        return factRow ? [factRow] : [];
      });
      await session.writeTable(paths.fact, toTable(FACT_COLUMNS, fact), FACT_TYPES);
      this.logger.log(`Fact table written to ${paths.fact}`);

      // 4. date dimension
      const dim = buildDateDimension(fact);
      await session.writeTable(paths.dim, toTable(DIM_COLUMNS, dim), DIM_TYPES);
      this.logger.log(`Dimension table written to ${paths.dim}`);

      return { staged, fact, dim, encoding: layout.encoding, warnings };
    });

    const durationSeconds = Number(process.hrtime.bigint() - startedAt) / 1e9;
    this.metricsService?.recordTransform(durationSeconds);
    this.logger.debug(
      `Transformed ${ticker} [${start}..${end}] (${result.fact.length} rows, ` +
        `${result.encoding.kind} layout) in ${durationSeconds.toFixed(3)}s`,
    );

    return { ticker, start, end, ...result, paths };
  }
}

function isWithin(value: CellValue | undefined, start: string, end: string): boolean {
  const day = toIsoDay(value);
  return day !== null && day >= start && day <= end;
}

function toFactRow(row: PriceRow, mapping: PriceColumnMapping, ticker: string): FactPriceRow | null {
  const date = toIsoDay(row[mapping.date]);
  if (date === null) {
    return null;
  }
  const number = (label: string | null): number | null =>
    label === null ? null : toNumber(row[label]);
  const symbol = mapping.symbol === null ? null : row[mapping.symbol];

  return {
    date,
    ticker: typeof symbol === 'string' && symbol.trim() !== '' ? symbol : ticker,
    Open: number(mapping.open),
    High: number(mapping.high),
    Low: number(mapping.low),
    Close: number(mapping.close),
    Volume: number(mapping.volume),
  };
}

/**
 * Distinct fact dates in ascending order, without gap filling
 */
export function buildDateDimension(fact: readonly FactPriceRow[]): DimDateRow[] {
  const dates = [...new Set(fact.map((row) => row.date))].sort();
  return dates.map((date) => ({
    date,
    year: Number(date.slice(0, 4)),
    month: Number(date.slice(5, 7)),
    day: Number(date.slice(8, 10)),
  }));
}

function toTable(columns: string[], rows: ReadonlyArray<FactPriceRow | DimDateRow>): PriceTable {
  return {
    columns,
    rows: rows.map((row) => ({ ...row })),
  };
}
