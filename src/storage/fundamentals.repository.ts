import { Injectable, Logger } from '@nestjs/common';
import { ArtifactStoreService, ColumnTypes } from './artifact-store.service';
import {
  FundamentalMetric,
  FundamentalMetrics,
  FundamentalsRecord,
} from '../interfaces/fundamentals.interface';
import { CellValue, PriceRow } from '../interfaces/price-table.interface';
import { errorMessage } from '../utils/guards';

type MetricField = keyof FundamentalMetric;

const METRIC_FIELDS: readonly MetricField[] = ['value', 'source', 'filed_date', 'end_date'];

/**
 * Persists fundamentals records as one-row Parquet files with the metrics
 * flattened to `{metric}.{field}` columns plus `ticker` and `timestamp`.
 */
@Injectable()
export class FundamentalsRepository {
  private readonly logger = new Logger(FundamentalsRepository.name);

  constructor(private readonly store: ArtifactStoreService) {}

  async save(record: FundamentalsRecord): Promise<string> {
    const path = this.store.paths.fundamentals(record.ticker);
    const { columns, row, types } = flattenRecord(record);
    await this.store.writeTable(path, { columns, rows: [row] }, types);
    this.logger.log(`Saved fundamental data for ${record.ticker} to ${path}`);
    return path;
  }

  /**
   * Load the persisted record, or null when absent or unreadable
   */
  async load(ticker: string): Promise<FundamentalsRecord | null> {
    const path = this.store.paths.fundamentals(ticker);
    if (!(await this.store.exists(path))) {
      return null;
    }

    try {
      const table = await this.store.readTable(path);
      if (table.rows.length === 0) {
        return null;
      }
      return unflattenRow(table.columns, table.rows[0], ticker);
    } catch (error) {
      this.logger.warn(
        `Error loading fundamentals for ${ticker}: ${errorMessage(error)}`,
      );
      return null;
    }
  }
}

export function flattenRecord(record: FundamentalsRecord): {
  columns: string[];
  row: PriceRow;
  types: ColumnTypes;
} {
  const columns: string[] = [];
  const row: PriceRow = {};
  const types: ColumnTypes = {};

  for (const [name, metric] of Object.entries(record.metrics)) {
    for (const field of METRIC_FIELDS) {
      const value = metric[field];
      if (value === undefined) {
        continue;
      }
      const column = `${name}.${field}`;
      columns.push(column);
      row[column] = value;
      types[column] = field === 'value' ? 'double' : 'string';
    }
  }

  columns.push('ticker', 'timestamp');
  row['ticker'] = record.ticker;
  row['timestamp'] = record.timestamp;
  types['ticker'] = 'string';
  types['timestamp'] = 'string';

  return { columns, row, types };
}

export function unflattenRow(
  columns: readonly string[],
  row: PriceRow,
  fallbackTicker: string,
): FundamentalsRecord {
  const metrics: FundamentalMetrics = {};

  for (const column of columns) {
    const separator = column.lastIndexOf('.');
    if (separator <= 0) {
      continue;
    }
    const name = column.slice(0, separator);
    const field = column.slice(separator + 1);
    const metric = metrics[name] ?? { value: null, source: '' };
    const cell = row[column];

    switch (field) {
      case 'value':
        metric.value = typeof cell === 'number' ? cell : null;
        break;
      case 'source':
        metric.source = asText(cell) ?? '';
        break;
      case 'filed_date':
        metric.filed_date = asText(cell) ?? undefined;
        break;
      case 'end_date':
        metric.end_date = asText(cell) ?? undefined;
        break;
      default:
        continue;
    }
    metrics[name] = metric;
  }

  return {
    ticker: asText(row['ticker']) ?? fallbackTicker,
    timestamp: asText(row['timestamp']) ?? '',
    metrics,
  };
}

function asText(cell: CellValue | undefined): string | null {
  if (typeof cell === 'string') {
    return cell;
  }
  if (cell instanceof Date) {
    return cell.toISOString();
  }
  return null;
}
