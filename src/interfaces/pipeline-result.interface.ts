import { ColumnEncoding, SchemaWarning } from './column-layout.interface';
import { DimDateRow, FactPriceRow, PriceSummary, PriceTable } from './price-table.interface';

export interface ExtractionResult {
  ticker: string;
  path: string;
  table: PriceTable;
}

/**
 * Outputs of one star-schema transform
 */
export interface TransformResult {
  ticker: string;
  start: string;
  end: string;
  staged: PriceTable;
  fact: FactPriceRow[];
  dim: DimDateRow[];

  /** Label encoding detected on the staged artifact */
  encoding: ColumnEncoding;

  /** Degraded-mode decisions taken while projecting the fact table */
  warnings: SchemaWarning[];

  paths: { staged: string; fact: string; dim: string };
}

/**
 * Price data for one window as served to consumers
 */
export interface PriceDataResult {
  ticker: string;
  start: string;
  end: string;

  /** True when served from an existing staged artifact */
  cached: boolean;

  table: PriceTable;

  /** Canonical rows; present only when this request ran the transform */
  fact?: FactPriceRow[];

  warnings: SchemaWarning[];

  /** Null when the window holds no close prices */
  summary: PriceSummary | null;
}
