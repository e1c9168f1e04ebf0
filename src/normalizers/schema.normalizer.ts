import { Injectable, Logger } from '@nestjs/common';
import {
  ColumnEncoding,
  LogicalColumn,
  OhlcFallback,
  PriceColumnMapping,
  PriceField,
  SchemaWarning,
} from '../interfaces/column-layout.interface';
import { ColumnNotFoundException, PipelineContext } from '../exceptions';

const UNKNOWN_CONTEXT: PipelineContext = { ticker: 'unknown' };

/**
 * Column labels of one artifact together with their detected encoding.
 * Lookups never re-sniff the encoding.
 */
export class ColumnLayout {
  constructor(
    readonly columns: readonly string[],
    readonly encoding: ColumnEncoding,
    private readonly context: PipelineContext = UNKNOWN_CONTEXT,
  ) {}

  /**
   * Resolve a logical name to a physical label, or null when absent.
   * An exact case-insensitive match always wins over a composite match.
   */
  tryResolve(logicalName: LogicalColumn): string | null {
    const wanted = logicalName.toLowerCase();
    const exact = this.columns.find((col) => col.toLowerCase() === wanted);
    if (exact !== undefined) {
      return exact;
    }

    if (this.encoding.kind === 'flat') {
      return null;
    }

    const patterns = compositePatterns(logicalName);
    const composite = this.columns.find((col) =>
      patterns.some((pattern) => col.includes(pattern)),
    );
    return composite ?? null;
  }

  /**
   * @throws ColumnNotFoundException
   */
  resolve(logicalName: LogicalColumn): string {
    const label = this.tryResolve(logicalName);
    if (label === null) {
      throw new ColumnNotFoundException(logicalName, this.columns, this.context);
    }
    return label;
  }
}

/**
 * Label fragments a composite encoding uses for a field, e.g. `('Close'`.
 */
function compositePatterns(logicalName: string): string[] {
  const lower = logicalName.toLowerCase();
  const capitalized = lower.charAt(0).toUpperCase() + lower.slice(1);
  const upper = logicalName.toUpperCase();
  return [`('${capitalized}'`, `('${upper}'`, `"${capitalized}"`, `"${upper}"`];
}

/**
 * Resolves logical price columns (date/open/high/low/close/volume/symbol)
 * against flat or composite column labels.
 */
@Injectable()
export class SchemaNormalizer {
  private readonly logger = new Logger(SchemaNormalizer.name);

  /**
   * Detect the label encoding of a table once
   */
  detectEncoding(columns: readonly string[]): ColumnEncoding {
    const composite = columns.some((col) => col.includes("',") || col.includes('",'));
    return composite ? { kind: 'composite' } : { kind: 'flat' };
  }

  inspect(columns: readonly string[], context?: PipelineContext): ColumnLayout {
    return new ColumnLayout(columns, this.detectEncoding(columns), context);
  }

  /**
   * @throws ColumnNotFoundException when no label matches
   */
  resolve(
    columns: readonly string[],
    logicalName: LogicalColumn,
    context?: PipelineContext,
  ): string {
    return this.inspect(columns, context).resolve(logicalName);
  }

  /**
   * Map every price field to a label. `date` is mandatory; other fields
   * missing from the layout are null-filled, or with the `close` fallback
   * open/high/low reuse the close column. Each such decision is reported
   * as a warning.
   *
   * @throws ColumnNotFoundException when date is missing, or when neither
   * close nor volume can be resolved
   */
  resolvePriceColumns(
    layout: ColumnLayout,
    fallback: OhlcFallback = 'null',
  ): { mapping: PriceColumnMapping; warnings: SchemaWarning[] } {
    const warnings: SchemaWarning[] = [];
    const date = layout.resolve('date');
    const close = layout.tryResolve('close');
    const volume = layout.tryResolve('volume');

    if (close === null && volume === null) {
      layout.resolve('close');
    }

    const resolveOhl = (field: PriceField): string | null => {
      const label = layout.tryResolve(field);
      if (label !== null) {
        return label;
      }
      if (fallback === 'close' && close !== null) {
        warnings.push({
          code: 'ohlc-substituted-by-close',
          column: field,
          message: `Complete OHLC data not available; '${field}' uses close values`,
        });
        return close;
      }
      warnings.push(nullFilled(field));
      return null;
    };

    const mapping: PriceColumnMapping = {
      date,
      symbol: layout.tryResolve('symbol'),
      open: resolveOhl('open'),
      high: resolveOhl('high'),
      low: resolveOhl('low'),
      close,
      volume,
    };

    if (close === null) {
      warnings.push(nullFilled('close'));
    }
    if (volume === null) {
      warnings.push(nullFilled('volume'));
    }

    for (const warning of warnings) {
      this.logger.warn(`${warning.message} [${layout.encoding.kind} layout]`);
    }

    return { mapping, warnings };
  }
}

function nullFilled(column: PriceField): SchemaWarning {
  return {
    code: 'column-null-filled',
    column,
    message: `Column '${column}' not found; filled with nulls`,
  };
}
