import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ParquetReader, ParquetSchema, ParquetWriter } from '@dsnp/parquetjs';
import { promises as fs } from 'fs';
import { dirname } from 'path';
import { CellValue, PriceRow, PriceTable } from '../interfaces/price-table.interface';
import { ArtifactPaths, ArtifactZone, ARTIFACT_ZONES } from './artifact-paths';
import { dayToDate, toIsoDay, toNumber } from '../utils/trading-day';

export type ColumnType = 'double' | 'int32' | 'string' | 'date';

export type ColumnTypes = Record<string, ColumnType>;

/**
 * A table as stored on disk, with the column types it was written with
 */
export interface StoredTable extends PriceTable {
  types: ColumnTypes;
}

/** Key-value metadata entry holding the verbatim column labels */
export const COLUMN_LABELS_KEY = 'market_lake.columns';

const PARQUET_TYPES = {
  double: 'DOUBLE',
  int32: 'INT32',
  string: 'UTF8',
  date: 'DATE',
} as const;

type ParquetCell = number | string | Date;

/**
 * Reads and writes pipeline artifacts (Parquet tables, JSON documents)
 * under the configured data directory.
 */
@Injectable()
export class ArtifactStoreService {
  private readonly logger = new Logger(ArtifactStoreService.name);
  readonly paths: ArtifactPaths;

  constructor(private readonly configService: ConfigService) {
    this.paths = new ArtifactPaths(this.configService.get<string>('DATA_DIR', 'data'));
  }

  async exists(path: string): Promise<boolean> {
    try {
      await fs.access(path);
      return true;
    } catch {
      return false;
    }
  }

  async readTable(path: string): Promise<StoredTable> {
    const reader = await ParquetReader.openFile(path);
    try {
      const fields = reader.getSchema().fieldList;
      const labels =
        parseLabels(reader.getMetadata()[COLUMN_LABELS_KEY], fields.length) ??
        fields.map((field) => field.name);

      const types: ColumnTypes = {};
      fields.forEach((field, index) => {
        types[labels[index]] = columnTypeOf(field.originalType, field.primitiveType);
      });

      const rows: PriceRow[] = [];
      const cursor = reader.getCursor();
      let record: unknown = await cursor.next();
      while (isRecord(record)) {
        const current = record;
        const row: PriceRow = {};
        fields.forEach((field, index) => {
          row[labels[index]] = fromParquetValue(current, field.name);
        });
        rows.push(row);
        record = await cursor.next();
      }

      return { columns: labels, types, rows };
    } finally {
      await reader.close();
    }
  }

  /**
   * Write a table atomically: the artifact only appears at `path` once it
   * is complete. Types not given are inferred from the first non-null value.
   */
  async writeTable(path: string, table: PriceTable, types: ColumnTypes = {}): Promise<void> {
    const tempPath = temporaryPathFor(path);
    try {
      await this.writeParquet(tempPath, table, types);
      await fs.rename(tempPath, path);
    } finally {
      await fs.rm(tempPath, { force: true });
    }
  }

  /**
   * Write Parquet at exactly `path`, creating parent directories
   */
  async writeParquet(path: string, table: PriceTable, types: ColumnTypes = {}): Promise<void> {
    await fs.mkdir(dirname(path), { recursive: true });

    const resolved = table.columns.map((label) => types[label] ?? inferColumnType(table.rows, label));
    const physical = table.columns.map(physicalName);

    const definition: Record<string, { type: (typeof PARQUET_TYPES)[ColumnType]; optional: true }> =
      {};
    physical.forEach((name, index) => {
      definition[name] = { type: PARQUET_TYPES[resolved[index]], optional: true };
    });

    const writer = await ParquetWriter.openFile(new ParquetSchema(definition), path);
    writer.setMetadata(COLUMN_LABELS_KEY, JSON.stringify(table.columns));
    try {
      for (const row of table.rows) {
        const record: Record<string, ParquetCell> = {};
        table.columns.forEach((label, index) => {
          const value = toParquetValue(row[label], resolved[index]);
          if (value !== null) {
            record[physical[index]] = value;
          }
        });
        await writer.appendRow(record);
      }
    } finally {
      await writer.close();
    }
  }

  async readJson(path: string): Promise<unknown> {
    if (!(await this.exists(path))) {
      return null;
    }
    return JSON.parse(await fs.readFile(path, 'utf-8'));
  }

  async writeJson(path: string, value: unknown): Promise<void> {
    await fs.mkdir(dirname(path), { recursive: true });
    const tempPath = temporaryPathFor(path);
    try {
      await fs.writeFile(tempPath, JSON.stringify(value), 'utf-8');
      await fs.rename(tempPath, path);
    } finally {
      await fs.rm(tempPath, { force: true });
    }
  }

  /**
   * Run `work` inside a session whose writes become visible only if it
   * completes. Pending files are removed on every exit path.
   */
  async withSession<T>(work: (session: ArtifactSession) => Promise<T>): Promise<T> {
    const session = new ArtifactSession(this);
    try {
      const result = await work(session);
      await session.commit();
      return result;
    } finally {
      await session.release();
    }
  }

  /**
   * Remove every artifact in the given zones (all zones by default)
   */
  async clear(zones: readonly ArtifactZone[] = ARTIFACT_ZONES): Promise<string[]> {
    const removed: string[] = [];
    for (const zone of zones) {
      const dir = this.paths.zone(zone);
      if (await this.exists(dir)) {
        await fs.rm(dir, { recursive: true, force: true });
        removed.push(dir);
      }
    }
    this.logger.log(`Cleared ${removed.length} artifact zone(s) under ${this.paths.rootDir}`);
    return removed;
  }
}

/**
 * Scoped handle for one multi-artifact operation
 */
export class ArtifactSession {
  private readonly pending = new Map<string, string>();
  private released = false;

  constructor(private readonly store: ArtifactStoreService) {}

  readTable(path: string): Promise<StoredTable> {
    this.assertOpen();
    return this.store.readTable(path);
  }

  async writeTable(path: string, table: PriceTable, types?: ColumnTypes): Promise<void> {
    this.assertOpen();
    const tempPath = temporaryPathFor(path);
    this.pending.set(path, tempPath);
    await this.store.writeParquet(tempPath, table, types);
  }

  async commit(): Promise<void> {
    this.assertOpen();
    for (const [path, tempPath] of this.pending) {
      await fs.rename(tempPath, path);
      this.pending.delete(path);
    }
  }

  async release(): Promise<void> {
    for (const tempPath of this.pending.values()) {
      await fs.rm(tempPath, { force: true });
    }
    this.pending.clear();
    this.released = true;
  }

  private assertOpen(): void {
    if (this.released) {
      throw new Error('Artifact session already released');
    }
  }
}

function temporaryPathFor(path: string): string {
  return `${path}.${process.pid}.tmp`;
}

/**
 * Commas are path separators for the Parquet library, so such labels get
 * a positional field name; the verbatim label lives in the file metadata.
 */
function physicalName(label: string, index: number): string {
  return label.includes(',') ? `col_${index}` : label;
}

function parseLabels(raw: unknown, count: number): string[] | null {
  if (typeof raw !== 'string') {
    return null;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (
    Array.isArray(parsed) &&
    parsed.length === count &&
    parsed.every((label): label is string => typeof label === 'string')
  ) {
    return parsed;
  }
  return null;
}

function columnTypeOf(originalType: string | undefined, primitiveType: string | undefined): ColumnType {
  if (originalType === 'DATE') {
    return 'date';
  }
  if (originalType === 'UTF8') {
    return 'string';
  }
  if (primitiveType === 'INT32') {
    return 'int32';
  }
  if (primitiveType === 'DOUBLE' || primitiveType === 'FLOAT' || primitiveType === 'INT64') {
    return 'double';
  }
  return 'string';
}

function inferColumnType(rows: readonly PriceRow[], label: string): ColumnType {
  for (const row of rows) {
    const value = row[label];
    if (value instanceof Date) {
      return 'date';
    }
    if (typeof value === 'number') {
      return 'double';
    }
    if (typeof value === 'string') {
      return 'string';
    }
  }
  return 'string';
}

function toParquetValue(value: CellValue | undefined, type: ColumnType): ParquetCell | null {
  switch (type) {
    case 'date': {
      const day = toIsoDay(value);
      return day === null ? null : dayToDate(day);
    }
    case 'double':
      return toNumber(value);
    case 'int32': {
      const number = toNumber(value);
      return number === null ? null : Math.trunc(number);
    }
    case 'string':
      if (value === null || value === undefined) {
        return null;
      }
      return value instanceof Date ? value.toISOString() : String(value);
  }
}

function fromParquetValue(record: Record<string, unknown>, field: string): CellValue {
  const value = record[field];
  if (value instanceof Date || typeof value === 'number' || typeof value === 'string') {
    return value;
  }
  if (typeof value === 'bigint') {
    return Number(value);
  }
  if (Buffer.isBuffer(value)) {
    return value.toString('utf-8');
  }
  return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}
