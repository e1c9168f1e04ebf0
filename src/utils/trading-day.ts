import { CellValue } from '../interfaces/price-table.interface';

const ISO_DAY = /^(\d{4})-(\d{2})-(\d{2})/;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Truncate a cell to its UTC day as YYYY-MM-DD, or null if it is not a date
 */
export function toIsoDay(value: CellValue | undefined): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (value instanceof Date) {
    return isNaN(value.getTime()) ? null : value.toISOString().slice(0, 10);
  }
  if (typeof value === 'number') {
    return isFinite(value) ? new Date(value).toISOString().slice(0, 10) : null;
  }
  const match = ISO_DAY.exec(value.trim());
  return match ? `${match[1]}-${match[2]}-${match[3]}` : null;
}

/**
 * UTC midnight of a YYYY-MM-DD day
 */
export function dayToDate(isoDay: string): Date {
  const match = ISO_DAY.exec(isoDay);
  if (!match) {
    throw new Error(`Invalid day: ${isoDay}`);
  }
  return new Date(Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3])));
}

export function addDays(isoDay: string, days: number): string {
  return new Date(dayToDate(isoDay).getTime() + days * MS_PER_DAY).toISOString().slice(0, 10);
}

export function isIsoDay(value: string): boolean {
  return /^\d{4}-\d{2}-\d{2}$/.test(value) && toIsoDay(dayToDate(value)) === value;
}

export function toNumber(value: CellValue | undefined): number | null {
  if (typeof value === 'number') {
    return isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return isFinite(parsed) ? parsed : null;
  }
  return null;
}
