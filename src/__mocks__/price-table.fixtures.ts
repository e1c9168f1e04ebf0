import { PriceRow, PriceTable } from '../interfaces/price-table.interface';
import { addDays, dayToDate } from '../utils/trading-day';

/**
 * Weekdays in [start, end], a stand-in for a trading calendar
 */
export function weekdaysBetween(start: string, end: string): string[] {
  const days: string[] = [];
  for (let day = start; day <= end; day = addDays(day, 1)) {
    const weekday = dayToDate(day).getUTCDay();
    if (weekday !== 0 && weekday !== 6) {
      days.push(day);
    }
  }
  return days;
}

/**
 * Daily bars with flat labels, as the chart provider returns them.
 * Close on the n-th day is 100 + n.
 */
export function flatPriceTable(start: string, end: string): PriceTable {
  const columns = ['Date', 'Open', 'High', 'Low', 'Close', 'Adj Close', 'Volume'];
  const rows: PriceRow[] = weekdaysBetween(start, end).map((day, index) => ({
    Date: dayToDate(day),
    Open: 99.5 + index,
    High: 101 + index,
    Low: 99 + index,
    Close: 100 + index,
    'Adj Close': 99.75 + index,
    Volume: 1000000 + index * 1000,
  }));
  return { columns, rows };
}

/**
 * Same bars with composite (field, ticker) labels, as written by
 * multi-ticker download tooling.
 */
export function compositePriceTable(ticker: string, start: string, end: string): PriceTable {
  const flat = flatPriceTable(start, end);
  const label = (field: string): string => `('${field}', '${ticker}')`;
  const fields = ['Open', 'High', 'Low', 'Close', 'Volume'];
  const columns = ['Date', ...fields.map(label)];
  const rows = flat.rows.map((row) => {
    const composite: PriceRow = { Date: row['Date'] };
    for (const field of fields) {
      composite[label(field)] = row[field];
    }
    return composite;
  });
  return { columns, rows };
}
