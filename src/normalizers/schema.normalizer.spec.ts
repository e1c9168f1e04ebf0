import { Test, TestingModule } from '@nestjs/testing';
import { ColumnLayout, SchemaNormalizer } from './schema.normalizer';
import { ColumnNotFoundException } from '../exceptions';
import { compositePriceTable, flatPriceTable } from '../__mocks__/price-table.fixtures';

describe('SchemaNormalizer', () => {
  let normalizer: SchemaNormalizer;
  const context = { ticker: 'AAPL', start: '2023-01-15', end: '2023-02-01' };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [SchemaNormalizer],
    }).compile();

    normalizer = module.get<SchemaNormalizer>(SchemaNormalizer);
  });

  describe('detectEncoding', () => {
    it('should detect flat labels', () => {
      const { columns } = flatPriceTable('2023-01-02', '2023-01-03');
      expect(normalizer.detectEncoding(columns)).toEqual({ kind: 'flat' });
    });

    it('should detect single-quoted composite labels', () => {
      const { columns } = compositePriceTable('AAPL', '2023-01-02', '2023-01-03');
      expect(normalizer.detectEncoding(columns)).toEqual({ kind: 'composite' });
    });

    it('should detect double-quoted composite labels', () => {
      expect(normalizer.detectEncoding(['Date', '("Close", "MSFT")'])).toEqual({
        kind: 'composite',
      });
    });
  });

  describe('resolve', () => {
    it('should match flat labels case-insensitively', () => {
      expect(normalizer.resolve(['date', 'CLOSE', 'Volume'], 'close')).toBe('CLOSE');
    });

    it('should resolve a composite label', () => {
      const { columns } = compositePriceTable('AAPL', '2023-01-02', '2023-01-03');
      expect(normalizer.resolve(columns, 'close')).toBe("('Close', 'AAPL')");
    });

    it('should resolve upper-cased composite fields', () => {
      expect(normalizer.resolve(['Date', "('VOLUME', 'KO')"], 'volume')).toBe("('VOLUME', 'KO')");
    });

    it('should resolve double-quoted composite fields', () => {
      expect(normalizer.resolve(['Date', '("Close", "MSFT")'], 'close')).toBe('("Close", "MSFT")');
    });

    it('should prefer an exact match over a composite match', () => {
      const columns = ["('Close', 'AAPL')", 'Date', 'close'];
      expect(normalizer.resolve(columns, 'close')).toBe('close');
    });

    it('should not scan composite patterns on flat layouts', () => {
      const layout = new ColumnLayout(["('Close'"], { kind: 'flat' });
      expect(layout.tryResolve('close')).toBeNull();
    });

    it('should throw ColumnNotFoundException listing the available columns', () => {
      expect(() => normalizer.resolve(['Date', 'Open'], 'close', context)).toThrow(
        "Column 'close' not found (case-insensitive). Available columns: Date, Open " +
          '(AAPL [2023-01-15..2023-02-01])',
      );
      expect(() => normalizer.resolve(['Date', 'Open'], 'close')).toThrow(
        ColumnNotFoundException,
      );
    });
  });

  describe('resolvePriceColumns', () => {
    it('should map every field of a flat table without warnings', () => {
      const layout = normalizer.inspect(flatPriceTable('2023-01-02', '2023-01-03').columns);

      const { mapping, warnings } = normalizer.resolvePriceColumns(layout);

      expect(mapping).toEqual({
        date: 'Date',
        symbol: null,
        open: 'Open',
        high: 'High',
        low: 'Low',
        close: 'Close',
        volume: 'Volume',
      });
      expect(warnings).toEqual([]);
    });

    it('should map composite labels and a symbol column', () => {
      const { columns } = compositePriceTable('AAPL', '2023-01-02', '2023-01-03');
      const layout = normalizer.inspect([...columns, 'Symbol']);

      const { mapping } = normalizer.resolvePriceColumns(layout);

      expect(mapping.close).toBe("('Close', 'AAPL')");
      expect(mapping.open).toBe("('Open', 'AAPL')");
      expect(mapping.symbol).toBe('Symbol');
    });

    it('should null-fill missing columns with a warning each', () => {
      const layout = normalizer.inspect(['Date', 'Close']);

      const { mapping, warnings } = normalizer.resolvePriceColumns(layout);

      expect(mapping.open).toBeNull();
      expect(mapping.volume).toBeNull();
      expect(warnings.map((w) => [w.code, w.column])).toEqual([
        ['column-null-filled', 'open'],
        ['column-null-filled', 'high'],
        ['column-null-filled', 'low'],
        ['column-null-filled', 'volume'],
      ]);
    });

    it('should substitute close for open/high/low under the close fallback', () => {
      const layout = normalizer.inspect(['Date', 'Close', 'Volume']);

      const { mapping, warnings } = normalizer.resolvePriceColumns(layout, 'close');

      expect(mapping.open).toBe('Close');
      expect(mapping.high).toBe('Close');
      expect(mapping.low).toBe('Close');
      expect(warnings).toHaveLength(3);
      expect(warnings.every((w) => w.code === 'ohlc-substituted-by-close')).toBe(true);
    });

    it('should null-fill close when only volume is present', () => {
      const layout = normalizer.inspect(['Date', 'Volume']);

      const { mapping, warnings } = normalizer.resolvePriceColumns(layout, 'close');

      expect(mapping.close).toBeNull();
      expect(mapping.open).toBeNull();
      expect(warnings.map((w) => w.column)).toEqual(['open', 'high', 'low', 'close']);
    });

    it('should fail when the date column is missing', () => {
      const layout = normalizer.inspect(['Close', 'Volume'], context);
      expect(() => normalizer.resolvePriceColumns(layout)).toThrow(ColumnNotFoundException);
    });

    it('should fail when neither close nor volume resolves', () => {
      const layout = normalizer.inspect(['Date', 'Open', 'High'], context);
      expect(() => normalizer.resolvePriceColumns(layout)).toThrow("Column 'close' not found");
    });
  });
});
