import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { existsSync, readdirSync } from 'fs';
import { join } from 'path';
import { ArtifactStoreService } from './artifact-store.service';
import {
  createMockConfigService,
  createTempDataDir,
  removeTempDataDir,
} from '../__mocks__/config.fixtures';
import { compositePriceTable, flatPriceTable } from '../__mocks__/price-table.fixtures';

describe('ArtifactStoreService', () => {
  let store: ArtifactStoreService;
  let dataDir: string;

  beforeEach(async () => {
    dataDir = createTempDataDir();
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ArtifactStoreService,
        { provide: ConfigService, useValue: createMockConfigService({ DATA_DIR: dataDir }) },
      ],
    }).compile();

    store = module.get<ArtifactStoreService>(ArtifactStoreService);
  });

  afterEach(() => {
    removeTempDataDir(dataDir);
  });

  it('should root paths at the configured data directory', () => {
    expect(store.paths.raw('AAPL')).toBe(join(dataDir, 'raw', 'AAPL.parquet'));
  });

  describe('tables', () => {
    it('should round-trip flat labels, values and inferred types', async () => {
      const table = flatPriceTable('2023-01-02', '2023-01-04');
      const path = store.paths.raw('AAPL');

      await store.writeTable(path, table);
      const read = await store.readTable(path);

      expect(read.columns).toEqual(table.columns);
      expect(read.types).toEqual({
        Date: 'date',
        Open: 'double',
        High: 'double',
        Low: 'double',
        Close: 'double',
        'Adj Close': 'double',
        Volume: 'double',
      });
      expect(read.rows).toHaveLength(3);
      expect(read.rows[0]['Date']).toEqual(new Date('2023-01-02T00:00:00.000Z'));
      expect(read.rows[2]['Close']).toBe(102);
    });

    it('should preserve composite labels that contain commas', async () => {
      const table = compositePriceTable('AAPL', '2023-01-02', '2023-01-03');
      const path = store.paths.raw('AAPL');

      await store.writeTable(path, table);
      const read = await store.readTable(path);

      expect(read.columns).toEqual(table.columns);
      expect(read.rows[1]["('Close', 'AAPL')"]).toBe(101);
    });

    it('should read missing optional values as null', async () => {
      const path = store.paths.raw('KO');
      await store.writeTable(
        path,
        {
          columns: ['Date', 'Close', 'Symbol'],
          rows: [
            { Date: new Date('2023-01-02T00:00:00.000Z'), Close: null, Symbol: 'KO' },
            { Date: new Date('2023-01-03T00:00:00.000Z'), Close: 61.2, Symbol: 'KO' },
          ],
        },
        { Close: 'double' },
      );

      const read = await store.readTable(path);

      expect(read.rows[0]['Close']).toBeNull();
      expect(read.rows[1]['Close']).toBe(61.2);
      expect(read.rows[0]['Symbol']).toBe('KO');
    });

    it('should leave no temporary files behind', async () => {
      await store.writeTable(store.paths.raw('AAPL'), flatPriceTable('2023-01-02', '2023-01-03'));
      expect(readdirSync(join(dataDir, 'raw'))).toEqual(['AAPL.parquet']);
    });
  });

  describe('withSession', () => {
    it('should publish session writes only after the work completes', async () => {
      const path = store.paths.staged('AAPL', '2023-01-02', '2023-01-03');

      await store.withSession(async (session) => {
        await session.writeTable(path, flatPriceTable('2023-01-02', '2023-01-03'));
        expect(existsSync(path)).toBe(false);
      });

      expect(existsSync(path)).toBe(true);
    });

    it('should discard pending writes when the work fails', async () => {
      const path = store.paths.staged('AAPL', '2023-01-02', '2023-01-03');

      await expect(
        store.withSession(async (session) => {
          await session.writeTable(path, flatPriceTable('2023-01-02', '2023-01-03'));
          throw new Error('boom');
        }),
      ).rejects.toThrow('boom');

      expect(existsSync(path)).toBe(false);
      expect(readdirSync(join(dataDir, 'staged'))).toEqual([]);
    });
  });

  describe('json', () => {
    it('should return null for a missing document', async () => {
      expect(await store.readJson(store.paths.tickerCikMap())).toBeNull();
    });

    it('should round-trip a document', async () => {
      await store.writeJson(store.paths.tickerCikMap(), { AAPL: '0000320193' });
      expect(await store.readJson(store.paths.tickerCikMap())).toEqual({ AAPL: '0000320193' });
    });
  });

  describe('clear', () => {
    it('should remove only the requested zones', async () => {
      await store.writeTable(store.paths.raw('AAPL'), flatPriceTable('2023-01-02', '2023-01-03'));
      await store.writeJson(store.paths.tickerCikMap(), {});

      const removed = await store.clear(['raw']);

      expect(removed).toEqual([join(dataDir, 'raw')]);
      expect(existsSync(store.paths.raw('AAPL'))).toBe(false);
      expect(existsSync(store.paths.tickerCikMap())).toBe(true);
    });
  });
});
