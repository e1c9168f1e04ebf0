import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { PricePipelineService, summarizeCloses } from './price-pipeline.service';
import { PriceExtractorService } from './price-extractor.service';
import { StarSchemaTransformerService } from './star-schema-transformer.service';
import { SchemaNormalizer } from '../normalizers/schema.normalizer';
import { ArtifactStoreService } from '../storage/artifact-store.service';
import { CacheResolverService } from '../storage/cache-resolver.service';
import { FundamentalsRepository } from '../storage/fundamentals.repository';
import { PRICE_PROVIDER } from '../interfaces/price-provider.interface';
import { NoDataAvailableException } from '../exceptions';
import {
  createMockConfigService,
  createTempDataDir,
  removeTempDataDir,
} from '../__mocks__/config.fixtures';
import { compositePriceTable, flatPriceTable } from '../__mocks__/price-table.fixtures';

describe('PricePipelineService', () => {
  let service: PricePipelineService;
  let store: ArtifactStoreService;
  let dataDir: string;
  let priceProvider: { name: string; fetchDailyHistory: jest.Mock };

  beforeEach(async () => {
    dataDir = createTempDataDir();
    priceProvider = {
      name: 'Yahoo Finance',
      fetchDailyHistory: jest.fn().mockResolvedValue(flatPriceTable('2023-01-01', '2023-03-01')),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        PricePipelineService,
        PriceExtractorService,
        StarSchemaTransformerService,
        SchemaNormalizer,
        ArtifactStoreService,
        CacheResolverService,
        FundamentalsRepository,
        {
          provide: ConfigService,
          useValue: createMockConfigService({
            DATA_DIR: dataDir,
            STOCK_SYMBOLS: ' msft, aapl,,MSFT ,ko',
          }),
        },
        { provide: PRICE_PROVIDER, useValue: priceProvider },
      ],
    }).compile();

    service = module.get<PricePipelineService>(PricePipelineService);
    store = module.get<ArtifactStoreService>(ArtifactStoreService);
  });

  afterEach(() => {
    removeTempDataDir(dataDir);
  });

  describe('getTrackedTickers', () => {
    it('should normalise the configured list', () => {
      expect(service.getTrackedTickers()).toEqual(['AAPL', 'KO', 'MSFT']);
    });
  });

  describe('getPriceData', () => {
    it('should extract and transform on a cache miss', async () => {
      const result = await service.getPriceData('AAPL', '2023-01-15', '2023-02-01');

      expect(priceProvider.fetchDailyHistory).toHaveBeenCalledWith('AAPL', '2023-01-15', '2023-02-01');
      expect(result.cached).toBe(false);
      expect(result.table.rows).toHaveLength(13);
      expect(result.fact).toHaveLength(13);
      expect(result.summary).toEqual({
        firstClose: 110,
        lastClose: 122,
        change: 12,
        changePercent: expect.closeTo(10.909, 3),
        high: 123,
        low: 109,
      });
    });

    it('should serve a staged hit without calling the provider', async () => {
      await service.getPriceData('AAPL', '2023-01-15', '2023-02-01');
      priceProvider.fetchDailyHistory.mockClear();

      const result = await service.getPriceData('AAPL', '2023-01-15', '2023-02-01');

      expect(priceProvider.fetchDailyHistory).not.toHaveBeenCalled();
      expect(result.cached).toBe(true);
      expect(result.fact).toBeUndefined();
      expect(result.table.rows).toHaveLength(13);
      expect(result.summary?.lastClose).toBe(122);
    });

    it('should not reuse a wider staged window', async () => {
      await service.getPriceData('AAPL', '2023-01-01', '2023-03-01');
      priceProvider.fetchDailyHistory.mockClear();

      const result = await service.getPriceData('AAPL', '2023-01-15', '2023-02-01');

      expect(priceProvider.fetchDailyHistory).toHaveBeenCalledTimes(1);
      expect(result.cached).toBe(false);
    });

    it('should transform the existing raw artifact when the provider has no new rows', async () => {
      await store.writeTable(store.paths.raw('AAPL'), compositePriceTable('AAPL', '2023-01-01', '2023-03-01'));
      priceProvider.fetchDailyHistory.mockResolvedValue({ columns: [], rows: [] });

      const result = await service.getPriceData('AAPL', '2023-01-15', '2023-02-01');

      expect(result.cached).toBe(false);
      expect(result.fact?.[0].Close).toBe(110);
    });

    it('should propagate NoDataAvailableException when nothing was ever extracted', async () => {
      priceProvider.fetchDailyHistory.mockResolvedValue({ columns: [], rows: [] });

      await expect(service.getPriceData('NOPE', '2023-01-15', '2023-02-01')).rejects.toThrow(
        NoDataAvailableException,
      );
    });
  });

  describe('summarizeCloses', () => {
    it('should return null without closes', () => {
      expect(summarizeCloses([{ close: null, high: 5, low: 4 }])).toBeNull();
    });

    it('should fall back to closes for the range', () => {
      expect(
        summarizeCloses([
          { close: 10, high: null, low: null },
          { close: 8, high: null, low: null },
        ]),
      ).toEqual({ firstClose: 10, lastClose: 8, change: -2, changePercent: -20, high: 10, low: 8 });
    });
  });
});
