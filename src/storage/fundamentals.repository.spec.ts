import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { mkdirSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { ArtifactStoreService } from './artifact-store.service';
import { FundamentalsRepository, flattenRecord } from './fundamentals.repository';
import { FundamentalsRecord } from '../interfaces/fundamentals.interface';
import {
  createMockConfigService,
  createTempDataDir,
  removeTempDataDir,
} from '../__mocks__/config.fixtures';

describe('FundamentalsRepository', () => {
  let repository: FundamentalsRepository;
  let store: ArtifactStoreService;
  let dataDir: string;

  const record: FundamentalsRecord = {
    ticker: 'AAPL',
    timestamp: '2024-01-15T14:30:00.000Z',
    metrics: {
      EPS: { value: 6.13, source: 'Yahoo Finance' },
      Revenue: {
        value: 383285000000,
        source: 'SEC EDGAR',
        filed_date: '2023-11-03',
        end_date: '2023-09-30',
      },
    },
  };

  beforeEach(async () => {
    dataDir = createTempDataDir();
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ArtifactStoreService,
        FundamentalsRepository,
        { provide: ConfigService, useValue: createMockConfigService({ DATA_DIR: dataDir }) },
      ],
    }).compile();

    repository = module.get<FundamentalsRepository>(FundamentalsRepository);
    store = module.get<ArtifactStoreService>(ArtifactStoreService);
  });

  afterEach(() => {
    removeTempDataDir(dataDir);
  });

  describe('flattenRecord', () => {
    it('should flatten metrics into dotted columns followed by ticker and timestamp', () => {
      const { columns, row } = flattenRecord(record);

      expect(columns).toEqual([
        'EPS.value',
        'EPS.source',
        'Revenue.value',
        'Revenue.source',
        'Revenue.filed_date',
        'Revenue.end_date',
        'ticker',
        'timestamp',
      ]);
      expect(row['Revenue.filed_date']).toBe('2023-11-03');
      expect(row['ticker']).toBe('AAPL');
    });
  });

  it('should write a one-row artifact at the canonical path', async () => {
    const path = await repository.save(record);

    expect(path).toBe(store.paths.fundamentals('AAPL'));
    const table = await store.readTable(path);
    expect(table.rows).toHaveLength(1);
    expect(table.rows[0]['timestamp']).toBe('2024-01-15T14:30:00.000Z');
  });

  it('should load what it saved', async () => {
    await repository.save(record);
    expect(await repository.load('AAPL')).toEqual(record);
  });

  it('should return null when nothing is persisted', async () => {
    expect(await repository.load('MSFT')).toBeNull();
  });

  it('should return null for an unreadable artifact', async () => {
    const path = store.paths.fundamentals('MSFT');
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, 'not parquet');

    expect(await repository.load('MSFT')).toBeNull();
  });
});
