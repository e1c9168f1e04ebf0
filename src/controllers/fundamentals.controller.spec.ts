import { Test, TestingModule } from '@nestjs/testing';
import { NotFoundException } from '@nestjs/common';
import { FundamentalsController } from './fundamentals.controller';
import { FundamentalsAggregatorService } from '../services/fundamentals-aggregator.service';

describe('FundamentalsController', () => {
  let controller: FundamentalsController;
  let aggregator: FundamentalsAggregatorService;

  const record = {
    ticker: 'AAPL',
    timestamp: '2024-01-15T12:00:00.000Z',
    metrics: { EPS: { value: 6.13, source: 'Yahoo Finance' } },
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [FundamentalsController],
      providers: [
        {
          provide: FundamentalsAggregatorService,
          useValue: { getOrUpdate: jest.fn().mockResolvedValue(record) },
        },
      ],
    }).compile();

    controller = module.get<FundamentalsController>(FundamentalsController);
    aggregator = module.get<FundamentalsAggregatorService>(FundamentalsAggregatorService);
  });

  it('should return the record without forcing by default', async () => {
    await expect(controller.getFundamentals({ ticker: 'AAPL' }, {})).resolves.toEqual(record);
    expect(aggregator.getOrUpdate).toHaveBeenCalledWith('AAPL', false);
  });

  it('should pass the force flag through', async () => {
    await controller.getFundamentals({ ticker: 'AAPL' }, { force: true });
    expect(aggregator.getOrUpdate).toHaveBeenCalledWith('AAPL', true);
  });

  it('should respond 404 when no source produced metrics', async () => {
    jest.mocked(aggregator.getOrUpdate).mockResolvedValue(null);

    await expect(controller.getFundamentals({ ticker: 'ZZZZ' }, {})).rejects.toThrow(
      NotFoundException,
    );
  });
});
