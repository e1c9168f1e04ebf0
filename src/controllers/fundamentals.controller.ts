import { Controller, Get, NotFoundException, Param, Query } from '@nestjs/common';
import { FundamentalsAggregatorService } from '../services/fundamentals-aggregator.service';
import { FundamentalsQueryDto, TickerParamDto } from '../dto/price-window.dto';
import { FundamentalsRecord } from '../interfaces/fundamentals.interface';

@Controller('fundamentals')
export class FundamentalsController {
  constructor(private readonly aggregator: FundamentalsAggregatorService) {}

  /**
   * Cached fundamentals while fresh; `?force=true` re-aggregates
   */
  @Get(':ticker')
  async getFundamentals(
    @Param() { ticker }: TickerParamDto,
    @Query() { force }: FundamentalsQueryDto,
  ): Promise<FundamentalsRecord> {
    const record = await this.aggregator.getOrUpdate(ticker, force ?? false);
    if (!record) {
      throw new NotFoundException(`No fundamental data available for ${ticker}`);
    }
    return record;
  }
}
