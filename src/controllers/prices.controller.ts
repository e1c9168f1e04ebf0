import { BadRequestException, Controller, Get, Param, Query } from '@nestjs/common';
import { PricePipelineService } from '../services/price-pipeline.service';
import { PriceWindowQueryDto, TickerParamDto } from '../dto/price-window.dto';
import { PriceDataResult } from '../interfaces/pipeline-result.interface';
import { isIsoDay } from '../utils/trading-day';

/**
 * - GET /tickers         - Tracked ticker symbols.
 * - GET /prices/:ticker  - Daily prices for `?start=YYYY-MM-DD&end=YYYY-MM-DD`, inclusive.
 */
@Controller()
export class PricesController {
  constructor(private readonly pricePipeline: PricePipelineService) {}

  @Get('tickers')
  getTickers(): { tickers: string[] } {
    return { tickers: this.pricePipeline.getTrackedTickers() };
  }

  @Get('prices/:ticker')
  async getPrices(
    @Param() { ticker }: TickerParamDto,
    @Query() { start, end }: PriceWindowQueryDto,
  ): Promise<PriceDataResult> {
    if (!isIsoDay(start) || !isIsoDay(end)) {
      throw new BadRequestException('start and end must be calendar dates');
    }
    if (start > end) {
      throw new BadRequestException('start must not be after end');
    }
    return this.pricePipeline.getPriceData(ticker, start, end);
  }
}
