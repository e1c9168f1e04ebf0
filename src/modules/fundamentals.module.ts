import { Module } from '@nestjs/common';
import { StorageModule } from './storage.module';
import { ProvidersModule } from './providers.module';
import { FundamentalsController } from '../controllers/fundamentals.controller';
import { FundamentalsAggregatorService } from '../services/fundamentals-aggregator.service';

@Module({
  imports: [StorageModule, ProvidersModule],
  controllers: [FundamentalsController],
  providers: [FundamentalsAggregatorService],
  exports: [FundamentalsAggregatorService],
})
export class FundamentalsModule {}
