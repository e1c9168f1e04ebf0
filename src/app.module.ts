import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { PricesModule } from './modules/prices.module';
import { FundamentalsModule } from './modules/fundamentals.module';
import { StorageModule } from './modules/storage.module';
import { HealthModule } from './health/health.module';
import { MetricsModule } from './metrics/metrics.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, envFilePath: '.env' }),
    MetricsModule,
    StorageModule,
    PricesModule,
    FundamentalsModule,
    HealthModule,
  ],
})
export class AppModule {}
