import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpModule } from '@nestjs/axios';
import { StorageModule } from './storage.module';
import { YahooPriceProvider } from '../providers/yahoo-price.provider';
import { YahooMarketDataProvider } from '../providers/yahoo-market-data.provider';
import { SecEdgarProvider } from '../providers/sec-edgar.provider';
import { PRICE_PROVIDER } from '../interfaces/price-provider.interface';
import { MARKET_DATA_PROVIDER } from '../interfaces/market-data-provider.interface';
import { REGULATORY_FILINGS_PROVIDER } from '../interfaces/regulatory-filings-provider.interface';
import { FixedDelayPacer, SEC_REQUEST_PACER } from '../interfaces/request-pacer.interface';
import { readNumberSetting } from '../config/settings';

/**
 * Upstream data providers, bound to the tokens the pipeline injects
 */
@Module({
  imports: [
    StorageModule,
    HttpModule.registerAsync({
      useFactory: (configService: ConfigService) => ({
        timeout: readNumberSetting(configService, 'HTTP_TIMEOUT_MS', 10000),
        maxRedirects: 5,
      }),
      inject: [ConfigService],
    }),
  ],
  providers: [
    YahooPriceProvider,
    YahooMarketDataProvider,
    SecEdgarProvider,
    { provide: PRICE_PROVIDER, useExisting: YahooPriceProvider },
    { provide: MARKET_DATA_PROVIDER, useExisting: YahooMarketDataProvider },
    { provide: REGULATORY_FILINGS_PROVIDER, useExisting: SecEdgarProvider },
    {
      provide: SEC_REQUEST_PACER,
      useFactory: (configService: ConfigService) =>
        new FixedDelayPacer(readNumberSetting(configService, 'SEC_REQUEST_DELAY_MS', 100)),
      inject: [ConfigService],
    },
  ],
  exports: [PRICE_PROVIDER, MARKET_DATA_PROVIDER, REGULATORY_FILINGS_PROVIDER],
})
export class ProvidersModule {}
