import { Module } from '@nestjs/common';
import { NormalizationModule } from './normalization.module';
import { StorageModule } from './storage.module';
import { ProvidersModule } from './providers.module';
import { PricesController } from '../controllers/prices.controller';
import { PriceExtractorService } from '../services/price-extractor.service';
import { StarSchemaTransformerService } from '../services/star-schema-transformer.service';
import { PricePipelineService } from '../services/price-pipeline.service';

@Module({
  imports: [NormalizationModule, StorageModule, ProvidersModule],
  controllers: [PricesController],
  providers: [PriceExtractorService, StarSchemaTransformerService, PricePipelineService],
  exports: [PriceExtractorService, StarSchemaTransformerService, PricePipelineService],
})
export class PricesModule {}
