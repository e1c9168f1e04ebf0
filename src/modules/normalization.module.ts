import { Module } from '@nestjs/common';
import { SchemaNormalizer } from '../normalizers/schema.normalizer';

@Module({
  providers: [SchemaNormalizer],
  exports: [SchemaNormalizer],
})
export class NormalizationModule {}
