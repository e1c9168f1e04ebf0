import { Module } from '@nestjs/common';
import { ArtifactStoreService } from '../storage/artifact-store.service';
import { FundamentalsRepository } from '../storage/fundamentals.repository';
import { CacheResolverService } from '../storage/cache-resolver.service';

@Module({
  providers: [ArtifactStoreService, FundamentalsRepository, CacheResolverService],
  exports: [ArtifactStoreService, FundamentalsRepository, CacheResolverService],
})
export class StorageModule {}
