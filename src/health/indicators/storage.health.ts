import { Injectable } from '@nestjs/common';
import { HealthCheckError, HealthIndicator, HealthIndicatorResult } from '@nestjs/terminus';
import { constants, promises as fs } from 'fs';
import { ArtifactStoreService } from '../../storage/artifact-store.service';
import { errorMessage } from '../../utils/guards';

/**
 * Up when the artifact data directory exists (or can be created) and is writable
 */
@Injectable()
export class StorageHealthIndicator extends HealthIndicator {
  constructor(private readonly store: ArtifactStoreService) {
    super();
  }

  async isHealthy(key: string): Promise<HealthIndicatorResult> {
    const dataDir = this.store.paths.rootDir;
    try {
      await fs.mkdir(dataDir, { recursive: true });
      await fs.access(dataDir, constants.W_OK);
      return this.getStatus(key, true, { message: `Data directory ${dataDir} is writable` });
    } catch (err) {
      throw new HealthCheckError(
        'Storage check failed',
        this.getStatus(key, false, { message: errorMessage(err) }),
      );
    }
  }
}
