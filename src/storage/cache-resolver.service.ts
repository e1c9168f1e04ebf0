import { Injectable, Logger, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ArtifactStoreService } from './artifact-store.service';
import { FundamentalsRepository } from './fundamentals.repository';
import { CacheKey, CachePolicy } from '../interfaces/cache-key.interface';
import { FundamentalsRecord } from '../interfaces/fundamentals.interface';
import { MetricsService } from '../metrics/metrics.service';

const HOUR_MS = 60 * 60 * 1000;

/**
 * Decides whether a cached artifact can be reused.
 *
 * Staged price windows never expire: a closed historical window does not
 * change, so existence at the exact key is enough. Fundamentals are
 * restated periodically and expire after the configured TTL.
 */
@Injectable()
export class CacheResolverService {
  private readonly logger = new Logger(CacheResolverService.name);
  private readonly fundamentalsTtlMs: number;

  constructor(
    private readonly configService: ConfigService,
    private readonly store: ArtifactStoreService,
    private readonly fundamentalsRepository: FundamentalsRepository,
    @Optional() private readonly metricsService?: MetricsService,
  ) {
    const hours = Number(this.configService.get<string>('FUNDAMENTALS_TTL_HOURS', '24'));
    this.fundamentalsTtlMs = (isFinite(hours) && hours > 0 ? hours : 24) * HOUR_MS;
  }

  async isFresh(key: CacheKey, policy: CachePolicy = {}): Promise<boolean> {
    switch (key.kind) {
      case 'staged': {
        const hit =
          !policy.forceRefresh &&
          (await this.store.exists(this.store.paths.staged(key.ticker, key.start, key.end)));
        this.record('staged', hit);
        return hit;
      }
      case 'fundamentals':
        return (await this.resolveFundamentals(key.ticker, policy)) !== null;
    }
  }

  /**
   * The persisted fundamentals record if it is still fresh, otherwise null
   */
  async resolveFundamentals(
    ticker: string,
    policy: CachePolicy = {},
  ): Promise<FundamentalsRecord | null> {
    if (policy.forceRefresh) {
      this.record('fundamentals', false);
      return null;
    }

    const record = await this.fundamentalsRepository.load(ticker);
    const fresh = record !== null && this.isWithinTtl(record.timestamp, policy);
    this.record('fundamentals', fresh);
    return fresh ? record : null;
  }

  /**
   * True when `timestamp` is younger than the TTL. Unparsable timestamps are stale.
   */
  isWithinTtl(timestamp: string, policy: CachePolicy = {}): boolean {
    const assembledAt = Date.parse(timestamp);
    if (isNaN(assembledAt)) {
      this.logger.warn(`Unparsable cache timestamp '${timestamp}', treating as stale`);
      return false;
    }
    const now = (policy.now ?? new Date()).getTime();
    return now - assembledAt < (policy.ttlMs ?? this.fundamentalsTtlMs);
  }

  private record(artifact: CacheKey['kind'], hit: boolean): void {
    this.logger.debug(`Cache ${hit ? 'hit' : 'miss'} for ${artifact} artifact`);
    this.metricsService?.recordCacheLookup(artifact, hit);
  }
}
