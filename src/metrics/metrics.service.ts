import { Injectable } from '@nestjs/common';
import {
  Registry,
  Counter,
  Histogram,
  collectDefaultMetrics,
} from 'prom-client';

/**
 * Service that registers and updates Prometheus metrics for the pipeline.
 * Exposes cache lookups, extraction outcomes, transform latency and
 * provider failures.
 */
@Injectable()
export class MetricsService {
  private readonly register: Registry;

  /** Cache lookups by artifact kind and outcome (hit/miss) */
  readonly cacheLookups: Counter<string>;

  /** Price extractions by outcome (written/no_data/failed) */
  readonly extractions: Counter<string>;

  /** Duration of star-schema transforms in seconds */
  readonly transformLatency: Histogram<string>;

  /** Failed upstream provider calls */
  readonly providerFailures: Counter<string>;

  constructor() {
    this.register = new Registry();
    this.cacheLookups = new Counter({
      name: 'market_lake_cache_lookups_total',
      help: 'Total number of cache lookups',
      labelNames: ['artifact', 'outcome'],
      registers: [this.register],
    });
    this.extractions = new Counter({
      name: 'market_lake_extractions_total',
      help: 'Total number of raw price extractions',
      labelNames: ['outcome'],
      registers: [this.register],
    });
    this.transformLatency = new Histogram({
      name: 'market_lake_transform_duration_seconds',
      help: 'Star-schema transform duration in seconds',
      buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5],
      registers: [this.register],
    });
    this.providerFailures = new Counter({
      name: 'market_lake_provider_failures_total',
      help: 'Total number of failed upstream provider calls',
      labelNames: ['provider'],
      registers: [this.register],
    });
    collectDefaultMetrics({ register: this.register, prefix: 'market_lake_' });
  }

  recordCacheLookup(artifact: string, hit: boolean): void {
    this.cacheLookups.inc({ artifact, outcome: hit ? 'hit' : 'miss' }, 1);
  }

  recordExtraction(outcome: 'written' | 'no_data' | 'failed'): void {
    this.extractions.inc({ outcome }, 1);
  }

  recordTransform(durationSeconds: number): void {
    this.transformLatency.observe(durationSeconds);
  }

  recordProviderFailure(provider: string): void {
    this.providerFailures.inc({ provider }, 1);
  }

  /**
   * Get metrics in Prometheus text format.
   */
  async getMetrics(): Promise<string> {
    return this.register.metrics();
  }
}
