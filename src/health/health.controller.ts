import {
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  ServiceUnavailableException,
} from '@nestjs/common';
import { HealthCheck, HealthCheckResult, HealthCheckService } from '@nestjs/terminus';
import { StorageHealthIndicator } from './indicators/storage.health';

/**
 * - GET /health  - Data directory check. 200 if OK, 503 otherwise.
 * - GET /live    - Liveness probe, no dependency checks.
 */
@Controller()
export class HealthController {
  constructor(
    private readonly health: HealthCheckService,
    private readonly storage: StorageHealthIndicator,
  ) {}

  @Get('health')
  @HealthCheck()
  @HttpCode(HttpStatus.OK)
  async check(): Promise<HealthCheckResult> {
    const result = await this.health.check([() => this.storage.isHealthy('storage')]);
    if (result.status === 'ok') {
      return result;
    }
    throw new ServiceUnavailableException(result);
  }

  @Get('live')
  @HttpCode(HttpStatus.OK)
  live(): { status: string } {
    return { status: 'ok' };
  }
}
