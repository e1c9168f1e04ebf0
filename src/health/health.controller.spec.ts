import { Test, TestingModule } from '@nestjs/testing';
import { ServiceUnavailableException } from '@nestjs/common';
import { HealthCheckResult, HealthCheckService } from '@nestjs/terminus';
import { HealthController } from './health.controller';
import { StorageHealthIndicator } from './indicators/storage.health';

describe('HealthController', () => {
  let controller: HealthController;
  let healthCheckService: HealthCheckService;

  const storageUp = { storage: { status: 'up' as const, message: 'Data directory data is writable' } };
  const healthyResult: HealthCheckResult = {
    status: 'ok',
    info: storageUp,
    error: {},
    details: storageUp,
  };
  const unhealthyResult: HealthCheckResult = {
    status: 'error',
    info: {},
    error: { storage: { status: 'down', message: 'EACCES' } },
    details: { storage: { status: 'down', message: 'EACCES' } },
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [HealthController],
      providers: [
        { provide: HealthCheckService, useValue: { check: jest.fn() } },
        {
          provide: StorageHealthIndicator,
          useValue: { isHealthy: jest.fn().mockResolvedValue(storageUp) },
        },
      ],
    }).compile();

    controller = module.get<HealthController>(HealthController);
    healthCheckService = module.get<HealthCheckService>(HealthCheckService);
    jest.mocked(healthCheckService.check).mockResolvedValue(healthyResult);
  });

  describe('GET /health', () => {
    it('should return the result when storage is healthy', async () => {
      await expect(controller.check()).resolves.toEqual(healthyResult);
      expect(healthCheckService.check).toHaveBeenCalledWith([expect.any(Function)]);
    });

    it('should throw ServiceUnavailableException when storage is down', async () => {
      jest.mocked(healthCheckService.check).mockResolvedValue(unhealthyResult);
      await expect(controller.check()).rejects.toThrow(ServiceUnavailableException);
    });
  });

  describe('GET /live', () => {
    it('should return ok without running checks', () => {
      expect(controller.live()).toEqual({ status: 'ok' });
      expect(healthCheckService.check).not.toHaveBeenCalled();
    });
  });
});
