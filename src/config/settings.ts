import { ConfigService } from '@nestjs/config';

/**
 * Numeric setting from the environment; `fallback` when unset or not a
 * non-negative number
 */
export function readNumberSetting(configService: ConfigService, key: string, fallback: number): number {
  const raw = configService.get<string | number>(key);
  const value = typeof raw === 'number' ? raw : Number(raw);
  return raw !== undefined && raw !== '' && isFinite(value) && value >= 0 ? value : fallback;
}
