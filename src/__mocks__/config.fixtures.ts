import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

/**
 * ConfigService stand-in backed by a plain object
 */
export function createMockConfigService(values: Record<string, unknown> = {}) {
  return {
    get: jest.fn((key: string, defaultValue?: unknown) => values[key] ?? defaultValue),
  };
}

export function createTempDataDir(): string {
  return mkdtempSync(join(tmpdir(), 'market-lake-'));
}

export function removeTempDataDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}
