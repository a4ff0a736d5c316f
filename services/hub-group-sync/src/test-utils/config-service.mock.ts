import type { ConfigService } from '@nestjs/config';
import { vi } from 'vitest';
import type { Config } from '../config';

export function createConfigServiceMock(
  values: Record<string, unknown>,
): ConfigService<Config, true> {
  return {
    get: vi.fn((key: string) => values[key]),
  } as unknown as ConfigService<Config, true>;
}
