import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { vi, type Mock } from 'vitest';

export interface TempWorkspace {
  path: string;
  cleanup(): Promise<void>;
}

export async function createTempWorkspace(prefix = 'attachkit-core-'): Promise<TempWorkspace> {
  const path = await mkdtemp(join(tmpdir(), prefix));
  return {
    path,
    async cleanup(): Promise<void> {
      await rm(path, { recursive: true, force: true });
    },
  };
}

export interface TestLogger {
  logger: Console;
  warn: Mock;
  debug: Mock;
}

/**
 * warn / debug 호출을 기록하는 Console
 */
export function createTestLogger(): TestLogger {
  const warn = vi.fn();
  const debug = vi.fn();
  const logger: Console = { ...console, warn, debug };
  return { logger, warn, debug };
}
