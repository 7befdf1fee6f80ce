import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { vi, type Mock } from 'vitest';
import type { StageContext } from '@attachkit/core';

export interface TempWorkspace {
  path: string;
  /** 파일을 쓰고 절대 경로를 반환 */
  file(name: string, content: string | Uint8Array): Promise<string>;
  cleanup(): Promise<void>;
}

export async function createTempWorkspace(prefix = 'attachkit-base-'): Promise<TempWorkspace> {
  const path = await mkdtemp(join(tmpdir(), prefix));
  return {
    path,
    async file(name, content) {
      const target = join(path, name);
      await writeFile(target, content);
      return target;
    },
    async cleanup() {
      await rm(path, { recursive: true, force: true });
    },
  };
}

export interface TestLogger {
  logger: Console;
  warn: Mock;
  debug: Mock;
}

export function createTestLogger(): TestLogger {
  const warn = vi.fn();
  const debug = vi.fn();
  const logger: Console = { ...console, warn, debug };
  return { logger, warn, debug };
}

export function createContext(locator: string, logger: Console = createTestLogger().logger): StageContext {
  return { identifier: locator, locator, tokens: [], commands: {}, logger };
}
