import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { vi, type Mock } from 'vitest';
import type { ModuleImporter, PluginApi } from '@attachkit/core';
import { registerBasePlugins } from '@attachkit/base';
import type { CliDependencies } from '../src/types.js';

export interface MockState {
  outs: string[];
  errs: string[];
  warn: Mock;
}

export interface MockDepsOptions {
  cwd: string;
  env?: NodeJS.ProcessEnv;
  registerPlugins?: (api: PluginApi) => void;
  importModule?: ModuleImporter;
}

/**
 * 기본 플러그인 (pdf는 unpdf 없이 비활성)
 */
export function registerTestPlugins(api: PluginApi): void {
  registerBasePlugins(api, { pdf: { gate: { probe: () => false } } });
}

export function createMockDeps(options: MockDepsOptions): { deps: CliDependencies; state: MockState } {
  const state: MockState = { outs: [], errs: [], warn: vi.fn() };

  const deps: CliDependencies = {
    io: {
      out(message) {
        state.outs.push(message);
      },
      err(message) {
        state.errs.push(message);
      },
    },
    env: options.env ?? {},
    cwd: options.cwd,
    version: '0.0.0-test',
    logger: { ...console, warn: state.warn, debug: vi.fn() },
    registerPlugins: options.registerPlugins ?? registerTestPlugins,
    importModule: options.importModule,
  };

  return { deps, state };
}

export interface TempWorkspace {
  path: string;
  file(name: string, content: string | Uint8Array): Promise<string>;
  cleanup(): Promise<void>;
}

export async function createTempWorkspace(prefix = 'attachkit-cli-'): Promise<TempWorkspace> {
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
