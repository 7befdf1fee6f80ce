/**
 * 플러그인 모듈 로더
 *
 * register(api) 함수를 export하는 ES 모듈을 순서대로 import하고 초기화한다.
 * 하나의 모듈이 실패해도 전체 로딩은 중단되지 않으며, 실패 결과를 반환하고 로그를 남긴다.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import type { PluginApi } from './api.js';

/**
 * 플러그인 모듈의 register 함수
 */
export type PluginRegisterFunction = (api: PluginApi) => void | Promise<void>;

export interface PluginModule {
  register: PluginRegisterFunction;
}

export interface PluginLoadResult {
  specifier: string;
  status: 'loaded' | 'failed';
  error?: Error;
}

/**
 * specifier → 모듈 namespace
 */
export type ModuleImporter = (specifier: string) => Promise<unknown>;

export interface PluginLoaderOptions {
  api: PluginApi;
  importer?: ModuleImporter;
  logger?: Console;
}

const PLUGIN_EXTENSIONS = new Set(['.js', '.mjs']);

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

async function pathExists(target: string): Promise<boolean> {
  return fs.access(target).then(
    () => true,
    () => false
  );
}

/**
 * 모듈 namespace에서 register 함수 추출 (named export 또는 default export)
 */
export function extractRegisterFunction(namespace: unknown): PluginRegisterFunction | null {
  if (typeof namespace !== 'object' || namespace === null) {
    return null;
  }

  if ('register' in namespace && typeof namespace.register === 'function') {
    const register = namespace.register;
    return (api) => register(api);
  }

  if ('default' in namespace) {
    const fallback = namespace.default;
    if (typeof fallback === 'function') {
      return (api) => fallback(api);
    }
    return extractRegisterFunction(fallback);
  }

  return null;
}

/**
 * 파일 경로는 file URL로, 패키지 이름은 그대로 import specifier로 변환
 */
export function toImportSpecifier(entry: string, baseDir: string = process.cwd()): string {
  if (entry.startsWith('.') || path.isAbsolute(entry)) {
    return pathToFileURL(path.resolve(baseDir, entry)).href;
  }
  return entry;
}

/**
 * 디렉토리 항목을 그 안의 *.js / *.mjs 파일 목록으로 펼침 (하위 디렉토리 포함, 정렬)
 * 존재하지 않는 경로는 절대 경로로 남겨 로드 단계에서 실패로 기록되게 한다.
 */
export async function expandPluginEntries(entries: readonly string[], baseDir: string = process.cwd()): Promise<string[]> {
  const output: string[] = [];

  for (const entry of entries) {
    if (!entry.startsWith('.') && !path.isAbsolute(entry)) {
      output.push(entry);
      continue;
    }

    const absolute = path.resolve(baseDir, entry);
    const stat = await fs.stat(absolute).catch(() => null);
    if (!stat) {
      output.push(absolute);
      continue;
    }

    if (stat.isFile()) {
      output.push(absolute);
      continue;
    }

    if (stat.isDirectory()) {
      const files = await fs.readdir(absolute, { recursive: true });
      const modules = files
        .filter((file) => PLUGIN_EXTENSIONS.has(path.extname(file)))
        .filter((file) => !path.basename(file).startsWith('_'))
        .sort()
        .map((file) => path.join(absolute, file));
      output.push(...modules);
    }
  }

  return output;
}

/**
 * PluginLoader 클래스
 */
export class PluginLoader {
  private readonly api: PluginApi;
  private readonly importer: ModuleImporter;
  private readonly logger?: Console;
  private readonly loaded: string[] = [];

  constructor(options: PluginLoaderOptions) {
    this.api = options.api;
    this.importer = options.importer ?? ((specifier) => import(specifier));
    this.logger = options.logger;
  }

  /**
   * 단일 플러그인 모듈 로드
   */
  async loadModule(entry: string): Promise<PluginLoadResult> {
    const specifier = toImportSpecifier(entry);

    try {
      if (path.isAbsolute(entry) && !(await pathExists(entry))) {
        throw new Error(`Plugin module not found: ${entry}`);
      }
      const namespace = await this.importer(specifier);
      const register = extractRegisterFunction(namespace);
      if (!register) {
        throw new Error(`Plugin module ${entry} must export a register(api) function`);
      }

      await Promise.resolve(register(this.api));
      this.loaded.push(entry);
      this.logger?.debug?.(`Plugin module loaded: ${entry}`);

      return { specifier: entry, status: 'loaded' };
    } catch (error) {
      const err = toError(error);
      this.logger?.warn?.(`Failed to load plugin module '${entry}': ${err.message}`);
      return { specifier: entry, status: 'failed', error: err };
    }
  }

  /**
   * 여러 모듈을 순서대로 로드
   * 디렉토리 항목은 안의 모듈 파일로 펼쳐진다.
   */
  async loadModules(entries: readonly string[], baseDir?: string): Promise<PluginLoadResult[]> {
    const expanded = await expandPluginEntries(entries, baseDir);
    const results: PluginLoadResult[] = [];

    for (const entry of expanded) {
      results.push(await this.loadModule(entry));
    }

    return results;
  }

  getLoadedModules(): string[] {
    return [...this.loaded];
  }
}
