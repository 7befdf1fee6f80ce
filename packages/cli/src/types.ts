import type { ModuleImporter, PluginApi } from '@attachkit/core';

export type ExitCode = 0 | 1 | 2 | 3 | 4;

export interface CliIO {
  out(message: string): void;
  err(message: string): void;
}

export interface CliDependencies {
  io: CliIO;
  env: NodeJS.ProcessEnv;
  cwd: string;
  version: string;
  /** 파이프라인과 플러그인 경고 출력용 */
  logger: Console;
  /** 기본 플러그인 등록 */
  registerPlugins(api: PluginApi): void;
  /** 설정의 plugins 모듈 import (생략 시 동적 import) */
  importModule?: ModuleImporter;
}
