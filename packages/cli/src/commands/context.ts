/**
 * 명령 실행 컨텍스트: 설정 로드 → 레지스트리 구성 → 플러그인 모듈 로드
 */

import {
  Pipeline,
  PluginLoader,
  Registry,
  createPluginApi,
  loadConfig,
  registerContracts,
  type AttachkitConfig,
  type PluginLoadResult,
} from '@attachkit/core';
import type { CliDependencies } from '../types.js';

export interface CommandContext {
  config: AttachkitConfig;
  configSource?: string;
  registry: Registry;
  pipeline: Pipeline;
  plugins: PluginLoadResult[];
}

export interface CreateContextOptions {
  configPath?: string;
  strict?: boolean;
}

export async function createCommandContext(
  deps: CliDependencies,
  options: CreateContextOptions = {},
): Promise<CommandContext> {
  const { config, source } = await loadConfig({ path: options.configPath, cwd: deps.cwd, env: deps.env });

  const registry = new Registry({ logger: deps.logger });
  registerContracts(registry);

  const api = createPluginApi({ registry, config, logger: deps.logger });
  deps.registerPlugins(api);

  const loader = new PluginLoader({ api, importer: deps.importModule, logger: deps.logger });
  const plugins = await loader.loadModules(config.plugins, deps.cwd);

  const pipeline = new Pipeline({
    registry,
    logger: deps.logger,
    strict: options.strict ?? config.strict,
  });

  return { config, configSource: source, registry, pipeline, plugins };
}
