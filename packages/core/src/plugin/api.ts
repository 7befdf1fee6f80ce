/**
 * 플러그인 등록 API
 */

import type { AttachkitConfig } from '../config/types.js';
import { defaultConfig } from '../config/types.js';
import { isDisabledPlugin, requires, type DisabledPlugin, type RequiresOptions } from '../gate/requires.js';
import { DEFAULT_PRIORITY, type Registry } from '../registry/registry.js';
import type { PluginKind, PluginKindMap } from './types.js';

/**
 * 레지스트리 등록 진입점 (Dependency Gate 2단계)
 *
 * 비활성 stand-in은 등록하지 않고 사유를 진단용으로 기록한다.
 * 경고는 플러그인마다 한 번만 출력된다.
 *
 * @returns 실제로 등록되었으면 true
 */
export function registerPlugin<K extends PluginKind>(
  registry: Registry,
  kind: K,
  plugin: PluginKindMap[K] | DisabledPlugin,
  priority: number = DEFAULT_PRIORITY,
  logger: Console = console
): boolean {
  if (isDisabledPlugin(plugin)) {
    const firstTime = registry.recordDisabled(kind, plugin.disabled, priority);
    if (firstTime) {
      logger.warn(
        `Skipping plugin ${plugin.name} - missing: ${plugin.disabled.missing.join(', ')}`
      );
    }
    return false;
  }

  return registry.register(kind, plugin, priority);
}

/**
 * 플러그인 모듈의 register(api)에 전달되는 API
 */
export interface PluginApi {
  readonly registry: Registry;
  readonly logger: Console;
  readonly config: Readonly<AttachkitConfig>;
  /**
   * 플러그인 등록
   * 설정의 priorities에 이름이 있으면 그 값이 우선한다.
   */
  register<K extends PluginKind>(
    kind: K,
    plugin: PluginKindMap[K] | DisabledPlugin,
    priority?: number
  ): boolean;
  requires: typeof requires;
}

export interface CreatePluginApiOptions {
  registry: Registry;
  config?: AttachkitConfig;
  logger?: Console;
  /** requires()에 기본으로 적용할 옵션 (probe 주입 등) */
  requiresDefaults?: RequiresOptions;
}

export function createPluginApi(options: CreatePluginApiOptions): PluginApi {
  const registry = options.registry;
  const config = options.config ?? defaultConfig();
  const logger = options.logger ?? console;
  const defaults = options.requiresDefaults ?? {};

  return {
    registry,
    logger,
    config,
    register(kind, plugin, priority = DEFAULT_PRIORITY) {
      const override = config.priorities[plugin.name];
      return registerPlugin(registry, kind, plugin, override ?? priority, logger);
    },
    requires(capabilities, plugin, requireOptions = {}) {
      return requires(capabilities, plugin, { logger, ...defaults, ...requireOptions });
    },
  };
}
