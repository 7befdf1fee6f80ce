/**
 * Dependency Gate - requires()
 *
 * capability가 없으면 플러그인 대신 비활성 stand-in을 돌려준다.
 * stand-in의 match()는 false를 반환해 다음 후보로 넘어가게 하고,
 * 그 외 메서드는 누락된 capability와 해결 방법을 담은 MissingCapabilityError를 던진다.
 */

import { MissingCapabilityError } from '../errors.js';
import type { ContentType } from '../plugin/types.js';
import { probeCapabilities, type DisabledPluginMarker, type ProbeOptions } from './probe.js';

/**
 * 비활성화된 플러그인 stand-in
 *
 * 모든 플러그인 계약(Loader, Renderer, Transform, Deliverer)을 구조적으로 만족한다.
 */
export interface DisabledPlugin {
  readonly name: string;
  readonly contentType: ContentType;
  readonly disabled: DisabledPluginMarker;
  match(value?: unknown): false;
  load(): never;
  apply(): never;
  render(): never;
  package(): never;
}

export interface RequiresOptions extends ProbeOptions {
  logger?: Console;
}

export interface NamedPlugin {
  readonly name: string;
  readonly contentType?: ContentType;
}

export function isDisabledPlugin(value: unknown): value is DisabledPlugin {
  if (typeof value !== 'object' || value === null || !('disabled' in value)) {
    return false;
  }
  const marker = value.disabled;
  return typeof marker === 'object' && marker !== null && 'missing' in marker && Array.isArray(marker.missing);
}

/**
 * marker를 가진 stand-in 생성
 */
export function createDisabledPlugin(
  marker: DisabledPluginMarker,
  contentType: ContentType = 'text'
): DisabledPlugin {
  const fail = (): never => {
    throw new MissingCapabilityError(marker.pluginName, marker.missing, marker.hints);
  };

  return {
    name: marker.pluginName,
    contentType,
    disabled: marker,
    match: () => false,
    load: fail,
    apply: fail,
    render: fail,
    package: fail,
  };
}

/**
 * 필요한 capability가 모두 있으면 플러그인을, 아니면 비활성 stand-in을 반환
 *
 * @example
 * ```typescript
 * export const pdfLoader = requires(['unpdf'], {
 *   name: 'pdf',
 *   match: (locator) => locator.toLowerCase().endsWith('.pdf'),
 *   load: async (locator) => readPdf(locator),
 * });
 * ```
 */
export function requires<P extends NamedPlugin>(
  capabilities: readonly string[],
  plugin: P,
  options: RequiresOptions = {}
): P | DisabledPlugin {
  const status = probeCapabilities(capabilities, options);
  if (status.available) {
    return plugin;
  }

  options.logger?.debug?.(
    `Plugin ${plugin.name} disabled - missing: ${status.missing.join(', ')}`
  );

  return createDisabledPlugin(
    {
      pluginName: plugin.name,
      missing: status.missing,
      hints: status.hints,
    },
    plugin.contentType ?? 'text'
  );
}
