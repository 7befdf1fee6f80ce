/**
 * 플러그인 정의 헬퍼
 */

import type { ContentType, Deliverer, Loader, Renderer, RenderMeta, RenderResult, StageContext, Transform } from './types.js';

function assertName(name: string, what: string): void {
  if (name.trim() === '') {
    throw new TypeError(`${what} name must be a non-empty string`);
  }
}

export function defineLoader<T>(
  name: string,
  definition: {
    match(locator: string): boolean;
    load(locator: string, context: StageContext): T | Promise<T>;
  }
): Loader<T> {
  assertName(name, 'Loader');
  return {
    name,
    match: (locator) => definition.match(locator),
    load: (locator, context) => definition.load(locator, context),
  };
}

/**
 * Renderer 정의
 * match를 생략하면 모든 payload를 받는다.
 */
export function defineRenderer(
  name: string,
  contentType: ContentType,
  definition: {
    match?(payload: unknown): boolean;
    render(payload: unknown, meta: RenderMeta): RenderResult | Promise<RenderResult>;
  }
): Renderer {
  assertName(name, 'Renderer');
  return {
    name,
    contentType,
    match: (payload) => (definition.match ? definition.match(payload) : true),
    render: (payload, meta) => definition.render(payload, meta),
  };
}

export function defineTransform(
  name: string,
  apply: (payload: unknown, argument: string | null, context: StageContext) => unknown
): Transform {
  assertName(name, 'Transform');
  return { name, apply };
}

/**
 * Deliverer 정의
 * style 조회가 소문자로 이루어지므로 이름도 소문자로 정규화한다.
 */
export function defineDeliverer<T>(
  name: string,
  pack: (
    text: string | null,
    images: readonly string[] | null,
    audio: readonly string[] | null,
    prompt: string | null
  ) => T
): Deliverer<T> {
  assertName(name, 'Deliverer');
  return { name: name.toLowerCase(), package: pack };
}
