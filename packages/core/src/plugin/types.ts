/**
 * 플러그인 계약 타입 정의
 *
 * Loader → Transform* → Renderer(s) → Deliverer 순서로 파이프라인에 참여한다.
 */

import type { CommandToken } from '../dsl/splitter.js';

/**
 * Renderer가 생산하는 출력 종류
 */
export type ContentType = 'text' | 'image' | 'audio';

export const CONTENT_TYPES: readonly ContentType[] = ['text', 'image', 'audio'] as const;

/**
 * Renderer 결과: text는 문자열, image/audio는 문자열 배열 (data URL 등)
 */
export type RenderResult = string | string[];

/**
 * 단계 실행 시 플러그인에 전달되는 컨텍스트
 */
export interface StageContext {
  /** 원본 식별자 */
  identifier: string;
  /** 명령 블록이 제거된 locator */
  locator: string;
  tokens: readonly CommandToken[];
  commands: Readonly<Record<string, string>>;
  logger: Console;
}

/**
 * Renderer에 전달되는 메타데이터
 */
export interface RenderMeta extends StageContext {
  meta: Readonly<Record<string, unknown>>;
}

/**
 * locator → payload
 */
export interface Loader<T = unknown> {
  readonly name: string;
  match(locator: string): boolean;
  load(locator: string, context: StageContext): T | Promise<T>;
}

/**
 * payload → text / images / audio
 */
export interface Renderer {
  readonly name: string;
  readonly contentType: ContentType;
  match(payload: unknown): boolean;
  render(payload: unknown, meta: RenderMeta): RenderResult | Promise<RenderResult>;
}

/**
 * DSL 토큰 이름(`name`)으로 선택되어 payload를 교체한다.
 */
export interface Transform {
  readonly name: string;
  apply(payload: unknown, argument: string | null, context: StageContext): unknown;
}

/**
 * 렌더링 결과를 외부 API가 기대하는 구조로 포장한다.
 */
export interface Deliverer<T = unknown> {
  readonly name: string;
  package(
    text: string | null,
    images: readonly string[] | null,
    audio: readonly string[] | null,
    prompt: string | null
  ): T;
}

/**
 * `abc` kind에 등록되는 계약 설명 (introspection 전용)
 */
export interface ContractDescriptor {
  readonly name: 'Loader' | 'Renderer' | 'Transform' | 'Deliverer';
  readonly methods: readonly string[];
}

/**
 * Registry kind → 구현 타입 매핑
 *
 * 새로운 kind는 module augmentation으로 추가한다.
 *
 * @example
 * ```typescript
 * declare module '@attachkit/core' {
 *   interface PluginKindMap {
 *     summarizer: Summarizer;
 *   }
 * }
 * ```
 */
export interface PluginKindMap {
  loader: Loader;
  renderer_text: Renderer;
  renderer_image: Renderer;
  renderer_audio: Renderer;
  transform: Transform;
  deliverer: Deliverer;
  abc: ContractDescriptor;
}

export type PluginKind = keyof PluginKindMap;

export type RendererKind = `renderer_${ContentType}`;

export function rendererKind(contentType: ContentType): RendererKind {
  return `renderer_${contentType}`;
}

export const CONTRACTS: readonly ContractDescriptor[] = [
  { name: 'Loader', methods: ['match', 'load'] },
  { name: 'Renderer', methods: ['match', 'render'] },
  { name: 'Transform', methods: ['apply'] },
  { name: 'Deliverer', methods: ['package'] },
] as const;
