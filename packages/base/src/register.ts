/**
 * 기본 플러그인 등록
 *
 * 플러그인 모듈 규약(register(api))을 그대로 따르므로
 * 설정 파일의 plugins 목록에 '@attachkit/base'를 넣어도 동작한다.
 */

import { rendererKind, type PluginApi, type Renderer } from '@attachkit/core';
import { claudeDeliverer, openaiDeliverer } from './deliverers/index.js';
import {
  audioLoader,
  createPdfLoader,
  csvLoader,
  createUrlLoader,
  imageLoader,
  pagedTextLoader,
  plainTextLoader,
  structuredLoader,
  type PdfLoaderOptions,
  type UrlLoaderOptions,
} from './loaders/index.js';
import {
  audioRenderer,
  imageRenderer,
  pagedTextRenderer,
  plainTextRenderer,
  structuredTextRenderer,
  tableBriefRenderer,
  tableFullRenderer,
} from './renderers/index.js';
import {
  formatTransform,
  headTransform,
  linesTransform,
  pagesTransform,
  selectTransform,
  summaryTransform,
} from './transforms/index.js';

/** 기본 loader priority (설정의 priorities로 덮어쓸 수 있다) */
export const LOADER_PRIORITIES = {
  pdf: 100,
  structured: 100,
  image: 100,
  audio: 100,
  csv: 100,
  url: 50,
  'paged-text': 20,
  'plain-text': 1,
} as const;

export interface BasePluginOptions {
  pdf?: PdfLoaderOptions;
  url?: UrlLoaderOptions;
}

/** 기본값(100)과 다른 renderer priority */
export const RENDERER_PRIORITIES: Readonly<Record<string, number>> = {
  'csv-brief': 120,
  'csv-full': 80,
};

const RENDERERS: readonly Renderer[] = [
  pagedTextRenderer,
  structuredTextRenderer,
  tableBriefRenderer,
  tableFullRenderer,
  plainTextRenderer,
  imageRenderer,
  audioRenderer,
];

export function registerBasePlugins(api: PluginApi, options: BasePluginOptions = {}): void {
  api.register('loader', createPdfLoader({ ...options.pdf, gate: { logger: api.logger, ...options.pdf?.gate } }), LOADER_PRIORITIES.pdf);
  api.register('loader', structuredLoader, LOADER_PRIORITIES.structured);
  api.register('loader', imageLoader, LOADER_PRIORITIES.image);
  api.register('loader', audioLoader, LOADER_PRIORITIES.audio);
  api.register('loader', csvLoader, LOADER_PRIORITIES.csv);
  api.register('loader', createUrlLoader(options.url), LOADER_PRIORITIES.url);
  api.register('loader', pagedTextLoader, LOADER_PRIORITIES['paged-text']);
  api.register('loader', plainTextLoader, LOADER_PRIORITIES['plain-text']);

  for (const transform of [
    pagesTransform,
    linesTransform,
    headTransform,
    selectTransform,
    formatTransform,
    summaryTransform,
  ]) {
    api.register('transform', transform);
  }

  for (const renderer of RENDERERS) {
    api.register(rendererKind(renderer.contentType), renderer, RENDERER_PRIORITIES[renderer.name]);
  }

  api.register('deliverer', openaiDeliverer);
  api.register('deliverer', claudeDeliverer);

  api.logger.debug?.('Base plugins registered');
}

/**
 * 플러그인 모듈 진입점
 */
export function register(api: PluginApi): void {
  registerBasePlugins(api);
}
