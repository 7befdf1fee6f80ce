/**
 * 텍스트 파일 Loader
 */

import { readFile } from 'node:fs/promises';
import { defineLoader } from '@attachkit/core';
import { createPagedDocument, type PagedDocument } from '../types.js';
import { extensionOf, isHttpUrl } from '../utils.js';

const PAGED_EXTENSIONS = new Set(['.txt', '.md']);

/** 페이지 구분자 */
export const FORM_FEED = '\f';

/**
 * .txt / .md 파일을 form feed 기준으로 페이지 분할
 * form feed가 없으면 한 페이지 문서가 된다. 마지막 빈 페이지는 버린다.
 */
export const pagedTextLoader = defineLoader<PagedDocument>('paged-text', {
  match: (locator) => !isHttpUrl(locator) && PAGED_EXTENSIONS.has(extensionOf(locator)),
  async load(locator) {
    const content = await readFile(locator, 'utf8');
    const pages = content.split(FORM_FEED);
    if (pages.length > 1 && pages[pages.length - 1]?.trim() === '') {
      pages.pop();
    }
    return createPagedDocument(locator, pages);
  },
});

/**
 * 최후의 fallback: 어떤 locator든 UTF-8 텍스트로 읽는다.
 */
export const plainTextLoader = defineLoader<string>('plain-text', {
  match: () => true,
  load: (locator) => readFile(locator, 'utf8'),
});
