/**
 * 페이지 / 줄 선택 Transform
 */

import { defineTransform, parseIndexExpression } from '@attachkit/core';
import { isPagedDocument, type PagedDocument } from '../types.js';

/**
 * `pages:1-3,N` - 페이지 선택 (원래 페이지 번호 유지)
 * 아무 페이지도 선택되지 않으면 빈 문서를 반환하고 경고한다.
 */
export const pagesTransform = defineTransform('pages', (payload, argument, context) => {
  if (!isPagedDocument(payload)) {
    return payload;
  }
  const doc: PagedDocument = payload;

  const expr = argument ?? '';
  const { indices, rejected } = parseIndexExpression(expr, doc.pages.length);
  for (const item of rejected) {
    context.logger.warn(`Ignoring ${item.reason} page spec '${item.spec}' (pages: ${doc.pages.length})`);
  }

  if (indices.length === 0) {
    context.logger.warn(`Page selection '${expr}' matched no pages in ${doc.source}`);
  }

  return {
    ...doc,
    pages: indices.map((index) => doc.pages[index] ?? ''),
    pageNumbers: indices.map((index) => doc.pageNumbers[index] ?? index + 1),
  };
});

/**
 * `lines:1-10` - 문자열의 줄 선택
 */
export const linesTransform = defineTransform('lines', (payload, argument, context) => {
  if (typeof payload !== 'string') {
    return payload;
  }

  const lines = payload.split('\n');
  const { indices, rejected } = parseIndexExpression(argument ?? '', lines.length);
  for (const item of rejected) {
    context.logger.warn(`Ignoring ${item.reason} line spec '${item.spec}' (lines: ${lines.length})`);
  }
  return indices.map((index) => lines[index] ?? '').join('\n');
});
