import { defineTransform } from '@attachkit/core';
import { isPagedDocument, isStructuredData, isTable } from '../types.js';
import { parseCount } from '../utils.js';

const DEFAULT_HEAD = 10;

/**
 * `head:N` - 처음 N개 (문자열은 줄, 문서는 페이지, 표는 행, 배열 데이터는 항목)
 */
export const headTransform = defineTransform('head', (payload, argument) => {
  const count = parseCount(argument, DEFAULT_HEAD, 'head');

  if (typeof payload === 'string') {
    return payload.split('\n').slice(0, count).join('\n');
  }
  if (isPagedDocument(payload)) {
    return {
      ...payload,
      pages: payload.pages.slice(0, count),
      pageNumbers: payload.pageNumbers.slice(0, count),
    };
  }
  if (isTable(payload)) {
    return { ...payload, rows: payload.rows.slice(0, count) };
  }
  if (isStructuredData(payload) && Array.isArray(payload.value)) {
    return { ...payload, value: payload.value.slice(0, count) };
  }
  return payload;
});
