/**
 * 기본 payload 타입 선언
 *
 * guard는 정확한 타입 검사에, shape은 kind가 없는 유사 객체(duck-typing)에 쓰인다.
 */

import { guard, isRecord, TypeUniverse } from '@attachkit/core';
import {
  isBinaryAsset,
  isPagedDocument,
  isStructuredData,
  isTable,
  type BinaryAsset,
  type PagedDocument,
  type StructuredData,
  type Table,
} from '../types.js';

export const PAYLOAD_TYPES = {
  paged: 'PagedDocument',
  data: 'StructuredData',
  binary: 'BinaryAsset',
  table: 'Table',
} as const;

export function createPayloadUniverse(): TypeUniverse {
  return new TypeUniverse()
    .declare(PAYLOAD_TYPES.paged, guard(PAYLOAD_TYPES.paged, isPagedDocument), { shape: ['source', 'pages'] })
    .declare(PAYLOAD_TYPES.data, guard(PAYLOAD_TYPES.data, isStructuredData), { shape: ['source', 'value'] })
    .declare(PAYLOAD_TYPES.binary, guard(PAYLOAD_TYPES.binary, isBinaryAsset), { shape: ['mimeType', 'data'] })
    .declare(PAYLOAD_TYPES.table, guard(PAYLOAD_TYPES.table, isTable), { shape: ['columns', 'rows'] });
}

function sourceOf(value: Record<string, unknown>): string {
  return typeof value['source'] === 'string' ? value['source'] : '(unknown)';
}

/**
 * shape으로 선택된 값도 다룰 수 있도록 PagedDocument로 읽어들임
 */
export function asPagedDocument(value: unknown): PagedDocument | null {
  if (isPagedDocument(value)) {
    return value;
  }
  if (!isRecord(value) || !Array.isArray(value['pages'])) {
    return null;
  }
  const pages = value['pages'].map((page) => String(page));
  return { kind: 'paged', source: sourceOf(value), pages, pageNumbers: pages.map((_, index) => index + 1) };
}

export function asStructuredData(value: unknown): StructuredData | null {
  if (isStructuredData(value)) {
    return value;
  }
  if (!isRecord(value) || !('value' in value)) {
    return null;
  }
  return { kind: 'data', source: sourceOf(value), format: value['format'] === 'json' ? 'json' : 'yaml', value: value['value'] };
}

export function asBinaryAsset(value: unknown): BinaryAsset | null {
  if (isBinaryAsset(value)) {
    return value;
  }
  if (!isRecord(value) || typeof value['mimeType'] !== 'string' || !(value['data'] instanceof Uint8Array)) {
    return null;
  }
  return { kind: 'binary', source: sourceOf(value), mimeType: value['mimeType'], data: value['data'] };
}

export function asTable(value: unknown): Table | null {
  if (isTable(value)) {
    return value;
  }
  if (!isRecord(value) || !Array.isArray(value['columns']) || !Array.isArray(value['rows'])) {
    return null;
  }
  const columns = value['columns'].map((column: unknown) => String(column));
  const rows = value['rows'].map((row: unknown) =>
    columns.map((_, index) => (Array.isArray(row) ? String(row[index] ?? '') : ''))
  );
  return { kind: 'table', source: sourceOf(value), columns, rows };
}
