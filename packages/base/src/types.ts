/**
 * 기본 플러그인이 주고받는 payload 타입
 */

import { isRecord } from '@attachkit/core';

/**
 * 페이지 단위 문서 (PDF, form feed로 나눈 텍스트)
 */
export interface PagedDocument {
  readonly kind: 'paged';
  readonly source: string;
  readonly pages: readonly string[];
  /** 각 페이지의 원래 번호 (1-based) */
  readonly pageNumbers: readonly number[];
}

export type StructuredFormat = 'json' | 'yaml';

/**
 * 구조화된 데이터 (JSON / YAML)
 */
export interface StructuredData {
  readonly kind: 'data';
  readonly source: string;
  readonly format: StructuredFormat;
  readonly value: unknown;
}

/**
 * 바이너리 자산 (이미지, 오디오)
 */
export interface BinaryAsset {
  readonly kind: 'binary';
  readonly source: string;
  readonly mimeType: string;
  readonly data: Uint8Array;
}

/**
 * 표 형식 데이터 (CSV / TSV)
 */
export interface Table {
  readonly kind: 'table';
  readonly source: string;
  readonly columns: readonly string[];
  /** 각 행은 columns와 같은 길이 */
  readonly rows: ReadonlyArray<readonly string[]>;
}

export type BasePayload = string | PagedDocument | StructuredData | BinaryAsset | Table;

export function createPagedDocument(source: string, pages: readonly string[]): PagedDocument {
  return {
    kind: 'paged',
    source,
    pages: [...pages],
    pageNumbers: pages.map((_, index) => index + 1),
  };
}

export function isPagedDocument(value: unknown): value is PagedDocument {
  return (
    isRecord(value) &&
    value['kind'] === 'paged' &&
    Array.isArray(value['pages']) &&
    Array.isArray(value['pageNumbers'])
  );
}

export function isStructuredData(value: unknown): value is StructuredData {
  return isRecord(value) && value['kind'] === 'data' && (value['format'] === 'json' || value['format'] === 'yaml');
}

export function isBinaryAsset(value: unknown): value is BinaryAsset {
  return (
    isRecord(value) &&
    value['kind'] === 'binary' &&
    typeof value['mimeType'] === 'string' &&
    value['data'] instanceof Uint8Array
  );
}

export function isTable(value: unknown): value is Table {
  return isRecord(value) && value['kind'] === 'table' && Array.isArray(value['columns']) && Array.isArray(value['rows']);
}

export function isStructuredFormat(value: string): value is StructuredFormat {
  return value === 'json' || value === 'yaml';
}
