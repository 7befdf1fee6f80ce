/**
 * CSV / TSV Loader
 *
 * 첫 행을 열 이름으로 사용한다.
 */

import { readFile } from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import { defineLoader } from '@attachkit/core';
import type { Table } from '../types.js';
import { extensionOf, isHttpUrl } from '../utils.js';

const DELIMITERS: Readonly<Record<string, string>> = {
  '.csv': ',',
  '.tsv': '\t',
};

function toCells(row: unknown): string[] {
  return Array.isArray(row) ? row.map((cell: unknown) => String(cell ?? '')) : [String(row ?? '')];
}

/**
 * CSV 텍스트 → Table
 * 열 수가 다른 행은 columns 길이에 맞춰 자르거나 빈 칸으로 채운다.
 */
export function parseCsv(content: string, source: string, delimiter = ','): Table {
  const records: unknown = parse(content, {
    delimiter,
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });
  const rows = Array.isArray(records) ? records.map(toCells) : [];
  const [header = [], ...body] = rows;
  const columns = header.map((name, index) => name.trim() || `column_${index + 1}`);

  return {
    kind: 'table',
    source,
    columns,
    rows: body.map((row) => columns.map((_, index) => row[index] ?? '')),
  };
}

export const csvLoader = defineLoader<Table>('csv', {
  match: (locator) => !isHttpUrl(locator) && extensionOf(locator) in DELIMITERS,
  async load(locator) {
    const content = await readFile(locator, 'utf8');
    return parseCsv(content, locator, DELIMITERS[extensionOf(locator)] ?? ',');
  },
});
