import YAML from 'yaml';
import type { PagedDocument, StructuredData, Table } from '../types.js';

/**
 * 페이지 사이에 원래 페이지 번호 표시를 넣어 이어 붙임
 */
export function formatPages(doc: PagedDocument): string {
  return doc.pages
    .map((page, index) => `--- Page ${doc.pageNumbers[index] ?? index + 1} ---\n${page.trim()}`)
    .join('\n\n');
}

export function formatStructured(data: StructuredData): string {
  if (data.format === 'json') {
    return JSON.stringify(data.value, null, 2) ?? 'null';
  }
  return YAML.stringify(data.value).trimEnd();
}

function escapeCell(value: string): string {
  return value.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

/**
 * Markdown 표 (limit이 있으면 앞의 limit개 행만)
 */
export function formatTable(table: Table, limit: number = table.rows.length): string {
  const line = (cells: readonly string[]): string => `| ${cells.map(escapeCell).join(' | ')} |`;
  return [line(table.columns), line(table.columns.map(() => '---')), ...table.rows.slice(0, limit).map(line)].join('\n');
}
