/**
 * 표 Renderer
 *
 * csv-brief(120)가 csv-full(80)보다 우선한다.
 * 전체 표가 필요하면 설정의 priorities로 csv-full을 올린다.
 */

import { defineRenderer } from '@attachkit/core';
import { isTable, type Table } from '../types.js';
import { formatTable } from './format.js';

export const BRIEF_ROWS = 5;

export function formatTableBrief(table: Table): string {
  const lines = [
    '### CSV SUMMARY',
    '',
    `${table.source}: ${table.rows.length} rows × ${table.columns.length} columns`,
    `Columns: ${table.columns.join(', ')}`,
    '',
    formatTable(table, BRIEF_ROWS),
  ];
  if (table.rows.length > BRIEF_ROWS) {
    lines.push('', `(${table.rows.length - BRIEF_ROWS} more rows)`);
  }
  return lines.join('\n');
}

export const tableBriefRenderer = defineRenderer('csv-brief', 'text', {
  match: isTable,
  render: (payload) => (isTable(payload) ? formatTableBrief(payload) : ''),
});

export const tableFullRenderer = defineRenderer('csv-full', 'text', {
  match: isTable,
  render: (payload) => (isTable(payload) ? formatTable(payload) : ''),
});
