import { defineTransform } from '@attachkit/core';
import { isTable, type Table } from '../types.js';

export const SUMMARY_COLUMNS = ['column', 'count', 'unique', 'top', 'mean', 'min', 'max'] as const;

function formatNumber(value: number): string {
  return Number.isInteger(value) ? String(value) : String(Number(value.toFixed(4)));
}

function mostFrequent(values: readonly string[]): string {
  const counts = new Map<string, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }

  let top = '';
  let best = 0;
  for (const [value, count] of counts) {
    if (count > best) {
      top = value;
      best = count;
    }
  }
  return top;
}

function summarizeColumn(name: string, values: readonly string[]): string[] {
  const present = values.filter((value) => value.trim() !== '');
  const numbers = present.map((value) => Number(value));
  const numeric = present.length > 0 && numbers.every((value) => Number.isFinite(value));

  const stats = numeric
    ? [
        formatNumber(numbers.reduce((sum, value) => sum + value, 0) / numbers.length),
        formatNumber(Math.min(...numbers)),
        formatNumber(Math.max(...numbers)),
      ]
    : ['', '', ''];

  return [name, String(present.length), String(new Set(present).size), mostFrequent(present), ...stats];
}

/**
 * 열마다 한 행씩 통계를 담은 Table
 * mean / min / max는 비어 있지 않은 값이 모두 숫자인 열에만 채운다.
 */
export function summarizeTable(table: Table): Table {
  return {
    kind: 'table',
    source: table.source,
    columns: [...SUMMARY_COLUMNS],
    rows: table.columns.map((name, index) =>
      summarizeColumn(
        name,
        table.rows.map((row) => row[index] ?? '')
      )
    ),
  };
}

/**
 * `summary` 또는 `summary:true` - 표를 열별 통계로 바꾼다.
 */
export const summaryTransform = defineTransform('summary', (payload, argument) => {
  if (!isTable(payload)) {
    return payload;
  }
  if (argument !== null && argument.trim().toLowerCase() !== 'true') {
    return payload;
  }
  return summarizeTable(payload);
});
