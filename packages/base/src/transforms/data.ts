/**
 * 구조화된 데이터 Transform
 */

import { defineTransform, isRecord } from '@attachkit/core';
import { isStructuredData, isStructuredFormat } from '../types.js';

/**
 * 점으로 구분된 경로로 값 조회 (배열은 0-based 숫자 key)
 */
export function selectPath(value: unknown, path: string): { found: true; value: unknown } | { found: false } {
  let current = value;
  for (const segment of path.split('.').filter((part) => part !== '')) {
    if (Array.isArray(current)) {
      const index = Number(segment);
      if (!Number.isInteger(index) || index < 0 || index >= current.length) {
        return { found: false };
      }
      current = current[index];
    } else if (isRecord(current) && segment in current) {
      current = current[segment];
    } else {
      return { found: false };
    }
  }
  return { found: true, value: current };
}

/**
 * `select:a.b.0`
 */
export const selectTransform = defineTransform('select', (payload, argument) => {
  if (!isStructuredData(payload) || argument === null) {
    return payload;
  }

  const result = selectPath(payload.value, argument);
  if (!result.found) {
    throw new Error(`Path '${argument}' not found in ${payload.source}`);
  }
  return { ...payload, value: result.value };
});

/**
 * `format:yaml` / `format:json`
 */
export const formatTransform = defineTransform('format', (payload, argument) => {
  if (!isStructuredData(payload)) {
    return payload;
  }

  const format = (argument ?? '').trim().toLowerCase();
  if (!isStructuredFormat(format)) {
    throw new Error(`Unknown format '${argument ?? ''}'. Use json or yaml.`);
  }
  return { ...payload, format };
});
