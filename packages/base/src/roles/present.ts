/**
 * present role - payload를 사람이 읽을 텍스트로 변환
 */

import { any, createDispatcher, describeValueType, primitive, ref, type Dispatcher, type TypeUniverse } from '@attachkit/core';
import { formatPages, formatStructured, formatTable } from '../renderers/format.js';
import { asBinaryAsset, asPagedDocument, asStructuredData, asTable, createPayloadUniverse, PAYLOAD_TYPES } from './universe.js';

export type PresentRole = Dispatcher<[], string>;

export interface RoleOptions {
  universe?: TypeUniverse;
  logger?: Console;
}

function fallbackText(datum: unknown): string {
  if (datum === null || datum === undefined) {
    return '';
  }
  if (typeof datum === 'object') {
    return JSON.stringify(datum, null, 2) ?? describeValueType(datum);
  }
  return String(datum);
}

export function createPresentRole(options: RoleOptions = {}): PresentRole {
  const role = createDispatcher<[], string>('present', options.universe ?? createPayloadUniverse(), {
    logger: options.logger,
  });

  role
    .register(primitive('string'), (datum) => String(datum))
    .register(ref(PAYLOAD_TYPES.paged), (datum) => {
      const doc = asPagedDocument(datum);
      return doc ? formatPages(doc) : fallbackText(datum);
    })
    .register(ref(PAYLOAD_TYPES.data), (datum) => {
      const data = asStructuredData(datum);
      return data ? formatStructured(data) : fallbackText(datum);
    })
    .register(ref(PAYLOAD_TYPES.binary), (datum) => {
      const asset = asBinaryAsset(datum);
      return asset ? `[${asset.mimeType}, ${asset.data.byteLength} bytes: ${asset.source}]` : fallbackText(datum);
    })
    .register(ref(PAYLOAD_TYPES.table), (datum) => {
      const table = asTable(datum);
      return table ? formatTable(table) : fallbackText(datum);
    })
    .register(any(), fallbackText);

  return role;
}
