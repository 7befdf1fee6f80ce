/**
 * describe role - payload 한 줄 요약
 */

import { any, createDispatcher, describeValueType, primitive, ref, type Dispatcher } from '@attachkit/core';
import type { RoleOptions } from './present.js';
import { asBinaryAsset, asPagedDocument, asStructuredData, asTable, createPayloadUniverse, PAYLOAD_TYPES } from './universe.js';

export type DescribeRole = Dispatcher<[], string>;

export function createDescribeRole(options: RoleOptions = {}): DescribeRole {
  const role = createDispatcher<[], string>('describe', options.universe ?? createPayloadUniverse(), {
    logger: options.logger,
  });
  const unknown = (datum: unknown): string => `Unknown(${describeValueType(datum)})`;

  role
    .register(primitive('string'), (datum) => `Text(${String(datum).length} chars)`)
    .register(ref(PAYLOAD_TYPES.paged), (datum) => {
      const doc = asPagedDocument(datum);
      return doc ? `PagedDocument(${doc.source}, ${doc.pages.length} pages)` : unknown(datum);
    })
    .register(ref(PAYLOAD_TYPES.data), (datum) => {
      const data = asStructuredData(datum);
      return data ? `StructuredData(${data.source}, ${data.format}, ${describeValueType(data.value)})` : unknown(datum);
    })
    .register(ref(PAYLOAD_TYPES.binary), (datum) => {
      const asset = asBinaryAsset(datum);
      return asset ? `BinaryAsset(${asset.source}, ${asset.mimeType}, ${asset.data.byteLength} bytes)` : unknown(datum);
    })
    .register(ref(PAYLOAD_TYPES.table), (datum) => {
      const table = asTable(datum);
      return table ? `Table(${table.source}, ${table.rows.length} rows, ${table.columns.length} columns)` : unknown(datum);
    })
    .register(any(), unknown);

  return role;
}
