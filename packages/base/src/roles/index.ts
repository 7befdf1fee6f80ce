export { createPresentRole } from './present.js';
export type { PresentRole, RoleOptions } from './present.js';
export { createDescribeRole } from './describe.js';
export type { DescribeRole } from './describe.js';
export { createPayloadUniverse, asPagedDocument, asStructuredData, asBinaryAsset, asTable, PAYLOAD_TYPES } from './universe.js';
