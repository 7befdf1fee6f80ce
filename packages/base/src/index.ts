/**
 * attachkit base - 기본 loader, transform, renderer, deliverer
 *
 * @packageDocumentation
 */

export { registerBasePlugins, register, LOADER_PRIORITIES, RENDERER_PRIORITIES } from './register.js';
export type { BasePluginOptions } from './register.js';

// Payload
export {
  createPagedDocument,
  isPagedDocument,
  isStructuredData,
  isBinaryAsset,
  isTable,
  isStructuredFormat,
} from './types.js';
export type { PagedDocument, StructuredData, StructuredFormat, BinaryAsset, Table, BasePayload } from './types.js';

// Plugins
export * from './loaders/index.js';
export * from './transforms/index.js';
export * from './renderers/index.js';
export * from './deliverers/index.js';

// Dispatch roles
export * from './roles/index.js';

export { toDataUrl, parseDataUrl, extensionOf, isHttpUrl, IMAGE_TYPES, AUDIO_TYPES } from './utils.js';
