export { CONTENT_TYPES, CONTRACTS, rendererKind } from './types.js';
export type {
  ContentType,
  RenderResult,
  StageContext,
  RenderMeta,
  Loader,
  Renderer,
  Transform,
  Deliverer,
  ContractDescriptor,
  PluginKindMap,
  PluginKind,
  RendererKind,
} from './types.js';

export { registerPlugin, createPluginApi } from './api.js';
export type { PluginApi, CreatePluginApiOptions } from './api.js';

export { defineLoader, defineRenderer, defineTransform, defineDeliverer } from './define.js';

export {
  PluginLoader,
  extractRegisterFunction,
  toImportSpecifier,
  expandPluginEntries,
} from './loader.js';
export type {
  PluginModule,
  PluginRegisterFunction,
  PluginLoadResult,
  PluginLoaderOptions,
  ModuleImporter,
} from './loader.js';
