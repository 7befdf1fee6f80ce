/**
 * attachkit core - plugin registry and conversion pipeline
 *
 * @packageDocumentation
 */

// Errors
export * from './errors.js';

// DSL
export * from './dsl/index.js';

// Registry
export * from './registry/index.js';

// Dependency Gate
export * from './gate/index.js';

// Plugin contracts, API, discovery
export * from './plugin/index.js';

// Type-Directed Dispatch
export * from './dispatch/index.js';

// Attachment
export * from './attachment/index.js';

// Pipeline
export * from './pipeline/index.js';

// Config
export * from './config/index.js';

// Utils
export { isRecord, errorMessage } from './utils.js';
