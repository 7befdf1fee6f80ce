export { Attachment } from './attachment.js';
export type { AttachmentInit, RenderedOutputs, TraceEntry, TraceOutcome } from './attachment.js';
export { AttachmentCollection } from './collection.js';
export { deliverOutputs } from './deliver.js';
export type { Deliverable } from './deliver.js';
