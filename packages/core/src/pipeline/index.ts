export { Pipeline } from './orchestrator.js';
export type { PipelineOptions, RunOptions } from './orchestrator.js';

export { orElse, anyOf, pipe, loaderStage, rendererStage, toLoader } from './compose.js';
export type { MatchableStage, AttachmentStep } from './compose.js';

export { describeRegistry, formatRegistryReport } from './diagnostics.js';
export type {
  RegistryReport,
  KindReport,
  ReportEntry,
  DisabledReport,
} from './diagnostics.js';
