export {
  parseIndexExpression,
  resolveIndices,
} from './index-resolver.js';
export type { IndexSelection, RejectedSpec, RejectedSpecReason } from './index-resolver.js';

export {
  splitIdentifier,
  splitTopLevel,
  parseCommandTokens,
  parseCommandMap,
  parseIdentifier,
} from './splitter.js';
export type {
  SplitResult,
  CommandToken,
  CommandParseOptions,
  ParsedIdentifier,
} from './splitter.js';
