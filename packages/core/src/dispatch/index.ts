export {
  any,
  instance,
  primitive,
  guard,
  ref,
  union,
  typeName,
  isSameType,
  describeValueType,
} from './types.js';
export type {
  TypeSpec,
  AnySpec,
  InstanceSpec,
  PrimitiveSpec,
  GuardSpec,
  RefSpec,
  UnionSpec,
  PrimitiveName,
  Constructor,
} from './types.js';

export { TypeUniverse } from './universe.js';
export type { DeclareOptions, CompletionResult } from './universe.js';

export { createDispatcher } from './dispatcher.js';
export type {
  Dispatcher,
  DispatchFunction,
  DispatchImplementation,
  DispatchSelection,
  MatchReason,
  CreateDispatcherOptions,
} from './dispatcher.js';

export { dispatchStage } from './stage.js';
export type { DispatchStage } from './stage.js';
