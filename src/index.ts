export { QueryTree } from './tree.js';
export type { QueryTreeConfig, ParseOptions, ReadFileOptions } from './tree.js';
export { QueryNode } from './query/node.js';
export { ASSIGN, ROOT_LABEL } from './query/guards.js';
export { expressionsEqual } from './query/equality.js';
export { createMingoMatcher, mingoMatcher } from './matcher.js';
export {
  ArgumentBinder,
  positional,
  withDefault,
  rest,
  keywords,
} from './binding/argument-binder.js';
export type {
  ParameterDescriptor,
  KeywordDescriptor,
  DefineOptions,
} from './binding/argument-binder.js';
export type {
  MatchGuardOptions,
  GuardedFunction,
  DiscoveryMethod,
} from './binding/guard.js';
export type {
  Scalar,
  Expression,
  Definition,
  AssignmentBlock,
  DataRecord,
  SearchStrategy,
  SearchOptions,
  SerializeOptions,
  Matcher,
} from './types.js';
export {
  QueryTreeError,
  NotFoundError,
  InvalidArgumentError,
  MalformedDefinitionError,
} from './errors.js';
