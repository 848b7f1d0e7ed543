/**
 * filter-vm
 *
 * Deterministic sandbox for user-supplied filter scripts: fresh isolated
 * context per filter, pinned randomness and time, whitelisted host
 * callbacks, and diagnostic text instead of thrown script errors.
 *
 * @packageDocumentation
 */

// Engine
export {
  FilterEngine,
  FilterContext,
  NONDETERMINISTIC_GLOBALS,
  DEFAULT_TERMINATION_REASON,
  INVOKE_GLOBAL,
  DESCRIBE_GLOBAL,
} from './engine';
export type { FilterEngineDeps, EntryFunction, EngineFailure, CompileOutcome, ScriptOutcome } from './engine';
export { FilterEngineUserData } from './engine-user-data';
export { createStaticFeatures } from './features';
export type { FilterFeatures } from './features';

// Filter
export { Filter, DESTROYED_WHILE_RUNNING_REASON } from './filter';
export { testFilter } from './filter-runner';
export type { TestFilterInput } from './filter-runner';

// Callbacks
export {
  CallbackRegistry,
  createCallbackRegistry,
  defineCallback,
  parseCallbackArgs,
  invokeCallback,
  isReservedGlobalName,
  RESERVED_GLOBAL_PREFIXES,
} from './callback-registry';
export type { CallbackDefinition, CallbackHandler, TypedCallbackDefinition } from './callback-registry';

// Preamble
export { buildPreamble, BASE_PREAMBLE, LIMIT_MATH_PREAMBLE, MATH_ALLOW_LIST } from './preamble';
export type { PreambleOptions } from './preamble';

// Exception reporting
export {
  reportException,
  reportTermination,
  formatExceptionRecord,
  captureHostException,
  exceptionMessage,
  parseDecoratedHeader,
  parseStackFrames,
  EMPTY_EXCEPTION_MESSAGE,
  UNPRINTABLE_EXCEPTION_MESSAGE,
} from './exception-reporter';
export type { CapturedException } from './exception-reporter';

// Errors
export { FilterEngineBusyError, FilterConfigError, DuplicateCallbackError } from './errors';

// Re-export types package
export * from '@filter-vm/types';
