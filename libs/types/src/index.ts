/**
 * @filter-vm/types
 *
 * Type definitions and Zod schemas for the deterministic filter runtime.
 *
 * @packageDocumentation
 */

// Protocol exports
export {
  PREAMBLE_ORIGIN,
  SCRIPT_ORIGIN,
  INVALID_FILTER_MESSAGE,
  FilterStatus,
  DEFAULT_ENGINE_OPTIONS,
} from './protocol';

export type {
  ExceptionLocation,
  FilterExceptionRecord,
  CallbackLogEntry,
  FilterInitResult,
  FilterRunResult,
  FilterRunWithLogResult,
  FilterTestReport,
  FilterEngineOptions,
} from './protocol';

// Schema exports
export {
  FilterEngineOptionsSchema,
  FilterStatusSchema,
  ExceptionLocationSchema,
  FilterExceptionRecordSchema,
  CallbackLogEntrySchema,
  FilterTestReportSchema,
  CallbackFixtureSchema,
  CallbackFixturesSchema,
  parseFilterEngineOptions,
  parseCallbackFixtures,
  parseFilterTestReport,
} from './schemas';

export type { ResolvedFilterEngineOptions, CallbackFixture, CallbackFixtures } from './schemas';
