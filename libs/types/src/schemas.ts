/**
 * @filter-vm/types - Zod schemas
 *
 * Runtime validation schemas for engine options, reports and CLI fixtures.
 * These schemas are used for validating values that come from files, the
 * command line or other untrusted sources.
 */

import { z } from 'zod';
import { DEFAULT_ENGINE_OPTIONS, FilterStatus } from './protocol';

// ============================================================================
// Engine Options
// ============================================================================

/**
 * Engine options schema. Parsing applies the documented defaults.
 */
export const FilterEngineOptionsSchema = z
  .object({
    timeoutMs: z.number().int().positive().default(DEFAULT_ENGINE_OPTIONS.timeoutMs),
    breakOnSigint: z.boolean().default(DEFAULT_ENGINE_OPTIONS.breakOnSigint),
    limitMathBuiltins: z.boolean().default(DEFAULT_ENGINE_OPTIONS.limitMathBuiltins),
    codeGeneration: z
      .object({
        strings: z.boolean().default(DEFAULT_ENGINE_OPTIONS.codeGeneration.strings),
        wasm: z.boolean().default(DEFAULT_ENGINE_OPTIONS.codeGeneration.wasm),
      })
      .strict()
      .default({}),
    debug: z.boolean().default(DEFAULT_ENGINE_OPTIONS.debug),
  })
  .strict();

/**
 * Engine options with every default applied.
 */
export type ResolvedFilterEngineOptions = z.output<typeof FilterEngineOptionsSchema>;

// ============================================================================
// Records
// ============================================================================

/**
 * Filter status schema.
 */
export const FilterStatusSchema = z.enum([FilterStatus.NoError, FilterStatus.InternalError]);

/**
 * Exception location schema.
 */
export const ExceptionLocationSchema = z.object({
  sourceName: z.string(),
  line: z.number().int().positive(),
  startColumn: z.number().int().nonnegative(),
  endColumn: z.number().int().nonnegative(),
  sourceLine: z.string(),
});

/**
 * Exception record schema.
 */
export const FilterExceptionRecordSchema = z.object({
  message: z.string(),
  location: ExceptionLocationSchema.optional(),
  terminated: z.boolean().optional(),
});

/**
 * Callback log entry schema.
 */
export const CallbackLogEntrySchema = z.union([
  z.object({
    method: z.string(),
    params: z.array(z.unknown()),
    error: z.string(),
  }),
  z.object({
    method: z.string(),
    params: z.array(z.unknown()),
    result: z.unknown(),
  }),
]);

/**
 * One-shot filter report schema.
 */
export const FilterTestReportSchema = z.object({
  compiled: z.boolean(),
  status: FilterStatusSchema,
  diagnostic: z.string().optional(),
  result: z.string().optional(),
  exception: FilterExceptionRecordSchema.optional(),
  callbacks: z.array(CallbackLogEntrySchema),
});

// ============================================================================
// CLI Fixtures
// ============================================================================

/**
 * Canned behaviour of one callback: return `result`, or throw `error`.
 */
export const CallbackFixtureSchema = z.union([
  z.object({ error: z.string() }).strict(),
  z.object({ result: z.unknown() }).strict(),
]);

export type CallbackFixture = z.infer<typeof CallbackFixtureSchema>;

/**
 * Callback fixtures file schema: callback name to canned behaviour.
 */
export const CallbackFixturesSchema = z.record(z.string().min(1), CallbackFixtureSchema);

export type CallbackFixtures = z.infer<typeof CallbackFixturesSchema>;

// ============================================================================
// Parse Helpers
// ============================================================================

/**
 * Parse and validate engine options, applying defaults.
 */
export function parseFilterEngineOptions(data: unknown) {
  return FilterEngineOptionsSchema.safeParse(data);
}

/**
 * Parse and validate a callback fixtures document.
 */
export function parseCallbackFixtures(data: unknown) {
  return CallbackFixturesSchema.safeParse(data);
}

/**
 * Parse and validate a one-shot filter report.
 */
export function parseFilterTestReport(data: unknown) {
  return FilterTestReportSchema.safeParse(data);
}
