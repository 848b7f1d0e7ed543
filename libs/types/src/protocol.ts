/**
 * @filter-vm/types - Protocol definitions
 *
 * Core constants and record types shared by the filter engine, the one-shot
 * runner and the CLI.
 */

/**
 * Script origin used when compiling the determinism preamble.
 */
export const PREAMBLE_ORIGIN = 'preamble' as const;

/**
 * Script origin used when compiling user filter code.
 */
export const SCRIPT_ORIGIN = '<script>' as const;

/**
 * Result reported by Run when the filter holds no context or entry function.
 */
export const INVALID_FILTER_MESSAGE = 'Trying to run an invalid filter' as const;

/**
 * Filter operation status.
 *
 * Script-level failures (compile errors, missing entry point, runtime
 * exceptions, forced termination) are reported as `NoError` with non-empty
 * diagnostic text. Only host-level faults use `InternalError`.
 */
export const FilterStatus = {
  /** The operation completed; check the diagnostic text for script failures */
  NoError: 'NO_ERROR',
  /** The host rejected the request (e.g. unknown callback name) */
  InternalError: 'INTERNAL_ERROR',
} as const;

export type FilterStatus = (typeof FilterStatus)[keyof typeof FilterStatus];

/**
 * Location of the token that raised an exception.
 * Either every field is known or the location is omitted altogether.
 */
export interface ExceptionLocation {
  /** Script origin (`preamble`, `<script>`) */
  sourceName: string;
  /** 1-based line number */
  line: number;
  /** 0-based column where the offending token starts */
  startColumn: number;
  /** 0-based column where the offending token ends (exclusive) */
  endColumn: number;
  /** Text of the offending source line */
  sourceLine: string;
}

/**
 * Structured failure extracted from an engine-level exception.
 */
export interface FilterExceptionRecord {
  /** Exception value converted to text */
  message: string;
  /** Source location, when the engine provided one */
  location?: ExceptionLocation;
  /** True when execution was forcibly stopped rather than thrown */
  terminated?: boolean;
}

/**
 * One recorded callback invocation.
 */
export type CallbackLogEntry =
  | { method: string; params: unknown[]; result: unknown }
  | { method: string; params: unknown[]; error: string };

/**
 * Outcome of `Filter.initialize`.
 */
export interface FilterInitResult {
  status: FilterStatus;
  /** Empty on success */
  diagnostic: string;
}

/**
 * Outcome of `Filter.run`.
 */
export interface FilterRunResult {
  status: FilterStatus;
  /**
   * String returned by the entry function, an empty string for any other
   * return value, or the diagnostic text when the run failed.
   */
  result: string;
  /** Present when the run failed */
  exception?: FilterExceptionRecord;
}

/**
 * Outcome of `Filter.runWithCallbackLog`.
 */
export interface FilterRunWithLogResult extends FilterRunResult {
  callbacks: CallbackLogEntry[];
}

/**
 * Report produced by compiling and running a filter once.
 */
export interface FilterTestReport {
  /** Whether the preamble and the script loaded and the entry function resolved */
  compiled: boolean;
  status: FilterStatus;
  /** Initialize diagnostic, when compilation failed */
  diagnostic?: string;
  /** Run result, when compilation succeeded */
  result?: string;
  /** Run failure, when the entry function threw or was terminated */
  exception?: FilterExceptionRecord;
  callbacks: CallbackLogEntry[];
}

/**
 * Engine options.
 */
export interface FilterEngineOptions {
  /**
   * Watchdog for every compile-and-run and every filter invocation.
   * @default 1000
   */
  timeoutMs?: number;

  /**
   * Let SIGINT interrupt a running filter.
   * @default false
   */
  breakOnSigint?: boolean;

  /**
   * Remove non-essential Math built-ins and Date.now from every new context.
   * Ignored when a features provider is given to the engine.
   * @default false
   */
  limitMathBuiltins?: boolean;

  /**
   * Code generation allowed inside filter contexts.
   * @default { strings: false, wasm: false }
   */
  codeGeneration?: {
    strings?: boolean;
    wasm?: boolean;
  };

  /**
   * Enable debug logging
   * @default false
   */
  debug?: boolean;
}

/**
 * Default engine options.
 */
export const DEFAULT_ENGINE_OPTIONS = {
  timeoutMs: 1000,
  breakOnSigint: false,
  limitMathBuiltins: false,
  codeGeneration: { strings: false, wasm: false },
  debug: false,
} as const;
