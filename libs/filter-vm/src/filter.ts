/**
 * Filter
 *
 * One filter instance: an isolated context with the determinism preamble,
 * the requested callbacks and the user script loaded, and a resolved entry
 * function that can be run any number of times.
 *
 * Script-level failures never throw. They come back with status `NO_ERROR`
 * and non-empty diagnostic text; only host-level faults use
 * `INTERNAL_ERROR` or throw.
 *
 * @packageDocumentation
 */

import {
  FilterStatus,
  INVALID_FILTER_MESSAGE,
  PREAMBLE_ORIGIN,
  SCRIPT_ORIGIN,
  type FilterExceptionRecord,
  type FilterInitResult,
  type FilterRunResult,
  type FilterRunWithLogResult,
} from '@filter-vm/types';
import { installCallbacks } from './callback-bridge';
import type { EngineFailure, EntryFunction, FilterContext, FilterEngine, ScriptOutcome } from './engine';
import { formatExceptionRecord, reportException, reportTermination } from './exception-reporter';
import { buildPreamble } from './preamble';

/**
 * Reason given to the engine when a running filter is destroyed
 */
export const DESTROYED_WHILE_RUNNING_REASON = 'Filter was destroyed while running';

interface LoadResult {
  diagnostic: string;
  entry?: EntryFunction;
}

/**
 * Filter instance
 *
 * @example
 * ```typescript
 * const filter = new Filter();
 * const init = filter.initialize(engine, script, 'filtertransaction', ['getfiltertransaction']);
 * if (init.diagnostic === '') {
 *   const { result } = filter.run();
 * }
 * filter.destroy();
 * ```
 */
export class Filter<THost = undefined> {
  private engine?: FilterEngine<THost>;
  private context?: FilterContext;
  private entry?: EntryFunction;
  private running = false;

  /**
   * Load a script and resolve its entry function.
   *
   * @param engine Engine the filter runs on
   * @param script User script text
   * @param entryPoint Name of the global function Run calls
   * @param callbackNames Callbacks to expose as globals
   * @throws FilterEngineBusyError when the engine is executing another filter
   */
  initialize(
    engine: FilterEngine<THost>,
    script: string,
    entryPoint: string,
    callbackNames: Iterable<string>,
  ): FilterInitResult {
    this.destroy();

    return engine.withLock(() => {
      this.engine = engine;
      this.log('Initialize');

      const names = Array.from(new Set(callbackNames));
      const missing = names.find((name) => !engine.registry.has(name));
      if (missing !== undefined) {
        this.zero();
        return { status: FilterStatus.InternalError, diagnostic: `Undefined callback name: ${missing}` };
      }

      const context = engine.createContext();
      installCallbacks(engine, context, names);

      const preamble = buildPreamble({ limitMath: engine.features.isMathLimited() });
      const preambleLoad = this.compileAndLoadScript(engine, context, preamble, PREAMBLE_ORIGIN);
      if (preambleLoad.diagnostic !== '') {
        this.zero();
        return { status: FilterStatus.NoError, diagnostic: preambleLoad.diagnostic };
      }

      const scriptLoad = this.compileAndLoadScript(engine, context, script, SCRIPT_ORIGIN, entryPoint);
      if (scriptLoad.diagnostic !== '' || !scriptLoad.entry) {
        this.zero();
        return { status: FilterStatus.NoError, diagnostic: scriptLoad.diagnostic };
      }

      context.bindEntry(scriptLoad.entry);
      this.context = context;
      this.entry = scriptLoad.entry;
      return { status: FilterStatus.NoError, diagnostic: '' };
    });
  }

  /**
   * Call the entry function with no arguments and the global object as
   * receiver.
   *
   * @param withCallbackLog Record callback invocations made during this run
   * @throws FilterEngineBusyError when the engine is executing another filter
   */
  run(withCallbackLog = false): FilterRunResult {
    const { engine, context, entry } = this;
    if (!engine || !context || !entry) {
      return { status: FilterStatus.NoError, result: INVALID_FILTER_MESSAGE };
    }
    this.log('Run');

    return engine.withLock(() => {
      engine.userData.reset(withCallbackLog);
      this.running = true;
      let outcome: ScriptOutcome;
      try {
        outcome = engine.invoke(context);
      } finally {
        this.running = false;
      }

      if (!outcome.ok) {
        const exception = this.describeFailure(engine, context, outcome);
        return { status: FilterStatus.NoError, result: exception.message, exception };
      }
      return { status: FilterStatus.NoError, result: typeof outcome.value === 'string' ? outcome.value : '' };
    });
  }

  /**
   * Run with the callback log enabled and return the log with the result.
   */
  runWithCallbackLog(): FilterRunWithLogResult {
    const engine = this.engine;
    const result = this.run(true);
    return { ...result, callbacks: engine ? engine.userData.callbacks : [] };
  }

  /**
   * Release the context and the entry function. Terminates the current run
   * when called while the filter is running. Safe to call at any time.
   */
  destroy(): void {
    if (this.running && this.engine) {
      this.engine.terminateExecution(DESTROYED_WHILE_RUNNING_REASON);
    }
    if (this.context) {
      this.log('Destroy');
      this.context.bindEntry(undefined);
    }
    this.zero();
  }

  /**
   * Whether the filter holds a context and an entry function
   */
  get isInitialized(): boolean {
    return this.context !== undefined && this.entry !== undefined;
  }

  /**
   * Whether a run is in progress
   */
  get isRunning(): boolean {
    return this.running;
  }

  private zero(): void {
    this.engine = undefined;
    this.context = undefined;
    this.entry = undefined;
    this.running = false;
  }

  private compileAndLoadScript(
    engine: FilterEngine<THost>,
    context: FilterContext,
    text: string,
    origin: string,
    functionName?: string,
  ): LoadResult {
    this.log(`Compiling ${origin}`);
    context.sources.set(origin, text);

    const compiled = engine.compile(text, origin);
    if (!compiled.ok) {
      return { diagnostic: this.describeFailure(engine, context, compiled).message };
    }

    const outcome = engine.runScript(compiled.script, context);
    if (!outcome.ok) {
      return { diagnostic: this.describeFailure(engine, context, outcome).message };
    }

    if (functionName === undefined) {
      return { diagnostic: '' };
    }
    const entry = context.lookupFunction(functionName);
    if (!entry) {
      return { diagnostic: `Cannot find function '${functionName}' in script` };
    }
    return { diagnostic: '', entry };
  }

  private describeFailure(
    engine: FilterEngine<THost>,
    context: FilterContext,
    failure: EngineFailure,
  ): FilterExceptionRecord {
    const record = failure.terminated
      ? reportTermination(engine.terminationReason())
      : reportException(failure.exception, context.sources);
    if (engine.options.debug) {
      for (const line of formatExceptionRecord(record)) {
        console.log(`[Filter] ${line}`);
      }
    }
    return record;
  }

  /**
   * Log debug message
   */
  private log(message: string): void {
    if (this.engine?.options.debug) {
      console.log(`[Filter] ${message}`);
    }
  }
}
