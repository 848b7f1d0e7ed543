/**
 * Filter Engine
 *
 * Engine handle built on the Node.js vm module. Owns the options, the
 * callback registry, the feature flags, the per-engine user data and the
 * termination state shared by every filter it runs.
 *
 * @packageDocumentation
 */

import * as util from 'util';
import * as vm from 'vm';
import { parseFilterEngineOptions } from '@filter-vm/types';
import type { FilterEngineOptions, ResolvedFilterEngineOptions } from '@filter-vm/types';
import { CallbackRegistry } from './callback-registry';
import { captureHostException, type CapturedException } from './exception-reporter';
import { FilterEngineUserData } from './engine-user-data';
import { FilterConfigError, FilterEngineBusyError } from './errors';
import { createStaticFeatures, type FilterFeatures } from './features';

/**
 * Globals that expose garbage collection timing or shared memory.
 */
export const NONDETERMINISTIC_GLOBALS: readonly string[] = Object.freeze([
  'WeakRef',
  'FinalizationRegistry',
  'SharedArrayBuffer',
  'Atomics',
]);

/**
 * Global through which the engine calls the bound entry function.
 */
export const INVOKE_GLOBAL = '__filter_invoke__';

/**
 * Global through which the engine converts a held exception to text.
 */
export const DESCRIBE_GLOBAL = '__filter_describe__';

/**
 * Reason reported when a run is terminated without a more specific one.
 */
export const DEFAULT_TERMINATION_REASON = 'Filter execution terminated';

/**
 * Runs once per context before anything else. Removes the nondeterministic
 * globals and installs the invoker and the describer. The entry function and
 * the held exception live in a closure that only the host can set, through
 * the returned hooks. `String` is captured here, before any filter code runs.
 */
const CONTEXT_SETUP_CODE = `
(function (global) {
  var apply = Reflect.apply;
  var toText = String;
  var removed = ${JSON.stringify(NONDETERMINISTIC_GLOBALS)};
  for (var i = 0; i < removed.length; i++) {
    delete global[removed[i]];
    if (typeof global[removed[i]] !== 'undefined') {
      global[removed[i]] = undefined;
    }
  }

  var entry;
  Object.defineProperty(global, '${INVOKE_GLOBAL}', {
    value: function () {
      return apply(entry, global, []);
    },
    writable: false,
    enumerable: false,
    configurable: false
  });

  var held;
  Object.defineProperty(global, '${DESCRIBE_GLOBAL}', {
    value: function () {
      var e = held;
      held = undefined;
      var message = null;
      var stack = null;
      try {
        message = toText(e);
      } catch (ignored) {
        message = null;
      }
      if ((typeof e === 'object' && e !== null) || typeof e === 'function') {
        try {
          var s = e.stack;
          stack = typeof s === 'string' ? s : null;
        } catch (ignored) {
          stack = null;
        }
      }
      return [message, stack];
    },
    writable: false,
    enumerable: false,
    configurable: false
  });

  return {
    bindEntry: function (fn) {
      entry = fn;
    },
    holdException: function (e) {
      held = e;
    }
  };
})(globalThis);
`.trim();

const CONTEXT_SETUP_SCRIPT = new vm.Script(CONTEXT_SETUP_CODE, { filename: 'filter-setup' });

const INVOKE_SCRIPT = new vm.Script(`${INVOKE_GLOBAL}()`, { filename: 'filter-invoke' });

const DESCRIBE_SCRIPT = new vm.Script(`${DESCRIBE_GLOBAL}()`, { filename: 'filter-describe' });

/**
 * Function defined by a filter script
 */
export type EntryFunction = (...args: unknown[]) => unknown;

/**
 * Hooks returned by the context setup script
 */
interface ContextHooks {
  bindEntry: (fn: EntryFunction | undefined) => void;
  holdException: (exception: unknown) => void;
}

function isEntryFunction(value: unknown): value is EntryFunction {
  return typeof value === 'function';
}

function ownValue(target: object, key: PropertyKey): unknown {
  return Object.getOwnPropertyDescriptor(target, key)?.value;
}

function isContextHooks(value: unknown): value is ContextHooks {
  return (
    typeof value === 'object' &&
    value !== null &&
    typeof ownValue(value, 'bindEntry') === 'function' &&
    typeof ownValue(value, 'holdException') === 'function'
  );
}

/**
 * Error code of an error raised by Node itself. Proxies and non-errors are
 * never inspected, so no filter code runs here.
 */
function hostErrorCode(error: unknown): unknown {
  return util.types.isNativeError(error) && !util.types.isProxy(error) ? ownValue(error, 'code') : undefined;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/**
 * Failed compile or run
 */
export type EngineFailure =
  | { ok: false; terminated: true }
  | { ok: false; terminated: false; exception: CapturedException };

/**
 * Result of compiling a script
 */
export type CompileOutcome = { ok: true; script: vm.Script } | EngineFailure;

/**
 * Result of running a script or invoking an entry function
 */
export type ScriptOutcome = { ok: true; value: unknown } | EngineFailure;

/**
 * One isolated global scope, created fresh per filter.
 */
export class FilterContext {
  /**
   * Script text by origin, for locating exceptions
   */
  readonly sources = new Map<string, string>();

  constructor(
    readonly sandbox: vm.Context,
    private readonly hooks: ContextHooks,
  ) {}

  /**
   * Resolve a function declared on the global object.
   * Accessors are not evaluated.
   */
  lookupFunction(name: string): EntryFunction | undefined {
    const descriptor = Object.getOwnPropertyDescriptor(this.sandbox, name);
    const value: unknown = descriptor?.value;
    return isEntryFunction(value) ? value : undefined;
  }

  /**
   * Set (or clear) the function the invoker calls.
   */
  bindEntry(fn: EntryFunction | undefined): void {
    this.hooks.bindEntry(fn);
  }

  /**
   * Hand an exception to the describer, which converts it on its next run.
   */
  holdException(exception: unknown): void {
    this.hooks.holdException(exception);
  }
}

/**
 * Collaborators injected into an engine
 */
export interface FilterEngineDeps<THost = undefined> {
  /**
   * Callbacks filters may request. Defaults to an empty registry.
   */
  registry?: CallbackRegistry<THost>;

  /**
   * Feature flags. Defaults to flags derived from the options.
   */
  features?: FilterFeatures;

  /**
   * Host state handed to callbacks through the user data
   */
  hostContext?: THost;
}

/**
 * Engine handle
 *
 * @example
 * ```typescript
 * const engine = new FilterEngine({ timeoutMs: 500 });
 * const filter = new Filter();
 * filter.initialize(engine, 'function main() { return "ok"; }', 'main', []);
 * filter.run().result; // "ok"
 * ```
 */
export class FilterEngine<THost = undefined> {
  readonly options: ResolvedFilterEngineOptions;
  readonly registry: CallbackRegistry<THost>;
  readonly features: FilterFeatures;
  readonly userData: FilterEngineUserData<THost>;

  private locked = false;
  private pendingTermination?: string;
  private lastTerminationReason = '';

  /**
   * @throws FilterConfigError if the options do not validate
   */
  constructor(options: FilterEngineOptions = {}, deps: FilterEngineDeps<THost> = {}) {
    const parsed = parseFilterEngineOptions(options);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(
        (issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'options'}: ${issue.message}`,
      );
      throw new FilterConfigError(`Invalid filter engine options: ${issues.join('; ')}`, issues);
    }
    this.options = parsed.data;
    this.registry = deps.registry ?? new CallbackRegistry<THost>();
    this.features = deps.features ?? createStaticFeatures(this.options);
    this.userData = new FilterEngineUserData<THost>(deps.hostContext);
  }

  /**
   * Create a fresh context with the nondeterministic globals removed and the
   * invoker installed.
   */
  createContext(): FilterContext {
    const sandbox = vm.createContext(
      {},
      {
        name: 'filter',
        microtaskMode: 'afterEvaluate',
        codeGeneration: {
          strings: this.options.codeGeneration.strings,
          wasm: this.options.codeGeneration.wasm,
        },
      },
    );
    const hooks: unknown = CONTEXT_SETUP_SCRIPT.runInContext(sandbox);
    if (!isContextHooks(hooks)) {
      throw new Error('Filter context setup did not return its hooks');
    }
    this.log('Created context');
    return new FilterContext(sandbox, hooks);
  }

  /**
   * Compile script text under a named origin.
   */
  compile(text: string, origin: string): CompileOutcome {
    try {
      return { ok: true, script: new vm.Script(text, { filename: origin }) };
    } catch (error: unknown) {
      return { ok: false, terminated: false, exception: captureHostException(error) };
    }
  }

  /**
   * Run a compiled script in a context under the watchdog. Promise jobs the
   * script queues run before this returns, under the same watchdog. A thrown
   * value is converted to text inside the context, under the watchdog too.
   */
  runScript(script: vm.Script, context: FilterContext): ScriptOutcome {
    this.pendingTermination = undefined;
    let value: unknown;
    try {
      value = this.runGuarded(script, context);
    } catch (error: unknown) {
      if (this.isForcedStop(error)) {
        return { ok: false, terminated: true };
      }
      return this.describeException(error, context);
    }
    if (this.pendingTermination !== undefined) {
      return { ok: false, terminated: true };
    }
    return { ok: true, value };
  }

  private runGuarded(script: vm.Script, context: FilterContext): unknown {
    return script.runInContext(context.sandbox, {
      timeout: this.options.timeoutMs,
      breakOnSigint: this.options.breakOnSigint,
      displayErrors: false,
    });
  }

  /**
   * Whether an error means the run was stopped rather than failed. Records
   * the reason for timeouts and interrupts.
   */
  private isForcedStop(error: unknown): boolean {
    const code = hostErrorCode(error);
    if (code === 'ERR_SCRIPT_EXECUTION_TIMEOUT') {
      this.lastTerminationReason = `Filter aborted due to timeout after ${this.options.timeoutMs} ms`;
      return true;
    }
    if (code === 'ERR_SCRIPT_EXECUTION_INTERRUPTED') {
      this.lastTerminationReason = 'Filter execution interrupted';
      return true;
    }
    return this.pendingTermination !== undefined;
  }

  private describeException(exception: unknown, context: FilterContext): ScriptOutcome {
    context.holdException(exception);
    let described: unknown;
    try {
      described = this.runGuarded(DESCRIBE_SCRIPT, context);
    } catch (error: unknown) {
      if (this.isForcedStop(error)) {
        return { ok: false, terminated: true };
      }
      throw error;
    }
    if (this.pendingTermination !== undefined) {
      return { ok: false, terminated: true };
    }
    if (!Array.isArray(described)) {
      throw new Error('Filter exception describer returned an unexpected value');
    }
    return {
      ok: false,
      terminated: false,
      exception: {
        message: optionalString(ownValue(described, 0)),
        stack: optionalString(ownValue(described, 1)),
      },
    };
  }

  /**
   * Call the entry function bound in a context, with the global object as
   * receiver and no arguments.
   */
  invoke(context: FilterContext): ScriptOutcome {
    return this.runScript(INVOKE_SCRIPT, context);
  }

  /**
   * Request that the current execution stop. Callbacks refuse to run from
   * now until the next script starts, and the current run is reported as
   * terminated with this reason.
   */
  terminateExecution(reason: string = DEFAULT_TERMINATION_REASON): void {
    this.log(`Terminating execution: ${reason}`);
    this.pendingTermination = reason;
    this.lastTerminationReason = reason;
  }

  /**
   * Whether a termination was requested during the current execution
   */
  isTerminationPending(): boolean {
    return this.pendingTermination !== undefined;
  }

  /**
   * Reason of the most recent forced termination
   */
  terminationReason(): string {
    return this.lastTerminationReason;
  }

  /**
   * Hold the engine exclusively for the duration of `fn`.
   *
   * @throws FilterEngineBusyError when the engine is already held
   */
  withLock<T>(fn: () => T): T {
    if (this.locked) {
      throw new FilterEngineBusyError();
    }
    this.locked = true;
    try {
      return fn();
    } finally {
      this.locked = false;
    }
  }

  /**
   * Whether the engine is currently held
   */
  get isLocked(): boolean {
    return this.locked;
  }

  /**
   * Log debug message
   */
  private log(message: string): void {
    if (this.options.debug) {
      console.log(`[FilterEngine] ${message}`);
    }
  }
}
