/**
 * Callback Bridge
 *
 * Installs registry callbacks as global functions of a filter context.
 *
 * Values cross the boundary as JSON strings only: arguments are serialized
 * inside the context, results are parsed inside the context with intrinsics
 * captured before user code runs. No host object, function or prototype is
 * ever reachable from the filter. Host errors are rebuilt as context-realm
 * errors with the same name and message.
 *
 * @packageDocumentation
 */

import * as vm from 'vm';
import { invokeCallback } from './callback-registry';
import type { FilterContext, FilterEngine } from './engine';

/**
 * Temporary global holding the host side of the bridge while it is captured
 */
const HOST_BRIDGE_GLOBAL = '__host_callbackBridge__';

const BRIDGE_INIT_SCRIPT = new vm.Script(
  `
(function (global) {
  var bridge = global.${HOST_BRIDGE_GLOBAL};
  var stringify = JSON.stringify;
  var parse = JSON.parse;
  var apply = Reflect.apply;
  var slice = Array.prototype.slice;
  var hasOwn = Object.prototype.hasOwnProperty;
  var defineProperty = Object.defineProperty;
  var ErrorCtor = Error;
  var TypeErrorCtor = TypeError;

  try { delete global.${HOST_BRIDGE_GLOBAL}; } catch (e) { /* removed by the host */ }

  function makeError(message, name) {
    if (name === 'TypeError') return new TypeErrorCtor(message);
    var err = new ErrorCtor(message);
    if (name && name !== 'Error') err.name = name;
    return err;
  }

  return function install(name) {
    var callback = function () {
      var requestJson;
      try {
        requestJson = stringify(apply(slice, arguments, []));
      } catch (e) {
        throw makeError('Arguments of callback ' + name + ' must be JSON-serializable', 'TypeError');
      }

      var response = parse(bridge(name, requestJson));
      if (response.ok === true) {
        return hasOwn.call(response, 'value') ? response.value : undefined;
      }
      throw makeError(response.error.message, response.error.name);
    };
    defineProperty(callback, 'name', { value: name, configurable: true });
    defineProperty(global, name, {
      value: callback,
      writable: false,
      enumerable: false,
      configurable: false
    });
  };
})(globalThis)
`.trim(),
  { filename: 'filter-bridge' },
);

type BridgeInstaller = (name: string) => void;

function isBridgeInstaller(value: unknown): value is BridgeInstaller {
  return typeof value === 'function';
}

/**
 * Response sent back into the context
 */
type BridgeResponse = { ok: true; value?: unknown } | { ok: false; error: { name: string; message: string } };

function errorResponse(name: string, message: string): string {
  const response: BridgeResponse = { ok: false, error: { name, message } };
  return JSON.stringify(response);
}

/**
 * Build the host side of the bridge: decode arguments, run the handler with
 * the engine user data, record the call, encode the result.
 */
export function createHostCallbackBridge<THost>(
  engine: FilterEngine<THost>,
): (name: unknown, requestJson: unknown) => string {
  return (name, requestJson) => {
    if (typeof name !== 'string' || typeof requestJson !== 'string') {
      return errorResponse('TypeError', 'Malformed callback request');
    }
    if (engine.isTerminationPending()) {
      return errorResponse('Error', engine.terminationReason());
    }

    const definition = engine.registry.lookup(name);
    if (!definition) {
      return errorResponse('ReferenceError', `Undefined callback name: ${name}`);
    }

    const decoded: unknown = JSON.parse(requestJson);
    const params: unknown[] = Array.isArray(decoded) ? decoded : [];

    let value: unknown;
    try {
      value = invokeCallback(definition, params, engine.userData);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      engine.userData.record({ method: name, params, error: message });
      return errorResponse(error instanceof Error ? error.name : 'Error', message);
    }

    let response: BridgeResponse;
    try {
      const encoded: string | undefined = value === undefined ? undefined : JSON.stringify(value);
      response = encoded === undefined ? { ok: true } : { ok: true, value: JSON.parse(encoded) };
    } catch {
      const message = `Callback ${name} returned a value that is not JSON-serializable`;
      engine.userData.record({ method: name, params, error: message });
      return errorResponse('TypeError', message);
    }

    engine.userData.record({ method: name, params, result: 'value' in response ? response.value : null });
    return JSON.stringify(response);
  };
}

/**
 * Install one global function per callback name in the context.
 * Names must already be validated against the engine's registry.
 */
export function installCallbacks<THost>(
  engine: FilterEngine<THost>,
  context: FilterContext,
  names: readonly string[],
): void {
  if (names.length === 0) {
    return;
  }

  Object.defineProperty(context.sandbox, HOST_BRIDGE_GLOBAL, {
    value: createHostCallbackBridge(engine),
    writable: false,
    configurable: true,
    enumerable: false,
  });

  let installer: unknown;
  try {
    installer = BRIDGE_INIT_SCRIPT.runInContext(context.sandbox);
  } finally {
    Reflect.deleteProperty(context.sandbox, HOST_BRIDGE_GLOBAL);
  }

  if (!isBridgeInstaller(installer)) {
    throw new Error('Callback bridge initialization did not return an installer');
  }
  for (const name of names) {
    installer(name);
  }
}
