/**
 * Callback Registry
 *
 * Immutable table of the host functions filters may call, keyed by the
 * global name they are installed under.
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import type { FilterEngineUserData } from './engine-user-data';
import { DuplicateCallbackError, FilterConfigError } from './errors';

/**
 * Prefixes reserved for runtime globals inside filter contexts.
 */
export const RESERVED_GLOBAL_PREFIXES = ['__filter_', '__host_'] as const;

/**
 * Host implementation of a callback.
 *
 * Receives the call arguments (already decoded from the sandbox) and the
 * engine user data. Returns a JSON-serializable value or throws; a thrown
 * error becomes an exception inside the filter.
 */
export type CallbackHandler<THost = undefined, TArgs extends unknown[] = unknown[]> = (
  args: TArgs,
  userData: FilterEngineUserData<THost>,
) => unknown;

/**
 * Callback definition for registration
 */
export interface CallbackDefinition<THost = undefined> {
  /**
   * Global name inside the filter context (must be unique)
   */
  name: string;

  /**
   * Description for documentation
   */
  description?: string;

  /**
   * Zod schema for the argument list, checked before the handler runs
   */
  argsSchema?: z.ZodType<unknown[], z.ZodTypeDef, unknown>;

  /**
   * Host implementation
   */
  handler: CallbackHandler<THost>;
}

/**
 * Callback definition whose arguments are validated before the handler runs
 */
export interface TypedCallbackDefinition<TArgs extends unknown[], THost = undefined> {
  name: string;
  description?: string;
  /**
   * Zod schema for the argument list
   */
  argsSchema: z.ZodType<TArgs, z.ZodTypeDef, unknown>;
  handler: CallbackHandler<THost, TArgs>;
}

/**
 * Validate a callback argument list.
 *
 * @throws TypeError listing every issue
 */
export function parseCallbackArgs<TArgs>(
  name: string,
  argsSchema: z.ZodType<TArgs, z.ZodTypeDef, unknown>,
  args: unknown[],
): TArgs {
  const parsed = argsSchema.safeParse(args);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'args'}: ${issue.message}`)
      .join('; ');
    throw new TypeError(`Invalid arguments for callback "${name}": ${details}`);
  }
  return parsed.data;
}

/**
 * Run a callback: validate the arguments against `argsSchema` when the
 * definition has one, then call the handler.
 */
export function invokeCallback<THost>(
  definition: CallbackDefinition<THost>,
  args: unknown[],
  userData: FilterEngineUserData<THost>,
): unknown {
  const params = definition.argsSchema ? parseCallbackArgs(definition.name, definition.argsSchema, args) : args;
  return definition.handler(params, userData);
}

/**
 * Wrap a handler so its argument list is validated against a schema.
 * Invalid arguments raise a TypeError inside the filter.
 */
export function defineCallback<TArgs extends unknown[], THost = undefined>(
  definition: TypedCallbackDefinition<TArgs, THost>,
): CallbackDefinition<THost> {
  const { name, description, argsSchema, handler } = definition;
  return {
    name,
    description,
    handler: (args, userData) => handler(parseCallbackArgs(name, argsSchema, args), userData),
  };
}

/**
 * Check whether a global name is reserved for the runtime
 */
export function isReservedGlobalName(name: string): boolean {
  return RESERVED_GLOBAL_PREFIXES.some((prefix) => name.startsWith(prefix));
}

/**
 * Callback Registry
 *
 * Populated once at construction and read-only afterwards, so it can be
 * shared by every engine in the process.
 */
export class CallbackRegistry<THost = undefined> {
  private readonly callbacks: ReadonlyMap<string, CallbackDefinition<THost>>;

  /**
   * @throws DuplicateCallbackError if two definitions share a name
   * @throws FilterConfigError if a name is empty or reserved
   */
  constructor(definitions: Iterable<CallbackDefinition<THost>> = []) {
    const callbacks = new Map<string, CallbackDefinition<THost>>();
    for (const definition of definitions) {
      if (definition.name.length === 0) {
        throw new FilterConfigError('Callback name must be a non-empty string');
      }
      if (isReservedGlobalName(definition.name)) {
        throw new FilterConfigError(
          `Callback name "${definition.name}" uses a reserved prefix (${RESERVED_GLOBAL_PREFIXES.join(', ')})`,
        );
      }
      if (callbacks.has(definition.name)) {
        throw new DuplicateCallbackError(definition.name);
      }
      callbacks.set(definition.name, definition);
    }
    this.callbacks = callbacks;
  }

  /**
   * Find a callback by name
   */
  lookup(name: string): CallbackDefinition<THost> | undefined {
    return this.callbacks.get(name);
  }

  /**
   * Check if a callback is registered
   */
  has(name: string): boolean {
    return this.callbacks.has(name);
  }

  /**
   * List all registered callback names
   */
  list(): string[] {
    return Array.from(this.callbacks.keys());
  }

  /**
   * Get count of registered callbacks
   */
  get size(): number {
    return this.callbacks.size;
  }
}

/**
 * Create a callback registry
 */
export function createCallbackRegistry<THost = undefined>(
  definitions: Iterable<CallbackDefinition<THost>> = [],
): CallbackRegistry<THost> {
  return new CallbackRegistry(definitions);
}
