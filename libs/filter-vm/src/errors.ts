/**
 * Host-level filter errors
 *
 * Script-level failures never surface as these; they are reported as
 * diagnostic text. These errors are thrown for faults in how the host uses
 * the engine.
 *
 * @packageDocumentation
 */

/**
 * Thrown when a filter is initialized or run on an engine that is already
 * executing one, e.g. from inside a callback.
 */
export class FilterEngineBusyError extends Error {
  /** Error code for identification */
  public readonly code = 'ENGINE_BUSY';

  constructor(message = 'Filter engine is already executing a filter') {
    super(message);
    this.name = 'FilterEngineBusyError';
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, FilterEngineBusyError);
    }
  }
}

/**
 * Thrown when engine options or a callback definition are invalid.
 */
export class FilterConfigError extends Error {
  /** Error code for identification */
  public readonly code = 'INVALID_CONFIG';

  constructor(
    message: string,
    /** One `path: message` line per validation issue */
    public readonly issues: string[] = [],
  ) {
    super(message);
    this.name = 'FilterConfigError';
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, FilterConfigError);
    }
  }
}

/**
 * Thrown when two callbacks with the same name are registered.
 */
export class DuplicateCallbackError extends Error {
  /** Error code for identification */
  public readonly code = 'DUPLICATE_CALLBACK';

  constructor(public readonly callbackName: string) {
    super(`Callback "${callbackName}" is already registered`);
    this.name = 'DuplicateCallbackError';
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DuplicateCallbackError);
    }
  }
}
