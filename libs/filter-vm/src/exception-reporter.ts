/**
 * Exception Reporter
 *
 * Turns whatever a filter threw into a `FilterExceptionRecord`: the value as
 * text, plus the location of the offending token when the engine recorded one.
 *
 * Node decorates the `stack` of errors raised while compiling or running a
 * vm script with a header naming the origin and line, the source line, and a
 * caret underline of the offending token:
 *
 * ```text
 * <script>:3
 *   return undefinedVar.x;
 *          ^
 *
 * ReferenceError: undefinedVar is not defined
 *     at main (<script>:3:10)
 * ```
 *
 * When the header is missing, the first stack frame that points into a known
 * script origin is used instead, with a one-character token.
 *
 * Values thrown by filter code are never inspected here: the engine converts
 * them inside the filter context, under its watchdog, and hands over a
 * `CapturedException` made of strings only.
 *
 * @packageDocumentation
 */

import type { ExceptionLocation, FilterExceptionRecord } from '@filter-vm/types';

/**
 * Reported when the exception converts to an empty string
 */
export const EMPTY_EXCEPTION_MESSAGE = 'Uncaught exception without a message';

/**
 * Reported when converting the exception to a string throws
 */
export const UNPRINTABLE_EXCEPTION_MESSAGE = 'Uncaught exception that cannot be converted to a string';

const DECORATED_HEADER = /^([^\n]*):(\d+)\n([^\n]*)\n([ \t]*)(\^+)\n/;

const STACK_FRAME = /^\s*at (?:.*? \()?(.+?):(\d+):(\d+)\)?$/;

/**
 * An exception reduced to text
 */
export interface CapturedException {
  /** `String(exception)`; absent when the conversion threw */
  message?: string;
  /** The exception's `stack`, when it was a string */
  stack?: string;
}

/**
 * Capture an exception raised by the host itself, such as a compile error.
 */
export function captureHostException(exception: unknown): CapturedException {
  let message: string | undefined;
  try {
    message = String(exception);
  } catch {
    message = undefined;
  }
  const stack = exception instanceof Error && typeof exception.stack === 'string' ? exception.stack : undefined;
  return { message, stack };
}

/**
 * Text reported for a captured message.
 */
export function exceptionMessage(captured: CapturedException): string {
  if (captured.message === undefined) {
    return UNPRINTABLE_EXCEPTION_MESSAGE;
  }
  return captured.message.length > 0 ? captured.message : EMPTY_EXCEPTION_MESSAGE;
}

/**
 * Read the location from Node's decorated stack header.
 */
export function parseDecoratedHeader(stack: string): ExceptionLocation | undefined {
  const match = DECORATED_HEADER.exec(stack);
  if (!match) {
    return undefined;
  }
  const [, sourceName, line, sourceLine, indent, carets] = match;
  return {
    sourceName,
    line: Number(line),
    startColumn: indent.length,
    endColumn: indent.length + carets.length,
    sourceLine,
  };
}

/**
 * Read the location from the first stack frame inside a known script.
 * Stack frame columns are 1-based; the returned columns are 0-based.
 */
export function parseStackFrames(stack: string, sources: ReadonlyMap<string, string>): ExceptionLocation | undefined {
  for (const frame of stack.split('\n')) {
    const match = STACK_FRAME.exec(frame);
    if (!match) {
      continue;
    }
    const [, sourceName, lineText, columnText] = match;
    const text = sources.get(sourceName);
    if (text === undefined) {
      continue;
    }
    const line = Number(lineText);
    const sourceLine = text.split('\n')[line - 1];
    if (sourceLine === undefined) {
      continue;
    }
    const startColumn = Math.max(0, Number(columnText) - 1);
    return { sourceName, line, startColumn, endColumn: startColumn + 1, sourceLine };
  }
  return undefined;
}

/**
 * Build the exception record for a captured exception.
 *
 * @param sources Script text by origin, used when the stack is not decorated
 */
export function reportException(
  captured: CapturedException,
  sources: ReadonlyMap<string, string>,
): FilterExceptionRecord {
  const message = exceptionMessage(captured);
  const { stack } = captured;
  const location = stack === undefined ? undefined : (parseDecoratedHeader(stack) ?? parseStackFrames(stack, sources));
  return location ? { message, location } : { message };
}

/**
 * Build the record for a forced termination.
 */
export function reportTermination(reason: string): FilterExceptionRecord {
  return { message: reason, terminated: true };
}

/**
 * Render a record as log lines: the message, or `file:line message`, the
 * source line and a caret line under the offending token.
 */
export function formatExceptionRecord(record: FilterExceptionRecord): string[] {
  const { message, location } = record;
  if (!location) {
    return [message];
  }
  const width = Math.max(0, location.endColumn - location.startColumn);
  return [
    `${location.sourceName}:${location.line} ${message}`,
    location.sourceLine,
    `${' '.repeat(location.startColumn)}${'^'.repeat(width)}`,
  ];
}
