/**
 * Determinism Preamble
 *
 * Script run inside every filter context before user code. It pins the
 * sources of nondeterminism that remain in a bare V8 context: the random
 * number generator, the clock, and `new Date()`.
 *
 * @packageDocumentation
 */

/**
 * Math members kept when math built-ins are limited.
 */
export const MATH_ALLOW_LIST: readonly string[] = Object.freeze([
  'abs',
  'ceil',
  'floor',
  'max',
  'min',
  'round',
  'sign',
  'trunc',
  'log',
  'log10',
  'log2',
  'pow',
  'sqrt',
  'E',
  'LN10',
  'LN2',
  'LOG10E',
  'LOG2E',
  'PI',
  'SQRT1_2',
  'SQRT2',
]);

/**
 * Base preamble.
 *
 * `Date` becomes a constructor that builds `new Date(0)` when given no
 * arguments and otherwise forwards to the original, keeping `new.target` so
 * subclasses still work. Called without `new` it builds the same Date object
 * instead of a string in the host time zone. Every own property of the original constructor is
 * copied over (`prototype`, `parse`, `UTC`, the pinned `now`, `length`,
 * `name`), and the shared prototype points back at the replacement.
 */
export const BASE_PREAMBLE = `
(function (global) {
  var OriginalDate = global.Date;
  var construct = Reflect.construct;
  var apply = Reflect.apply;
  var slice = Array.prototype.slice;
  var defineProperty = Object.defineProperty;
  var getOwnPropertyNames = Object.getOwnPropertyNames;
  var getOwnPropertyDescriptor = Object.getOwnPropertyDescriptor;

  global.Math.random = function random() {
    return 0;
  };

  OriginalDate.now = function now() {
    return 0;
  };

  function Date() {
    var args = arguments.length === 0 ? [0] : apply(slice, arguments, []);
    return construct(OriginalDate, args, new.target === undefined ? OriginalDate : new.target);
  }

  var names = getOwnPropertyNames(OriginalDate);
  for (var i = 0; i < names.length; i++) {
    defineProperty(Date, names[i], getOwnPropertyDescriptor(OriginalDate, names[i]));
  }
  defineProperty(OriginalDate.prototype, 'constructor', {
    value: Date,
    writable: true,
    enumerable: false,
    configurable: true
  });

  global.Date = Date;
})(globalThis);
`.trim();

/**
 * Fragment appended when math built-ins are limited. Deletes every Math
 * member outside the allow-list and removes `Date.now` altogether, so any use
 * fails instead of silently returning zero.
 */
export const LIMIT_MATH_PREAMBLE = `
(function (global) {
  var keep = ${JSON.stringify(MATH_ALLOW_LIST)};
  var names = Object.getOwnPropertyNames(global.Math);
  for (var i = 0; i < names.length; i++) {
    if (keep.indexOf(names[i]) === -1) {
      delete global.Math[names[i]];
    }
  }
  delete global.Date.now;
})(globalThis);
`.trim();

/**
 * Options for building the preamble
 */
export interface PreambleOptions {
  /** Append the math/date restriction fragment */
  limitMath: boolean;
}

/**
 * Build the preamble text for one filter context.
 */
export function buildPreamble(options: PreambleOptions): string {
  return options.limitMath ? `${BASE_PREAMBLE}\n${LIMIT_MATH_PREAMBLE}` : BASE_PREAMBLE;
}
