/**
 * Filter Runner
 *
 * Compile and run a filter once, without keeping it, and describe what
 * happened in a single report.
 *
 * @packageDocumentation
 */

import type { FilterTestReport } from '@filter-vm/types';
import type { FilterEngine } from './engine';
import { Filter } from './filter';

/**
 * Input for a one-shot filter run
 */
export interface TestFilterInput {
  /** Script text */
  script: string;

  /**
   * Entry function name
   * @default 'main'
   */
  entryPoint?: string;

  /**
   * Callbacks to expose to the script
   * @default []
   */
  callbacks?: Iterable<string>;
}

/**
 * Initialize a filter, run it once with the callback log enabled, and
 * destroy it.
 *
 * @example
 * ```typescript
 * const report = testFilter(engine, { script: 'function main() { return "ok"; }' });
 * report.result; // "ok"
 * ```
 */
export function testFilter<THost>(engine: FilterEngine<THost>, input: TestFilterInput): FilterTestReport {
  const filter = new Filter<THost>();
  try {
    const init = filter.initialize(engine, input.script, input.entryPoint ?? 'main', input.callbacks ?? []);
    if (init.diagnostic !== '') {
      return { compiled: false, status: init.status, diagnostic: init.diagnostic, callbacks: [] };
    }

    const run = filter.runWithCallbackLog();
    const report: FilterTestReport = {
      compiled: true,
      status: run.status,
      result: run.result,
      callbacks: run.callbacks,
    };
    if (run.exception) {
      report.exception = run.exception;
    }
    return report;
  } finally {
    filter.destroy();
  }
}
