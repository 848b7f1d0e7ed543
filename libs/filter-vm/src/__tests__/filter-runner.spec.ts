import { FilterStatus, parseFilterTestReport } from '@filter-vm/types';
import { createCallbackRegistry } from '../callback-registry';
import { FilterEngine } from '../engine';
import { testFilter } from '../filter-runner';

describe('testFilter', () => {
  const registry = createCallbackRegistry([{ name: 'getfiltertransaction', handler: () => ({ amount: 5 }) }]);
  const engine = new FilterEngine({ timeoutMs: 100 }, { registry });

  it('should report a successful run with its callback log', () => {
    const report = testFilter(engine, {
      script: 'function main() { return getfiltertransaction().amount > 1 ? "accept" : "reject"; }',
      callbacks: ['getfiltertransaction'],
    });

    expect(report).toEqual({
      compiled: true,
      status: FilterStatus.NoError,
      result: 'accept',
      callbacks: [{ method: 'getfiltertransaction', params: [], result: { amount: 5 } }],
    });
    expect(parseFilterTestReport(report).success).toBe(true);
  });

  it('should use the given entry point', () => {
    const report = testFilter(engine, { script: 'function check() { return "ok"; }', entryPoint: 'check' });

    expect(report.result).toBe('ok');
  });

  it('should report a compile failure', () => {
    const report = testFilter(engine, { script: 'function main() { return "ok"; }', entryPoint: 'missing' });

    expect(report).toEqual({
      compiled: false,
      status: FilterStatus.NoError,
      diagnostic: "Cannot find function 'missing' in script",
      callbacks: [],
    });
  });

  it('should report an unknown callback as an internal error', () => {
    const report = testFilter(engine, { script: 'function main() {}', callbacks: ['nope'] });

    expect(report.compiled).toBe(false);
    expect(report.status).toBe(FilterStatus.InternalError);
    expect(report.diagnostic).toBe('Undefined callback name: nope');
  });

  it('should include the exception of a failed run', () => {
    const report = testFilter(engine, { script: 'function main() { for (;;) {} }' });

    expect(report.compiled).toBe(true);
    expect(report.result).toBe('Filter aborted due to timeout after 100 ms');
    expect(report.exception).toEqual({ message: 'Filter aborted due to timeout after 100 ms', terminated: true });
    expect(parseFilterTestReport(report).success).toBe(true);
  });

  it('should release the engine after each run', () => {
    testFilter(engine, { script: 'function main() { undefinedVar.x; }' });

    expect(engine.isLocked).toBe(false);
  });
});
