import { z } from 'zod';
import { FilterStatus } from '@filter-vm/types';
import { createCallbackRegistry, defineCallback } from '../callback-registry';
import { FilterEngine } from '../engine';
import { FilterEngineBusyError } from '../errors';
import { DESTROYED_WHILE_RUNNING_REASON, Filter } from '../filter';

describe('Callbacks', () => {
  const add = defineCallback({
    name: 'add',
    argsSchema: z.tuple([z.number(), z.number()]),
    handler: ([a, b]) => a + b,
  });
  const registry = createCallbackRegistry([
    { name: 'double', handler: (args) => Number(args[0]) * 2 },
    {
      name: 'fail',
      handler: () => {
        throw new Error('boom');
      },
    },
    {
      name: 'outOfRange',
      handler: () => {
        throw new RangeError('out');
      },
    },
    {
      name: 'badType',
      handler: () => {
        throw new TypeError('bad');
      },
    },
    { name: 'noop', handler: () => undefined },
    { name: 'echo', handler: (args) => args },
    { name: 'bigint', handler: () => BigInt(1) },
    { name: 'greet', argsSchema: z.tuple([z.string()]), handler: (args) => `hello ${String(args[0])}` },
    add,
  ]);

  let engine: FilterEngine;
  let filter: Filter;

  beforeEach(() => {
    engine = new FilterEngine({}, { registry });
    filter = new Filter();
  });

  afterEach(() => {
    filter.destroy();
  });

  function load(body: string, callbacks: string[]): void {
    const init = filter.initialize(engine, `function main() { ${body} }`, 'main', callbacks);
    expect(init.diagnostic).toBe('');
  }

  describe('installation', () => {
    it('should expose only the requested callbacks', () => {
      load('return typeof double + "," + typeof fail;', ['double']);

      expect(filter.run().result).toBe('function,undefined');
    });

    it('should name the installed function after the callback', () => {
      load('return double.name;', ['double']);

      expect(filter.run().result).toBe('double');
    });

    it('should not let the script overwrite a callback', () => {
      load('double = function () { return 1; }; return String(double(4));', ['double']);

      expect(filter.run().result).toBe('8');
    });

    it('should accept the same name requested twice', () => {
      load('return String(double(1));', ['double', 'double']);

      expect(filter.run().result).toBe('2');
    });
  });

  describe('marshalling', () => {
    it('should pass arguments and return the result', () => {
      load('return String(double(21));', ['double']);

      expect(filter.run().result).toBe('42');
    });

    it('should copy structured values across the boundary', () => {
      load('var out = echo({ a: [1, "x"] }, null); return JSON.stringify(out) + ":" + Array.isArray(out);', ['echo']);

      expect(filter.run().result).toBe('[{"a":[1,"x"]},null]:true');
    });

    it('should return undefined when the handler returns nothing', () => {
      load('return typeof noop();', ['noop']);

      expect(filter.run().result).toBe('undefined');
    });

    it('should raise handler errors inside the filter', () => {
      load('try { fail(); } catch (e) { return (e instanceof Error) + ":" + e.message; }', ['fail']);

      expect(filter.run().result).toBe('true:boom');
    });

    it('should keep the error type of handler errors', () => {
      load(
        'var out = []; try { badType(); } catch (e) { out.push(e instanceof TypeError); } try { outOfRange(); } catch (e) { out.push(e.name + ":" + e.message); } return out.join(",");',
        ['badType', 'outOfRange'],
      );

      expect(filter.run().result).toBe('true,RangeError:out');
    });

    it('should reject arguments that are not JSON-serializable', () => {
      load('try { echo(1n); } catch (e) { return e.name + ":" + e.message; }', ['echo']);

      expect(filter.run().result).toBe('TypeError:Arguments of callback echo must be JSON-serializable');
    });

    it('should reject results that are not JSON-serializable', () => {
      load('try { bigint(); } catch (e) { return e.message; }', ['bigint']);

      expect(filter.run().result).toBe('Callback bigint returned a value that is not JSON-serializable');
    });

    it('should validate typed callback arguments', () => {
      load('var sum = add(2, 3); try { add("a", 1); } catch (e) { return sum + "|" + e.message; }', ['add']);

      expect(filter.run().result).toBe('5|Invalid arguments for callback "add": 0: Expected number, received string');
    });

    it('should validate arguments of a plain definition with a schema', () => {
      load('var ok = greet("ann"); try { greet(7); } catch (e) { return ok + "|" + e.name + ":" + e.message; }', [
        'greet',
      ]);

      expect(filter.run().result).toBe(
        'hello ann|TypeError:Invalid arguments for callback "greet": 0: Expected string, received number',
      );
    });

    it('should report an uncaught handler error as a diagnostic', () => {
      load('fail();', ['fail']);

      const run = filter.run();

      expect(run.status).toBe(FilterStatus.NoError);
      expect(run.result).toBe('Error: boom');
    });
  });

  describe('callback log', () => {
    it('should record calls in order with results and errors', () => {
      load('var a = double(2); try { fail("x"); } catch (e) { return a + ":" + e.message; }', ['double', 'fail']);

      const run = filter.runWithCallbackLog();

      expect(run.result).toBe('4:boom');
      expect(run.callbacks).toEqual([
        { method: 'double', params: [2], result: 4 },
        { method: 'fail', params: ['x'], error: 'boom' },
      ]);
    });

    it('should record callbacks made from promise jobs within the same run', () => {
      load('Promise.resolve(3).then(function (n) { double(n); }); return "queued";', ['double']);

      const run = filter.runWithCallbackLog();

      expect(run.result).toBe('queued');
      expect(run.callbacks).toEqual([{ method: 'double', params: [3], result: 6 }]);
    });

    it('should record a missing result as null', () => {
      load('noop(1); return "done";', ['noop']);

      expect(filter.runWithCallbackLog().callbacks).toEqual([{ method: 'noop', params: [1], result: null }]);
    });

    it('should start a fresh log for every run', () => {
      load('double(1); return "done";', ['double']);

      filter.runWithCallbackLog();
      const second = filter.runWithCallbackLog();

      expect(second.callbacks).toEqual([{ method: 'double', params: [1], result: 2 }]);
    });

    it('should not record when the log is off', () => {
      load('double(1); return "done";', ['double']);

      filter.run();

      expect(engine.userData.callbacks).toEqual([]);
    });

    it('should hand the host context to callbacks', () => {
      const hostRegistry = createCallbackRegistry<{ prefix: string }>([
        { name: 'tag', handler: (args, userData) => `${userData.hostContext?.prefix ?? ''}${String(args[0])}` },
      ]);
      const hostEngine = new FilterEngine({}, { registry: hostRegistry, hostContext: { prefix: 'tx-' } });
      const hostFilter = new Filter<{ prefix: string }>();
      hostFilter.initialize(hostEngine, 'function main() { return tag("7"); }', 'main', ['tag']);

      expect(hostFilter.run().result).toBe('tx-7');

      hostFilter.destroy();
    });
  });

  describe('termination', () => {
    it('should report the destroy reason when destroyed from a callback', () => {
      const stopRegistry = createCallbackRegistry([
        {
          name: 'stop',
          handler: () => {
            stoppable.destroy();
            return 'stopped';
          },
        },
      ]);
      const stopEngine = new FilterEngine({}, { registry: stopRegistry });
      const stoppable = new Filter();
      stoppable.initialize(stopEngine, 'function main() { stop(); return "finished"; }', 'main', ['stop']);

      const run = stoppable.run();

      expect(run.result).toBe(DESTROYED_WHILE_RUNNING_REASON);
      expect(run.exception).toEqual({ message: DESTROYED_WHILE_RUNNING_REASON, terminated: true });
      expect(stoppable.isInitialized).toBe(false);
      expect(stoppable.isRunning).toBe(false);
    });

    it('should refuse further callbacks after termination was requested', () => {
      const calls: string[] = [];
      const stopRegistry = createCallbackRegistry([
        {
          name: 'stop',
          handler: () => {
            calls.push('stop');
            stoppable.destroy();
          },
        },
        {
          name: 'after',
          handler: () => {
            calls.push('after');
          },
        },
      ]);
      const stopEngine = new FilterEngine({}, { registry: stopRegistry });
      const stoppable = new Filter();
      stoppable.initialize(
        stopEngine,
        'function main() { stop(); try { after(); } catch (e) { return e.message; } return "ran"; }',
        'main',
        ['stop', 'after'],
      );

      const run = stoppable.run();

      expect(run.result).toBe(DESTROYED_WHILE_RUNNING_REASON);
      expect(calls).toEqual(['stop']);
    });
  });

  describe('engine lock', () => {
    it('should reject a nested initialize on the same engine', () => {
      const nested = new Filter();
      const lockRegistry = createCallbackRegistry([
        {
          name: 'reenter',
          handler: () => nested.initialize(lockEngine, 'function main() {}', 'main', []).diagnostic,
        },
      ]);
      const lockEngine: FilterEngine = new FilterEngine({}, { registry: lockRegistry });
      const outer = new Filter();
      outer.initialize(lockEngine, 'function main() { try { reenter(); } catch (e) { return e.name; } }', 'main', [
        'reenter',
      ]);

      expect(outer.run().result).toBe('FilterEngineBusyError');
      expect(lockEngine.isLocked).toBe(false);

      outer.destroy();
    });

    it('should throw FilterEngineBusyError on re-entrant use', () => {
      expect(() => engine.withLock(() => engine.withLock(() => 1))).toThrow(FilterEngineBusyError);
      expect(engine.isLocked).toBe(false);
    });
  });
});
