import { z } from 'zod';
import {
  CallbackRegistry,
  createCallbackRegistry,
  defineCallback,
  invokeCallback,
  isReservedGlobalName,
  parseCallbackArgs,
  type CallbackDefinition,
} from '../callback-registry';
import { FilterEngineUserData } from '../engine-user-data';
import { DuplicateCallbackError, FilterConfigError } from '../errors';

describe('CallbackRegistry', () => {
  it('should list callbacks in registration order', () => {
    const registry = createCallbackRegistry([
      { name: 'getfiltertransaction', handler: () => '{}' },
      { name: 'getfilterblock', handler: () => '{}' },
    ]);

    expect(registry.list()).toEqual(['getfiltertransaction', 'getfilterblock']);
    expect(registry.size).toBe(2);
  });

  it('should look up callbacks by name', () => {
    const registry = new CallbackRegistry([{ name: 'lookup', description: 'Find a value', handler: () => 1 }]);

    expect(registry.has('lookup')).toBe(true);
    expect(registry.lookup('lookup')?.description).toBe('Find a value');
    expect(registry.has('missing')).toBe(false);
    expect(registry.lookup('missing')).toBeUndefined();
  });

  it('should start empty by default', () => {
    expect(new CallbackRegistry().size).toBe(0);
  });

  it('should reject duplicate names', () => {
    const create = () =>
      createCallbackRegistry([
        { name: 'dup', handler: () => 1 },
        { name: 'dup', handler: () => 2 },
      ]);

    expect(create).toThrow(DuplicateCallbackError);
    expect(create).toThrow('Callback "dup" is already registered');
  });

  it('should reject reserved names', () => {
    expect(() => createCallbackRegistry([{ name: '__filter_invoke__', handler: () => 1 }])).toThrow(FilterConfigError);
    expect(() => createCallbackRegistry([{ name: '__host_bridge', handler: () => 1 }])).toThrow(FilterConfigError);
  });

  it('should reject empty names', () => {
    expect(() => createCallbackRegistry([{ name: '', handler: () => 1 }])).toThrow(
      'Callback name must be a non-empty string',
    );
  });

  describe('isReservedGlobalName', () => {
    it('should match runtime prefixes only', () => {
      expect(isReservedGlobalName('__filter_x')).toBe(true);
      expect(isReservedGlobalName('__host_x')).toBe(true);
      expect(isReservedGlobalName('filter_x')).toBe(false);
    });
  });

  describe('defineCallback', () => {
    const userData = new FilterEngineUserData();

    it('should pass validated arguments to the handler', () => {
      const callback = defineCallback({
        name: 'greet',
        argsSchema: z.tuple([z.string()]),
        handler: ([name]) => `hello ${name}`,
      });

      expect(callback.handler(['ada'], userData)).toBe('hello ada');
    });

    it('should throw a TypeError listing every issue', () => {
      const callback = defineCallback({
        name: 'pair',
        argsSchema: z.tuple([z.string(), z.number()]),
        handler: () => 'unreachable',
      });

      expect(() => callback.handler([1, 'x'], userData)).toThrow(
        new TypeError(
          'Invalid arguments for callback "pair": 0: Expected string, received number; 1: Expected number, received string',
        ),
      );
    });

    it('should use args as the path for whole-list issues', () => {
      const callback = defineCallback({
        name: 'none',
        argsSchema: z.tuple([]),
        handler: () => 'ok',
      });

      expect(() => callback.handler([1], userData)).toThrow(
        'Invalid arguments for callback "none": args: Array must contain at most 0 element(s)',
      );
    });
  });

  describe('parseCallbackArgs', () => {
    it('should return the parsed arguments', () => {
      expect(parseCallbackArgs('pair', z.tuple([z.string(), z.coerce.number()]), ['a', '2'])).toEqual(['a', 2]);
    });

    it('should name every issue path', () => {
      expect(() => parseCallbackArgs('pair', z.tuple([z.string(), z.number()]), [1, 'b'])).toThrow(
        'Invalid arguments for callback "pair": 0: Expected string, received number; 1: Expected number, received string',
      );
    });
  });

  describe('invokeCallback', () => {
    const userData = new FilterEngineUserData();

    it('should validate a plain definition that carries a schema', () => {
      const greet: CallbackDefinition = {
        name: 'greet',
        argsSchema: z.tuple([z.string()]),
        handler: (args) => `hello ${String(args[0])}`,
      };

      expect(invokeCallback(greet, ['ann'], userData)).toBe('hello ann');
      expect(() => invokeCallback(greet, [7], userData)).toThrow(TypeError);
      expect(() => invokeCallback(greet, [7], userData)).toThrow(
        'Invalid arguments for callback "greet": 0: Expected string, received number',
      );
    });

    it('should pass arguments through when there is no schema', () => {
      const echo: CallbackDefinition = { name: 'echo', handler: (args) => args };

      expect(invokeCallback(echo, [1, 'x'], userData)).toEqual([1, 'x']);
    });
  });
});
