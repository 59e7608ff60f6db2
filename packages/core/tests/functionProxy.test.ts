import { describe, expect, it, vi } from 'vitest';

import { anchorEquals, identityHash, representProxy } from '../src/proxy/identity';
import { wrapFunction } from '../src/proxy/proxyFactory';
import { WRAPPED } from '../src/proxy/types';

function add(a: number, b: number): number {
  return a + b;
}

describe('wrapFunction', () => {
  it('returns the original result through a pass-through callback', () => {
    const proxy = wrapFunction(add, (wrapped, _receiver, args) => wrapped(...args));

    for (const [a, b] of [
      [0, 0],
      [2, 3],
      [-4, 1.5],
    ]) {
      expect(proxy(a, b)).toBe(add(a, b));
    }
  });

  it('passes a null receiver, the arguments and the config to the callback', () => {
    const calls: Array<{ receiver: unknown; args: unknown; config: unknown }> = [];
    const proxy = wrapFunction(
      add,
      (wrapped, receiver, args, config) => {
        calls.push({ receiver, args, config });
        return wrapped(...args);
      },
      { config: { label: 'sum' } },
    );

    expect(proxy(1, 2)).toBe(3);
    expect(calls).toEqual([{ receiver: null, args: [1, 2], config: { label: 'sum' } }]);
  });

  it('hands the callback the target itself', () => {
    const tagged = Object.assign(
      function tagged(value: number): number {
        return value + 1;
      },
      { meta: 'm' },
    );
    const seen: unknown[] = [];
    const proxy = wrapFunction(tagged, (wrapped, _receiver, args) => {
      seen.push(wrapped);
      return wrapped(...args);
    });

    expect(proxy(1)).toBe(2);
    expect(seen[0]).toBe(tagged);
    expect(seen).toEqual([tagged]);
  });

  it('ignores the call-site this', () => {
    const receivers: unknown[] = [];
    const proxy = wrapFunction(add, (wrapped, receiver, args) => {
      receivers.push(receiver);
      return wrapped(...args);
    });
    const holder = { run: proxy };

    expect(holder.run(4, 5)).toBe(9);
    expect(receivers).toEqual([null]);
  });

  it('freezes a copy of the config at construction', () => {
    const config = { retries: 1 };
    const seen: Array<{ retries: number }> = [];
    const proxy = wrapFunction(
      add,
      (wrapped, _receiver, args, frozen) => {
        seen.push(frozen);
        return wrapped(...args);
      },
      { config },
    );

    config.retries = 2;
    proxy(1, 1);

    expect(seen[0].retries).toBe(1);
    expect(Object.isFrozen(seen[0])).toBe(true);
  });

  it('lets the callback skip the original', () => {
    const original = vi.fn((a: number, b: number) => a * b);
    const proxy = wrapFunction(original, () => 42);

    expect(proxy(3, 3)).toBe(42);
    expect(original).not.toHaveBeenCalled();
  });

  it('propagates callback failures unchanged', () => {
    const failure = new Error('boom');
    const proxy = wrapFunction(add, () => {
      throw failure;
    });

    let caught: unknown;
    try {
      proxy(1, 2);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBe(failure);
  });

  it('propagates failures raised by the original', () => {
    const explode = (): never => {
      throw new TypeError('original failed');
    };
    const proxy = wrapFunction(explode, (wrapped, _receiver, args) => wrapped(...args));

    expect(() => proxy()).toThrow(new TypeError('original failed'));
  });

  it('passes promises through untouched', async () => {
    const fetchValue = async (key: string): Promise<string> => `value:${key}`;
    const proxy = wrapFunction(fetchValue, (wrapped, _receiver, args) => wrapped(...args));

    await expect(proxy('a')).resolves.toBe('value:a');
  });

  it('reports the identity of the original', () => {
    const proxy = wrapFunction(add, (wrapped, _receiver, args) => wrapped(...args));

    expect(proxy).not.toBe(add);
    expect(anchorEquals(proxy, add)).toBe(true);
    expect(identityHash(proxy)).toBe(identityHash(add));
    expect(representProxy(proxy)).toBe('<FunctionProxy for [Function: add]>');
    expect(Reflect.get(proxy, WRAPPED)).toBe(add);
  });

  it('collapses nested proxies to the innermost original', () => {
    const layers: string[] = [];
    const inner = wrapFunction(add, (wrapped, _receiver, args) => {
      layers.push('inner');
      return wrapped(...args);
    });
    const outer = wrapFunction(inner, (wrapped, _receiver, args) => {
      layers.push('outer');
      return wrapped(...args);
    });

    expect(outer(2, 2)).toBe(4);
    expect(layers).toEqual(['outer', 'inner']);
    expect(Reflect.get(outer, WRAPPED)).toBe(add);
    expect(anchorEquals(outer, add)).toBe(true);
    expect(anchorEquals(outer, inner)).toBe(true);
    expect(identityHash(outer)).toBe(identityHash(add));
    expect(representProxy(outer)).toBe('<FunctionProxy for [Function: add]>');
  });

  it('reports an adapter as its identity instead of the target', () => {
    const proxy = wrapFunction(add, (wrapped, _receiver, args) => wrapped(...args), {
      adapter: 'math.add',
    });

    expect(proxy(1, 2)).toBe(3);
    expect(Reflect.get(proxy, WRAPPED)).toBe('math.add');
    expect(anchorEquals(proxy, 'math.add')).toBe(true);
    expect(anchorEquals(proxy, add)).not.toBe(true);
    expect(representProxy(proxy)).toBe('<FunctionProxy for math.add>');
  });
});
