import type { Callable, Invocable } from './types';

export type AnyFunction = (...args: unknown[]) => unknown;

export function getFunctionProperty(target: object, prop: PropertyKey): AnyFunction | null {
  const value: unknown = Reflect.get(target, prop);
  if (typeof value !== 'function') {
    return null;
  }

  // `Object.prototype` methods (e.g. `toString`) are not capabilities the target opted into.
  const objectProtoValue: unknown = Reflect.get(Object.prototype, prop);
  if (typeof objectProtoValue === 'function' && objectProtoValue === value) {
    return null;
  }

  return value as AnyFunction;
}

/** Binds `fn` to `thisArg` with the host's own binding mechanism. */
export function bindCallable<T extends Callable>(fn: Callable, thisArg: unknown): Invocable<T> {
  return Function.prototype.bind.call(fn, thisArg);
}

/** Narrows a callable to the shape the interception callback sees, without copying it. */
export function isInvocable<T extends Callable>(fn: T): fn is T & Invocable<T> {
  return typeof fn === 'function';
}
