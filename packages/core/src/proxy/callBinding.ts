import { createCallBindingError } from '../errors/callBindingError';
import { getLogger } from '../observability/logger';
import { assertNever } from '../types/exhaustive';
import { bindCallable, isInvocable } from './functionProperty';
import { getProxyRecord } from './proxyRegistry';
import type { AmbiguousBindingPolicy, BindingKind, Callable, Invocable, Receiver } from './types';

export type AccessResolution = {
  /** `null` when the property was read through the owning type rather than an instance. */
  readonly receiver: object | null;
  readonly ownerType: unknown;
};

export type CallBindingState<T extends Callable> =
  | { readonly type: 'unbound'; readonly callable: Invocable<T> }
  | { readonly type: 'bound'; readonly callable: Invocable<T>; readonly receiver: object }
  | {
      readonly type: 'type-access';
      readonly binding: BindingKind;
      readonly target: T;
      readonly callable: Invocable<T>;
    };

export type ResolvedCall<T extends Callable> = {
  readonly wrapped: Invocable<T>;
  readonly receiver: Receiver;
  readonly args: Parameters<T>;
};

export type ResolveCallOptions = {
  onAmbiguousBinding: AmbiguousBindingPolicy;
};

function isObjectLike(value: unknown): value is object {
  return (typeof value === 'object' && value !== null) || typeof value === 'function';
}

function isPrototypeObject(value: object): boolean {
  if (!Object.prototype.hasOwnProperty.call(value, 'constructor')) {
    return false;
  }
  const ctor: unknown = Reflect.get(value, 'constructor');
  return typeof ctor === 'function' && Reflect.get(ctor, 'prototype') === value;
}

/**
 * Classifies who a property was read through: a class constructor or a prototype
 * object means the owning type (no receiver); anything else is an instance.
 */
export function resolveAccess(accessor: unknown): AccessResolution {
  if (typeof accessor === 'function') {
    return { receiver: null, ownerType: accessor };
  }

  if (!isObjectLike(accessor)) {
    return { receiver: null, ownerType: undefined };
  }

  const ownerType: unknown = Reflect.get(accessor, 'constructor');
  if (isPrototypeObject(accessor)) {
    return { receiver: null, ownerType };
  }

  return { receiver: accessor, ownerType };
}

/**
 * Binds `target` to `thisArg`. A target that is itself a bindable proxy is first
 * bound through its own record for `accessor`, so every layer of a chain resolves
 * the same receiver.
 */
function bindTarget<T extends Callable>(target: T, thisArg: unknown, accessor: unknown): Invocable<T> {
  const bindInner = getProxyRecord(target)?.bind;
  return bindCallable<T>(bindInner ? bindInner(accessor) : target, thisArg);
}

/** State for a call that never binds: the callback receives `target` itself. */
export function unboundState<T extends Callable>(target: T): CallBindingState<T> {
  if (!isInvocable(target)) {
    throw createCallBindingError('not_callable', typeof target);
  }
  return { type: 'unbound', callable: target };
}

export function bindForAccess<T extends Callable>(
  target: T,
  binding: BindingKind,
  access: AccessResolution,
): CallBindingState<T> {
  switch (binding) {
    case 'function':
      return unboundState(target);
    case 'class':
    case 'static': {
      const callable = bindTarget(
        target,
        binding === 'class' ? access.ownerType : undefined,
        access.receiver ?? access.ownerType,
      );
      return access.receiver
        ? { type: 'bound', callable, receiver: access.receiver }
        : { type: 'type-access', binding, target, callable };
    }
    case 'instance':
    case 'generic':
      return access.receiver
        ? {
            type: 'bound',
            callable: bindTarget(target, access.receiver, access.receiver),
            receiver: access.receiver,
          }
        : { type: 'type-access', binding, target, callable: bindCallable<T>(target, undefined) };
    default:
      return assertNever(binding);
  }
}

function shiftReceiver<T extends Callable>(target: T, args: readonly unknown[]): ResolvedCall<T> {
  if (args.length === 0) {
    throw createCallBindingError('missing_receiver');
  }

  const [instance, ...rest] = args;
  return {
    wrapped: bindTarget(target, instance, instance),
    receiver: instance,
    args: rest as Parameters<T>,
  };
}

/**
 * Decides the receiver and argument list the interception callback observes.
 *
 * A call through the owning type is ambiguous for `generic` callables: the first
 * argument may be an explicit instance, or an ordinary argument of a class or static
 * method hidden behind an opaque wrapper. The policy picks between the instance-method
 * reading and an error.
 */
export function resolveCall<T extends Callable>(
  state: CallBindingState<T>,
  args: Parameters<T>,
  options: ResolveCallOptions,
): ResolvedCall<T> {
  switch (state.type) {
    case 'unbound':
      return { wrapped: state.callable, receiver: null, args };
    case 'bound':
      return { wrapped: state.callable, receiver: state.receiver, args };
    case 'type-access':
      break;
    default:
      return assertNever(state);
  }

  switch (state.binding) {
    case 'function':
    case 'class':
    case 'static':
      return { wrapped: state.callable, receiver: null, args };
    case 'instance':
      return shiftReceiver(state.target, args);
    case 'generic':
      if (options.onAmbiguousBinding === 'throw') {
        throw createCallBindingError('ambiguous_binding', state.target.name);
      }
      getLogger().debug(
        { callable: state.target, argCount: args.length },
        'call_binding.ambiguous_fallback',
      );
      return shiftReceiver(state.target, args);
    default:
      return assertNever(state.binding);
  }
}
