import { createCallBindingError } from '../errors/callBindingError';
import { getRuntimeConfig } from '../runtimeConfig';
import { createBoundCallProxy, type BoundCallParent } from './boundCallProxy';
import {
  bindForAccess,
  resolveAccess,
  resolveCall,
  unboundState,
  type CallBindingState,
} from './callBinding';
import { bindCallable } from './functionProperty';
import { createIdentityHandler, createIdentityState } from './identityDelegate';
import { getProxyRecord, registerProxy } from './proxyRegistry';
import type {
  AmbiguousBindingPolicy,
  BindingKind,
  Callable,
  DeclaredBindingKind,
  InterceptionCallback,
  ProxyConfig,
  ProxyKind,
} from './types';

export type FunctionProxyOptions<TConfig extends ProxyConfig> = {
  /** Forwarded to the callback on every call; copied and frozen at construction. */
  config?: TConfig;
  /** Reported identity in place of the innermost wrapped entity. */
  adapter?: unknown;
};

export type MethodProxyOptions<TConfig extends ProxyConfig> = FunctionProxyOptions<TConfig>;

export type GenericProxyOptions<TConfig extends ProxyConfig> = FunctionProxyOptions<TConfig> & {
  /**
   * Declared kind of the target. Defaults to the kind of the proxy being wrapped,
   * or `generic` when the target is not one of ours.
   */
  binding?: DeclaredBindingKind;
  /** Defaults to `INTERPOSE_AMBIGUOUS_BINDING`. */
  onAmbiguousBinding?: AmbiguousBindingPolicy;
};

function freezeConfig<TConfig extends ProxyConfig>(config: TConfig | undefined): TConfig {
  return Object.freeze({ ...(config ?? {}) }) as TConfig;
}

function inheritBindingKind(target: object): DeclaredBindingKind {
  const record = getProxyRecord(target);
  if (!record || record.binding === 'function') {
    return 'generic';
  }
  return record.binding;
}

/**
 * Wraps a plain function. Every call reaches the callback as
 * `(target, null, args, config)`; the proxy never binds to a receiver.
 */
export function wrapFunction<T extends Callable, TConfig extends ProxyConfig = ProxyConfig>(
  target: T,
  callback: InterceptionCallback<T, TConfig>,
  options: FunctionProxyOptions<TConfig> = {},
): T {
  const state = unboundState(target);
  const identity = createIdentityState(target, options.adapter);
  const config = freezeConfig(options.config);
  const resolveOptions = { onAmbiguousBinding: 'fallback' as const };

  const proxy = new Proxy(target, {
    ...createIdentityHandler<T>(identity),
    apply(_target, _thisArg, argArray: Parameters<T>) {
      const call = resolveCall(state, argArray, resolveOptions);
      return callback(call.wrapped, call.receiver, call.args, config);
    },
  });

  return registerProxy(proxy, {
    kind: 'FunctionProxy',
    anchor: identity.anchor,
    binding: 'function',
    bind: null,
  });
}

function createBindableProxy<T extends Callable, TConfig extends ProxyConfig>(
  kind: 'GenericProxy' | 'MethodProxy',
  target: T,
  callback: InterceptionCallback<T, TConfig>,
  binding: DeclaredBindingKind,
  options: GenericProxyOptions<TConfig>,
): T {
  const identity = createIdentityState(target, options.adapter);
  const config = freezeConfig(options.config);
  const onAmbiguousBinding = options.onAmbiguousBinding ?? getRuntimeConfig().ambiguousBinding;
  const parent: BoundCallParent<T, TConfig> = {
    kind,
    target,
    identity,
    binding,
    callback,
    config,
    onAmbiguousBinding,
  };

  // A bare call never went through attribute access: generic proxies see no
  // receiver, method proxies treat it as a call through the owning type.
  const directState: CallBindingState<T> =
    kind === 'GenericProxy'
      ? unboundState(target)
      : { type: 'type-access', binding, target, callable: bindCallable<T>(target, undefined) };

  const proxy = new Proxy(target, {
    ...createIdentityHandler<T>(identity),
    apply(_target, thisArg: unknown, argArray: Parameters<T>) {
      // Called as `owner.key(...)` after a plain assignment: `this` is the accessor.
      const state =
        thisArg === undefined ? directState : bindForAccess(target, binding, resolveAccess(thisArg));
      const call = resolveCall(state, argArray, { onAmbiguousBinding });
      return callback(call.wrapped, call.receiver, call.args, config);
    },
  });

  return registerProxy(proxy, {
    kind,
    anchor: identity.anchor,
    binding,
    bind: (accessor) => createBoundCallProxy(parent, accessor),
  });
}

/**
 * Wraps an entity whose nature (function, instance, class or static method) only
 * shows once it is read through an owning type. Reading it through {@link bindProxy}
 * or an accessor installed by {@link attachProxy} yields a bound call proxy.
 */
export function wrapGeneric<T extends Callable, TConfig extends ProxyConfig = ProxyConfig>(
  target: T,
  callback: InterceptionCallback<T, TConfig>,
  options: GenericProxyOptions<TConfig> = {},
): T {
  const binding = options.binding ?? inheritBindingKind(target);
  return createBindableProxy('GenericProxy', target, callback, binding, options);
}

/** Wraps an instance method; the callback always sees the instance as the receiver. */
export function wrapMethod<T extends Callable, TConfig extends ProxyConfig = ProxyConfig>(
  target: T,
  callback: InterceptionCallback<T, TConfig>,
  options: MethodProxyOptions<TConfig> = {},
): T {
  return createBindableProxy('MethodProxy', target, callback, 'instance', {
    config: options.config,
    adapter: options.adapter,
    onAmbiguousBinding: 'fallback',
  });
}

/**
 * Binds a generic or method proxy as if it had been read from `accessor`
 * (an instance, a prototype or a class).
 */
export function bindProxy<T extends object>(proxy: T, accessor: unknown): T {
  const record = getProxyRecord(proxy);
  if (!record?.bind) {
    throw createCallBindingError('not_bindable', record?.kind ?? typeof proxy);
  }
  const bound = record.bind(accessor);
  return bound as T;
}

/**
 * Installs `proxy` on `owner` (a prototype or a class) as an accessor that binds on
 * every read. Assigning through an instance shadows it with a plain property.
 */
export function attachProxy<TOwner extends object>(owner: TOwner, key: PropertyKey, proxy: object): TOwner {
  if (!getProxyRecord(proxy)?.bind) {
    throw createCallBindingError('not_bindable', String(key));
  }

  Object.defineProperty(owner, key, {
    configurable: true,
    enumerable: false,
    get(this: unknown) {
      return bindProxy(proxy, this);
    },
    set(this: unknown, value: unknown) {
      if ((typeof this === 'object' && this !== null) || typeof this === 'function') {
        Object.defineProperty(this, key, {
          configurable: true,
          enumerable: true,
          writable: true,
          value,
        });
      }
    },
  });

  return owner;
}

export function isInterceptionProxy(value: unknown): boolean {
  return getProxyRecord(value) !== null;
}

export function proxyKindOf(value: unknown): ProxyKind | null {
  return getProxyRecord(value)?.kind ?? null;
}

export function bindingKindOf(value: unknown): BindingKind | null {
  return getProxyRecord(value)?.binding ?? null;
}
