export type Callable = (...args: never[]) => unknown;

/** The shape the interception callback sees for the original callable. */
export type Invocable<T extends Callable> = (...args: Parameters<T>) => ReturnType<T>;

export type ProxyConfig = Readonly<Record<string, unknown>>;

/**
 * What a call acts upon, or `null` when there is none. Usually an object; a value
 * shifted out of the arguments by the instance-method fallback keeps its own type.
 */
export type Receiver = unknown;

/**
 * How a callable is invoked relative to an owning type:
 * - `function`: plain function, never bound
 * - `instance`: method that receives the instance as `this`
 * - `class`: method bound to the owning class
 * - `static`: method invoked without `this`
 * - `generic`: not declared; resolved by the ambiguous-binding policy
 */
export type BindingKind = 'function' | 'instance' | 'class' | 'static' | 'generic';

export type DeclaredBindingKind = Exclude<BindingKind, 'function'>;

/**
 * - "fallback" (default): treat an unresolved call through the owning type as an instance-method call.
 * - "throw": raise `call_binding.ambiguous_binding` instead.
 */
export type AmbiguousBindingPolicy = 'fallback' | 'throw';

export type ProxyKind =
  | 'FunctionProxy'
  | 'GenericProxy'
  | 'MethodProxy'
  | 'BoundGenericProxy'
  | 'BoundMethodProxy';

/**
 * Caller-supplied function that controls what happens on every call through a proxy.
 *
 * `wrapped` is already bound to the resolved receiver; `args` excludes the receiver.
 * Whatever the callback returns (or throws) reaches the call site unchanged.
 */
export type InterceptionCallback<
  T extends Callable = Callable,
  TConfig extends ProxyConfig = ProxyConfig,
> = (
  wrapped: Invocable<T>,
  receiver: Receiver,
  args: Parameters<T>,
  config: TConfig,
) => ReturnType<T>;

/** Wrapped-chain pointer: reading it from a proxy yields the proxy's identity anchor. */
export const WRAPPED: unique symbol = Symbol.for('interpose.wrapped');

/** Names of the arguments every proxy kind passes to its interception callback, in order. */
export const CALLBACK_ARGLIST = ['wrapped', 'receiver', 'args', 'config'] as const;
