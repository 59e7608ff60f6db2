import { bindForAccess, resolveAccess, resolveCall } from './callBinding';
import { createIdentityHandler, type IdentityState } from './identityDelegate';
import { registerProxy } from './proxyRegistry';
import type {
  AmbiguousBindingPolicy,
  BindingKind,
  Callable,
  InterceptionCallback,
  ProxyConfig,
} from './types';

/** What a bound proxy keeps from the unbound proxy that produced it. */
export type BoundCallParent<T extends Callable, TConfig extends ProxyConfig> = {
  readonly kind: 'GenericProxy' | 'MethodProxy';
  readonly target: T;
  readonly identity: IdentityState;
  readonly binding: BindingKind;
  readonly callback: InterceptionCallback<T, TConfig>;
  readonly config: TConfig;
  readonly onAmbiguousBinding: AmbiguousBindingPolicy;
};

/**
 * Creates the short-lived proxy returned by one attribute access.
 *
 * Non-call operations still see the parent's target, so `name` and custom metadata
 * report the original method rather than the host's bound function.
 */
export function createBoundCallProxy<T extends Callable, TConfig extends ProxyConfig>(
  parent: BoundCallParent<T, TConfig>,
  accessor: unknown,
): T {
  const state = bindForAccess(parent.target, parent.binding, resolveAccess(accessor));
  const identityHandler = createIdentityHandler<T>(parent.identity);
  const resolveOptions = { onAmbiguousBinding: parent.onAmbiguousBinding };

  const proxy = new Proxy(parent.target, {
    ...identityHandler,
    apply(_target, _thisArg, argArray: Parameters<T>) {
      const call = resolveCall(state, argArray, resolveOptions);
      return parent.callback(call.wrapped, call.receiver, call.args, parent.config);
    },
  });

  return registerProxy(proxy, {
    kind: parent.kind === 'GenericProxy' ? 'BoundGenericProxy' : 'BoundMethodProxy',
    anchor: parent.identity.anchor,
    binding: parent.binding,
    bind: null,
  });
}
