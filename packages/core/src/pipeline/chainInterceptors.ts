import type { Callable, InterceptionCallback, ProxyConfig } from '../proxy/types';

/**
 * Composes interception callbacks into one, so several layers can share a single proxy.
 *
 * Callbacks run in array order (first callback runs first). Each one's `wrapped`
 * calls the next layer with the same receiver and config; the innermost layer calls
 * the original. Any callback may short-circuit by returning without calling `wrapped`.
 */
export function chainInterceptors<T extends Callable, TConfig extends ProxyConfig = ProxyConfig>(
  callbacks: ReadonlyArray<InterceptionCallback<T, TConfig>>,
): InterceptionCallback<T, TConfig> {
  const terminal: InterceptionCallback<T, TConfig> = (wrapped, _receiver, args) => wrapped(...args);

  return callbacks.reduceRight<InterceptionCallback<T, TConfig>>(
    (next, callback) => (wrapped, receiver, args, config) =>
      callback((...innerArgs) => next(wrapped, receiver, innerArgs, config), receiver, args, config),
    terminal,
  );
}
