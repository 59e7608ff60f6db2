import type { BindingKind, Callable, ProxyKind } from './types';

export interface ProxyRecord {
  readonly kind: ProxyKind;
  readonly anchor: unknown;
  readonly binding: BindingKind;
  /** Produces a bound call proxy for one attribute access; `null` for kinds that never bind. */
  readonly bind: ((accessor: unknown) => Callable) | null;
}

const records = new WeakMap<object, ProxyRecord>();

export function registerProxy<T extends object>(proxy: T, record: ProxyRecord): T {
  records.set(proxy, record);
  return proxy;
}

export function getProxyRecord(value: unknown): ProxyRecord | null {
  if ((typeof value !== 'object' && typeof value !== 'function') || value === null) {
    return null;
  }
  return records.get(value) ?? null;
}
