import { getLogger } from '../observability/logger';
import { getFunctionProperty } from './functionProperty';
import { WRAPPED } from './types';

/** String keys with this prefix are stored on the proxy itself instead of the target. */
export const OWN_STATE_PREFIX = '_self_';

export type IdentitySnapshot = {
  readonly name?: string;
  readonly qualifiedName?: string;
};

export type IdentityState = {
  readonly anchor: unknown;
  readonly snapshot: IdentitySnapshot;
};

const SNAPSHOT_FIELDS = ['name', 'qualifiedName'] as const;

const protocolKeys: ReadonlySet<PropertyKey> = new Set([
  Symbol.iterator,
  Symbol.asyncIterator,
  Symbol.dispose,
  Symbol.asyncDispose,
]);

export function isOwnStateKey(prop: PropertyKey): prop is string {
  return typeof prop === 'string' && prop.startsWith(OWN_STATE_PREFIX);
}

/**
 * The innermost wrapped entity: `adapter` when given, otherwise whatever the target's
 * own wrapped-chain pointer names, otherwise the target itself.
 */
export function resolveIdentityAnchor(target: object, adapter?: unknown): unknown {
  if (adapter !== undefined) {
    return adapter;
  }
  return WRAPPED in target ? Reflect.get(target, WRAPPED) : target;
}

export function snapshotIdentity(target: object): IdentitySnapshot {
  const snapshot: { name?: string; qualifiedName?: string } = {};

  for (const field of SNAPSHOT_FIELDS) {
    const value: unknown = Reflect.get(target, field);
    if (typeof value === 'string') {
      snapshot[field] = value;
    } else {
      getLogger().debug({ field, target }, 'identity_snapshot.skipped');
    }
  }

  return snapshot;
}

export function createIdentityState(target: object, adapter?: unknown): IdentityState {
  return {
    anchor: resolveIdentityAnchor(target, adapter),
    snapshot: snapshotIdentity(target),
  };
}

/**
 * Traps for every non-call operation that needs more than plain forwarding.
 * Traps left out fall through to the target.
 */
export function createIdentityHandler<T extends object>(identity: IdentityState): ProxyHandler<T> {
  const ownState = new Map<string, unknown>();

  return {
    get(target, prop) {
      if (prop === WRAPPED) {
        return identity.anchor;
      }

      if (isOwnStateKey(prop) && ownState.has(prop)) {
        return ownState.get(prop);
      }

      if (prop === 'name' && identity.snapshot.name !== undefined) {
        return identity.snapshot.name;
      }

      if (prop === 'qualifiedName' && identity.snapshot.qualifiedName !== undefined) {
        return identity.snapshot.qualifiedName;
      }

      if (protocolKeys.has(prop)) {
        const method = getFunctionProperty(target, prop);
        return method ? method.bind(target) : Reflect.get(target, prop);
      }

      return Reflect.get(target, prop);
    },

    set(target, prop, value) {
      if (isOwnStateKey(prop)) {
        ownState.set(prop, value);
        return true;
      }
      return Reflect.set(target, prop, value);
    },

    has(target, prop) {
      if (prop === WRAPPED || (isOwnStateKey(prop) && ownState.has(prop))) {
        return true;
      }
      return Reflect.has(target, prop);
    },

    deleteProperty(target, prop) {
      if (isOwnStateKey(prop) && ownState.has(prop)) {
        return ownState.delete(prop);
      }
      return Reflect.deleteProperty(target, prop);
    },
  };
}
