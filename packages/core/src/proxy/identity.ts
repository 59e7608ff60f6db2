import { inspect } from 'node:util';

import { getFunctionProperty } from './functionProperty';
import { getProxyRecord } from './proxyRegistry';

/** Returned when neither side of a comparison can decide equality. */
export const UNDECIDED: unique symbol = Symbol('interpose.undecided');

export type EqualityResult = boolean | typeof UNDECIDED;

/** Capability an anchor can implement to take part in {@link anchorEquals}. */
export interface Equatable {
  equals(other: unknown): EqualityResult;
}

/** Capability an anchor can implement to supply its own {@link identityHash}. */
export interface Hashable {
  hashCode(): number;
}

/** Identity anchor of a proxy; any other value is its own anchor. */
export function identityOf(value: unknown): unknown {
  const record = getProxyRecord(value);
  return record ? record.anchor : value;
}

function askEquals(left: unknown, right: unknown): EqualityResult {
  if ((typeof left !== 'object' && typeof left !== 'function') || left === null) {
    return UNDECIDED;
  }

  const equals = getFunctionProperty(left, 'equals');
  if (!equals) {
    return UNDECIDED;
  }

  const result = equals.call(left, right);
  return typeof result === 'boolean' ? result : UNDECIDED;
}

/**
 * Equality of `value`'s identity anchor with `other` (itself unwrapped when it is a proxy).
 *
 * Identical anchors are equal. Otherwise an `Equatable` anchor decides, left side first.
 * When neither decides, anchors of different `typeof` are {@link UNDECIDED} and
 * anchors of the same `typeof` are not equal.
 */
export function anchorEquals(value: unknown, other: unknown): EqualityResult {
  const left = identityOf(value);
  const right = identityOf(other);

  if (Object.is(left, right)) {
    return true;
  }

  const decided = askEquals(left, right);
  if (decided !== UNDECIDED) {
    return decided;
  }

  const reflected = askEquals(right, left);
  if (reflected !== UNDECIDED) {
    return reflected;
  }

  return typeof left === typeof right ? false : UNDECIDED;
}

export function anchorNotEquals(value: unknown, other: unknown): EqualityResult {
  const result = anchorEquals(value, other);
  if (result === UNDECIDED) {
    return result;
  }
  return !result;
}

export function isSameIdentity(value: unknown, other: unknown): boolean {
  return anchorEquals(value, other) === true;
}

const objectIds = new WeakMap<object, number>();
let nextObjectId = 1;

function objectId(value: object): number {
  const existing = objectIds.get(value);
  if (existing !== undefined) {
    return existing;
  }

  const id = nextObjectId;
  nextObjectId += 1;
  objectIds.set(value, id);
  return id;
}

// FNV-1a, 32-bit
function hashString(text: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < text.length; i += 1) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

/** Hash of `value`'s identity anchor; stable for the lifetime of the anchor. */
export function identityHash(value: unknown): number {
  const anchor = identityOf(value);

  if ((typeof anchor === 'object' && anchor !== null) || typeof anchor === 'function') {
    const hashCode = getFunctionProperty(anchor, 'hashCode');
    if (hashCode) {
      const result = hashCode.call(anchor);
      if (typeof result === 'number') {
        return result;
      }
    }
    return objectId(anchor);
  }

  return hashString(`${typeof anchor}:${String(anchor)}`);
}

function describeAnchor(anchor: unknown): string {
  if ((typeof anchor === 'object' && anchor !== null) || typeof anchor === 'function') {
    return inspect(anchor);
  }
  return String(anchor);
}

/**
 * `<{ProxyKind} for {anchor}>` for proxies, with primitive anchors in their string
 * form and objects through `util.inspect`. Anything else is `util.inspect` output.
 */
export function representProxy(value: unknown): string {
  const record = getProxyRecord(value);
  if (!record) {
    return inspect(value);
  }
  return `<${record.kind} for ${describeAnchor(record.anchor)}>`;
}
