import { describe, expect, it } from 'vitest';

import {
  anchorEquals,
  anchorNotEquals,
  identityHash,
  identityOf,
  isSameIdentity,
  representProxy,
  UNDECIDED,
  type EqualityResult,
} from '../src/proxy/identity';
import { wrapFunction } from '../src/proxy/proxyFactory';

class RouteKey {
  constructor(readonly path: string) {}

  equals(other: unknown): EqualityResult {
    return other instanceof RouteKey ? other.path === this.path : UNDECIDED;
  }

  hashCode(): number {
    return this.path.length;
  }
}

function handler(): string {
  return 'handled';
}

function proxyFor(adapter: unknown): () => string {
  return wrapFunction(handler, (wrapped, _receiver, args) => wrapped(...args), { adapter });
}

describe('identityOf', () => {
  it('returns the anchor of a proxy and any other value unchanged', () => {
    const plain = { id: 1 };

    expect(identityOf(proxyFor('route'))).toBe('route');
    expect(identityOf(plain)).toBe(plain);
    expect(identityOf(null)).toBeNull();
  });
});

describe('anchorEquals', () => {
  it('treats identical anchors as equal', () => {
    expect(anchorEquals(proxyFor('a'), 'a')).toBe(true);
    expect(anchorEquals('a', proxyFor('a'))).toBe(true);
    expect(anchorEquals(proxyFor(Number.NaN), Number.NaN)).toBe(true);
  });

  it('lets an equatable anchor decide', () => {
    expect(anchorEquals(proxyFor(new RouteKey('/users')), new RouteKey('/users'))).toBe(true);
    expect(anchorEquals(proxyFor(new RouteKey('/users')), new RouteKey('/teams'))).toBe(false);
  });

  it('asks the right side when the left side cannot decide', () => {
    expect(anchorEquals(proxyFor({ path: '/users' }), new RouteKey('/users'))).toBe(false);
    expect(anchorEquals('route', new RouteKey('/users'))).toBe(UNDECIDED);
  });

  it('treats different anchors of the same type as unequal', () => {
    expect(anchorEquals(proxyFor('a'), 'b')).toBe(false);
    expect(anchorEquals(proxyFor({}), {})).toBe(false);
  });

  it('is undecided for anchors of different types', () => {
    expect(anchorEquals(proxyFor('1'), 1)).toBe(UNDECIDED);
  });

  it('ignores a non-function equals attribute', () => {
    expect(anchorEquals(proxyFor({ equals: true }), { equals: true })).toBe(false);
  });
});

describe('anchorNotEquals', () => {
  it('negates a decided result', () => {
    expect(anchorNotEquals(proxyFor('a'), 'a')).toBe(false);
    expect(anchorNotEquals(proxyFor('a'), 'b')).toBe(true);
  });

  it('stays undecided', () => {
    expect(anchorNotEquals(proxyFor('1'), 1)).toBe(UNDECIDED);
  });
});

describe('isSameIdentity', () => {
  it('is true only for decided equality', () => {
    expect(isSameIdentity(proxyFor('a'), 'a')).toBe(true);
    expect(isSameIdentity(proxyFor('1'), 1)).toBe(false);
  });
});

describe('identityHash', () => {
  it('matches for a proxy and its anchor', () => {
    const anchor = { id: 1 };

    expect(identityHash(proxyFor(anchor))).toBe(identityHash(anchor));
    expect(identityHash(proxyFor('route'))).toBe(identityHash('route'));
  });

  it('uses the anchor hashCode when present', () => {
    expect(identityHash(proxyFor(new RouteKey('/users')))).toBe(6);
  });

  it('is stable per object and distinct between objects', () => {
    const first = {};
    const second = {};

    expect(identityHash(first)).toBe(identityHash(first));
    expect(identityHash(first)).not.toBe(identityHash(second));
  });

  it('distinguishes primitives of different types', () => {
    expect(identityHash('1')).not.toBe(identityHash(1));
  });
});

describe('representProxy', () => {
  it('names the proxy kind and the anchor', () => {
    expect(representProxy(proxyFor('route'))).toBe('<FunctionProxy for route>');
    expect(representProxy(proxyFor(42))).toBe('<FunctionProxy for 42>');
    expect(representProxy(proxyFor({ path: '/users' }))).toBe("<FunctionProxy for { path: '/users' }>");
  });

  it('inspects values that are not proxies', () => {
    expect(representProxy(handler)).toBe('[Function: handler]');
    expect(representProxy('plain')).toBe("'plain'");
  });
});
