import { describe, expect, it } from 'vitest';

import { typeToken } from '../src/core/token.js';
import {
  assertInstanceName,
  clampPriority,
  composeKey,
  describeType,
  INSTANCE_SEPARATOR,
  typeIdentity,
} from '../src/core/type-key.js';
import { InvalidInstanceNameError, InvalidTypeError } from '../src/errors/errors.js';

describe('typeIdentity()', () => {
  it('numbers classes once and keeps the id for the same constructor', () => {
    class Conn {}
    class Other {}

    const id = typeIdentity(Conn);
    expect(id).toMatch(/^cls_\d+$/);
    expect(typeIdentity(Conn)).toBe(id);
    expect(typeIdentity(Other)).not.toBe(id);
  });

  it('uses the token id for tokens', () => {
    const ClockT = typeToken('Clock');
    expect(typeIdentity(ClockT)).toBe(ClockT.id);
  });

  it('rejects values that are neither classes nor tokens', () => {
    expect(() => typeIdentity(42 as never)).toThrow(InvalidTypeError);
    expect(() => typeIdentity({ kind: 'token' } as never)).toThrow(InvalidTypeError);
  });
});

describe('composeKey()', () => {
  class Conn {}

  it('separates named instances from the default one', () => {
    const base = composeKey(Conn);
    expect(base).toBe(typeIdentity(Conn));
    expect(composeKey(Conn, 'primary')).toBe(`${base}${INSTANCE_SEPARATOR}primary`);
    expect(composeKey(Conn, 'primary')).not.toBe(composeKey(Conn, 'replica'));
  });

  it('never lets a token key collide with a class key', () => {
    const ConnT = typeToken<Conn>('Conn');
    expect(composeKey(ConnT)).not.toBe(composeKey(Conn));
  });

  it('rejects empty names and names containing the separator', () => {
    expect(() => composeKey(Conn, '')).toThrow(InvalidInstanceNameError);
    expect(() => composeKey(Conn, 'a#b')).toThrow(InvalidInstanceNameError);
    expect(() => assertInstanceName(7)).toThrow(InvalidInstanceNameError);
    expect(() => assertInstanceName(undefined)).not.toThrow();
  });
});

describe('describeType()', () => {
  it('labels classes, tokens and named instances', () => {
    class Conn {}
    const Anonymous = (() => class {})();

    expect(describeType(Conn)).toBe('Conn');
    expect(describeType(Conn, 'primary')).toBe('Conn#primary');
    expect(describeType(typeToken('Clock'))).toBe('Clock');
    expect(describeType(Anonymous)).toBe('anonymous');
  });
});

describe('clampPriority()', () => {
  it('clamps into [0, 10]', () => {
    expect(clampPriority(-5)).toBe(0);
    expect(clampPriority(99)).toBe(10);
    expect(clampPriority(Number.POSITIVE_INFINITY)).toBe(10);
    expect(clampPriority(Number.NEGATIVE_INFINITY)).toBe(0);
    expect(clampPriority(7)).toBe(7);
  });

  it('truncates fractions and defaults missing values', () => {
    expect(clampPriority(3.7)).toBe(3);
    expect(clampPriority(undefined)).toBe(5);
    expect(clampPriority(Number.NaN)).toBe(5);
  });
});
