/*
 * Key scheme
 * ----------
 * Every registration is addressed by a string key built from the identity of
 * its type reference and an optional instance name:
 *
 *   cls_3            default instance of a class
 *   cls_3#primary    instance 'primary' of the same class
 *   tok_7            default instance behind a type token
 *
 * Classes are numbered on first sight and remembered in a WeakMap, so a
 * constructor keeps its identity for the life of the process no matter which
 * module asks. Tokens already carry a unique id. The `cls_` and `tok_`
 * prefixes keep the two spaces apart, and the separator never appears in an
 * identity or a valid instance name, so unnamed and named keys cannot collide.
 */
import { InvalidInstanceNameError, InvalidTypeError } from '../errors/errors.js';
import { Priority, type TypeRef } from '../types/types.js';
import { isTypeToken } from './token.js';

/**
 * Branded registry key. Only {@link composeKey} produces one.
 */
export type RegistryKey = string & { __brand: 'RegistryKey' };

/** Reserved between the type identity and an instance name. */
export const INSTANCE_SEPARATOR = '#';

const classIds = new WeakMap<object, string>();
let _classCounter = 0;

/**
 * Stable per-process identity of a type reference.
 *
 * @throws InvalidTypeError if the reference is neither a class nor a token
 */
export function typeIdentity(type: TypeRef): string {
  if (isTypeToken(type)) return type.id;
  if (typeof type !== 'function') throw new InvalidTypeError(type);
  let id = classIds.get(type);
  if (!id) {
    id = `cls_${++_classCounter}`;
    classIds.set(type, id);
  }
  return id;
}

/**
 * Validate an optional instance name.
 *
 * @throws InvalidInstanceNameError for empty names, non-strings, or names
 *   containing {@link INSTANCE_SEPARATOR}
 */
export function assertInstanceName(name: unknown): asserts name is string | undefined {
  if (name === undefined) return;
  if (typeof name !== 'string' || name.length === 0 || name.includes(INSTANCE_SEPARATOR)) {
    throw new InvalidInstanceNameError(name, INSTANCE_SEPARATOR);
  }
}

export function composeKey(type: TypeRef, name?: string): RegistryKey {
  assertInstanceName(name);
  const identity = typeIdentity(type);
  return (name === undefined ? identity : `${identity}${INSTANCE_SEPARATOR}${name}`) as RegistryKey;
}

/**
 * Human-readable label for diagnostics, e.g. `Conn` or `Conn#primary`.
 */
export function describeType(type: TypeRef, name?: string): string {
  const base = isTypeToken(type) ? type.label : type.name || 'anonymous';
  return name === undefined ? base : `${base}${INSTANCE_SEPARATOR}${name}`;
}

/**
 * Clamp a priority into [0, 10].
 *
 * Fractions are truncated toward zero; NaN falls back to the default priority.
 */
export function clampPriority(priority: number | undefined): number {
  if (priority === undefined || Number.isNaN(priority)) return Priority.Default;
  return Math.min(Priority.Latest, Math.max(Priority.Earliest, Math.trunc(priority)));
}
