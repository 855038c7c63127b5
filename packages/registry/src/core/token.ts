/**
 * Branded type for token identifiers.
 * Prevents accidental use of raw strings as token IDs.
 */
export type TokenId = string & { __brand: 'TokenId' };

/**
 * Phantom type brand for compile-time type safety.
 * Associates tokens with the instance type they stand for.
 */
declare const TOKEN_BRAND: unique symbol;

/**
 * Runtime stand-in for a type that has no class of its own.
 *
 * Interfaces and type aliases vanish at runtime, so registering one needs a
 * value to key on. A token carries the type at compile time via the phantom
 * parameter T and a unique id at runtime.
 *
 * @template T - The instance type registered under this token
 */
export interface TypeToken<T = unknown> {
  /** Discriminant for runtime type checking */
  readonly kind: 'type-token';

  /** Unique identifier (tok_1, tok_2, etc.) */
  readonly id: TokenId;

  /** Human-readable label for diagnostics */
  readonly label: string;

  /** Phantom type brand */
  readonly [TOKEN_BRAND]: T;
}

let _tokCounter = 0;

/**
 * Create a new type token.
 *
 * @example
 * ```typescript
 * interface Clock { now(): number }
 * const ClockT = typeToken<Clock>('Clock');
 * registry.registerFactory(ClockT, () => ({ now: Date.now }));
 * ```
 */
export function typeToken<T = unknown>(label?: string): TypeToken<T> {
  const id = `tok_${++_tokCounter}`;
  // The brand only exists at the type level; the frozen object is the token.
  return Object.freeze({
    kind: 'type-token',
    id,
    label: label ?? 'Token',
  }) as TypeToken<T>;
}

/**
 * Runtime guard for {@link TypeToken} values.
 */
export function isTypeToken(x: unknown): x is TypeToken<unknown> {
  return (
    typeof x === 'object' &&
    x !== null &&
    'kind' in x &&
    x.kind === 'type-token' &&
    'id' in x &&
    typeof x.id === 'string' &&
    'label' in x &&
    typeof x.label === 'string'
  );
}
