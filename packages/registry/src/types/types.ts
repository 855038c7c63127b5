import type { DiagnosticSink, LogLevel } from '../core/diagnostics.js';
import type { TypeToken } from '../core/token.js';
import type { RegistryKey } from '../core/type-key.js';

/**
 * Constructor signature accepted as a type reference.
 *
 * `never[]` accepts every constructor regardless of its parameter list; only
 * {@link DefaultConstructor} is ever invoked by the registry.
 *
 * @template T - Type produced by the constructor
 */
export type Constructor<T = unknown> = new (...args: never[]) => T;

/**
 * Constructor the registry can call with no arguments.
 */
export type DefaultConstructor<T = unknown> = new () => T;

/**
 * Anything a registration can be keyed on: a class, or a token for types
 * without a runtime class.
 */
export type TypeRef<T = unknown> = Constructor<T> | TypeToken<T>;

/**
 * Parameterless factory producing a fresh instance.
 *
 * Returning `null` or `undefined` counts as a failed creation.
 */
export type Creator<T> = () => T | Promise<T>;

/**
 * Post-construction hook receiving the created instance.
 */
export type Initializer<T> = (instance: T) => void | Promise<void>;

/**
 * Names of the zero-argument methods of T, usable as `init: 'start'`.
 */
export type InitMethod<T> = {
  [K in keyof T]-?: T[K] extends () => unknown ? K : never;
}[keyof T] &
  string;

/**
 * Initializer given either as a callback or as the name of a method on the
 * instance.
 */
export type InitHook<T> = Initializer<T> | InitMethod<T>;

/**
 * Priority bounds for batch initialization. Lower runs earlier.
 */
export const Priority = {
  Earliest: 0,
  Default: 5,
  Latest: 10,
} as const;

/**
 * Options accepted by `Registry.register`.
 *
 * @example
 * ```typescript
 * registry.register(Database, {
 *   name: 'replica',
 *   create: () => new Database(replicaUrl),
 *   init: 'connect',
 *   priority: 2,
 * });
 * ```
 */
export interface RegisterOptions<T> {
  /** Instance label; registers a named entry instead of the default one */
  name?: string;
  /** Factory; defaults to `new Type()` when the reference is a class */
  create?: Creator<T>;
  /** Post-construction hook or method name */
  init?: InitHook<T>;
  /** Batch order in [0, 10]; out-of-range values are clamped */
  priority?: number;
}

export type ClassRegisterOptions<T> = Omit<RegisterOptions<T>, 'create'>;

/**
 * Registry configuration passed to the constructor.
 */
export interface RegistryConfig {
  /**
   * Name used in diagnostics.
   *
   * @default 'Registry'
   */
  name?: string;

  /**
   * Destination for diagnostic lines. Defaults to the console.
   */
  sink?: DiagnosticSink;

  /**
   * Minimum severity written to the sink. Falls back to the
   * `AUTOREGISTER_LOG_LEVEL` environment variable, then to 'warn'.
   */
  logLevel?: LogLevel;

  /**
   * Invoked after an instance is created, with the entry key and the
   * creation duration in nanoseconds.
   */
  onCreate?: (key: RegistryKey, durationNs: number) => void;
}

/**
 * Outcome of a batch initialization pass.
 */
export interface BatchReport {
  /** Bound the pass selected on, as passed in */
  maxPriority: number;
  /** Entries selected for the pass */
  selected: number;
  /** Selected entries holding an instance after the create phase */
  created: number;
  /** Selected entries initialized after the init phase */
  initialized: number;
  /** Keys whose creation or initialization did not complete */
  failed: RegistryKey[];
}
