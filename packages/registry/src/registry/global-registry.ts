import { Registry } from '../core/registry.js';

/**
 * Global symbol for storing the process-wide registry on globalThis.
 *
 * This ensures a single registry per process, even if the module is bundled
 * multiple times (e.g., in monorepos or when two copies are installed).
 */
const GLOBAL_SYMBOL = Symbol.for('autoregister.defaultRegistry');

/**
 * The process-wide registry, created on first use.
 *
 * Prefer passing an explicit `Registry` through the program; this accessor is
 * for code that registers itself at module load, such as `@AutoRegister()`.
 */
export function defaultRegistry(): Registry {
  const existing: unknown = Reflect.get(globalThis, GLOBAL_SYMBOL);
  if (existing instanceof Registry) return existing;
  const fresh = new Registry({ name: 'default' });
  Reflect.set(globalThis, GLOBAL_SYMBOL, fresh);
  return fresh;
}

/**
 * Replace the process-wide registry with an empty one.
 *
 * ⚠️ Intended for test environments. The previous registry is cleared, not
 * disposed; instances it built are left to the garbage collector.
 */
export function resetDefaultRegistry(): Registry {
  const existing: unknown = Reflect.get(globalThis, GLOBAL_SYMBOL);
  if (existing instanceof Registry) existing.clear();
  const fresh = new Registry({ name: 'default' });
  Reflect.set(globalThis, GLOBAL_SYMBOL, fresh);
  return fresh;
}
