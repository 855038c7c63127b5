import type { Registry } from '../core/registry.js';
import { defaultRegistry } from '../registry/global-registry.js';
import type { ClassRegisterOptions, DefaultConstructor } from '../types/types.js';

export interface AutoRegisterOptions<T> extends ClassRegisterOptions<T> {
  /** Target registry; defaults to the process-wide one. */
  registry?: Registry;
}

/**
 * Registers a class for default construction when its module is evaluated.
 *
 * Decorators run once, at class definition, which makes them the natural
 * place to install registrations before the program's entry point calls
 * `executeAllInits()` or starts looking things up.
 *
 * Pass the class as the type argument to get a checked method name for
 * `init`.
 *
 * @example
 * ```typescript
 * @AutoRegister({ priority: 1 })
 * class Config {}
 *
 * @AutoRegister<Database>({ init: 'connect', priority: 3 })
 * class Database {
 *   connect() {}
 * }
 *
 * @AutoRegister({ name: 'audit' })
 * class Logger {}
 * ```
 */
export function AutoRegister<T = unknown>(
  options: AutoRegisterOptions<T> = {}
): (target: DefaultConstructor<T>) => void {
  return (target) => {
    const { registry, ...registration } = options;
    (registry ?? defaultRegistry()).registerClass(target, registration);
  };
}
