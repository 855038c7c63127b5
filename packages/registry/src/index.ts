export { Registry } from './core/registry.js';
export type { LineWriter } from './core/registry.js';
export { RegistrationEntry, compareEntries } from './core/registration-entry.js';
export type { EntryState, InitOutcome } from './core/registration-entry.js';

export { AutoRegister } from './decorators/auto-register.js';
export type { AutoRegisterOptions } from './decorators/auto-register.js';
export { defaultRegistry, resetDefaultRegistry } from './registry/global-registry.js';

export { isTypeToken, typeToken } from './core/token.js';
export type { TokenId, TypeToken } from './core/token.js';
export {
  INSTANCE_SEPARATOR,
  clampPriority,
  composeKey,
  describeType,
  typeIdentity,
} from './core/type-key.js';
export type { RegistryKey } from './core/type-key.js';

export { consoleSink, DIAGNOSTIC_PREFIX, LOG_LEVEL_ENV, LOG_LEVELS } from './core/diagnostics.js';
export type { DiagnosticSink, LogLevel } from './core/diagnostics.js';

export { Priority } from './types/types.js';
export type {
  BatchReport,
  ClassRegisterOptions,
  Constructor,
  Creator,
  DefaultConstructor,
  InitMethod,
  Initializer,
  InitHook,
  RegisterOptions,
  RegistryConfig,
  TypeRef,
} from './types/types.js';

// Errors
export {
  AggregateDisposalError,
  CircularCreationError,
  CreationFailedError,
  DuplicateRegistrationError,
  InitializationFailedError,
  InvalidInstanceNameError,
  InvalidRegistryConfigError,
  InvalidTypeError,
  MissingRegistrationError,
  PendingActivationError,
  RegistryDisposedError,
  UnconstructableEntryError,
} from './errors/errors.js';
