import { InvalidRegistryConfigError } from '../errors/errors.js';

/** Constant tag on every diagnostic line. */
export const DIAGNOSTIC_PREFIX = '[AutoRegister]';

export const LOG_LEVELS = ['silent', 'error', 'warn', 'info'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Destination for diagnostic lines. Messages arrive already prefixed.
 */
export interface DiagnosticSink {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Default sink: info to stdout, warnings and errors to stderr.
 */
export const consoleSink: DiagnosticSink = {
  info: (message) => console.info(message),
  warn: (message) => console.warn(message),
  error: (message) => console.error(message),
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

/** Environment variable consulted when no level is configured. */
export const LOG_LEVEL_ENV = 'AUTOREGISTER_LOG_LEVEL';

const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

/**
 * Resolve the effective level: explicit config, then the
 * `AUTOREGISTER_LOG_LEVEL` environment variable, then 'warn'.
 *
 * An unrecognized environment value falls back to 'warn'; see
 * {@link ignoredEnvLogLevel}.
 *
 * @throws InvalidRegistryConfigError for an unknown configured level
 */
export function resolveLogLevel(configured?: unknown): LogLevel {
  if (configured !== undefined) {
    if (!isLogLevel(configured)) {
      throw new InvalidRegistryConfigError(
        `logLevel must be one of ${LOG_LEVELS.join(', ')} (received ${String(configured)})`
      );
    }
    return configured;
  }
  const fromEnv = process.env[LOG_LEVEL_ENV];
  return isLogLevel(fromEnv) ? fromEnv : DEFAULT_LOG_LEVEL;
}

/**
 * The environment log level when it is set but not a known level.
 */
export function ignoredEnvLogLevel(): string | undefined {
  const fromEnv = process.env[LOG_LEVEL_ENV];
  return fromEnv === undefined || isLogLevel(fromEnv) ? undefined : fromEnv;
}

/**
 * Level-filtered, prefixed writer shared by a registry and its entries.
 */
export class Diagnostics {
  private readonly threshold: number;

  constructor(
    private readonly sink: DiagnosticSink,
    readonly level: LogLevel
  ) {
    this.threshold = LOG_LEVELS.indexOf(level);
  }

  info(message: string): void {
    if (this.threshold >= LOG_LEVELS.indexOf('info')) this.sink.info(`${DIAGNOSTIC_PREFIX} ${message}`);
  }

  warn(message: string): void {
    if (this.threshold >= LOG_LEVELS.indexOf('warn')) this.sink.warn(`${DIAGNOSTIC_PREFIX} ${message}`);
  }

  error(message: string): void {
    if (this.threshold >= LOG_LEVELS.indexOf('error')) this.sink.error(`${DIAGNOSTIC_PREFIX} ${message}`);
  }
}
