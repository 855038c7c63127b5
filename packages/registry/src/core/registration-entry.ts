/* RegistrationEntry
 *
 * One registration: a key, a creator, an optional initializer, a priority, and
 * once built, the instance. The entry enforces the lifecycle
 *
 *   empty --create--> built --init--> initialized
 *
 * where a failed create leaves the entry empty and a failed init leaves it
 * built, so either step is retried by the next caller. `initialized` is
 * terminal.
 *
 * Two lanes share that state:
 *  - create() / init() never wait. A creator or initializer that returns a
 *    promise is tracked as pending work and the synchronous call yields
 *    nothing for now.
 *  - createAsync() / initAsync() wait, and concurrent callers share a single
 *    in-flight promise, so a creator runs at most once per successful build
 *    and an initializer at most once per instance.
 *
 * Failures never propagate out of an entry: they are reported through the
 * registry's diagnostics and surface as an empty result.
 */

import {
  CircularCreationError,
  CreationFailedError,
  InitializationFailedError,
  PendingActivationError,
} from '../errors/errors.js';
import {
  activeChain,
  isActive,
  waitFor,
  withActivation,
  wouldDeadlock,
  type ActivationFrame,
} from './activation.js';
import type { Diagnostics } from './diagnostics.js';
import type { RegistryKey } from './type-key.js';

export type EntryState = 'empty' | 'built' | 'initialized';

/**
 * Result of an init step.
 *  - initialized: the initializer has completed (now or earlier)
 *  - reentrant: requested from inside this entry's own activation
 *  - pending: an asynchronous step is still settling (synchronous lane only)
 *  - failed: creation or initialization did not complete
 */
export type InitOutcome = 'initialized' | 'reentrant' | 'pending' | 'failed';

/**
 * Type-erased registration. The registry wraps the client's typed creator and
 * initializer into these shapes.
 */
export interface EntryDefinition {
  key: RegistryKey;
  label: string;
  priority: number;
  creator: () => unknown;
  initializer?: (instance: unknown) => unknown;
}

/** Services an entry borrows from its registry. */
export interface EntryContext {
  diagnostics: Diagnostics;
  onCreate?: (key: RegistryKey, durationNs: number) => void;
}

type CreationAttempt =
  | { kind: 'failed' }
  | { kind: 'built'; instance: unknown }
  | { kind: 'pending'; promise: Promise<unknown> };

const nowMs = (() => {
  const maybePerf = typeof globalThis !== 'undefined' ? globalThis.performance : undefined;
  return maybePerf && typeof maybePerf.now === 'function'
    ? () => maybePerf.now()
    : () => Date.now();
})();

const toNs = (ms: number) => Math.round(ms * 1_000_000);

export function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === 'object' || typeof value === 'function') &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

/**
 * Ordering relation used by batch initialization: lower priority first.
 */
export function compareEntries(a: RegistrationEntry, b: RegistrationEntry): number {
  return a.priority - b.priority;
}

export class RegistrationEntry {
  readonly key: RegistryKey;
  readonly label: string;
  readonly priority: number;

  private readonly creator: () => unknown;
  private readonly initializer?: (instance: unknown) => unknown;
  private readonly frame: ActivationFrame;

  private instance: unknown = undefined;
  private built = false;
  private initialized = false;

  /** Creation started by either lane and not yet settled. Never rejects. */
  private pendingCreate?: Promise<unknown>;
  /** Asynchronous initializer not yet settled. Never rejects. */
  private pendingInit?: Promise<InitOutcome>;
  /** Whole create-then-init run of the async lane, shared by concurrent callers. */
  private pendingActivation?: Promise<InitOutcome>;

  constructor(
    definition: EntryDefinition,
    private readonly context: EntryContext
  ) {
    this.key = definition.key;
    this.label = definition.label;
    this.priority = definition.priority;
    this.creator = definition.creator;
    this.initializer = definition.initializer;
    this.frame = { key: definition.key, label: definition.label };
  }

  get state(): EntryState {
    if (this.initialized) return 'initialized';
    return this.built ? 'built' : 'empty';
  }

  get hasInstance(): boolean {
    return this.built;
  }

  get hasInitializer(): boolean {
    return this.initializer !== undefined;
  }

  /** The built instance, without creating or initializing anything. */
  peek(): unknown {
    return this.built ? this.instance : undefined;
  }

  /**
   * Build the instance if it does not exist yet.
   *
   * @returns The instance, or undefined when creation failed, is still
   *   pending, or would recurse into itself.
   */
  create(): unknown {
    if (this.built) return this.instance;
    if (isActive(this.frame)) return this.reportCycle();
    if (this.pendingCreate) {
      this.report('warn', new PendingActivationError(this.label, 'creation'));
      return undefined;
    }

    const attempt = this.attemptCreation();
    if (attempt.kind === 'pending') {
      this.report('warn', new PendingActivationError(this.label, 'creation'));
      return undefined;
    }
    return attempt.kind === 'built' ? attempt.instance : undefined;
  }

  /**
   * Build the instance, waiting for asynchronous creators. Concurrent callers
   * receive the same in-flight creation.
   */
  async createAsync(): Promise<unknown> {
    if (this.built) return this.instance;
    if (isActive(this.frame)) return this.reportCycle();
    if (this.pendingCreate) {
      if (wouldDeadlock(this.frame)) return this.reportCycle();
      return waitFor(this.frame, this.pendingCreate);
    }

    const attempt = this.attemptCreation();
    if (attempt.kind === 'pending') return attempt.promise;
    return attempt.kind === 'built' ? attempt.instance : undefined;
  }

  /**
   * Ensure the instance exists, then run the initializer once.
   */
  init(): InitOutcome {
    if (this.initialized) return 'initialized';
    if (isActive(this.frame)) return this.reentrantOutcome();
    if (this.pendingInit) {
      this.report('warn', new PendingActivationError(this.label, 'initialization'));
      return 'pending';
    }

    this.create();
    if (!this.built) return this.pendingCreate ? 'pending' : 'failed';

    const outcome = this.attemptInit();
    if (typeof outcome === 'string') return outcome;
    this.report('warn', new PendingActivationError(this.label, 'initialization'));
    return 'pending';
  }

  /**
   * Ensure the instance exists and is initialized, waiting for asynchronous
   * steps. Concurrent callers share one run and observe the same outcome.
   *
   * A caller whose own activation the in-flight run is (transitively) waiting
   * on is treated as re-entrant instead of joining the wait.
   */
  async initAsync(): Promise<InitOutcome> {
    if (this.initialized) return 'initialized';
    if (isActive(this.frame)) return this.reentrantOutcome();
    if (this.pendingActivation) {
      if (wouldDeadlock(this.frame)) return this.reentrantOutcome();
      return waitFor(this.frame, this.pendingActivation);
    }

    const activation = this.activate().finally(() => {
      if (this.pendingActivation === activation) this.pendingActivation = undefined;
    });
    this.pendingActivation = activation;
    return activation;
  }

  /** Human-readable summary for diagnostics. */
  info(): string {
    const init = this.initializer ? '' : ', no initializer';
    return `${this.label} [${this.key}] priority ${this.priority}, ${this.state}${init}`;
  }

  // ---- internals ----

  private async activate(): Promise<InitOutcome> {
    await this.createAsync();
    if (!this.built) return 'failed';
    // The synchronous lane may have moved on while creation was awaited.
    if (this.initialized) return 'initialized';
    if (this.pendingInit) {
      if (wouldDeadlock(this.frame)) return this.reentrantOutcome();
      return waitFor(this.frame, this.pendingInit);
    }
    return this.attemptInit();
  }

  private attemptCreation(): CreationAttempt {
    const start = nowMs();
    let result: unknown;
    try {
      result = withActivation(this.frame, this.creator);
    } catch (error) {
      this.report('error', new CreationFailedError(this.label, error));
      return { kind: 'failed' };
    }

    if (!isPromiseLike(result)) return this.publish(result, start);

    const pending: Promise<unknown> = Promise.resolve(result)
      .then(
        (value) => {
          const settled = this.publish(value, start);
          return settled.kind === 'built' ? settled.instance : undefined;
        },
        (error: unknown) => {
          this.report('error', new CreationFailedError(this.label, error));
          return undefined;
        }
      )
      .finally(() => {
        if (this.pendingCreate === pending) this.pendingCreate = undefined;
      });
    this.pendingCreate = pending;
    return { kind: 'pending', promise: pending };
  }

  private publish(value: unknown, start: number): CreationAttempt {
    if (value === undefined || value === null) {
      this.report('error', new CreationFailedError(this.label, new Error('creator returned no instance')));
      return { kind: 'failed' };
    }
    this.instance = value;
    this.built = true;
    if (this.context.onCreate) {
      try {
        this.context.onCreate(this.key, toNs(nowMs() - start));
      } catch (error) {
        this.context.diagnostics.warn(
          `onCreate hook threw for '${this.label}': ${error instanceof Error ? error.message : String(error)}`
        );
      }
    }
    return { kind: 'built', instance: value };
  }

  private attemptInit(): InitOutcome | Promise<InitOutcome> {
    const initializer = this.initializer;
    if (!initializer) {
      this.initialized = true;
      return 'initialized';
    }

    let result: unknown;
    try {
      result = withActivation(this.frame, () => initializer(this.instance));
    } catch (error) {
      this.report('error', new InitializationFailedError(this.label, error));
      return 'failed';
    }

    if (!isPromiseLike(result)) {
      this.initialized = true;
      return 'initialized';
    }

    const pending: Promise<InitOutcome> = Promise.resolve(result)
      .then(
        (): InitOutcome => {
          this.initialized = true;
          return 'initialized';
        },
        (error: unknown): InitOutcome => {
          this.report('error', new InitializationFailedError(this.label, error));
          return 'failed';
        }
      )
      .finally(() => {
        if (this.pendingInit === pending) this.pendingInit = undefined;
      });
    this.pendingInit = pending;
    return pending;
  }

  /**
   * A lookup for this entry from inside its own activation. During
   * initialization the built instance is handed out un-initialized; during
   * creation there is nothing to hand out.
   */
  private reentrantOutcome(): InitOutcome {
    if (this.built) return 'reentrant';
    this.reportCycle();
    return 'failed';
  }

  private reportCycle(): undefined {
    const frames = activeChain();
    const start = frames.indexOf(this.frame);
    const cycle = frames.slice(Math.max(start, 0)).map((frame) => frame.label);
    this.report('error', new CircularCreationError([...cycle, this.label]));
    return undefined;
  }

  private report(level: 'warn' | 'error', error: Error): void {
    this.context.diagnostics[level](error.message);
  }
}
