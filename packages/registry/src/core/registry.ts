import {
  AggregateDisposalError,
  DuplicateRegistrationError,
  InvalidRegistryConfigError,
  MissingRegistrationError,
  RegistryDisposedError,
  UnconstructableEntryError,
} from '../errors/errors.js';
import {
  Priority,
  type BatchReport,
  type ClassRegisterOptions,
  type Creator,
  type DefaultConstructor,
  type InitHook,
  type RegisterOptions,
  type RegistryConfig,
  type TypeRef,
} from '../types/types.js';
import { activeChain } from './activation.js';
import {
  consoleSink,
  Diagnostics,
  DIAGNOSTIC_PREFIX,
  ignoredEnvLogLevel,
  LOG_LEVEL_ENV,
  LOG_LEVELS,
  resolveLogLevel,
} from './diagnostics.js';
import { EntryStore } from './entry-store.js';
import {
  isPromiseLike,
  RegistrationEntry,
  type EntryContext,
  type InitOutcome,
} from './registration-entry.js';
import { isTypeToken } from './token.js';
import { clampPriority, composeKey, describeType, type RegistryKey } from './type-key.js';

/**
 * Find a `dispose()` or `close()` method on a built instance.
 */
function findDisposer(instance: unknown): (() => unknown) | undefined {
  if ((typeof instance !== 'object' && typeof instance !== 'function') || instance === null) {
    return undefined;
  }
  for (const method of ['dispose', 'close'] as const) {
    const fn: unknown = Reflect.get(instance, method);
    if (typeof fn === 'function') return () => fn.call(instance);
  }
  return undefined;
}

/** Anything `dumpEntries` / `dumpInstances` can write lines to. */
export type LineWriter = Pick<NodeJS.WritableStream, 'write'>;

function validateConfig(config: RegistryConfig): RegistryConfig {
  const { name, sink, onCreate } = config;
  if (name !== undefined && (typeof name !== 'string' || name.length === 0)) {
    throw new InvalidRegistryConfigError(`'name' must be a non-empty string.`);
  }
  if (
    sink !== undefined &&
    (typeof sink !== 'object' ||
      sink === null ||
      typeof sink.info !== 'function' ||
      typeof sink.warn !== 'function' ||
      typeof sink.error !== 'function')
  ) {
    throw new InvalidRegistryConfigError(`'sink' must provide info, warn and error functions.`);
  }
  if (onCreate !== undefined && typeof onCreate !== 'function') {
    throw new InvalidRegistryConfigError(`'onCreate' must be a function.`);
  }
  return config;
}

/*
 * Registry: type-keyed directory of lazily created singletons.
 *
 * Clients register a creator (and optionally an initializer and a priority)
 * per type, or per type and instance name. Instances are built on the first
 * lookup, or eagerly by a batch pass that runs every creator of the selected
 * priority slice before any initializer, in ascending priority.
 *
 * Nothing here holds a lock across client code: JavaScript runs one call at a
 * time, so the only interleavings are re-entrant calls (an initializer asking
 * for a peer) and awaited async creators/initializers. Entries handle both;
 * the registry only routes lookups and drives batches.
 */
export class Registry {
  private readonly store = new EntryStore();
  private readonly diagnostics: Diagnostics;
  private readonly context: EntryContext;
  private readonly name: string;
  private disposed = false;

  constructor(config: RegistryConfig = {}) {
    const cfg = validateConfig(config);
    this.name = cfg.name ?? 'Registry';
    this.diagnostics = new Diagnostics(cfg.sink ?? consoleSink, resolveLogLevel(cfg.logLevel));
    const ignored = cfg.logLevel === undefined ? ignoredEnvLogLevel() : undefined;
    if (ignored !== undefined) {
      this.diagnostics.warn(
        `Ignoring ${LOG_LEVEL_ENV}='${ignored}'; expected one of ${LOG_LEVELS.join(', ')}.`
      );
    }
    this.context = { diagnostics: this.diagnostics, onCreate: cfg.onCreate };
  }

  getName(): string {
    return this.name;
  }

  // ----- Registration -----

  /**
   * Register a creator for a type, optionally under an instance name.
   *
   * Without `create`, classes are default-constructed; tokens need a creator.
   * Registering an existing key replaces the previous entry (and drops any
   * instance it built) after a warning. Priority is clamped into [0, 10].
   *
   * @returns The key the entry was installed under
   * @throws InvalidTypeError, InvalidInstanceNameError, UnconstructableEntryError
   *
   * @example
   * ```typescript
   * registry.register(Logger, { init: 'open', priority: 1 });
   * registry.register(Database, { name: 'replica', create: () => new Database(replicaUrl) });
   * ```
   */
  register<T>(type: TypeRef<T>, options: RegisterOptions<T> = {}): RegistryKey {
    this.assertNotDisposed();
    const key = composeKey(type, options.name);
    const label = describeType(type, options.name);
    const priority = clampPriority(options.priority);
    const creator = options.create ?? this.defaultCreator(type, label);

    const entry = new RegistrationEntry(
      { key, label, priority, creator, initializer: this.eraseInitializer(options.init, label) },
      this.context
    );

    const previous = this.store.set(entry);
    if (previous) {
      this.diagnostics.warn(
        new DuplicateRegistrationError(label, previous.priority, priority).message
      );
    }
    this.diagnostics.info(`Registered '${label}' with priority ${priority}`);
    return key;
  }

  /** Register default construction of a class. */
  registerClass<T>(ctor: DefaultConstructor<T>, options: ClassRegisterOptions<T> = {}): RegistryKey {
    return this.register(ctor, options);
  }

  /** Register a factory for a class or token. */
  registerFactory<T>(
    type: TypeRef<T>,
    create: Creator<T>,
    options: ClassRegisterOptions<T> = {}
  ): RegistryKey {
    return this.register(type, { ...options, create });
  }

  /** Register a named instance of a type. */
  registerNamed<T>(
    type: TypeRef<T>,
    name: string,
    options: Omit<RegisterOptions<T>, 'name'> = {}
  ): RegistryKey {
    return this.register(type, { ...options, name });
  }

  // ----- Lookup -----

  /**
   * Look up an instance, creating and initializing it on first use.
   *
   * Returns undefined (after a diagnostic) when nothing is registered, when
   * creation or initialization fails, or when an async creator/initializer
   * has not settled. Called from inside the same entry's initializer, it
   * returns the built but not yet initialized instance.
   */
  get<T>(type: TypeRef<T>, name?: string): T | undefined {
    const entry = this.lookup(type, name);
    if (!entry) return undefined;
    return this.handleFor<T>(entry, entry.init());
  }

  /**
   * Asynchronous {@link get}: waits for async creators and initializers.
   * Concurrent calls for the same entry share one creation and one
   * initialization.
   */
  async getAsync<T>(type: TypeRef<T>, name?: string): Promise<T | undefined> {
    const entry = this.lookup(type, name);
    if (!entry) return undefined;
    return this.handleFor<T>(entry, await entry.initAsync());
  }

  /** Whether a registration exists for the type (and name). */
  has(type: TypeRef, name?: string): boolean {
    return this.store.has(composeKey(type, name));
  }

  /** Whether the registration exists and has built its instance. */
  hasInstance(type: TypeRef, name?: string): boolean {
    return this.store.get(composeKey(type, name))?.hasInstance ?? false;
  }

  // ----- Batch initialization -----

  /**
   * Create, then initialize, every entry with priority ≤ maxPriority.
   *
   * All creators of the slice run before any initializer, both phases in
   * ascending priority. Failures are reported and skipped; entries whose
   * creation failed are not initialized in the same pass. Never throws for
   * client failures.
   *
   * The bound is compared as given: below 0 (or NaN) selects nothing.
   */
  executePriorInits(maxPriority: number = Priority.Latest): BatchReport {
    const batch = this.store.snapshot((p) => p <= maxPriority);
    const description = `priority ${Priority.Earliest}-${maxPriority}`;

    this.startBatch(description, batch.length);
    for (const entry of batch) entry.create();
    for (const entry of batch) if (entry.hasInstance) entry.init();
    return this.finishBatch(description, maxPriority, batch);
  }

  /** Batch pass over every entry. */
  executeAllInits(): BatchReport {
    return this.executePriorInits(Priority.Latest);
  }

  /** Batch pass over entries with priority ≤ maxPriority (all by default). */
  executeInits(maxPriority: number = Priority.Latest): BatchReport {
    return this.executePriorInits(maxPriority);
  }

  /** Batch pass over exactly one priority slice; values outside [0, 10] select nothing. */
  executeInitsAtPriority(priority: number): BatchReport {
    const batch = this.store.snapshot((p) => p === priority);
    const description = `priority ${priority}`;

    this.startBatch(description, batch.length);
    for (const entry of batch) entry.create();
    for (const entry of batch) if (entry.hasInstance) entry.init();
    return this.finishBatch(description, priority, batch);
  }

  /**
   * Asynchronous {@link executePriorInits}. Each creator and initializer is
   * awaited before the next one starts, so the ordering guarantees hold for
   * async clients too.
   */
  async executePriorInitsAsync(maxPriority: number = Priority.Latest): Promise<BatchReport> {
    const batch = this.store.snapshot((p) => p <= maxPriority);
    const description = `priority ${Priority.Earliest}-${maxPriority}`;

    this.startBatch(description, batch.length);
    for (const entry of batch) await entry.createAsync();
    for (const entry of batch) if (entry.hasInstance) await entry.initAsync();
    return this.finishBatch(description, maxPriority, batch);
  }

  executeAllInitsAsync(): Promise<BatchReport> {
    return this.executePriorInitsAsync(Priority.Latest);
  }

  // ----- Introspection -----

  /** Number of registrations. */
  get size(): number {
    return this.store.size;
  }

  /** Number of registrations that have built their instance. */
  get instanceCount(): number {
    let count = 0;
    for (const entry of this.store.values()) if (entry.hasInstance) count++;
    return count;
  }

  /** Registered keys, sorted. */
  getRegisteredKeys(): RegistryKey[] {
    return Array.from(this.store.keys()).sort();
  }

  /** Snapshot of built instances by key. */
  getInstances(): Map<RegistryKey, unknown> {
    const out = new Map<RegistryKey, unknown>();
    for (const entry of this.store.values()) {
      if (entry.hasInstance) out.set(entry.key, entry.peek());
    }
    return out;
  }

  /** One summary line per registration, in ascending priority. */
  describeEntries(): string[] {
    return this.store.snapshot(() => true).map((entry) => `- ${entry.info()}`);
  }

  /** One line per built instance, naming the instance's class. */
  describeInstances(): string[] {
    const lines: string[] = [];
    for (const [key, instance] of this.getInstances()) {
      const ctorName =
        typeof instance === 'object' && instance !== null
          ? instance.constructor?.name || 'Object'
          : typeof instance;
      lines.push(`- ${this.store.get(key)?.label ?? key} [${key}]: ${ctorName}`);
    }
    return lines;
  }

  dumpEntries(stream: LineWriter = process.stdout): void {
    const lines = this.describeEntries();
    stream.write(`${DIAGNOSTIC_PREFIX} Registry entries (${lines.length}):\n`);
    for (const line of lines) stream.write(`  ${line}\n`);
  }

  dumpInstances(stream: LineWriter = process.stdout): void {
    const lines = this.describeInstances();
    stream.write(`${DIAGNOSTIC_PREFIX} Registered instances (${lines.length}):\n`);
    if (lines.length === 0) stream.write('  No instances built.\n');
    for (const line of lines) stream.write(`  ${line}\n`);
  }

  // ----- Teardown -----

  /**
   * Drop every registration and cached instance.
   *
   * Creations still in flight finish on their detached entries; their
   * instances are not published here.
   */
  clear(): void {
    this.store.clear();
  }

  /**
   * Release every built instance, calling its `dispose()` or `close()` when it
   * has one, then drop all registrations. Order is unspecified.
   *
   * Returns a promise only when some disposer returned one.
   *
   * @throws AggregateDisposalError if one or more disposers fail
   */
  dispose(): void | Promise<void> {
    if (this.disposed) return;

    const errors: Error[] = [];
    const pending: Promise<void>[] = [];

    for (const entry of this.store.values()) {
      const disposer = findDisposer(entry.peek());
      if (!disposer) continue;
      try {
        const result = disposer();
        if (isPromiseLike(result)) pending.push(Promise.resolve(result).then(() => undefined));
      } catch (error) {
        errors.push(error instanceof Error ? error : new Error(String(error)));
      }
    }

    this.store.clear();

    if (pending.length === 0) {
      this.disposed = true;
      if (errors.length > 0) throw new AggregateDisposalError(errors);
      return;
    }

    return Promise.allSettled(pending).then((results) => {
      this.disposed = true;
      for (const result of results) {
        if (result.status === 'rejected') {
          const error: unknown = result.reason;
          errors.push(error instanceof Error ? error : new Error(String(error)));
        }
      }
      if (errors.length > 0) throw new AggregateDisposalError(errors);
    });
  }

  // ----- internals -----

  private assertNotDisposed(): void {
    if (this.disposed) throw new RegistryDisposedError(this.name);
  }

  private lookup(type: TypeRef, name: string | undefined): RegistrationEntry | undefined {
    this.assertNotDisposed();
    const entry = this.store.get(composeKey(type, name));
    if (!entry) {
      const available = this.store.snapshot(() => true).map((e) => e.label);
      const chain = activeChain().map((frame) => frame.label);
      this.diagnostics.warn(
        new MissingRegistrationError(
          describeType(type, name),
          available,
          chain.length > 0 ? chain : undefined
        ).message
      );
    }
    return entry;
  }

  /**
   * The instance is stored type-erased; the caller's type reference is the
   * only source of T, as it was when the entry was registered.
   */
  private handleFor<T>(entry: RegistrationEntry, outcome: InitOutcome): T | undefined {
    if (outcome === 'initialized' || outcome === 'reentrant') return entry.peek() as T | undefined;
    return undefined;
  }

  private defaultCreator<T>(type: TypeRef<T>, label: string): Creator<T> {
    if (isTypeToken(type)) throw new UnconstructableEntryError(label);
    const ctor = type;
    return () => new ctor();
  }

  private eraseInitializer<T>(
    init: InitHook<T> | undefined,
    label: string
  ): ((instance: unknown) => unknown) | undefined {
    if (init === undefined) return undefined;
    if (typeof init === 'function') {
      const initializer = init;
      return (instance) => initializer(instance as T);
    }
    const methodName: string = init;
    return (instance) => {
      const method: unknown = Reflect.get(Object(instance), methodName);
      if (typeof method !== 'function') {
        throw new TypeError(`'${methodName}' is not a method of ${label}`);
      }
      return method.call(instance);
    };
  }

  private startBatch(description: string, count: number): void {
    this.diagnostics.info(
      `Starting execution of initializers with ${description} (${count} items)...`
    );
  }

  private finishBatch(description: string, max: number, batch: RegistrationEntry[]): BatchReport {
    const failed = batch.filter((e) => e.state !== 'initialized').map((e) => e.key);
    const report: BatchReport = {
      maxPriority: max,
      selected: batch.length,
      created: batch.filter((e) => e.hasInstance).length,
      initialized: batch.length - failed.length,
      failed,
    };
    this.diagnostics.info(
      `Initializers with ${description} executed. Total instances: ${this.instanceCount}`
    );
    return report;
  }
}
