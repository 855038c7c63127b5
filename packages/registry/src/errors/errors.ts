const IS_PROD = typeof process !== 'undefined' && process.env?.NODE_ENV === 'production';

const join = (lines: string[]): string => lines.join('\n');
const format = (prod: string, devLines: string[]): string => (IS_PROD ? prod : join(devLines));

const describeCause = (cause: unknown): string =>
  cause instanceof Error ? cause.message : String(cause);

/**
 * A key was registered a second time; the later registration wins.
 */
export class DuplicateRegistrationError extends Error {
  constructor(
    public entry: string,
    public previousPriority: number,
    public priority: number
  ) {
    const dev = [
      `Overwriting registration for '${entry}'.`,
      '',
      `The previous registration (priority ${previousPriority}) is replaced by the new one (priority ${priority}).`,
      'Any instance built by the previous registration is discarded.',
    ];
    super(format(`Overwriting registration for '${entry}'.`, dev));
    this.name = 'DuplicateRegistrationError';
  }
}

/**
 * Lookup for a key with no registration.
 */
export class MissingRegistrationError extends Error {
  constructor(
    public entry: string,
    public available: string[],
    public activationChain?: string[]
  ) {
    const parts: string[] = [`No registration for '${entry}'.`, ''];

    if (activationChain && activationChain.length > 0) {
      parts.push('Requested while activating:', `  ${activationChain.join(' → ')} → ${entry}`, '');
    }

    if (available.length > 0 && available.length <= 10) {
      parts.push('Registered entries:');
      available.forEach((e) => parts.push(`  - ${e}`));
      parts.push('');
    } else if (available.length > 10) {
      parts.push(`${available.length} entries are registered.`, '');
    }

    parts.push('To fix this:');
    parts.push(`  1. Register '${entry}' before looking it up`);
    parts.push(`  2. Check the instance name used in the lookup`);

    super(format(`No registration for '${entry}'.`, parts));
    this.name = 'MissingRegistrationError';
  }
}

/**
 * A creator threw, rejected, or produced no instance.
 */
export class CreationFailedError extends Error {
  constructor(
    public entry: string,
    cause: unknown
  ) {
    const dev = [
      `Create failed for '${entry}': ${describeCause(cause)}`,
      '',
      'The entry stays un-built; the next lookup retries the creator.',
    ];
    super(format(`Create failed for '${entry}'.`, dev), { cause });
    this.name = 'CreationFailedError';
  }
}

/**
 * An initializer threw or rejected.
 */
export class InitializationFailedError extends Error {
  constructor(
    public entry: string,
    cause: unknown
  ) {
    const dev = [
      `Initializer failed for '${entry}': ${describeCause(cause)}`,
      '',
      'The built instance is kept; the next lookup retries the initializer.',
    ];
    super(format(`Initializer failed for '${entry}'.`, dev), { cause });
    this.name = 'InitializationFailedError';
  }
}

/**
 * A synchronous lookup reached an entry whose creator or initializer is
 * still settling asynchronously.
 */
export class PendingActivationError extends Error {
  constructor(
    public entry: string,
    public phase: 'creation' | 'initialization'
  ) {
    const dev = [
      `Asynchronous ${phase} of '${entry}' has not settled.`,
      '',
      `The ${phase === 'creation' ? 'creator' : 'initializer'} returned a promise, which the synchronous lane cannot wait for.`,
      '',
      'To fix this:',
      '  1. Use getAsync() or executeAllInitsAsync() for this entry',
      '  2. Or make the creator and initializer synchronous',
    ];
    super(format(`Asynchronous ${phase} of '${entry}' has not settled.`, dev));
    this.name = 'PendingActivationError';
  }
}

/**
 * A creator asked, directly or through peers, for the entry it is creating.
 */
export class CircularCreationError extends Error {
  constructor(public cycle: string[]) {
    const cycleStr = cycle.join(' → ');
    const dev = [
      'Circular creation detected:',
      '',
      `  ${cycleStr}`,
      '',
      `The creator of ${cycle[0]} needs an instance that only exists once it returns.`,
      '',
      'To fix this:',
      '  1. Move the lookup from the creator into the initializer',
      '  2. Or break the cycle between these entries',
    ];
    super(format(`Circular creation detected: ${cycleStr}`, dev));
    this.name = 'CircularCreationError';
  }
}

export class InvalidTypeError extends Error {
  constructor(public type: unknown) {
    let typeString: string;
    try {
      typeString = JSON.stringify(type) ?? String(type);
    } catch {
      typeString = String(type);
    }

    const dev = [
      'Invalid type reference',
      '',
      'Expected a class constructor or a token created with typeToken().',
      '',
      'Received:',
      `  ${typeString}`,
    ];
    super(format('Invalid type reference.', dev));
    this.name = 'InvalidTypeError';
  }
}

export class InvalidInstanceNameError extends Error {
  constructor(
    public instanceName: unknown,
    public separator: string
  ) {
    const received = JSON.stringify(instanceName) ?? String(instanceName);
    const dev = [
      'Invalid instance name',
      '',
      `Instance names must be non-empty strings without '${separator}'.`,
      '',
      'Received:',
      `  ${received}`,
    ];
    super(format(`Invalid instance name ${received}.`, dev));
    this.name = 'InvalidInstanceNameError';
  }
}

export class UnconstructableEntryError extends Error {
  constructor(public entry: string) {
    const dev = [
      'Unconstructable entry',
      '',
      `'${entry}' is keyed on a token, which cannot be constructed.`,
      `Pass a 'create' factory when registering it.`,
    ];
    super(format(`'${entry}' cannot be constructed.`, dev));
    this.name = 'UnconstructableEntryError';
  }
}

export class InvalidRegistryConfigError extends Error {
  constructor(public reason: string) {
    const dev = ['Invalid registry configuration', '', `Invalid registry configuration: ${reason}`];
    super(format(`Invalid registry configuration: ${reason}`, dev));
    this.name = 'InvalidRegistryConfigError';
  }
}

export class RegistryDisposedError extends Error {
  constructor(public registryName: string) {
    const dev = [
      `Registry '${registryName}' has been disposed.`,
      '',
      'Dispose is irreversible. Create a new registry before registering or looking up entries.',
    ];
    super(format(`Registry '${registryName}' has been disposed.`, dev));
    this.name = 'RegistryDisposedError';
  }
}

/**
 * Error thrown when one or more instance disposers fail.
 *
 * Each individual failure is preserved in the `errors` array.
 */
export class AggregateDisposalError extends Error {
  constructor(public errors: Error[]) {
    const errorList = errors.map((e, i) => `  ${i + 1}. ${e.message}`).join('\n');
    const dev = [
      'Multiple disposal errors occurred',
      '',
      `${errors.length} error(s) occurred during registry disposal:`,
      errorList,
      '',
      'Check the `errors` property for detailed information about each failure.',
    ];

    super(format(`${errors.length} disposal error(s) occurred.`, dev));
    this.name = 'AggregateDisposalError';
  }
}
