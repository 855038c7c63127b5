import { afterEach, describe, expect, it, vi } from 'vitest';

describe('Production environment branches', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.resetModules();
  });

  it('uses single-line messages in production', async () => {
    vi.stubEnv('NODE_ENV', 'production');
    vi.resetModules();

    const errors = await import('../src/errors/errors.js');

    expect(new errors.DuplicateRegistrationError('P', 5, 5).message).toBe(
      "Overwriting registration for 'P'."
    );
    expect(new errors.MissingRegistrationError('X', ['Y']).message).toBe("No registration for 'X'.");
    expect(new errors.CreationFailedError('X', new Error('e')).message).toBe(
      "Create failed for 'X'."
    );
    expect(new errors.InitializationFailedError('X', new Error('e')).message).toBe(
      "Initializer failed for 'X'."
    );
    expect(new errors.PendingActivationError('X', 'creation').message).toBe(
      "Asynchronous creation of 'X' has not settled."
    );
    expect(new errors.CircularCreationError(['A', 'B', 'A']).message).toBe(
      'Circular creation detected: A → B → A'
    );
    expect(new errors.InvalidTypeError(1).message).toBe('Invalid type reference.');
    expect(new errors.InvalidInstanceNameError('', '#').message).toBe('Invalid instance name "".');
    expect(new errors.UnconstructableEntryError('Clock').message).toBe(
      "'Clock' cannot be constructed."
    );
    expect(new errors.RegistryDisposedError('app').message).toBe(
      "Registry 'app' has been disposed."
    );
    expect(
      new errors.AggregateDisposalError([new Error('one'), new Error('two')]).message
    ).toBe('2 disposal error(s) occurred.');
  });
});
