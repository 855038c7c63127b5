import { afterEach, describe, expect, it, vi } from 'vitest';

import { Registry } from '../src/core/registry.js';
import { resetDefaultRegistry } from '../src/registry/global-registry.js';
import {
  AggregateDisposalError,
  InvalidRegistryConfigError,
  RegistryDisposedError,
} from '../src/errors/errors.js';

const quietRegistry = () =>
  new Registry({ sink: { info: vi.fn(), warn: vi.fn(), error: vi.fn() }, logLevel: 'silent' });

describe('Registry configuration', () => {
  it('uses the configured name', () => {
    expect(new Registry({ name: 'app', logLevel: 'silent' }).getName()).toBe('app');
    expect(quietRegistry().getName()).toBe('Registry');
  });

  it('rejects invalid configuration', () => {
    expect(() => new Registry({ name: '' })).toThrow(InvalidRegistryConfigError);
    expect(() => new Registry({ sink: { info: vi.fn() } as never })).toThrow(
      InvalidRegistryConfigError
    );
    expect(() => new Registry({ onCreate: 'nope' as never })).toThrow(InvalidRegistryConfigError);
    expect(() => new Registry({ logLevel: 'loud' as never })).toThrow(InvalidRegistryConfigError);
  });

  it('reports creation timings through onCreate', () => {
    const onCreate = vi.fn();
    const registry = new Registry({ onCreate, logLevel: 'silent' });
    class Timed {}
    const key = registry.registerClass(Timed);

    registry.get(Timed);
    registry.get(Timed);

    expect(onCreate).toHaveBeenCalledTimes(1);
    expect(onCreate).toHaveBeenCalledWith(key, expect.any(Number));
  });

  it('writes to the console when no sink is given', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const registry = new Registry({ logLevel: 'warn' });
    class Unknown {}

    registry.get(Unknown);

    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0]?.[0])).toMatch(/^\[AutoRegister\] No registration for 'Unknown'\./);
  });
});

describe('Registry log level from the environment', () => {
  const original = process.env.AUTOREGISTER_LOG_LEVEL;

  afterEach(() => {
    if (original === undefined) delete process.env.AUTOREGISTER_LOG_LEVEL;
    else process.env.AUTOREGISTER_LOG_LEVEL = original;
  });

  it('warns once and keeps going when the variable is not a level', () => {
    process.env.AUTOREGISTER_LOG_LEVEL = 'verbose';
    const sink = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };

    const registry = new Registry({ sink });
    class Unknown {}
    registry.get(Unknown);

    expect(sink.warn).toHaveBeenCalledTimes(2);
    expect(sink.warn).toHaveBeenNthCalledWith(
      1,
      "[AutoRegister] Ignoring AUTOREGISTER_LOG_LEVEL='verbose'; expected one of silent, error, warn, info."
    );
    expect(sink.info).not.toHaveBeenCalled();
  });

  it('still builds the process-wide registry', () => {
    process.env.AUTOREGISTER_LOG_LEVEL = 'loud';
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    expect(() => resetDefaultRegistry()).not.toThrow();
    expect(warn).toHaveBeenCalledWith(
      "[AutoRegister] Ignoring AUTOREGISTER_LOG_LEVEL='loud'; expected one of silent, error, warn, info."
    );
  });

  it('does not consult the variable when a level is configured', () => {
    process.env.AUTOREGISTER_LOG_LEVEL = 'verbose';
    const sink = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };

    new Registry({ sink, logLevel: 'info' });

    expect(sink.warn).not.toHaveBeenCalled();
    expect(() => new Registry({ logLevel: 'loud' as never })).toThrow(InvalidRegistryConfigError);
  });
});

describe('Registry disposal', () => {
  it('calls dispose() or close() on built instances', () => {
    const registry = quietRegistry();
    const dispose = vi.fn();
    const close = vi.fn();
    class WithDispose {
      dispose = dispose;
    }
    class WithClose {
      close = close;
    }
    class Plain {}
    class NeverBuilt {
      dispose = dispose;
    }
    registry.registerClass(WithDispose);
    registry.registerClass(WithClose);
    registry.registerClass(Plain);
    registry.registerClass(NeverBuilt);
    registry.get(WithDispose);
    registry.get(WithClose);
    registry.get(Plain);

    expect(registry.dispose()).toBeUndefined();
    expect(dispose).toHaveBeenCalledTimes(1);
    expect(close).toHaveBeenCalledTimes(1);
    expect(registry.size).toBe(0);
  });

  it('returns a promise when a disposer is asynchronous', async () => {
    const registry = quietRegistry();
    let closed = false;
    class Socket {
      async close() {
        await Promise.resolve();
        closed = true;
      }
    }
    registry.registerClass(Socket);
    registry.get(Socket);

    const result = registry.dispose();

    expect(result).toBeInstanceOf(Promise);
    await result;
    expect(closed).toBe(true);
  });

  it('aggregates disposer failures', async () => {
    const registry = quietRegistry();
    class SyncFail {
      dispose() {
        throw new Error('sync fail');
      }
    }
    class AsyncFail {
      async dispose() {
        throw new Error('async fail');
      }
    }
    registry.registerClass(SyncFail);
    registry.registerClass(AsyncFail);
    registry.executeAllInits();

    const error = await Promise.resolve()
      .then(() => registry.dispose())
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AggregateDisposalError);
    expect(error instanceof AggregateDisposalError && error.errors.map((e) => e.message)).toEqual([
      'sync fail',
      'async fail',
    ]);
  });

  it('throws AggregateDisposalError synchronously when every disposer is synchronous', () => {
    const registry = quietRegistry();
    class Fails {
      close() {
        throw 'plain string';
      }
    }
    registry.registerClass(Fails);
    registry.get(Fails);

    expect(() => registry.dispose()).toThrow(AggregateDisposalError);
  });

  it('is irreversible and idempotent', async () => {
    const registry = quietRegistry();
    class Late {}
    registry.dispose();

    expect(registry.dispose()).toBeUndefined();
    expect(() => registry.registerClass(Late)).toThrow(RegistryDisposedError);
    expect(() => registry.get(Late)).toThrow(RegistryDisposedError);
    await expect(registry.getAsync(Late)).rejects.toThrow(RegistryDisposedError);
  });
});
