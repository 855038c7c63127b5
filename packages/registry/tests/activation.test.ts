import { describe, expect, it } from 'vitest';

import {
  activeChain,
  isActive,
  waitFor,
  withActivation,
  wouldDeadlock,
  type ActivationFrame,
} from '../src/core/activation.js';
import type { RegistryKey } from '../src/core/type-key.js';

const frame = (key: string): ActivationFrame => ({ key: key as RegistryKey, label: key });

const deferred = () => {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
};

describe('activation chain', () => {
  it('nests frames and compares them by identity', () => {
    const outer = frame('cls_outer');
    const inner = frame('cls_inner');
    const lookalike = frame('cls_outer');

    expect(activeChain()).toEqual([]);
    withActivation(outer, () =>
      withActivation(inner, () => {
        expect(activeChain()).toEqual([outer, inner]);
        expect(isActive(outer)).toBe(true);
        expect(isActive(lookalike)).toBe(false);
      })
    );
    expect(isActive(outer)).toBe(false);
  });

  it('keeps the chain across awaits', async () => {
    const outer = frame('cls_async');

    const seen = await withActivation(outer, async () => {
      await Promise.resolve();
      return activeChain();
    });

    expect(seen).toEqual([outer]);
  });
});

describe('wait-for graph', () => {
  it('refuses a wait that would close a cycle across chains', async () => {
    const left = frame('cls_left');
    const right = frame('cls_right');
    const gate = deferred();

    expect(wouldDeadlock(right)).toBe(false);
    const waiting = withActivation(left, () => waitFor(right, gate.promise));

    expect(withActivation(right, () => wouldDeadlock(left))).toBe(true);
    expect(withActivation(frame('cls_bystander'), () => wouldDeadlock(left))).toBe(false);

    gate.resolve();
    await waiting;

    expect(withActivation(right, () => wouldDeadlock(left))).toBe(false);
  });

  it('follows waits transitively', async () => {
    const a = frame('cls_a');
    const b = frame('cls_b');
    const c = frame('cls_c');
    const first = deferred();
    const second = deferred();

    const aWaits = withActivation(a, () => waitFor(b, first.promise));
    const bWaits = withActivation(b, () => waitFor(c, second.promise));

    expect(withActivation(c, () => wouldDeadlock(a))).toBe(true);

    first.resolve();
    second.resolve();
    await Promise.all([aWaits, bWaits]);
    expect(withActivation(c, () => wouldDeadlock(a))).toBe(false);
  });

  it('passes work through unchanged outside any activation', async () => {
    expect(await waitFor(frame('cls_free'), Promise.resolve(7))).toBe(7);
  });
});
