import { describe, expect, it, vi } from 'vitest';

import { Diagnostics } from '../src/core/diagnostics.js';
import { EntryStore } from '../src/core/entry-store.js';
import { RegistrationEntry } from '../src/core/registration-entry.js';
import type { RegistryKey } from '../src/core/type-key.js';

const context = {
  diagnostics: new Diagnostics({ info: vi.fn(), warn: vi.fn(), error: vi.fn() }, 'silent'),
};

const entry = (key: string, priority: number) =>
  new RegistrationEntry(
    { key: key as RegistryKey, label: key, priority, creator: () => ({}) },
    context
  );

describe('EntryStore', () => {
  it('returns the replaced entry on set', () => {
    const store = new EntryStore();
    const first = entry('cls_1', 5);
    const second = entry('cls_1', 2);

    expect(store.set(first)).toBeUndefined();
    expect(store.set(second)).toBe(first);
    expect(store.get(first.key)).toBe(second);
    expect(store.size).toBe(1);
  });

  it('snapshots selected entries by priority, keeping insertion order on ties', () => {
    const store = new EntryStore();
    const a = entry('a', 3);
    const b = entry('b', 1);
    const c = entry('c', 3);
    const d = entry('d', 9);
    [a, b, c, d].forEach((e) => store.set(e));

    expect(store.snapshot((p) => p <= 3)).toEqual([b, a, c]);
    expect(store.snapshot(() => true).map((e) => e.key)).toEqual(['b', 'a', 'c', 'd']);
  });

  it('iterates keys and values and clears', () => {
    const store = new EntryStore();
    store.set(entry('x', 0));
    store.set(entry('y', 0));

    expect(Array.from(store.keys())).toEqual(['x', 'y']);
    expect(Array.from(store.values()).map((e) => e.label)).toEqual(['x', 'y']);
    expect(store.has('x' as RegistryKey)).toBe(true);

    store.clear();
    expect(store.size).toBe(0);
    expect(store.has('x' as RegistryKey)).toBe(false);
  });
});
