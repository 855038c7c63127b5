/*
 * Activation chain
 * ----------------
 * Tracks which entries are being created or initialized further up the
 * current call chain, sync or async. A lookup for an entry already on the
 * chain is re-entrant: waiting on that entry's in-flight work would wait on
 * itself.
 *
 * Unrelated concurrent callers run in their own async contexts and do not see
 * each other's chains. They may share an entry's pending promise, so every
 * such wait is recorded as an edge in a wait-for graph: frames on the
 * waiting chain -> the frame whose work is awaited. Waiting on a frame that
 * already reaches the current chain through that graph would close a cycle
 * across callers, and is refused.
 *
 * Frames are compared by identity, so the same key in two registries never
 * counts as the same activation.
 */
import { AsyncLocalStorage } from 'node:async_hooks';

import type { RegistryKey } from './type-key.js';

export interface ActivationFrame {
  readonly key: RegistryKey;
  readonly label: string;
}

const EMPTY_CHAIN: readonly ActivationFrame[] = Object.freeze([]);

const chain = new AsyncLocalStorage<readonly ActivationFrame[]>();

/** waiter -> awaited frame -> number of outstanding waits */
const waits = new Map<ActivationFrame, Map<ActivationFrame, number>>();

/** Frames being activated in the current context, outermost first. */
export function activeChain(): readonly ActivationFrame[] {
  return chain.getStore() ?? EMPTY_CHAIN;
}

export function isActive(frame: ActivationFrame): boolean {
  return activeChain().includes(frame);
}

/**
 * Run `fn` with `frame` pushed onto the activation chain. Promises started
 * inside `fn` keep the extended chain.
 */
export function withActivation<R>(frame: ActivationFrame, fn: () => R): R {
  return chain.run([...activeChain(), frame], fn);
}

function reaches(from: ActivationFrame, targets: readonly ActivationFrame[]): boolean {
  const seen = new Set<ActivationFrame>();
  const pending = [from];
  while (pending.length > 0) {
    const frame = pending.pop();
    if (frame === undefined || seen.has(frame)) continue;
    if (targets.includes(frame)) return true;
    seen.add(frame);
    const next = waits.get(frame);
    if (next) pending.push(...next.keys());
  }
  return false;
}

/**
 * Whether awaiting `target`'s in-flight work from the current chain would
 * end up waiting on the chain itself.
 */
export function wouldDeadlock(target: ActivationFrame): boolean {
  const current = activeChain();
  return current.length > 0 && reaches(target, current);
}

function addWait(waiter: ActivationFrame, target: ActivationFrame): void {
  let targets = waits.get(waiter);
  if (!targets) {
    targets = new Map();
    waits.set(waiter, targets);
  }
  targets.set(target, (targets.get(target) ?? 0) + 1);
}

function removeWait(waiter: ActivationFrame, target: ActivationFrame): void {
  const targets = waits.get(waiter);
  const count = targets?.get(target);
  if (!targets || count === undefined) return;
  if (count > 1) targets.set(target, count - 1);
  else targets.delete(target);
  if (targets.size === 0) waits.delete(waiter);
}

/**
 * Await `work` owned by `target`, recording for the duration that every
 * frame of the current chain waits on it.
 */
export async function waitFor<R>(target: ActivationFrame, work: Promise<R>): Promise<R> {
  const waiters = activeChain();
  if (waiters.length === 0) return work;
  for (const waiter of waiters) addWait(waiter, target);
  try {
    return await work;
  } finally {
    for (const waiter of waiters) removeWait(waiter, target);
  }
}
