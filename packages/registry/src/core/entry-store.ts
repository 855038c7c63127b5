/*
 * EntryStore
 * ----------
 * Key -> RegistrationEntry map owned by a Registry.
 *
 * Keys are unique: installing an entry under an existing key replaces the old
 * one and hands it back so the caller can report the overwrite. Replaced and
 * cleared entries are simply dropped; anyone still holding one (an in-flight
 * creation, say) keeps a working but detached object.
 */
import { compareEntries, type RegistrationEntry } from './registration-entry.js';
import type { RegistryKey } from './type-key.js';

export class EntryStore {
  private readonly entries = new Map<RegistryKey, RegistrationEntry>();

  get size(): number {
    return this.entries.size;
  }

  get(key: RegistryKey): RegistrationEntry | undefined {
    return this.entries.get(key);
  }

  has(key: RegistryKey): boolean {
    return this.entries.has(key);
  }

  /**
   * Install an entry under its key.
   *
   * @returns The entry it replaced, if any
   */
  set(entry: RegistrationEntry): RegistrationEntry | undefined {
    const previous = this.entries.get(entry.key);
    this.entries.set(entry.key, entry);
    return previous;
  }

  *keys(): IterableIterator<RegistryKey> {
    yield* this.entries.keys();
  }

  *values(): IterableIterator<RegistrationEntry> {
    yield* this.entries.values();
  }

  /**
   * Entries whose priority passes `select`, in ascending priority. Equal
   * priorities keep insertion order (Array.prototype.sort is stable).
   */
  snapshot(select: (priority: number) => boolean): RegistrationEntry[] {
    return Array.from(this.entries.values())
      .filter((entry) => select(entry.priority))
      .sort(compareEntries);
  }

  clear(): void {
    this.entries.clear();
  }
}
