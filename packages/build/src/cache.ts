/**
 * @tessera/build — Build cache
 *
 * The cache is an explicit object handed to a builder.  Entries are only
 * committed once a unit's pipeline fully succeeded and its artifacts were
 * written; the backing CacheStore persists them at the end of a pass.
 */

import type { ComponentInterface, Diagnostic } from '@tessera/compiler';
import { MemoryCacheStore, type CacheStore } from './cache-store';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Where a unit's generated files live in an ArtifactStore. */
export interface ArtifactRefs {
  module: string;
  stylesheet: string | null;
}

export interface CacheEntry {
  unitId: string;
  /** sha256 of the unit source. */
  hash: string;
  /** Hash of the compile options the entry was produced with. */
  optionsHash: string;
  dependencies: string[];
  /** Content hash of each dependency at the time the unit was compiled. */
  dependencyHashes: Record<string, string>;
  artifacts: ArtifactRefs;
  interface: ComponentInterface;
  /** Warnings of the compile that produced the entry. */
  warnings: Diagnostic[];
}

// ---------------------------------------------------------------------------
// BuildCache
// ---------------------------------------------------------------------------

export class BuildCache {
  readonly store: CacheStore;
  #entries = new Map<string, CacheEntry>();
  #loaded: Promise<Diagnostic[]> | null = null;

  constructor(store: CacheStore = new MemoryCacheStore()) {
    this.store = store;
  }

  /**
   * Read the persisted entries, once.  Returns the warnings of the first
   * load (a discarded cache file); later calls return an empty list.
   */
  async load(): Promise<Diagnostic[]> {
    if (this.#loaded) {
      await this.#loaded;
      return [];
    }
    this.#loaded = this.store.load().then(({ entries, warnings }) => {
      for (const entry of entries) this.#entries.set(entry.unitId, entry);
      return warnings;
    });
    return this.#loaded;
  }

  get(unitId: string): CacheEntry | undefined {
    return this.#entries.get(unitId);
  }

  has(unitId: string): boolean {
    return this.#entries.has(unitId);
  }

  set(entry: CacheEntry): void {
    this.#entries.set(entry.unitId, entry);
  }

  delete(unitId: string): boolean {
    return this.#entries.delete(unitId);
  }

  ids(): string[] {
    return [...this.#entries.keys()];
  }

  get size(): number {
    return this.#entries.size;
  }

  /** Drop the entries of units that no longer exist and return them. */
  prune(live: ReadonlySet<string>): CacheEntry[] {
    const pruned = [...this.#entries.values()].filter((entry) => !live.has(entry.unitId));
    for (const entry of pruned) this.#entries.delete(entry.unitId);
    return pruned;
  }

  /** Persist the current entries through the store. */
  async flush(): Promise<void> {
    await this.store.save([...this.#entries.values()]);
  }
}
