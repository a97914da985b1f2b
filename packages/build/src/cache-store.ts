/**
 * @tessera/build — Cache stores
 *
 * A CacheStore persists the entries of a BuildCache between builds.  The
 * file store keeps them in `<cacheDir>/cache.json`; a file that cannot be
 * read back is discarded with a `cache-discarded` warning and the build
 * starts cold.
 */

import { isDiagnosticCode, warning, type ComponentInterface, type Diagnostic } from '@tessera/compiler';
import fs from 'node:fs/promises';
import path from 'node:path';
import { isNotFound } from './artifacts';
import type { ArtifactRefs, CacheEntry } from './cache';

export interface CacheLoadResult {
  entries: CacheEntry[];
  warnings: Diagnostic[];
}

export interface CacheStore {
  load(): Promise<CacheLoadResult>;
  save(entries: readonly CacheEntry[]): Promise<void>;
}

/** Bumped whenever the shape of a persisted entry changes. */
export const CACHE_VERSION = 1;

export const CACHE_FILE = 'cache.json';

// ---------------------------------------------------------------------------
// MemoryCacheStore
// ---------------------------------------------------------------------------

/** Keeps a copy of the last saved entries in memory (per session). */
export class MemoryCacheStore implements CacheStore {
  #saved: CacheEntry[] = [];

  async load(): Promise<CacheLoadResult> {
    return { entries: structuredClone(this.#saved), warnings: [] };
  }

  async save(entries: readonly CacheEntry[]): Promise<void> {
    this.#saved = structuredClone([...entries]);
  }
}

// ---------------------------------------------------------------------------
// FileCacheStore
// ---------------------------------------------------------------------------

export class FileCacheStore implements CacheStore {
  readonly file: string;

  constructor(cacheDir: string) {
    this.file = path.join(cacheDir, CACHE_FILE);
  }

  async load(): Promise<CacheLoadResult> {
    let text: string;
    try {
      text = await fs.readFile(this.file, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) return { entries: [], warnings: [] };
      throw err;
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch {
      return this.discard('the file is not valid JSON');
    }

    if (!isRecord(data) || data.version !== CACHE_VERSION) {
      return this.discard(`expected version ${CACHE_VERSION}`);
    }
    if (!Array.isArray(data.entries)) return this.discard('"entries" is not a list');

    const entries: CacheEntry[] = [];
    for (const raw of data.entries) {
      const entry = readEntry(raw);
      if (!entry) return this.discard('it holds a malformed entry');
      entries.push(entry);
    }
    return { entries, warnings: [] };
  }

  async save(entries: readonly CacheEntry[]): Promise<void> {
    await fs.mkdir(path.dirname(this.file), { recursive: true });
    const payload = JSON.stringify({ version: CACHE_VERSION, entries }, null, 2);
    // Written aside and renamed, so a reader never sees half a file.
    const temp = `${this.file}.${process.pid}.tmp`;
    await fs.writeFile(temp, payload, 'utf-8');
    await fs.rename(temp, this.file);
  }

  private discard(reason: string): CacheLoadResult {
    return {
      entries: [],
      warnings: [warning('cache-discarded', this.file, `Discarded build cache: ${reason}`)],
    };
  }
}

// ---------------------------------------------------------------------------
// Reading persisted entries
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function readStringRecord(value: unknown): Record<string, string> | null {
  if (!isRecord(value)) return null;
  const out: Record<string, string> = {};
  for (const [key, v] of Object.entries(value)) {
    if (typeof v !== 'string') return null;
    out[key] = v;
  }
  return out;
}

function readArtifacts(value: unknown): ArtifactRefs | null {
  if (!isRecord(value) || typeof value.module !== 'string') return null;
  const { stylesheet } = value;
  if (stylesheet !== null && typeof stylesheet !== 'string') return null;
  return { module: value.module, stylesheet };
}

function readInterface(value: unknown): ComponentInterface | null {
  if (!isRecord(value)) return null;
  const { id, name, props, slots, exports } = value;
  if (typeof id !== 'string' || typeof name !== 'string') return null;
  if (!isStringList(slots) || !isStringList(exports) || !Array.isArray(props)) return null;

  const readProps: ComponentInterface['props'] = [];
  for (const prop of props) {
    if (!isRecord(prop)) return null;
    const { type } = prop;
    if (typeof prop.name !== 'string' || typeof prop.required !== 'boolean') return null;
    if (type !== null && typeof type !== 'string') return null;
    readProps.push({ name: prop.name, required: prop.required, type });
  }
  return { id, name, props: readProps, slots, exports };
}

function readDiagnostic(value: unknown): Diagnostic | null {
  if (!isRecord(value)) return null;
  const { severity, unitId, code, message, location } = value;
  if (severity !== 'error' && severity !== 'warning') return null;
  if (typeof unitId !== 'string' || typeof message !== 'string') return null;
  if (typeof code !== 'string' || !isDiagnosticCode(code)) return null;

  const diagnostic: Diagnostic = { severity, unitId, code, message };
  if (location !== undefined) {
    if (!isRecord(location)) return null;
    const { line, column, offset } = location;
    if (typeof line !== 'number' || typeof column !== 'number' || typeof offset !== 'number') return null;
    diagnostic.location = { line, column, offset };
  }
  return diagnostic;
}

function readEntry(value: unknown): CacheEntry | null {
  if (!isRecord(value)) return null;
  const { unitId, hash, optionsHash, dependencies } = value;
  if (typeof unitId !== 'string' || typeof hash !== 'string' || typeof optionsHash !== 'string') return null;
  if (!isStringList(dependencies)) return null;

  const dependencyHashes = readStringRecord(value.dependencyHashes);
  const artifacts = readArtifacts(value.artifacts);
  const iface = readInterface(value.interface);
  if (!dependencyHashes || !artifacts || !iface || !Array.isArray(value.warnings)) return null;

  const warnings: Diagnostic[] = [];
  for (const raw of value.warnings) {
    const diagnostic = readDiagnostic(raw);
    if (!diagnostic) return null;
    warnings.push(diagnostic);
  }

  return { unitId, hash, optionsHash, dependencies, dependencyHashes, artifacts, interface: iface, warnings };
}
