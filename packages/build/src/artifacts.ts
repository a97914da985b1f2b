/**
 * @tessera/build — Artifact stores
 *
 * Generated render modules and stylesheets are handed to an ArtifactStore.
 * A reference is the artifact's path relative to the output root:
 * `components/Card.tess` -> `components/Card.js` and `components/Card.css`.
 */

import { UNIT_EXTENSION } from '@tessera/compiler';
import fs from 'node:fs/promises';
import path from 'node:path';

export type ArtifactKind = 'module' | 'stylesheet';

export interface ArtifactStore {
  /** Store an artifact under `ref`, replacing what was there. */
  write(ref: string, content: string): Promise<void>;
  read(ref: string): Promise<string | null>;
  has(ref: string): Promise<boolean>;
  remove(ref: string): Promise<void>;
}

/** The reference an artifact of `unitId` is stored under. */
export function artifactRef(unitId: string, kind: ArtifactKind, moduleExtension = '.js'): string {
  const stem = unitId.endsWith(UNIT_EXTENSION) ? unitId.slice(0, -UNIT_EXTENSION.length) : unitId;
  return stem + (kind === 'module' ? moduleExtension : '.css');
}

// ---------------------------------------------------------------------------
// MemoryArtifactStore
// ---------------------------------------------------------------------------

export class MemoryArtifactStore implements ArtifactStore {
  readonly files = new Map<string, string>();

  async write(ref: string, content: string): Promise<void> {
    this.files.set(ref, content);
  }

  async read(ref: string): Promise<string | null> {
    return this.files.get(ref) ?? null;
  }

  async has(ref: string): Promise<boolean> {
    return this.files.has(ref);
  }

  async remove(ref: string): Promise<void> {
    this.files.delete(ref);
  }
}

// ---------------------------------------------------------------------------
// FileArtifactStore
// ---------------------------------------------------------------------------

/** Writes artifacts below `outDir`, creating directories as needed. */
export class FileArtifactStore implements ArtifactStore {
  readonly outDir: string;

  constructor(outDir: string) {
    this.outDir = path.resolve(outDir);
  }

  async write(ref: string, content: string): Promise<void> {
    const file = this.pathFor(ref);
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, content, 'utf-8');
  }

  async read(ref: string): Promise<string | null> {
    try {
      return await fs.readFile(this.pathFor(ref), 'utf-8');
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }

  async has(ref: string): Promise<boolean> {
    return (await this.read(ref)) !== null;
  }

  async remove(ref: string): Promise<void> {
    await fs.rm(this.pathFor(ref), { force: true });
  }

  /** @throws when `ref` points outside the output directory. */
  pathFor(ref: string): string {
    const file = path.resolve(this.outDir, ref);
    if (file !== this.outDir && !file.startsWith(this.outDir + path.sep)) {
      throw new Error(`Artifact "${ref}" resolves outside ${this.outDir}`);
    }
    return file;
  }
}

/** The error fs raises for a missing file. */
export function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
