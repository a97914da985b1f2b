/**
 * @tessera/build — Unit discovery
 *
 * Finds .tess files on disk and reads the component imports of a unit's
 * `<script>` section without running the full pipeline.
 */

import { resolveUnitId, splitSections, MalformedSectionError, UNIT_EXTENSION } from '@tessera/compiler';
import fs from 'node:fs';
import path from 'node:path';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** One single-file component: its stable id and its text. */
export interface SourceUnit {
  /** Path relative to the project root, `/`-separated (`components/Card.tess`). */
  id: string;
  source: string;
}

const SKIPPED_DIRS = new Set(['node_modules', 'dist']);

// ---------------------------------------------------------------------------
// discoverUnits
// ---------------------------------------------------------------------------

/**
 * Recursively find all .tess files under `root`, sorted by id.
 *
 * @throws when `root` cannot be read.
 */
export function discoverUnits(root: string): SourceUnit[] {
  const units: SourceUnit[] = [];

  const walk = (dir: string): void => {
    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory() && !SKIPPED_DIRS.has(entry.name)) {
        walk(fullPath);
      } else if (entry.isFile() && entry.name.endsWith(UNIT_EXTENSION)) {
        units.push({
          id: path.relative(root, fullPath).split(path.sep).join('/'),
          source: fs.readFileSync(fullPath, 'utf-8'),
        });
      }
    }
  };

  walk(root);
  return units.sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
}

// ---------------------------------------------------------------------------
// scanImports
// ---------------------------------------------------------------------------

const COMMENT_RE = /\/\*[\s\S]*?\*\/|\/\/[^\n]*/g;
const IMPORT_RE = /\bimport\s+(?:[\w$*{}\s,]+?\s+from\s+)?(['"])([^'"\n]+?\.tess)\1/g;

/**
 * Unit ids of the components a unit imports, in order of first appearance.
 * A unit whose sections are malformed has no scannable imports; compiling it
 * reports the problem.
 */
export function scanImports(unit: SourceUnit): string[] {
  let script: string;
  try {
    script = splitSections(unit.source, unit.id).script?.content ?? '';
  } catch (err) {
    if (err instanceof MalformedSectionError) return [];
    throw err;
  }

  const ids: string[] = [];
  for (const match of script.replace(COMMENT_RE, '').matchAll(IMPORT_RE)) {
    const id = resolveUnitId(unit.id, match[2]);
    if (!ids.includes(id)) ids.push(id);
  }
  return ids;
}
