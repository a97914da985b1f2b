/**
 * @tessera/build — Discovery tests
 */

import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { discoverUnits, scanImports } from './discovery';

describe('discoverUnits', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'tessera-units-'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  async function put(file: string, content: string): Promise<void> {
    const full = path.join(root, file);
    await fs.mkdir(path.dirname(full), { recursive: true });
    await fs.writeFile(full, content, 'utf-8');
  }

  it('finds .tess files below the root, sorted by id', async () => {
    await put('pages/Home.tess', '<template>home</template>');
    await put('App.tess', '<template>app</template>');
    await put('components/ui/Badge.tess', '<template>badge</template>');
    await put('README.md', '# readme');

    expect(discoverUnits(root)).toEqual([
      { id: 'App.tess', source: '<template>app</template>' },
      { id: 'components/ui/Badge.tess', source: '<template>badge</template>' },
      { id: 'pages/Home.tess', source: '<template>home</template>' },
    ]);
  });

  it('skips node_modules and dist', async () => {
    await put('node_modules/lib/Lib.tess', '');
    await put('dist/Out.tess', '');
    await put('Main.tess', '');

    expect(discoverUnits(root).map((unit) => unit.id)).toEqual(['Main.tess']);
  });

  it('throws when the root does not exist', () => {
    expect(() => discoverUnits(path.join(root, 'missing'))).toThrow(/ENOENT/);
  });
});

describe('scanImports', () => {
  const scan = (script: string, id = 'pages/Home.tess') => scanImports({ id, source: `<template></template><script>${script}</script>` });

  it('resolves relative component imports against the unit', () => {
    const script = [
      "import Card from './Card.tess'",
      'import { format } from "./format.js"',
      'import Badge from "../shared/Badge.tess"',
    ].join('\n');

    expect(scan(script)).toEqual(['pages/Card.tess', 'shared/Badge.tess']);
  });

  it('lists each import once', () => {
    expect(scan("import A from './A.tess'\nimport B from './A.tess'")).toEqual(['pages/A.tess']);
  });

  it('ignores commented-out imports', () => {
    expect(scan("// import A from './A.tess'\n/* import B from './B.tess' */")).toEqual([]);
  });

  it('finds nothing without a script section', () => {
    expect(scanImports({ id: 'A.tess', source: '<template><p>x</p></template>' })).toEqual([]);
  });

  it('finds nothing in a unit with malformed sections', () => {
    expect(scanImports({ id: 'A.tess', source: "<script>import B from './B.tess'" })).toEqual([]);
  });
});
