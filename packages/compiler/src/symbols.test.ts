// ---------------------------------------------------------------------------
// symbols.test.ts — Tests for the logic section symbol table
// ---------------------------------------------------------------------------

import { describe, it, expect } from 'vitest';
import { LogicSyntaxError } from './errors';
import { buildSymbolTable, componentName, isReservedName, resolveUnitId } from './symbols';

const OPTIONS = { unitId: 'c.tess' };

const LOGIC = [
  "import Badge from './Badge.tess'",
  "import { format } from './util.js'",
  "defineProps({ title: String, tone: { type: String, default: 'info' }, size: { type: Number, required: false } })",
  'let count = 0',
  'const double = () => count * 2',
  'function reset() { count = 0 }',
  "export const VERSION = '1'",
  'class Store {}',
].join('\n');

// ===========================================================================
// Symbol kinds
// ===========================================================================

describe('buildSymbolTable', () => {
  it('classifies every top-level name', () => {
    const { symbols } = buildSymbolTable(LOGIC, OPTIONS);

    expect([...symbols.values()].map((s) => [s.name, s.kind])).toEqual([
      ['Badge', 'component'],
      ['format', 'import'],
      ['title', 'prop'],
      ['tone', 'prop'],
      ['size', 'prop'],
      ['count', 'state'],
      ['double', 'method'],
      ['reset', 'method'],
      ['VERSION', 'state'],
      ['Store', 'state'],
    ]);
    expect(symbols.get('Badge')?.source).toBe('./Badge.tess');
  });

  it('reads prop definitions', () => {
    const { props } = buildSymbolTable(LOGIC, OPTIONS);

    expect(props.map(({ name, required, type, default: def }) => ({ name, required, type, default: def }))).toEqual([
      { name: 'title', required: true, type: 'String', default: null },
      { name: 'tone', required: false, type: 'String', default: "'info'" },
      { name: 'size', required: false, type: 'Number', default: null },
    ]);
  });

  it('lists state, exports and imports', () => {
    const info = buildSymbolTable(LOGIC, OPTIONS);

    expect(info.state).toEqual(['count', 'VERSION', 'Store']);
    expect(info.exports).toEqual(['VERSION']);
    expect(info.imports.map(({ source, names }) => ({ source, names }))).toEqual([
      { source: './Badge.tess', names: ['Badge'] },
      { source: './util.js', names: ['format'] },
    ]);
  });

  it('records the offsets of import specifiers', () => {
    const code = "import A from './A.tess'";
    const [imp] = buildSymbolTable(code, OPTIONS).imports;
    expect(code.slice(imp.sourceStart, imp.sourceEnd)).toBe("'./A.tess'");
  });

  it('reads the array form of defineProps as optional props', () => {
    const { props } = buildSymbolTable("defineProps(['a', 'b'])", OPTIONS);
    expect(props.map((p) => [p.name, p.required])).toEqual([
      ['a', false],
      ['b', false],
    ]);
  });

  it('does not declare the binding that holds defineProps', () => {
    const info = buildSymbolTable('const props = defineProps({ a: String })', OPTIONS);

    expect([...info.symbols.keys()]).toEqual(['a']);
    expect(info.definePropsRange).toEqual({ start: 14, end: 40 });
  });

  it('collects names bound by destructuring', () => {
    const { state } = buildSymbolTable('const { a, b: [c, ...d] } = source()', OPTIONS);
    expect(state).toEqual(['a', 'c', 'd']);
  });

  it('lists renamed exports by their exported name', () => {
    expect(buildSymbolTable('let x = 1\nexport { x as y }', OPTIONS).exports).toEqual(['y']);
  });

  it('accepts an empty section', () => {
    const info = buildSymbolTable('', OPTIONS);
    expect(info.symbols.size).toBe(0);
    expect(info.definePropsRange).toBeNull();
  });
});

// ===========================================================================
// Errors
// ===========================================================================

describe('logic errors', () => {
  it('reports syntax errors in unit coordinates', () => {
    try {
      buildSymbolTable('\nlet x = ;', { ...OPTIONS, base: { line: 5, column: 9, offset: 100 } });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(LogicSyntaxError);
      if (!(err instanceof LogicSyntaxError)) return;
      expect(err.detail).toBe('Unexpected token');
      expect(err.location).toEqual({ line: 6, column: 9, offset: 109 });
    }
  });

  it('rejects a name declared as both prop and state', () => {
    try {
      buildSymbolTable('defineProps({ a: String })\nlet a = 1', OPTIONS);
      expect.unreachable();
    } catch (err) {
      if (!(err instanceof LogicSyntaxError)) throw err;
      expect(err.detail).toBe('"a" is already declared as a prop at line 1');
      expect(err.location).toEqual({ line: 2, column: 5, offset: 31 });
    }
  });

  it('rejects names reserved for generated code', () => {
    expect(() => buildSymbolTable('const __x = 1', OPTIONS)).toThrow('"__x" is reserved for generated code');
    expect(() => buildSymbolTable('let _ctx', OPTIONS)).toThrow(LogicSyntaxError);
  });

  it('rejects a default export', () => {
    expect(() => buildSymbolTable('export default {}', OPTIONS)).toThrow(
      '`export default` is reserved for the component definition',
    );
  });

  it('rejects a second defineProps call', () => {
    expect(() => buildSymbolTable('defineProps({ a: String })\ndefineProps({ b: Number })', OPTIONS)).toThrow(
      'defineProps() may only be called once',
    );
  });

  it('rejects computed prop keys', () => {
    expect(() => buildSymbolTable('defineProps({ [key]: String })', OPTIONS)).toThrow(
      'Prop definitions must use static keys',
    );
  });
});

// ===========================================================================
// Unit ids
// ===========================================================================

describe('unit ids', () => {
  it('resolves relative specifiers against the importing unit', () => {
    expect(resolveUnitId('pages/Home.tess', '../components/Card.tess')).toBe('components/Card.tess');
    expect(resolveUnitId('Home.tess', './Card.tess')).toBe('Card.tess');
    expect(resolveUnitId('a/b/C.tess', './d/E.tess')).toBe('a/b/d/E.tess');
  });

  it('returns bare specifiers unchanged', () => {
    expect(resolveUnitId('pages/Home.tess', 'lib/Card.tess')).toBe('lib/Card.tess');
  });

  it('names a component after its file', () => {
    expect(componentName('components/Card.tess')).toBe('Card');
  });

  it('reserves _ctx and double-underscore names', () => {
    expect(isReservedName('_ctx')).toBe(true);
    expect(isReservedName('__render')).toBe(true);
    expect(isReservedName('_private')).toBe(false);
  });
});
