// ---------------------------------------------------------------------------
// expressions.test.ts — Tests for template expressions
// ---------------------------------------------------------------------------

import { describe, it, expect } from 'vitest';
import { ExpressionSyntaxError } from './errors';
import { contextAccess, isAssignable, parseExpression, rewriteExpression, Scope } from './expressions';
import { buildSymbolTable } from './symbols';

const CONTEXT = { unitId: 'e.tess' };

function names(source: string): string[] {
  return parseExpression(source, CONTEXT).references.map((r) => r.name);
}

const toContext = (name: string): string => `_ctx.${name}`;

// ===========================================================================
// References
// ===========================================================================

describe('parseExpression', () => {
  it('collects free identifiers in source order', () => {
    expect(names('a + b.c')).toEqual(['a', 'b']);
  });

  it('skips arrow function parameters', () => {
    expect(names('items.map(i => i.x + y)')).toEqual(['items', 'y']);
  });

  it('keeps a parameter local to its own function', () => {
    expect(names('items.map(i => i).length + i')).toEqual(['items', 'i']);
    expect(names('a.map(x => b.map(y => x + y)) + y')).toEqual(['a', 'b', 'y']);
  });

  it('skips names declared in a function body', () => {
    expect(names('items.map((x) => { const d = x * 2; return d + k })')).toEqual(['items', 'k']);
  });

  it('treats assignments inside a handler body as references', () => {
    expect(names('() => { count = count + 1 }')).toEqual(['count', 'count']);
  });

  it('skips non-computed member and key names', () => {
    expect(names('{ key: obj[prop] }')).toEqual(['obj', 'prop']);
  });

  it('treats an assignment target as a reference', () => {
    expect(names('count = count + 1')).toEqual(['count', 'count']);
  });

  it('rejects an empty expression', () => {
    expect(() => parseExpression('  ', CONTEXT)).toThrow('Empty expression');
  });

  it('rejects invalid syntax', () => {
    expect(() => parseExpression('a +', CONTEXT)).toThrow(ExpressionSyntaxError);
  });

  it('rejects trailing input', () => {
    expect(() => parseExpression('a b', CONTEXT)).toThrow('Unexpected "b" after expression "a"');
  });

  it('reports the location it was given', () => {
    const location = { line: 3, column: 7, offset: 40 };
    try {
      parseExpression('', { ...CONTEXT, location });
      expect.unreachable();
    } catch (err) {
      if (!(err instanceof ExpressionSyntaxError)) throw err;
      expect(err.location).toEqual(location);
    }
  });
});

// ===========================================================================
// Rewriting
// ===========================================================================

describe('rewriteExpression', () => {
  it('rewrites every reference', () => {
    const parsed = parseExpression('count = count + 1', CONTEXT);
    expect(rewriteExpression(parsed, toContext)).toBe('_ctx.count = _ctx.count + 1');
  });

  it('expands shorthand properties', () => {
    const parsed = parseExpression('{ active, n: count }', CONTEXT);
    expect(rewriteExpression(parsed, toContext)).toBe('{ active: _ctx.active, n: _ctx.count }');
  });

  it('rewrites a name that a nested function shadows elsewhere', () => {
    const parsed = parseExpression('items.map(count => count).length + count', CONTEXT);
    expect(rewriteExpression(parsed, toContext)).toBe('_ctx.items.map(count => count).length + _ctx.count');
  });

  it('leaves names the resolver keeps', () => {
    const parsed = parseExpression('Math.max(a, 1)', CONTEXT);
    expect(rewriteExpression(parsed, (n) => (n === 'Math' ? n : toContext(n)))).toBe('Math.max(_ctx.a, 1)');
  });
});

describe('isAssignable', () => {
  it.each([
    ['a', true],
    ['a.b', true],
    ['a[0]', true],
    ['a?.b', false],
    ['a()', false],
    ['a + 1', false],
  ])('%s -> %s', (source, expected) => {
    expect(isAssignable(parseExpression(source, CONTEXT))).toBe(expected);
  });
});

// ===========================================================================
// Scopes
// ===========================================================================

describe('Scope', () => {
  const { symbols } = buildSymbolTable('defineProps({ title: String })\nlet items = []\nfunction pick() {}', {
    unitId: 'e.tess',
  });
  const root = Scope.root(symbols);

  it('resolves logic symbols, globals and nothing else', () => {
    expect(root.resolve('title')?.kind).toBe('prop');
    expect(root.resolve('items')?.kind).toBe('state');
    expect(root.resolve('pick')?.kind).toBe('method');
    expect(root.resolve('Math')).toEqual({ kind: 'global' });
    expect(root.resolve('missing')).toBeNull();
  });

  it('lets child scopes shadow logic symbols', () => {
    const inner = root.extend(['title', null]);
    expect(inner.resolve('title')).toEqual({ kind: 'local' });
    expect(root.resolve('title')?.kind).toBe('prop');
  });

  it('reads props and state through the context', () => {
    const inner = root.extend(['item']);
    expect(contextAccess(inner, 'title')).toBe('_ctx.title');
    expect(contextAccess(inner, 'items')).toBe('_ctx.items');
    expect(contextAccess(inner, 'pick')).toBe('pick');
    expect(contextAccess(inner, 'item')).toBe('item');
  });
});
