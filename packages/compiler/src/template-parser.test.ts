// ---------------------------------------------------------------------------
// template-parser.test.ts — Tests for the template tree
// ---------------------------------------------------------------------------

import { describe, it, expect } from 'vitest';
import { TemplateSyntaxError, UnclosedElementError, UnknownDirectiveError } from './errors';
import {
  parseTemplate,
  serializeTemplate,
  splitFilters,
  type ElementNode,
  type TemplateNode,
} from './template-parser';

const OPTIONS = { unitId: 't.tess' };

function parse(source: string): TemplateNode[] {
  return parseTemplate(source, OPTIONS).nodes;
}

function firstElement(source: string): ElementNode {
  const [node] = parse(source);
  if (node.type !== 'element') throw new Error(`expected an element, got ${node.type}`);
  return node;
}

/** Drop every `location` so trees can be compared structurally. */
function withoutLocations(nodes: TemplateNode[]): unknown {
  return JSON.parse(JSON.stringify(nodes, (key, value: unknown) => (key === 'location' ? undefined : value)));
}

// ===========================================================================
// Elements and text
// ===========================================================================

describe('elements and text', () => {
  it('preserves several root nodes', () => {
    expect(parse('<h1>A</h1><p>B</p>').map((n) => n.type)).toEqual(['element', 'element']);
  });

  it('keeps inline whitespace and drops whitespace-only lines', () => {
    const nodes = parse('<b>a</b> <i>b</i>\n  <u>c</u>');
    expect(nodes.map((n) => (n.type === 'text' ? JSON.stringify(n.content) : n.type))).toEqual([
      'element',
      '" "',
      'element',
      'element',
    ]);
  });

  it('parses void and self-closing elements without a closing tag', () => {
    const nodes = parse('<input type="text"><br><my-icon />');
    expect(nodes).toHaveLength(3);
    expect(nodes.every((n) => n.type === 'element' && n.selfClosing)).toBe(true);
  });

  it('keeps plain attributes, with null for boolean ones', () => {
    const el = firstElement('<button type="submit" disabled>Go</button>');
    expect(el.attrs.map((a) => [a.name, a.value])).toEqual([
      ['type', 'submit'],
      ['disabled', null],
    ]);
  });

  it('records element locations', () => {
    const [, second] = parse('<p>a</p>\n<p>b</p>');
    expect(second.location).toEqual({ line: 2, column: 1, offset: 9 });
  });
});

// ===========================================================================
// Directives
// ===========================================================================

describe('directives', () => {
  it('classifies shorthand and prefixed directives', () => {
    const el = firstElement('<input @click.prevent="save" :title="label" t-model="name" t-on:keyup.enter="go">');

    expect(el.directives.map(({ kind, name, arg, expression, modifiers }) => ({ kind, name, arg, expression, modifiers }))).toEqual([
      { kind: 'on', name: '@click.prevent', arg: 'click', expression: 'save', modifiers: ['prevent'] },
      { kind: 'bind', name: ':title', arg: 'title', expression: 'label', modifiers: [] },
      { kind: 'model', name: 't-model', arg: null, expression: 'name', modifiers: [] },
      { kind: 'on', name: 't-on:keyup.enter', arg: 'keyup', expression: 'go', modifiers: ['enter'] },
    ]);
    expect(el.attrs).toEqual([]);
  });

  it('reads slot directives', () => {
    const el = firstElement('<template #footer><p>x</p></template>');
    expect(el.directives[0]).toMatchObject({ kind: 'slot', arg: 'footer', expression: '' });
  });

  it('warns about unknown directives and keeps them as attributes', () => {
    const { nodes, warnings } = parseTemplate('<p t-foo="x"></p>', OPTIONS);

    expect(warnings).toEqual([
      {
        severity: 'warning',
        unitId: 't.tess',
        code: 'unknown-directive',
        message: 'Unknown directive "t-foo"',
        location: { line: 1, column: 4, offset: 3 },
      },
    ]);
    const [p] = nodes;
    expect(p.type === 'element' && p.attrs.map((a) => a.name)).toEqual(['t-foo']);
  });

  it('rejects unknown directives in strict mode', () => {
    expect(() => parseTemplate('<p t-foo="x"></p>', { ...OPTIONS, strict: true })).toThrow(UnknownDirectiveError);
  });
});

// ===========================================================================
// Structural directives
// ===========================================================================

describe('conditionals', () => {
  it('chains t-if, t-else-if and t-else siblings', () => {
    const [node, ...rest] = parse('<p t-if="a">A</p><p t-else-if="b">B</p><p t-else>C</p>');

    expect(rest).toEqual([]);
    expect(withoutLocations([node])).toEqual([
      {
        type: 'conditional',
        condition: 'a',
        then: [
          {
            type: 'element',
            tag: 'p',
            attrs: [],
            directives: [],
            children: [{ type: 'text', content: 'A' }],
            selfClosing: false,
          },
        ],
        else: [
          {
            type: 'conditional',
            condition: 'b',
            then: [
              {
                type: 'element',
                tag: 'p',
                attrs: [],
                directives: [],
                children: [{ type: 'text', content: 'B' }],
                selfClosing: false,
              },
            ],
            else: [
              {
                type: 'element',
                tag: 'p',
                attrs: [],
                directives: [],
                children: [{ type: 'text', content: 'C' }],
                selfClosing: false,
              },
            ],
          },
        ],
      },
    ]);
  });

  it('skips whitespace between branches', () => {
    const nodes = parse('<p t-if="a">A</p>\n  <p t-else>C</p>');
    expect(nodes).toHaveLength(1);
    expect(nodes[0].type).toBe('conditional');
  });

  it('lets a bare <template> group several nodes', () => {
    const [node] = parse('<template t-if="ok"><dt>a</dt><dd>b</dd></template>');
    expect(node.type === 'conditional' && node.then.map((n) => n.type)).toEqual(['element', 'element']);
  });

  it('rejects t-else without a preceding t-if', () => {
    expect(() => parse('<p t-else>C</p>')).toThrow(TemplateSyntaxError);
    expect(() => parse('<p t-else>C</p>')).toThrow('t-else without a preceding t-if');
  });
});

describe('loops', () => {
  it('lifts t-for and its key into a loop node', () => {
    const [node] = parse('<li t-for="(item, i) in items" :key="item.id">{{ item.name }}</li>');

    expect(node).toMatchObject({ type: 'loop', item: 'item', index: 'i', iterable: 'items', key: 'item.id' });
    if (node.type !== 'loop') return;
    const [li] = node.body;
    expect(li.type === 'element' && li.directives).toEqual([]);
  });

  it('accepts "of" and a single binding', () => {
    const [node] = parse('<li t-for="row of table.rows">x</li>');
    expect(node).toMatchObject({ type: 'loop', item: 'row', index: null, iterable: 'table.rows', key: null });
  });

  it('puts a loop inside a conditional when both are present', () => {
    const [node] = parse('<li t-if="show" t-for="x in xs">{{ x }}</li>');
    expect(node.type).toBe('conditional');
    if (node.type !== 'conditional') return;
    expect(node.then[0].type).toBe('loop');
  });

  it('rejects a malformed t-for', () => {
    expect(() => parse('<li t-for="items">x</li>')).toThrow('Invalid t-for expression: "items"');
  });
});

describe('slots', () => {
  it('turns <slot> into a slot node with fallback content', () => {
    expect(withoutLocations(parse('<slot name="footer">Default</slot><slot />'))).toEqual([
      { type: 'slot', name: 'footer', fallback: [{ type: 'text', content: 'Default' }] },
      { type: 'slot', name: null, fallback: [] },
    ]);
  });
});

// ===========================================================================
// Interpolations and filters
// ===========================================================================

describe('splitFilters', () => {
  it('splits filters and their arguments', () => {
    expect(splitFilters("price | currency('EUR') | upper")).toEqual({
      expression: 'price',
      filters: [
        { name: 'currency', args: "'EUR'" },
        { name: 'upper', args: null },
      ],
    });
  });

  it('does not split on logical or, or inside strings and calls', () => {
    expect(splitFilters("a || b")).toEqual({ expression: 'a || b', filters: [] });
    expect(splitFilters("f('x|y', [1 | 2])")).toEqual({ expression: "f('x|y', [1 | 2])", filters: [] });
  });

  it('is applied to interpolations', () => {
    const [node] = parse('{{ name | upper }}');
    expect(node).toMatchObject({ type: 'interpolation', expression: 'name', filters: [{ name: 'upper', args: null }] });
  });
});

// ===========================================================================
// Errors
// ===========================================================================

describe('errors', () => {
  it('reports the innermost unclosed element', () => {
    try {
      parse('<div><span></div>');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(UnclosedElementError);
      if (!(err instanceof UnclosedElementError)) return;
      expect(err.tag).toBe('span');
      expect(err.location).toEqual({ line: 1, column: 6, offset: 5 });
    }
  });

  it('reports elements still open at the end', () => {
    expect(() => parse('<section><p>x</p>')).toThrow('Unclosed element <section>');
  });

  it('rejects a closing tag that matches nothing open', () => {
    expect(() => parse('<div></span>')).toThrow('Unexpected closing tag </span>');
  });
});

// ===========================================================================
// Serialization
// ===========================================================================

describe('serializeTemplate', () => {
  const SOURCE = [
    '<ul class="list">',
    '<li t-for="(item, i) in items" :key="item.id" @click="pick(item)">{{ item.name | upper }}</li>',
    '</ul>',
    '<p t-if="empty">None</p><p t-else-if="few">Few</p><p t-else>Many</p>',
    '<slot name="footer">Bye</slot>',
    '<input t-model="query" />',
    '<span title=\'say "hi"\'>x</span>',
  ].join('');

  it('prints markup that parses back to the same tree', () => {
    const nodes = parse(SOURCE);
    const reparsed = parse(serializeTemplate(nodes));
    expect(withoutLocations(reparsed)).toEqual(withoutLocations(nodes));
  });

  it('merges text that only a comment splits', () => {
    const nodes = parse('<p>a<!-- c -->b</p>');
    expect(withoutLocations(firstElement('<p>a<!-- c -->b</p>').children)).toEqual([{ type: 'text', content: 'ab' }]);
    expect(serializeTemplate(nodes)).toBe('<p>ab</p>');
    expect(withoutLocations(parse(serializeTemplate(nodes)))).toEqual(withoutLocations(nodes));
  });

  it('prints a value holding both quote kinds unquoted', () => {
    const nodes = parse(`<span title=a"b'c>x</span>`);
    expect(serializeTemplate(nodes)).toBe(`<span title=a"b'c>x</span>`);
    expect(withoutLocations(parse(serializeTemplate(nodes)))).toEqual(withoutLocations(nodes));
  });

  it('escapes double quotes when a value cannot go unquoted', () => {
    const node = firstElement('<span title="x">y</span>');
    node.attrs[0].value = `say "hi" it's`;
    expect(serializeTemplate([node])).toBe(`<span title="say &quot;hi&quot; it's">y</span>`);
  });

  it('prints loops and conditionals as <template> wrappers', () => {
    const nodes = parse('<li t-for="x in xs" :key="x">{{ x }}</li><b t-if="a">y</b>');
    expect(serializeTemplate(nodes)).toBe(
      '<template t-for="x in xs" :key="x"><li>{{ x }}</li></template><template t-if="a"><b>y</b></template>',
    );
  });
});
