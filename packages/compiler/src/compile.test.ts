// ---------------------------------------------------------------------------
// compile.test.ts — End-to-end tests for compile() and its generated modules
// ---------------------------------------------------------------------------
// Generated modules are evaluated against @tessera/runtime: import lines are
// dropped, runtime helpers and imported components are passed in as
// parameters, and the default export is returned.
// ---------------------------------------------------------------------------

import { describe, it, expect } from 'vitest';
import * as runtime from '@tessera/runtime';
import type { ComponentDefinition } from '@tessera/runtime';
import { compile, generateScopeId, type CompileOptions } from './index';

const HELPERS: Record<string, unknown> = {
  __element: runtime.element,
  __text: runtime.text,
  __empty: runtime.empty,
  __flatten: runtime.flatten,
  __component: runtime.component,
  __renderList: runtime.renderList,
  __renderSlot: runtime.renderSlot,
  __withModifiers: runtime.withModifiers,
};

function isDefinition(value: unknown): value is ComponentDefinition {
  return (
    typeof value === 'object' &&
    value !== null &&
    'render' in value &&
    typeof value.render === 'function' &&
    'state' in value &&
    typeof value.state === 'function' &&
    'props' in value
  );
}

/** Evaluate a generated module; `scope` supplies its imported bindings. */
function load(code: string | null, scope: Record<string, unknown> = {}): ComponentDefinition {
  if (code === null) throw new Error('unit produced no code');
  const body = code
    .replace(/^import .*$/gm, '')
    .replace(/^export default /m, 'return ')
    .replace(/^export /gm, '');
  const bindings = { ...HELPERS, ...scope };
  const factory = new Function(...Object.keys(bindings), body);
  const definition: unknown = factory(...Object.values(bindings));
  if (!isDefinition(definition)) throw new Error('module did not export a component definition');
  return definition;
}

function compileUnit(source: string, unitId: string, options: Partial<CompileOptions> = {}) {
  return compile(source, { unitId, ...options });
}

// ===========================================================================
// Scenarios
// ===========================================================================

describe('compile', () => {
  it('compiles a unit that renders a prop', () => {
    const source = '<template><div>{{ name }}</div></template>\n<script>\ndefineProps({ name: String })\n</script>';
    const result = compileUnit(source, 'Greeting.tess');

    expect(result.diagnostics).toEqual([]);
    expect(result.css).toBeNull();
    expect(result.scopeId).toBeNull();

    const Greeting = load(result.code);
    expect(runtime.renderComponent(Greeting, { name: 'Ada' })).toEqual([
      { type: 'element', tag: 'div', attrs: {}, on: {}, children: [{ type: 'text', text: 'Ada' }], key: null },
    ]);
  });

  it('reports a required prop the parent does not supply', () => {
    const child = compileUnit('<template><p>{{ name }}</p></template><script>defineProps({ name: String })</script>', 'Child.tess');
    expect(child.interface).not.toBeNull();
    if (child.interface === null) return;

    const parent = compileUnit(
      "<template><Child /></template><script>import Child from './Child.tess'</script>",
      'Parent.tess',
      { dependencies: new Map([['Child.tess', child.interface]]) },
    );

    expect(parent.code).toBeNull();
    expect(parent.interface).toBeNull();
    expect(parent.dependencies).toEqual(['Child.tess']);
    expect(parent.diagnostics.map((d) => [d.severity, d.code, d.message])).toEqual([
      ['error', 'MissingRequiredPropError', 'Missing required prop "name" on <Child>'],
    ]);

    // Rendering the child without the prop fails at run time too.
    expect(() => runtime.renderComponent(load(child.code))).toThrow('<Child> Missing required prop "name"');
  });

  it('scopes styles and marks elements with the scope attribute', () => {
    const source = '<template><div class="box">x</div></template><script></script><style>.box { color: red; }</style>';
    const result = compileUnit(source, 'Box.tess', { scopeId: 'c1' });

    expect(result.css).toBe('.box[c1] {\n  color: red;\n}');
    expect(result.scopeId).toBe('c1');
    const [div] = runtime.renderComponent(load(result.code));
    expect(div.type === 'element' && div.attrs).toEqual({ class: 'box', c1: '' });
  });

  it('still compiles the style section after a markup error', () => {
    const source = '<template><div><span></div></template><style>.a { color: red; }</style><script></script>';
    const result = compileUnit(source, 'Broken.tess');

    expect(result.code).toBeNull();
    expect(result.css).toBe(`.a[${generateScopeId('Broken.tess')}] {\n  color: red;\n}`);
    expect(result.diagnostics).toEqual([
      {
        severity: 'error',
        unitId: 'Broken.tess',
        code: 'UnclosedElementError',
        message: 'Unclosed element <span>',
        location: { line: 1, column: 16, offset: 15 },
      },
    ]);
  });

  it('reports errors from every section together', () => {
    const source = '<template><p>{{ a </p></template><style>.a { color red; }</style><script>let = ;</script>';
    const codes = compileUnit(source, 'Bad.tess').diagnostics.map((d) => d.code);

    expect(codes).toEqual(['TemplateSyntaxError', 'InvalidDeclarationError', 'LogicSyntaxError']);
  });

  it('turns malformed sections into a single diagnostic', () => {
    const result = compileUnit('<template><p>x</p>', 'Open.tess');

    expect(result.code).toBeNull();
    expect(result.diagnostics.map((d) => d.code)).toEqual(['MalformedSectionError']);
  });

  it('produces code when only warnings were reported', () => {
    const result = compileUnit('<template><p t-foo="1">x</p></template>', 'Warn.tess');

    expect(result.code).not.toBeNull();
    expect(result.diagnostics.map((d) => [d.severity, d.code])).toEqual([
      ['warning', 'unknown-directive'],
      ['warning', 'missing-logic'],
    ]);
  });

  it('turns unknown directives into errors in strict mode', () => {
    const result = compileUnit('<template><p t-foo="1">x</p></template><script></script>', 'Strict.tess', { strict: true });
    expect(result.code).toBeNull();
    expect(result.diagnostics.map((d) => d.code)).toEqual(['UnknownDirectiveError']);
  });

  it('keeps the stylesheet when analysis fails', () => {
    const result = compileUnit('<template><p>{{ nope }}</p></template><script></script><style>p { margin: 0; }</style>', 'Nope.tess', {
      scopeId: 's',
    });

    expect(result.code).toBeNull();
    expect(result.css).toBe('p[s] {\n  margin: 0;\n}');
    expect(result.diagnostics.map((d) => [d.code, d.message])).toEqual([['UnresolvedSymbolError', 'Unresolved symbol "nope"']]);
  });

  it('reports logic errors at unit coordinates', () => {
    const result = compileUnit('<template></template>\n<script>\nlet x = ;\n</script>', 'Loc.tess');
    expect(result.diagnostics[0].location).toEqual({ line: 3, column: 9, offset: 39 });
  });

  it('compiles an empty unit to an empty render routine', () => {
    const result = compileUnit('', 'Empty.tess');
    expect(runtime.renderComponent(load(result.code))).toEqual([]);
  });
});

// ===========================================================================
// Generated modules at run time
// ===========================================================================

describe('generated modules', () => {
  it('renders keyed lists', () => {
    const List = load(
      compileUnit(
        '<template><ul><li t-for="item in items" :key="item.id">{{ item.name }}</li></ul></template><script>defineProps({ items: Array })</script>',
        'List.tess',
      ).code,
    );

    const [ul] = runtime.renderComponent(List, { items: [{ id: 1, name: 'a' }, { id: 2, name: 'b' }] });
    expect(ul.type === 'element' && ul.children).toEqual([
      { type: 'element', tag: 'li', attrs: {}, on: {}, children: [{ type: 'text', text: 'a' }], key: 1 },
      { type: 'element', tag: 'li', attrs: {}, on: {}, children: [{ type: 'text', text: 'b' }], key: 2 },
    ]);
  });

  it('renders 1..n for a numeric loop source', () => {
    const Count = load(compileUnit('<template><i t-for="n in 3">{{ n }}</i></template><script></script>', 'Count.tess').code);
    const texts = runtime.renderComponent(Count).map((node) => (node.type === 'element' ? node.children : []));
    expect(texts).toEqual([[{ type: 'text', text: '1' }], [{ type: 'text', text: '2' }], [{ type: 'text', text: '3' }]]);
  });

  it('picks the matching conditional branch', () => {
    const Toggle = load(
      compileUnit(
        '<template><p t-if="ok">Y</p><p t-else-if="maybe">M</p><p t-else>N</p></template><script>defineProps({ ok: Boolean, maybe: { type: Boolean, default: false } })</script>',
        'Toggle.tess',
      ).code,
    );

    const textOf = (props: Record<string, unknown>) =>
      runtime.renderComponent(Toggle, props).map((n) => (n.type === 'element' && n.children[0].type === 'text' ? n.children[0].text : n.type));

    expect(textOf({ ok: true })).toEqual(['Y']);
    expect(textOf({ ok: false, maybe: true })).toEqual(['M']);
    expect(textOf({ ok: false })).toEqual(['N']);
  });

  it('renders an empty marker for a false condition without else', () => {
    const Maybe = load(compileUnit('<template><p t-if="show">x</p></template><script>let show = false</script>', 'Maybe.tess').code);
    expect(runtime.renderComponent(Maybe)).toEqual([{ type: 'empty' }]);
  });

  it('renders passed slot content or the fallback', () => {
    const Card = load(
      compileUnit('<template><section><slot name="title">Untitled</slot><slot /></section></template>', 'Card.tess').code,
    );

    const [section] = runtime.renderComponent(Card, {}, { default: () => [runtime.text('body')] });
    expect(section.type === 'element' && section.children).toEqual([
      { type: 'text', text: 'Untitled' },
      { type: 'text', text: 'body' },
    ]);
  });

  it('applies filters and reads initial state', () => {
    const Price = load(
      compileUnit(
        "<template><b>{{ price | money('$') }}</b></template><script>let price = 5\nfunction money(v, sign) { return sign + v }</script>",
        'Price.tess',
      ).code,
    );

    const [b] = runtime.renderComponent(Price);
    expect(b.type === 'element' && b.children).toEqual([{ type: 'text', text: '$5' }]);
  });

  it('reads prop defaults that name logic constants', () => {
    const Badge = load(
      compileUnit(
        "<template><b>{{ tone }}</b></template><script>const DEFAULT_TONE = 'info'\ndefineProps({ tone: { type: String, default: DEFAULT_TONE } })</script>",
        'Badge.tess',
      ).code,
    );

    const [b] = runtime.renderComponent(Badge);
    expect(b.type === 'element' && b.children).toEqual([{ type: 'text', text: 'info' }]);
  });

  it('reads a prop that an arrow parameter shadows elsewhere', () => {
    const Sum = load(
      compileUnit(
        '<template><p>{{ items.map(count => count).length + count }}</p></template><script>defineProps({ items: Array, count: Number })</script>',
        'Sum.tess',
      ).code,
    );

    const [p] = runtime.renderComponent(Sum, { items: [1, 2], count: 3 });
    expect(p.type === 'element' && p.children).toEqual([{ type: 'text', text: '5' }]);
  });

  it('wires event handlers', () => {
    const Button = load(
      compileUnit(
        '<template><button @click.prevent="pressed = true">Go</button></template><script>let pressed = false</script>',
        'Button.tess',
      ).code,
    );

    const [button] = runtime.renderComponent(Button);
    if (button.type !== 'element') throw new Error('expected an element');
    let prevented = false;
    button.on.click({ preventDefault: () => (prevented = true) });
    expect(prevented).toBe(true);
  });

  it('renders child components with props and slots', () => {
    const child = compileUnit(
      '<template><em>{{ label }}</em><slot name="after" /></template><script>defineProps({ label: String })</script>',
      'ui/Tag.tess',
    );
    if (child.interface === null) throw new Error('child failed to compile');

    const parent = compileUnit(
      "<template><div><Tag :label=\"name\"><template #after>!</template></Tag></div></template><script>import Tag from './ui/Tag.tess'\nlet name = 'Ada'</script>",
      'Page.tess',
      { dependencies: new Map([['ui/Tag.tess', child.interface]]) },
    );
    expect(parent.diagnostics).toEqual([]);

    const Page = load(parent.code, { Tag: load(child.code) });
    const [div] = runtime.expand(runtime.renderComponent(Page));
    expect(div.type === 'element' && div.children).toEqual([
      { type: 'element', tag: 'em', attrs: {}, on: {}, children: [{ type: 'text', text: 'Ada' }], key: null },
      { type: 'text', text: '!' },
    ]);
  });
});
