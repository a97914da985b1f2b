// ---------------------------------------------------------------------------
// codegen.ts — Emit the render module of a unit
// ---------------------------------------------------------------------------
// Walks the analysed template and emits an ES module:
//
//   import { element as __element, text as __text, ... } from '@tessera/runtime'
//   let __props
//   <logic section, defineProps(...) replaced by
//    __props = { title: { type: String, required: true } }>
//   export function __state() { return { open } }
//   function __render(_ctx) { return __flatten([...]) }
//   export default { name, scopeId, props: __props, state: __state, render: __render }
//
// The prop table is assigned where defineProps(...) stood, so defaults may
// name constants the logic section declares before it.
//
// The render routine is a pure function of `_ctx` (props, state and `$slots`)
// returning a forest of virtual nodes.  Nothing wraps multiple roots.
// ---------------------------------------------------------------------------

import MagicString from 'magic-string';
import { camelize, DEFAULT_SLOT, isComponentTag, type AnalysisResult } from './analyzer';
import {
  contextAccess,
  CONTEXT,
  EVENT_BINDING,
  isHandlerReference,
  parseExpression,
  rewriteExpression,
  Scope,
} from './expressions';
import type { SourceLocation } from './location';
import { UNIT_EXTENSION, type LogicInfo } from './symbols';
import type {
  ConditionalNode,
  Directive,
  ElementNode,
  FilterCall,
  LoopNode,
  SlotNode,
  TemplateNode,
} from './template-parser';

export interface GenerateOptions {
  unitId: string;
  /** Scope attribute set on every element; `null` when no rule is scoped. */
  scopeId: string | null;
  /** Module the runtime helpers are imported from. */
  runtimeModule?: string;
  /** Extension that replaces `.tess` in component imports. */
  componentExtension?: string;
}

export interface GenerateResult {
  /** The full ES-module source. */
  code: string;
  /** The render routine alone: `function __render(_ctx) { ... }`. */
  render: string;
  /** Runtime helpers the render routine references. */
  helpers: Set<RuntimeHelper>;
}

export type RuntimeHelper =
  | 'element'
  | 'text'
  | 'empty'
  | 'flatten'
  | 'component'
  | 'renderList'
  | 'renderSlot'
  | 'withModifiers';

export const DEFAULT_RUNTIME_MODULE = '@tessera/runtime';

/** Local name of a runtime helper inside generated modules. */
export function helperAlias(helper: RuntimeHelper): string {
  return `__${helper}`;
}

export function generate(nodes: TemplateNode[], logic: LogicInfo, analysis: AnalysisResult, options: GenerateOptions): GenerateResult {
  return new CodeGenerator(logic, analysis, options).run(nodes);
}

class CodeGenerator {
  private helpers = new Set<RuntimeHelper>();

  constructor(
    private logic: LogicInfo,
    private analysis: AnalysisResult,
    private options: GenerateOptions,
  ) {}

  run(nodes: TemplateNode[]): GenerateResult {
    if (this.analysis.errors.length > 0) {
      throw new Error(`Cannot generate code for ${this.options.unitId}: analysis reported errors`);
    }
    const scope = Scope.root(this.logic.symbols);
    this.helpers.add('flatten');
    const body = this.genChildren(nodes, scope, '    ');
    const render = `function __render(${CONTEXT}) {\n  return ${this.use('flatten')}(${body});\n}`;

    const helperList = [...this.helpers].sort();
    const runtimeModule = this.options.runtimeModule ?? DEFAULT_RUNTIME_MODULE;
    const importLine = `import { ${helperList.map((h) => `${h} as ${helperAlias(h)}`).join(', ')} } from ${JSON.stringify(runtimeModule)};`;

    const scopeId = this.options.scopeId === null ? 'null' : JSON.stringify(this.options.scopeId);
    const definition = [
      `  name: ${JSON.stringify(this.analysis.interface.name)}`,
      `  scopeId: ${scopeId}`,
      '  props: __props',
      '  state: __state',
      '  render: __render',
    ].join(',\n');

    const sections = [
      importLine,
      this.logic.definePropsRange ? 'let __props;' : 'const __props = {};',
      this.genLogic(),
      `export function __state() {\n  return ${objectLiteral(this.logic.state)};\n}`,
      render,
      `export default {\n${definition},\n};`,
    ].filter((s) => s.trim() !== '');

    return { code: `${sections.join('\n\n')}\n`, render, helpers: this.helpers };
  }

  // ---- Module parts ---------------------------------------------------------

  /** The `__props = {...}` assignment that replaces `defineProps(...)`. */
  private genPropTable(): string {
    const entries = this.logic.props.map((p) => {
      const fields: string[] = [];
      if (p.type !== null) fields.push(`type: ${p.type}`);
      fields.push(`required: ${p.required}`);
      if (p.default !== null) fields.push(`default: ${p.default}`);
      return `  ${JSON.stringify(p.name)}: { ${fields.join(', ')} },`;
    });
    return entries.length ? `__props = {\n${entries.join('\n')}\n}` : '__props = {}';
  }

  private genLogic(): string {
    const { code, definePropsRange, imports } = this.logic;
    if (!code.trim()) return '';

    const s = new MagicString(code);
    if (definePropsRange) s.overwrite(definePropsRange.start, definePropsRange.end, this.genPropTable());

    const extension = this.options.componentExtension ?? '.js';
    for (const imp of imports) {
      if (imp.source.endsWith(UNIT_EXTENSION)) {
        const target = imp.source.slice(0, -UNIT_EXTENSION.length) + extension;
        s.overwrite(imp.sourceStart, imp.sourceEnd, JSON.stringify(target));
      }
    }
    return s.toString().trim();
  }

  // ---- Nodes ----------------------------------------------------------------

  private genChildren(nodes: TemplateNode[], scope: Scope, indent: string): string {
    if (nodes.length === 0) return '[]';
    const outer = indent.slice(2);
    return `[\n${nodes.map((n) => `${indent}${this.genNode(n, scope, indent)},`).join('\n')}\n${outer}]`;
  }

  private genNode(node: TemplateNode, scope: Scope, indent: string): string {
    switch (node.type) {
      case 'text':
        return `${this.use('text')}(${JSON.stringify(decodeEntities(node.content))})`;
      case 'interpolation':
        return `${this.use('text')}(${this.genFilters(this.expr(node.expression, scope, node.location), node.filters, scope, node.location)})`;
      case 'conditional':
        return this.genConditional(node, scope, indent);
      case 'loop':
        return this.genLoop(node, scope, indent);
      case 'slot':
        return this.genSlot(node, scope, indent);
      case 'element':
        if (isComponentTag(node.tag)) return this.genComponent(node, scope, indent);
        // A plain <template> groups its children without rendering itself.
        if (node.tag === 'template') return this.genChildren(node.children, scope, indent + '  ');
        return this.genElement(node, scope, indent);
    }
  }

  private genConditional(node: ConditionalNode, scope: Scope, indent: string): string {
    const condition = this.expr(node.condition, scope, node.location);
    const then = this.genChildren(node.then, scope, indent + '  ');
    const otherwise = node.else ? this.genChildren(node.else, scope, indent + '  ') : `${this.use('empty')}()`;
    return `(${condition}) ? ${then} : ${otherwise}`;
  }

  private genLoop(node: LoopNode, scope: Scope, indent: string): string {
    const iterable = this.expr(node.iterable, scope, node.location);
    const inner = scope.extend([node.item, node.index]);
    const params = node.index === null ? node.item : `${node.item}, ${node.index}`;
    const body = this.genChildren(node.body, inner, indent + '  ');
    const args = [iterable, `(${params}) => ${body}`];
    if (node.key !== null) {
      args.push(`(${params}) => (${this.expr(node.key, inner, node.location)})`);
    }
    return `${this.use('renderList')}(${args.join(', ')})`;
  }

  private genSlot(node: SlotNode, scope: Scope, indent: string): string {
    const args = [`${CONTEXT}.$slots`, JSON.stringify(node.name ?? DEFAULT_SLOT)];
    if (node.fallback.length > 0) {
      args.push(`() => ${this.genChildren(node.fallback, scope, indent + '  ')}`);
    }
    return `${this.use('renderSlot')}(${args.join(', ')})`;
  }

  private genElement(node: ElementNode, scope: Scope, indent: string): string {
    const attrs: string[] = node.attrs.map(
      (a) => `${JSON.stringify(a.name)}: ${JSON.stringify(decodeEntities(a.value ?? ''))}`,
    );
    const on: string[] = [];
    let key: string | null = null;

    for (const dir of node.directives) {
      switch (dir.kind) {
        case 'bind':
          if (dir.arg === null) attrs.push(`...(${this.expr(dir.expression, scope, dir.location)})`);
          else if (dir.arg === 'key') key = this.expr(dir.expression, scope, dir.location);
          else attrs.push(`${JSON.stringify(dir.arg)}: ${this.expr(dir.expression, scope, dir.location)}`);
          break;
        case 'on':
          on.push(this.genHandler(dir, scope));
          break;
        case 'model': {
          const target = this.expr(dir.expression, scope, dir.location);
          attrs.push(`"value": ${target}`);
          on.push(`"input": (${EVENT_BINDING}) => (${target} = ${EVENT_BINDING}.target.value)`);
          break;
        }
        case 'slot':
          break;
      }
    }

    if (this.options.scopeId !== null) attrs.push(`${JSON.stringify(this.options.scopeId)}: ""`);

    const args = [
      JSON.stringify(node.tag),
      objectLiteral(attrs),
      objectLiteral(on),
      this.genChildren(node.children, scope, indent + '  '),
    ];
    if (key !== null) args.push(key);
    return `${this.use('element')}(${args.join(', ')})`;
  }

  private genComponent(node: ElementNode, scope: Scope, indent: string): string {
    const props: string[] = node.attrs.map(
      (a) => `${JSON.stringify(camelize(a.name))}: ${a.value === null ? 'true' : JSON.stringify(decodeEntities(a.value))}`,
    );
    const on: string[] = [];
    let key: string | null = null;

    for (const dir of node.directives) {
      switch (dir.kind) {
        case 'bind':
          if (dir.arg === null) props.push(`...(${this.expr(dir.expression, scope, dir.location)})`);
          else if (dir.arg === 'key') key = this.expr(dir.expression, scope, dir.location);
          else props.push(`${JSON.stringify(camelize(dir.arg))}: ${this.expr(dir.expression, scope, dir.location)}`);
          break;
        case 'on':
          on.push(this.genHandler(dir, scope));
          break;
        case 'model': {
          const prop = camelize(dir.arg ?? 'modelValue');
          const target = this.expr(dir.expression, scope, dir.location);
          props.push(`${JSON.stringify(prop)}: ${target}`);
          on.push(`${JSON.stringify(`update:${prop}`)}: (${EVENT_BINDING}) => (${target} = ${EVENT_BINDING})`);
          break;
        }
        case 'slot':
          break;
      }
    }

    const slots: string[] = [];
    const defaultContent: TemplateNode[] = [];
    for (const child of node.children) {
      const slotDir = child.type === 'element' ? child.directives.find((d) => d.kind === 'slot') : undefined;
      if (child.type === 'element' && slotDir) {
        const name = slotDir.arg ?? DEFAULT_SLOT;
        slots.push(`${JSON.stringify(name)}: () => ${this.genChildren(child.children, scope, indent + '    ')}`);
      } else if (child.type !== 'text' || child.content.trim()) {
        defaultContent.push(child);
      }
    }
    if (defaultContent.length > 0) {
      slots.unshift(`${JSON.stringify(DEFAULT_SLOT)}: () => ${this.genChildren(defaultContent, scope, indent + '    ')}`);
    }

    const args = [node.tag, objectLiteral(props), objectLiteral(on), objectLiteral(slots)];
    if (key !== null) args.push(key);
    return `${this.use('component')}(${args.join(', ')})`;
  }

  // ---- Expressions ------------------------------------------------------------

  private genHandler(dir: Directive, scope: Scope): string {
    const handlerScope = scope.extend([EVENT_BINDING]);
    const parsed = parseExpression(dir.expression, { unitId: this.options.unitId, location: dir.location });
    const code = rewriteExpression(parsed, (name) => contextAccess(handlerScope, name));
    let handler = isHandlerReference(parsed) ? code : `(${EVENT_BINDING}) => (${code})`;
    if (dir.modifiers.length > 0) {
      handler = `${this.use('withModifiers')}(${handler}, ${JSON.stringify(dir.modifiers)})`;
    }
    return `${JSON.stringify(dir.arg)}: ${handler}`;
  }

  private genFilters(value: string, filters: FilterCall[], scope: Scope, location: SourceLocation): string {
    let code = value;
    for (const filter of filters) {
      const fn = contextAccess(scope, filter.name);
      if (filter.args !== null && filter.args.trim()) {
        const args = this.expr(`[${filter.args}]`, scope, location).slice(1, -1);
        code = `${fn}(${code}, ${args})`;
      } else {
        code = `${fn}(${code})`;
      }
    }
    return code;
  }

  private expr(source: string, scope: Scope, location: SourceLocation): string {
    const parsed = parseExpression(source, { unitId: this.options.unitId, location });
    return rewriteExpression(parsed, (name) => contextAccess(scope, name));
  }

  private use(helper: RuntimeHelper): string {
    this.helpers.add(helper);
    return helperAlias(helper);
  }
}

function objectLiteral(entries: string[]): string {
  return entries.length ? `{ ${entries.join(', ')} }` : '{}';
}

// ---- Entities -----------------------------------------------------------------

/**
 * Decode common HTML entities to their literal characters so that text nodes
 * carry the characters the author meant.
 */
const ENTITY_MAP: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: '\u00A0',
  mdash: '\u2014',
  ndash: '\u2013',
  lsquo: '\u2018',
  rsquo: '\u2019',
  ldquo: '\u201C',
  rdquo: '\u201D',
  bull: '\u2022',
  hellip: '\u2026',
  copy: '\u00A9',
  reg: '\u00AE',
  trade: '\u2122',
  times: '\u00D7',
  divide: '\u00F7',
};

export function decodeEntities(text: string): string {
  return text.replace(/&(?:#(\d+)|#x([0-9a-fA-F]+)|(\w+));/g, (match, dec: string | undefined, hex: string | undefined, named: string | undefined) => {
    if (dec !== undefined || hex !== undefined) {
      const code = dec !== undefined ? parseInt(dec, 10) : parseInt(hex ?? '', 16);
      return code <= 0x10ffff ? String.fromCodePoint(code) : match;
    }
    return (named !== undefined && ENTITY_MAP[named]) || match;
  });
}
