// ---------------------------------------------------------------------------
// template-parser.ts — Build the template tree from markup tokens
// ---------------------------------------------------------------------------
// The parser works in two steps:
//   1. **Nesting** — a stack of open elements turns the flat token stream into
//      elements, text and interpolations.
//   2. **Lifting** — structural directives (t-if / t-else-if / t-else, t-for)
//      are lifted out of elements into Conditional and Loop nodes, and
//      <slot> elements become Slot nodes.
//
// Expressions are kept as opaque strings; they are checked by the analyzer.
// The result is a forest: several root nodes are preserved as they are.
// ---------------------------------------------------------------------------

import {
  TemplateSyntaxError,
  UnclosedElementError,
  UnknownDirectiveError,
  warning,
  type Diagnostic,
} from './errors';
import type { SourceLocation } from './location';
import { tokenizeMarkup, type MarkupAttribute, type MarkupToken, type TagOpenToken } from './markup-lexer';

// ---- AST node types --------------------------------------------------------

export interface ElementNode {
  type: 'element';
  tag: string;
  attrs: Attribute[];
  directives: Directive[];
  children: TemplateNode[];
  selfClosing: boolean;
  location: SourceLocation;
}

export interface TextNode {
  type: 'text';
  /** Raw text; entities are decoded during code generation. */
  content: string;
  location: SourceLocation;
}

export interface FilterCall {
  name: string;
  /** Raw argument list between the parentheses, `null` without parentheses. */
  args: string | null;
}

export interface InterpolationNode {
  type: 'interpolation';
  expression: string;
  filters: FilterCall[];
  location: SourceLocation;
}

export interface ConditionalNode {
  type: 'conditional';
  condition: string;
  then: TemplateNode[];
  /** An else-if chain is an else branch holding a single Conditional. */
  else: TemplateNode[] | null;
  location: SourceLocation;
}

export interface LoopNode {
  type: 'loop';
  item: string;
  index: string | null;
  iterable: string;
  key: string | null;
  body: TemplateNode[];
  location: SourceLocation;
}

export interface SlotNode {
  type: 'slot';
  name: string | null;
  fallback: TemplateNode[];
  location: SourceLocation;
}

export type TemplateNode =
  | ElementNode
  | TextNode
  | InterpolationNode
  | ConditionalNode
  | LoopNode
  | SlotNode;

export interface Attribute {
  name: string;
  value: string | null; // null for boolean attributes
  location: SourceLocation;
}

export type DirectiveKind = 'bind' | 'on' | 'model' | 'slot';

export interface Directive {
  kind: DirectiveKind;
  /** The attribute name as written, e.g. `@click.prevent` or `t-bind:title`. */
  name: string;
  arg: string | null; // event name, attribute name, slot name
  expression: string;
  modifiers: string[];
  location: SourceLocation;
}

type BranchKind = 'if' | 'else-if' | 'else';

interface StructuralDirective {
  kind: BranchKind | 'for';
  expression: string;
  location: SourceLocation;
}

interface BranchDirective extends StructuralDirective {
  kind: BranchKind;
}

function isBranch(dir: StructuralDirective): dir is BranchDirective {
  return dir.kind !== 'for';
}

export interface TemplateParseOptions {
  unitId: string;
  /** Unknown `t-` directives become errors instead of warnings. */
  strict?: boolean;
}

export interface TemplateParseResult {
  nodes: TemplateNode[];
  warnings: Diagnostic[];
}

// Known HTML void (self-closing) elements.
const VOID_ELEMENTS = new Set([
  'area',
  'base',
  'br',
  'col',
  'embed',
  'hr',
  'img',
  'input',
  'link',
  'meta',
  'param',
  'source',
  'track',
  'wbr',
]);

export const DIRECTIVE_PREFIX = 't-';

// ===========================================================================
// Step 1 — Nesting
// ===========================================================================

/** A child list entry before sibling conditionals are paired up. */
type Pending =
  | { type: 'node'; node: TemplateNode }
  | { type: 'branch'; kind: BranchKind; expression: string; nodes: TemplateNode[]; location: SourceLocation };

interface OpenElement {
  token: TagOpenToken;
  attrs: Attribute[];
  directives: Directive[];
  structural: StructuralDirective[];
  children: Pending[];
}

class TemplateParser {
  private warnings: Diagnostic[] = [];

  constructor(private options: TemplateParseOptions) {}

  parse(tokens: MarkupToken[]): TemplateParseResult {
    const root: Pending[] = [];
    const stack: OpenElement[] = [];
    const current = () => (stack.length > 0 ? stack[stack.length - 1].children : root);

    for (const token of tokens) {
      switch (token.type) {
        case 'tag-open': {
          const open = this.openElement(token);
          if (token.selfClosing || VOID_ELEMENTS.has(token.name.toLowerCase())) {
            current().push(this.lift(open, true));
          } else {
            stack.push(open);
          }
          break;
        }

        case 'tag-close': {
          const top = stack[stack.length - 1];
          if (top && top.token.name === token.name) {
            stack.pop();
            current().push(this.lift(top, false));
            break;
          }
          if (top && stack.some((e) => e.token.name === token.name)) {
            throw new UnclosedElementError(top.token.name, this.options.unitId, top.token.location);
          }
          throw new TemplateSyntaxError(
            `Unexpected closing tag </${token.name}>`,
            this.options.unitId,
            { location: token.location },
          );
        }

        case 'text':
          // Whitespace-only runs that span lines are formatting, not content.
          if (!/^\s*$/.test(token.value) || !token.value.includes('\n')) {
            const siblings = current();
            const last = siblings[siblings.length - 1];
            // Text split only by a comment is one node.
            if (last?.type === 'node' && last.node.type === 'text') {
              last.node.content += token.value;
            } else {
              siblings.push({
                type: 'node',
                node: { type: 'text', content: token.value, location: token.location },
              });
            }
          }
          break;

        case 'interpolation': {
          const { expression, filters } = splitFilters(token.expression);
          current().push({
            type: 'node',
            node: { type: 'interpolation', expression, filters, location: token.location },
          });
          break;
        }

        case 'comment':
          break;
      }
    }

    const unclosed = stack[stack.length - 1];
    if (unclosed) {
      throw new UnclosedElementError(unclosed.token.name, this.options.unitId, unclosed.token.location);
    }

    return { nodes: this.pairBranches(root), warnings: this.warnings };
  }

  // ---- Attributes & Directives --------------------------------------------

  private openElement(token: TagOpenToken): OpenElement {
    const open: OpenElement = { token, attrs: [], directives: [], structural: [], children: [] };

    for (const attr of token.attrs) {
      const classified = this.classify(attr);
      if (classified === null) {
        open.attrs.push({ name: attr.name, value: attr.value, location: attr.location });
      } else if ('modifiers' in classified) {
        open.directives.push(classified);
      } else {
        open.structural.push(classified);
      }
    }

    return open;
  }

  private classify(attr: MarkupAttribute): Directive | StructuralDirective | null {
    const { name, location } = attr;
    const expression = attr.value ?? '';

    // @click="handler" --> t-on:click
    if (name.startsWith('@')) {
      return directive('on', name, name.slice(1), expression, location);
    }

    // :attr="expr" --> t-bind:attr
    if (name.startsWith(':')) {
      return directive('bind', name, name.slice(1), expression, location);
    }

    // #header --> t-slot:header
    if (name.startsWith('#')) {
      return directive('slot', name, name.slice(1), expression, location);
    }

    if (!name.startsWith(DIRECTIVE_PREFIX)) return null;

    const withoutPrefix = name.slice(DIRECTIVE_PREFIX.length);
    const colonIdx = withoutPrefix.indexOf(':');
    const kind = colonIdx === -1 ? withoutPrefix.split('.')[0] : withoutPrefix.slice(0, colonIdx);
    const rest = colonIdx === -1 ? withoutPrefix.slice(kind.length) : withoutPrefix.slice(colonIdx + 1);

    switch (kind) {
      case 'if':
      case 'else-if':
      case 'else':
      case 'for':
        return { kind, expression, location };
      case 'on':
      case 'bind':
      case 'model':
      case 'slot':
        return directive(kind, name, rest, expression, location);
    }

    const message = `Unknown directive "${name}"`;
    if (this.options.strict) {
      throw new UnknownDirectiveError(message, this.options.unitId, { location, identifier: name });
    }
    this.warnings.push(warning('unknown-directive', this.options.unitId, message, location));
    return null;
  }

  // ===========================================================================
  // Step 2 — Lifting
  // ===========================================================================

  private lift(open: OpenElement, selfClosing: boolean): Pending {
    const { token } = open;
    const children = this.pairBranches(open.children);
    const forDir = open.structural.find((d) => d.kind === 'for');
    const branchDir = open.structural.find(isBranch);

    // :key belongs to the loop, not to the element.
    const keyIdx = forDir
      ? open.directives.findIndex((d) => d.kind === 'bind' && d.arg === 'key')
      : -1;
    const key = keyIdx === -1 ? null : open.directives[keyIdx].expression;
    const directives = open.directives.filter((_, i) => i !== keyIdx);

    let nodes: TemplateNode[];
    if (token.name === 'template' && directives.length === 0 && open.attrs.length === 0 && open.structural.length > 0) {
      // A bare <template> only groups the nodes a directive applies to.
      nodes = children;
    } else if (token.name === 'slot') {
      const nameAttr = open.attrs.find((a) => a.name === 'name');
      nodes = [{ type: 'slot', name: nameAttr?.value ?? null, fallback: children, location: token.location }];
    } else {
      nodes = [
        {
          type: 'element',
          tag: token.name,
          attrs: open.attrs,
          directives,
          children,
          selfClosing,
          location: token.location,
        },
      ];
    }

    if (forDir) {
      nodes = [this.buildLoop(forDir, key, nodes)];
    }

    if (branchDir) {
      return {
        type: 'branch',
        kind: branchDir.kind,
        expression: branchDir.expression,
        nodes,
        location: branchDir.location,
      };
    }

    if (nodes.length !== 1) {
      throw new TemplateSyntaxError('Expected a single node', this.options.unitId, { location: token.location });
    }
    return { type: 'node', node: nodes[0] };
  }

  private buildLoop(dir: StructuralDirective, key: string | null, body: TemplateNode[]): LoopNode {
    // "item in expr" or "(item, index) in expr"
    const forMatch = dir.expression.match(
      /^\s*(?:\(\s*([\w$]+)\s*(?:,\s*([\w$]+)\s*)?\)|([\w$]+))\s+(?:in|of)\s+([\s\S]+)$/,
    );
    if (!forMatch) {
      throw new TemplateSyntaxError(
        `Invalid t-for expression: "${dir.expression}"`,
        this.options.unitId,
        { location: dir.location },
      );
    }
    return {
      type: 'loop',
      item: forMatch[1] ?? forMatch[3],
      index: forMatch[2] ?? null,
      iterable: forMatch[4].trim(),
      key,
      body,
      location: dir.location,
    };
  }

  /** Pair each t-if with the t-else-if / t-else siblings that follow it. */
  private pairBranches(children: Pending[]): TemplateNode[] {
    const nodes: TemplateNode[] = [];
    let i = 0;

    while (i < children.length) {
      const child = children[i];

      if (child.type === 'node') {
        nodes.push(child.node);
        i++;
        continue;
      }

      if (child.kind !== 'if') {
        throw new TemplateSyntaxError(
          `t-${child.kind} without a preceding t-if`,
          this.options.unitId,
          { location: child.location },
        );
      }

      const chain = [child];
      let j = i + 1;
      while (j < children.length) {
        const next = children[j];
        // Skip whitespace-only text between chained branches.
        if (next.type === 'node' && next.node.type === 'text' && !next.node.content.trim()) {
          j++;
          continue;
        }
        if (next.type === 'branch' && next.kind !== 'if') {
          chain.push(next);
          j++;
          if (next.kind === 'else') break;
          continue;
        }
        break;
      }

      // Whitespace skipped after the last branch belongs to the siblings.
      let consumed = i + 1;
      for (let k = i + 1; k < j; k++) {
        if (children[k].type === 'branch') consumed = k + 1;
      }

      nodes.push(buildConditional(chain, this.options.unitId));
      i = consumed;
    }

    return nodes;
  }
}

type Branch = Extract<Pending, { type: 'branch' }>;

function buildConditional(chain: Branch[], unitId: string): ConditionalNode {
  const [head, ...rest] = chain;
  let elseBranch: TemplateNode[] | null = null;

  if (rest.length > 0) {
    const next = rest[0];
    if (next.kind === 'else') {
      if (rest.length > 1) {
        throw new TemplateSyntaxError('t-else must be the last branch', unitId, { location: rest[1].location });
      }
      elseBranch = next.nodes;
    } else {
      elseBranch = [buildConditional([{ ...next, kind: 'if' }, ...rest.slice(1)], unitId)];
    }
  }

  return {
    type: 'conditional',
    condition: head.expression,
    then: head.nodes,
    else: elseBranch,
    location: head.location,
  };
}

function directive(
  kind: DirectiveKind,
  name: string,
  argWithModifiers: string,
  expression: string,
  location: SourceLocation,
): Directive {
  const parts = argWithModifiers.split('.');
  const arg = parts[0] ? parts[0] : null;
  return { kind, name, arg, expression, modifiers: parts.slice(1).filter(Boolean), location };
}

// ---- Filters ----------------------------------------------------------------

/**
 * Split `value | upper | truncate(10)` into the expression and its filters.
 * `||` and `|` inside strings or brackets are not filter separators.
 */
export function splitFilters(source: string): { expression: string; filters: FilterCall[] } {
  const segments: string[] = [];
  let depth = 0;
  let quote: string | null = null;
  let last = 0;

  for (let i = 0; i < source.length; i++) {
    const ch = source[i];
    if (quote) {
      if (ch === '\\') i++;
      else if (ch === quote) quote = null;
      continue;
    }
    if (ch === '"' || ch === "'" || ch === '`') quote = ch;
    else if (ch === '(' || ch === '[' || ch === '{') depth++;
    else if (ch === ')' || ch === ']' || ch === '}') depth--;
    else if (ch === '|' && depth === 0 && source[i + 1] !== '|' && source[i - 1] !== '|') {
      segments.push(source.slice(last, i));
      last = i + 1;
    }
  }
  segments.push(source.slice(last));

  const [expression, ...rawFilters] = segments.map((s) => s.trim());
  const filters = rawFilters.map((raw): FilterCall => {
    const call = raw.match(/^([\w$]+)\s*(?:\(([\s\S]*)\))?$/);
    if (!call) return { name: raw, args: null };
    return { name: call[1], args: call[2] ?? null };
  });
  return { expression, filters };
}

// ---- Entry points -----------------------------------------------------------

export function parseMarkup(tokens: MarkupToken[], options: TemplateParseOptions): TemplateParseResult {
  return new TemplateParser(options).parse(tokens);
}

/** Tokenize and parse a template string. */
export function parseTemplate(
  source: string,
  options: TemplateParseOptions = { unitId: 'anonymous.tess' },
): TemplateParseResult {
  return parseMarkup(tokenizeMarkup(source, options.unitId), options);
}

// ---- Serialization ----------------------------------------------------------

/** Print a forest back to markup that parses to a structurally equal forest. */
export function serializeTemplate(nodes: TemplateNode[]): string {
  return nodes.map(serializeNode).join('');
}

function serializeNode(node: TemplateNode): string {
  switch (node.type) {
    case 'text':
      return node.content;
    case 'interpolation': {
      const filters = node.filters.map((f) => ` | ${f.name}${f.args === null ? '' : `(${f.args})`}`);
      return `{{ ${node.expression}${filters.join('')} }}`;
    }
    case 'element': {
      const attrs = [
        ...node.attrs.map((a) => (a.value === null ? a.name : `${a.name}=${quoteAttr(a.value)}`)),
        ...node.directives.map((d) => `${d.name}=${quoteAttr(d.expression)}`),
      ];
      const open = `<${node.tag}${attrs.map((a) => ` ${a}`).join('')}`;
      if (node.selfClosing) return `${open} />`;
      return `${open}>${serializeTemplate(node.children)}</${node.tag}>`;
    }
    case 'slot': {
      const name = node.name === null ? '' : ` name=${quoteAttr(node.name)}`;
      return `<slot${name}>${serializeTemplate(node.fallback)}</slot>`;
    }
    case 'loop': {
      const binding = node.index === null ? node.item : `(${node.item}, ${node.index})`;
      const key = node.key === null ? '' : ` :key=${quoteAttr(node.key)}`;
      return `<template t-for=${quoteAttr(`${binding} in ${node.iterable}`)}${key}>${serializeTemplate(node.body)}</template>`;
    }
    case 'conditional':
      return serializeConditional(node, 't-if');
  }
}

function serializeConditional(node: ConditionalNode, attr: 't-if' | 't-else-if'): string {
  let out = `<template ${attr}=${quoteAttr(node.condition)}>${serializeTemplate(node.then)}</template>`;
  if (node.else) {
    const [only] = node.else;
    if (node.else.length === 1 && only.type === 'conditional') {
      out += serializeConditional(only, 't-else-if');
    } else {
      out += `<template t-else>${serializeTemplate(node.else)}</template>`;
    }
  }
  return out;
}

function quoteAttr(value: string): string {
  if (!value.includes('"')) return `"${value}"`;
  if (!value.includes("'")) return `'${value}'`;
  // Both quote kinds only parse from an unquoted value.
  if (!/^["']|[\s>]|\/>/.test(value)) return value;
  return `"${value.replace(/"/g, '&quot;')}"`;
}
