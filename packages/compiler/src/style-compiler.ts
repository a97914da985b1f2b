// ---------------------------------------------------------------------------
// style-compiler.ts — Style parser and selector scoper
// ---------------------------------------------------------------------------
// Parses the <style> section into rules and rewrites every scoped selector so
// that it only matches elements of its own unit.
//
// Given:
//   .counter { padding: 20px; }
//   .list > li:hover { color: blue; }
//
// With scopeId = "data-t-a1b2c3d4", produces:
//   .counter[data-t-a1b2c3d4] { padding: 20px; }
//   .list > li[data-t-a1b2c3d4]:hover { color: blue; }
//
// The same attribute is set on every element the unit renders (handled by
// the code generator).  Rules are scoped by default; `<style global>` opts the
// whole section out, `:global(...)` a single selector or the part it wraps.  `:deep(...)` and `>>>`
// leave everything after them unscoped.
// ---------------------------------------------------------------------------

import { InvalidDeclarationError, InvalidSelectorError } from './errors';
import type { SourceLocation } from './location';
import { tokenizeStyle, type StyleToken } from './style-lexer';

export interface Declaration {
  property: string;
  value: string;
  important: boolean;
  location: SourceLocation;
}

export interface StyleRule {
  type: 'rule';
  /** The selector list exactly as written (trimmed). */
  selector: string;
  /** The comma-separated parts of `selector`. */
  selectors: string[];
  declarations: Declaration[];
  scoped: boolean;
  location: SourceLocation;
}

export interface AtRule {
  type: 'at-rule';
  name: string;
  params: string;
  /** Set for descriptor blocks such as @font-face. */
  declarations: Declaration[] | null;
  /** Set for grouping rules such as @media and for @keyframes. */
  rules: StyleNode[] | null;
  location: SourceLocation;
}

export interface StyleComment {
  type: 'comment';
  text: string;
}

export type StyleNode = StyleRule | AtRule | StyleComment;

export interface StyleCompileOptions {
  /** The raw CSS source. */
  source: string;
  /** The unit identity (used to generate a stable scope ID). */
  unitId: string;
  /** Whether the section opted out of scoping (`<style global>`). */
  global?: boolean;
  /** Override the scope ID (useful for testing). */
  scopeId?: string;
}

export interface StyleCompileResult {
  /** The (possibly transformed) CSS. */
  css: string;
  /** The rules with scope predicates applied. */
  rules: StyleNode[];
  scopeId: string;
  /** Whether any rule was scoped, i.e. elements need the scope attribute. */
  scoped: boolean;
}

/** Attribute namespace reserved for scope tokens. */
export const SCOPE_PREFIX = 'data-t-';

const GROUPING_AT_RULES = new Set(['media', 'supports', 'container', 'layer', 'document', 'scope']);
const KEYFRAMES_RE = /^(?:-\w+-)?keyframes$/;

/**
 * Compile a <style> section, applying scope predicates to scoped rules.
 */
export function compileStyle(options: StyleCompileOptions): StyleCompileResult {
  const tokens = tokenizeStyle(options.source, options.unitId);
  return compileStyleTokens(tokens, options);
}

export function compileStyleTokens(
  tokens: StyleToken[],
  options: Omit<StyleCompileOptions, 'source'>,
): StyleCompileResult {
  const scopeId = options.scopeId ?? generateScopeId(options.unitId);
  const parsed = parseStyle(tokens, { unitId: options.unitId, scoped: !options.global });
  const rules = scopeRules(parsed, scopeId, options.unitId);
  return { css: emitStyle(rules), rules, scopeId, scoped: containsScopedRule(rules) };
}

// ---------------------------------------------------------------------------
// Scope-ID generation
// ---------------------------------------------------------------------------

/**
 * Generate a deterministic scope ID from a unit identity.
 *
 * We use a simple DJB2-style hash and format it as `data-t-XXXXXXXX`.
 */
export function generateScopeId(unitId: string): string {
  let hash = 5381;
  for (let i = 0; i < unitId.length; i++) {
    // hash * 33 + char
    hash = ((hash << 5) + hash + unitId.charCodeAt(i)) >>> 0;
  }
  return `${SCOPE_PREFIX}${hash.toString(16).padStart(8, '0')}`;
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

export interface StyleParseOptions {
  unitId: string;
  scoped: boolean;
}

type BlockContext = 'rules' | 'declarations';

class StyleParser {
  private pos = 0;

  constructor(
    private tokens: StyleToken[],
    private options: StyleParseOptions,
  ) {}

  parse(): StyleNode[] {
    const { nodes } = this.parseRules(this.options.scoped, null);
    return nodes;
  }

  /** Parse rules until the end of input, or the `}` closing `opener`. */
  private parseRules(scoped: boolean, opener: SourceLocation | null): { nodes: StyleNode[] } {
    const nodes: StyleNode[] = [];

    while (this.pos < this.tokens.length) {
      const token = this.tokens[this.pos++];

      switch (token.type) {
        case 'comment':
          nodes.push({ type: 'comment', text: token.text });
          break;

        case 'block-close':
          if (opener) return { nodes };
          throw this.selectorError('Unexpected "}"', token.location);

        case 'block-open':
          throw this.selectorError('Missing selector before "{"', token.location);

        case 'statement':
          if (!token.text.startsWith('@')) {
            throw this.declarationError(`Declaration "${token.text}" outside of a rule`, token.location);
          }
          nodes.push({ ...splitAtRule(token.text), declarations: null, rules: null, location: token.location, type: 'at-rule' });
          break;

        case 'declaration':
          throw this.declarationError(`Declaration "${token.text}" outside of a rule`, token.location);

        case 'prelude':
          this.expectBlockOpen(token.text, token.location);
          nodes.push(this.parseBlock(token.text, token.location, scoped));
          break;
      }
    }

    if (opener) throw this.selectorError('Unclosed block — expected "}"', opener);
    return { nodes };
  }

  private parseBlock(prelude: string, location: SourceLocation, scoped: boolean): StyleNode {
    if (prelude.startsWith('@')) {
      const { name, params } = splitAtRule(prelude);
      if (GROUPING_AT_RULES.has(name)) {
        return { type: 'at-rule', name, params, declarations: null, rules: this.parseRules(scoped, location).nodes, location };
      }
      if (KEYFRAMES_RE.test(name)) {
        // Keyframe selectors (`from`, `50%`) are never scoped.
        return { type: 'at-rule', name, params, declarations: null, rules: this.parseRules(false, location).nodes, location };
      }
      return { type: 'at-rule', name, params, declarations: this.parseDeclarations(location), rules: null, location };
    }

    const selectors = splitSelectorList(prelude);
    for (const selector of selectors) {
      this.validateSelector(selector, prelude, location);
    }

    return {
      type: 'rule',
      selector: prelude,
      selectors,
      declarations: this.parseDeclarations(location),
      scoped,
      location,
    };
  }

  private parseDeclarations(opener: SourceLocation): Declaration[] {
    const declarations: Declaration[] = [];

    while (this.pos < this.tokens.length) {
      const token = this.tokens[this.pos++];
      switch (token.type) {
        case 'block-close':
          return declarations;
        case 'comment':
          break;
        case 'declaration':
        case 'statement':
          declarations.push(this.parseDeclaration(token.text, token.location));
          break;
        case 'prelude':
          throw this.selectorError(`Nested rule "${token.text}" is not supported`, token.location);
        case 'block-open':
          throw this.selectorError('Unexpected "{"', token.location);
      }
    }

    throw this.selectorError('Unclosed block — expected "}"', opener);
  }

  private parseDeclaration(text: string, location: SourceLocation): Declaration {
    const colon = text.indexOf(':');
    if (colon === -1) {
      throw this.declarationError(`Invalid declaration "${text}" on line ${location.line}: expected "property: value"`, location);
    }
    const property = text.slice(0, colon).trim();
    let value = text.slice(colon + 1).trim();
    let important = false;

    const importantMatch = value.match(/\s*!\s*important$/i);
    if (importantMatch && importantMatch.index !== undefined) {
      important = true;
      value = value.slice(0, importantMatch.index).trim();
    }

    if (!/^(?:--)?-?[a-zA-Z_][\w-]*$/.test(property)) {
      throw this.declarationError(`Invalid property name "${property}" on line ${location.line}`, location);
    }
    if (!value && !property.startsWith('--')) {
      throw this.declarationError(`Missing value for "${property}" on line ${location.line}`, location);
    }

    return { property, value, important, location };
  }

  private expectBlockOpen(prelude: string, location: SourceLocation): void {
    const next = this.tokens[this.pos];
    if (next === undefined || next.type !== 'block-open') {
      throw this.selectorError(`Expected "{" after "${prelude}"`, location);
    }
    this.pos++;
  }

  private validateSelector(selector: string, prelude: string, location: SourceLocation): void {
    if (!selector) {
      throw this.selectorError(`Empty selector in "${prelude}"`, location);
    }
    if (!isBalanced(selector)) {
      throw this.selectorError(`Unbalanced brackets in selector "${selector}"`, location);
    }
    if (/(?:[>+~]|>>>)\s*$/.test(selector)) {
      throw this.selectorError(`Selector "${selector}" ends with a combinator`, location);
    }
    if (selector.includes(`[${SCOPE_PREFIX}`)) {
      throw this.selectorError(
        `Selector "${selector}" uses the reserved "${SCOPE_PREFIX}" attribute namespace`,
        location,
      );
    }
  }

  private selectorError(message: string, location: SourceLocation): InvalidSelectorError {
    return new InvalidSelectorError(message, this.options.unitId, { location });
  }

  private declarationError(message: string, location: SourceLocation): InvalidDeclarationError {
    return new InvalidDeclarationError(message, this.options.unitId, { location });
  }
}

export function parseStyle(tokens: StyleToken[], options: StyleParseOptions): StyleNode[] {
  return new StyleParser(tokens, options).parse();
}

function splitAtRule(text: string): { name: string; params: string } {
  const match = text.match(/^@([\w-]+)\s*([\s\S]*)$/);
  if (!match) return { name: text.slice(1), params: '' };
  return { name: match[1].toLowerCase(), params: match[2].trim() };
}

/** Split a selector list on top-level commas. */
export function splitSelectorList(list: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let quote: string | null = null;
  let last = 0;

  for (let i = 0; i < list.length; i++) {
    const ch = list[i];
    if (quote) {
      if (ch === '\\') i++;
      else if (ch === quote) quote = null;
    } else if (ch === '"' || ch === "'") quote = ch;
    else if (ch === '(' || ch === '[') depth++;
    else if (ch === ')' || ch === ']') depth--;
    else if (ch === ',' && depth === 0) {
      parts.push(list.slice(last, i).trim());
      last = i + 1;
    }
  }
  parts.push(list.slice(last).trim());
  return parts;
}

function isBalanced(selector: string): boolean {
  const stack: string[] = [];
  let quote: string | null = null;
  for (let i = 0; i < selector.length; i++) {
    const ch = selector[i];
    if (quote) {
      if (ch === '\\') i++;
      else if (ch === quote) quote = null;
      continue;
    }
    if (ch === '"' || ch === "'") quote = ch;
    else if (ch === '(' || ch === '[') stack.push(ch === '(' ? ')' : ']');
    else if (ch === ')' || ch === ']') {
      if (stack.pop() !== ch) return false;
    }
  }
  return stack.length === 0 && quote === null;
}

// ---------------------------------------------------------------------------
// CSS selector scoping
// ---------------------------------------------------------------------------

function scopeRules(nodes: StyleNode[], scopeId: string, unitId: string): StyleNode[] {
  return nodes.map((node): StyleNode => {
    if (node.type === 'rule') {
      if (!node.scoped) return node;
      const selectors = node.selectors.map((s) => scopeSelector(s, scopeId, unitId));
      return { ...node, selectors, selector: selectors.join(', ') };
    }
    if (node.type === 'at-rule' && node.rules) {
      return { ...node, rules: scopeRules(node.rules, scopeId, unitId) };
    }
    return node;
  });
}

function containsScopedRule(nodes: StyleNode[]): boolean {
  return nodes.some(
    (n) => (n.type === 'rule' && n.scoped) || (n.type === 'at-rule' && n.rules !== null && containsScopedRule(n.rules)),
  );
}

interface Segment {
  kind: 'compound' | 'combinator' | 'pierce';
  start: number;
  end: number;
}

/**
 * Append the scope attribute to a single selector.
 *
 * The attribute is added to the *last* compound selector so that it targets
 * the element itself, not an ancestor, and is inserted before any trailing
 * pseudo-classes or pseudo-elements.  A pierce marker moves the target to
 * the compound just before it and leaves the rest of the selector untouched.
 *
 * Examples:
 *   `.foo`              -> `.foo[data-t-x]`
 *   `.foo > .bar`       -> `.foo > .bar[data-t-x]`
 *   `h1::before`        -> `h1[data-t-x]::before`
 *   `.a :deep(.b .c)`   -> `.a[data-t-x] .b .c`
 *   `.a >>> .b`         -> `.a[data-t-x] .b`
 *   `:global(body)`     -> `body`
 *   `.a :global(.b)`    -> `.a[data-t-x] .b`
 */
export function scopeSelector(selector: string, scopeId: string, unitId = 'anonymous.tess'): string {
  const attr = `[${scopeId}]`;
  const trimmed = selector.trim();

  const globalInner = unwrapCall(trimmed, ':global');
  if (globalInner !== null) return globalInner.trim();

  const segments = segmentSelector(trimmed);
  const pierceIdx = segments.findIndex(
    (s) => s.kind === 'pierce' || (s.kind === 'compound' && findPierceCall(trimmed.slice(s.start, s.end)) !== null),
  );

  if (pierceIdx === -1) {
    const target = lastCompound(segments, segments.length);
    if (!target) {
      throw new InvalidSelectorError(`Cannot scope selector "${selector}"`, unitId);
    }
    return insertScope(trimmed, target, attr);
  }

  const pierce = segments[pierceIdx];
  let head: string;
  let tail: string;
  let isGlobal = false;

  const call = pierce.kind === 'compound' ? findPierceCall(trimmed.slice(pierce.start, pierce.end)) : null;
  if (call === null) {
    head = trimmed.slice(0, pierce.start).trimEnd();
    tail = trimmed.slice(pierce.end).trimStart();
  } else {
    const compound = trimmed.slice(pierce.start, pierce.end);
    const open = call.at + call.name.length + 1;
    const close = matchingParen(compound, open - 1);
    head = trimmed.slice(0, pierce.start + call.at).trimEnd();
    tail = compound.slice(open, close).trim() + compound.slice(close + 1) + trimmed.slice(pierce.end);
    isGlobal = call.name === ':global';
  }

  if (!head) return isGlobal ? tail.trim() : `${attr} ${tail}`.trimEnd();

  const headSegments = segmentSelector(head);
  const target = lastCompound(headSegments, headSegments.length);
  const scopedHead = target ? insertScope(head, target, attr) : `${head} ${attr}`;
  return tail ? `${scopedHead} ${tail}` : scopedHead;
}

function lastCompound(segments: Segment[], before: number): Segment | undefined {
  for (let i = before - 1; i >= 0; i--) {
    if (segments[i].kind === 'compound') return segments[i];
  }
  return undefined;
}

function insertScope(selector: string, target: Segment, attr: string): string {
  const compound = selector.slice(target.start, target.end);

  // Trailing pseudo-elements/classes: e.g. `:hover`, `::before`, `:nth-child(2n)`.
  const pseudoMatch = compound.match(/(?:::?[\w-]+(?:\([^)]*\))?)+$/);
  const at = target.start + (pseudoMatch?.index ?? compound.length);
  return selector.slice(0, at) + attr + selector.slice(at);
}

/** Split a selector into compound selectors, combinators and `>>>` markers. */
function segmentSelector(selector: string): Segment[] {
  const segments: Segment[] = [];
  let i = 0;

  while (i < selector.length) {
    if (selector.startsWith('>>>', i)) {
      segments.push({ kind: 'pierce', start: i, end: i + 3 });
      i += 3;
      continue;
    }

    if (/[\s>+~]/.test(selector[i])) {
      const start = i;
      while (i < selector.length && /[\s>+~]/.test(selector[i]) && !selector.startsWith('>>>', i)) i++;
      segments.push({ kind: 'combinator', start, end: i });
      continue;
    }

    const start = i;
    let depth = 0;
    let quote: string | null = null;
    while (i < selector.length) {
      const ch = selector[i];
      if (quote) {
        if (ch === '\\') i++;
        else if (ch === quote) quote = null;
      } else if (ch === '"' || ch === "'") quote = ch;
      else if (ch === '(' || ch === '[') depth++;
      else if (ch === ')' || ch === ']') depth--;
      else if (depth === 0 && /[\s>+~]/.test(ch)) break;
      i++;
    }
    segments.push({ kind: 'compound', start, end: i });
  }

  return segments;
}

/** Index of `name(` at parenthesis depth 0 in `text`, or -1. */
function findCall(text: string, name: string): number {
  let depth = 0;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '(' || ch === '[') depth++;
    else if (ch === ')' || ch === ']') depth--;
    else if (depth === 0 && text.startsWith(`${name}(`, i)) return i;
  }
  return -1;
}

/** The first `:deep(` or `:global(` call at the top level of a compound. */
function findPierceCall(compound: string): { name: ':deep' | ':global'; at: number } | null {
  for (const name of [':deep', ':global'] as const) {
    const at = findCall(compound, name);
    if (at !== -1) return { name, at };
  }
  return null;
}

function matchingParen(text: string, open: number): number {
  let depth = 0;
  for (let i = open; i < text.length; i++) {
    if (text[i] === '(') depth++;
    else if (text[i] === ')') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return text.length;
}

/** `:global(x)` -> `x` when the whole text is that call, otherwise null. */
function unwrapCall(text: string, name: string): string | null {
  if (!text.startsWith(`${name}(`)) return null;
  const close = matchingParen(text, name.length);
  if (close !== text.length - 1) return null;
  return text.slice(name.length + 1, close);
}

// ---------------------------------------------------------------------------
// Emission
// ---------------------------------------------------------------------------

export function emitStyle(nodes: StyleNode[], indent = ''): string {
  return nodes.map((node) => emitNode(node, indent)).join('\n');
}

function emitNode(node: StyleNode, indent: string): string {
  switch (node.type) {
    case 'comment':
      return `${indent}${node.text}`;
    case 'rule':
      return `${indent}${node.selector} {\n${emitDeclarations(node.declarations, indent + '  ')}${indent}}`;
    case 'at-rule': {
      const header = `${indent}@${node.name}${node.params ? ` ${node.params}` : ''}`;
      if (node.rules) {
        return `${header} {\n${emitStyle(node.rules, indent + '  ')}\n${indent}}`;
      }
      if (node.declarations) {
        return `${header} {\n${emitDeclarations(node.declarations, indent + '  ')}${indent}}`;
      }
      return `${header};`;
    }
  }
}

function emitDeclarations(declarations: Declaration[], indent: string): string {
  return declarations
    .map((d) => `${indent}${d.property}: ${d.value}${d.important ? ' !important' : ''};\n`)
    .join('');
}
