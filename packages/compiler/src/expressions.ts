// ---------------------------------------------------------------------------
// expressions.ts — Template expression parsing, scoping and rewriting
// ---------------------------------------------------------------------------
// Template expressions are parsed with acorn, their free identifiers are
// collected with acorn-walk, and references to props and state are rewritten
// with magic-string:
//
//   count + step        -> _ctx.count + _ctx.step
//   { active }          -> { active: _ctx.active }
//   items.map(i => i.x) -> _ctx.items.map(i => i.x)
// ---------------------------------------------------------------------------

import { parseExpressionAt, type AnyNode, type Expression, type Identifier } from 'acorn';
import { fullAncestor } from 'acorn-walk';
import MagicString from 'magic-string';
import { ExpressionSyntaxError } from './errors';
import type { SourceLocation } from './location';
import type { SymbolInfo, SymbolKind, SymbolTable } from './symbols';

/** Names every expression may use without declaring them. */
export const GLOBALS: ReadonlySet<string> = new Set([
  'undefined',
  'NaN',
  'Infinity',
  'Math',
  'JSON',
  'Date',
  'String',
  'Number',
  'Boolean',
  'Array',
  'Object',
  'RegExp',
  'Intl',
  'parseInt',
  'parseFloat',
  'isNaN',
  'isFinite',
  'encodeURIComponent',
  'decodeURIComponent',
]);

/** The event object inside event handler expressions. */
export const EVENT_BINDING = '$event';

export interface Reference {
  name: string;
  start: number;
  end: number;
  /** The identifier is the value of a shorthand property (`{ name }`). */
  shorthand: boolean;
}

export interface ParsedExpression {
  source: string;
  ast: Expression;
  /** Free identifiers, in source order. */
  references: Reference[];
}

export interface ExpressionContext {
  unitId: string;
  location?: SourceLocation;
}

/**
 * Parse a template expression.
 *
 * @throws ExpressionSyntaxError when `source` is empty or is not exactly one
 *   expression.
 */
export function parseExpression(source: string, context: ExpressionContext): ParsedExpression {
  const fail = (message: string) =>
    new ExpressionSyntaxError(message, context.unitId, { location: context.location });

  if (!source.trim()) throw fail('Empty expression');

  let ast: Expression;
  try {
    ast = parseExpressionAt(source, 0, { ecmaVersion: 'latest' });
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw fail(`${err.message.replace(/\s*\(\d+:\d+\)$/, '')} in "${source.trim()}"`);
    }
    throw err;
  }

  const rest = source.slice(ast.end).trim();
  if (rest) throw fail(`Unexpected "${rest}" after expression "${source.slice(0, ast.end).trim()}"`);

  return { source, ast, references: collectReferences(ast) };
}

const FUNCTION_TYPES: ReadonlySet<string> = new Set(['ArrowFunctionExpression', 'FunctionExpression', 'FunctionDeclaration']);

const isFunction = (node: AnyNode): boolean => FUNCTION_TYPES.has(node.type);

/** `x = 1` visits `x` as a pattern, but it is a reference. */
function isAssignmentTarget(enclosing: readonly AnyNode[]): boolean {
  for (const node of enclosing) {
    if (isFunction(node)) return false;
    if (node.type === 'AssignmentExpression') return true;
  }
  return false;
}

function collectReferences(ast: Expression): Reference[] {
  const candidates: Array<{ id: Identifier; scopes: AnyNode[] }> = [];
  // function node -> names its parameters and declarations bind
  const bound = new Map<AnyNode, Set<string>>();
  const shorthand = new Set<number>();

  fullAncestor(ast, (node, _state, ancestors, type) => {
    const visitedAs: string = type;
    if (node.type === 'Property') {
      if (node.shorthand && node.value.type === 'Identifier') shorthand.add(node.value.start);
      return;
    }
    if (node.type !== 'Identifier') return;

    // Innermost first, without the identifier itself.
    const enclosing = ancestors.slice(0, -1).reverse();
    const scopes = enclosing.filter(isFunction);
    if (visitedAs === 'VariablePattern' && scopes.length > 0 && !isAssignmentTarget(enclosing)) {
      const names = bound.get(scopes[0]) ?? new Set<string>();
      names.add(node.name);
      bound.set(scopes[0], names);
    } else {
      candidates.push({ id: node, scopes });
    }
  });

  return candidates
    .filter(({ id, scopes }) => !scopes.some((scope) => bound.get(scope)?.has(id.name)))
    .map(({ id }) => id)
    .sort((a, b) => a.start - b.start)
    .map((id) => ({ name: id.name, start: id.start, end: id.end, shorthand: shorthand.has(id.start) }));
}

/**
 * Replace every reference for which `resolve` returns a different name.
 * Shorthand properties are expanded so the key is preserved.
 */
export function rewriteExpression(parsed: ParsedExpression, resolve: (name: string) => string): string {
  const s = new MagicString(parsed.source);
  for (const ref of parsed.references) {
    const replacement = resolve(ref.name);
    if (replacement === ref.name) continue;
    s.overwrite(ref.start, ref.end, ref.shorthand ? `${ref.name}: ${replacement}` : replacement);
  }
  return s.toString().trim();
}

/** `handler` or `obj.handler`: an expression naming a function to call. */
export function isHandlerReference(parsed: ParsedExpression): boolean {
  return isAssignable(parsed);
}

/** Whether the expression can be the target of an assignment. */
export function isAssignable(parsed: ParsedExpression): boolean {
  const { ast } = parsed;
  return ast.type === 'Identifier' || (ast.type === 'MemberExpression' && !ast.optional);
}

// ---- Scopes -----------------------------------------------------------------

export type Resolution =
  | { kind: 'local' }
  | { kind: 'global' }
  | { kind: SymbolKind; symbol: SymbolInfo };

/**
 * A chain of template scopes.  The root resolves logic symbols and globals;
 * every loop (and every event handler, for `$event`) adds a child scope with
 * its own local names.
 */
export class Scope {
  private constructor(
    private symbols: SymbolTable,
    private locals: ReadonlySet<string>,
    private parent: Scope | null,
  ) {}

  static root(symbols: SymbolTable): Scope {
    return new Scope(symbols, new Set(), null);
  }

  extend(names: Array<string | null>): Scope {
    const locals = new Set<string>();
    for (const name of names) {
      if (name !== null) locals.add(name);
    }
    return new Scope(this.symbols, locals, this);
  }

  resolve(name: string): Resolution | null {
    for (let scope: Scope | null = this; scope; scope = scope.parent) {
      if (scope.locals.has(name)) return { kind: 'local' };
    }
    const symbol = this.symbols.get(name);
    if (symbol) return { kind: symbol.kind, symbol };
    if (GLOBALS.has(name)) return { kind: 'global' };
    return null;
  }
}

/** The render-time access path of a name: `_ctx.x` for props and state. */
export function contextAccess(scope: Scope, name: string): string {
  const resolved = scope.resolve(name);
  if (resolved && (resolved.kind === 'prop' || resolved.kind === 'state')) {
    return `${CONTEXT}.${name}`;
  }
  return name;
}

/** Name of the render routine's parameter. */
export const CONTEXT = '_ctx';
