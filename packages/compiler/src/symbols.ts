// ---------------------------------------------------------------------------
// symbols.ts — Symbol table of the <script> (logic) section
// ---------------------------------------------------------------------------
// The logic section is parsed with acorn and only its top level is inspected:
//
//   defineProps({ title: String, tone: { type: String, default: 'info' } })
//                                       -> props
//   let / const / var / class           -> state
//   function f() {}, const f = () => {} -> method
//   import X from './X.tess'            -> component
//   any other import binding            -> import
//
// Nothing below the top level contributes symbols.
// ---------------------------------------------------------------------------

import {
  parse,
  type Expression,
  type Identifier,
  type ModuleDeclaration,
  type Node,
  type Pattern,
  type Program,
  type Statement,
} from 'acorn';
import { posix } from 'node:path';
import { LogicSyntaxError } from './errors';
import { createLocator, START, type Locator, type SourceLocation } from './location';

export type SymbolKind = 'prop' | 'state' | 'method' | 'component' | 'import';

export interface SymbolInfo {
  name: string;
  kind: SymbolKind;
  location: SourceLocation;
  /** Import specifier, for `component` and `import` symbols. */
  source?: string;
}

export type SymbolTable = Map<string, SymbolInfo>;

export interface PropDefinition {
  name: string;
  /** A prop without a default is required unless it says `required: false`. */
  required: boolean;
  /** Source text of the `type` option, e.g. `String` or `[String, Number]`. */
  type: string | null;
  /** Source text of the `default` option. */
  default: string | null;
  location: SourceLocation;
}

export interface LogicImport {
  source: string;
  /** Local names bound by the declaration. */
  names: string[];
  /** Offsets of the specifier literal (quotes included) in the logic code. */
  sourceStart: number;
  sourceEnd: number;
}

export interface LogicInfo {
  /** The logic section text the offsets below refer to. */
  code: string;
  symbols: SymbolTable;
  props: PropDefinition[];
  /** Top-level state names in declaration order. */
  state: string[];
  /** Names the logic section exports. */
  exports: string[];
  imports: LogicImport[];
  /** Offsets of the `defineProps(...)` call, if any. */
  definePropsRange: { start: number; end: number } | null;
}

export interface SymbolTableOptions {
  unitId: string;
  /** Location of the first character of `code` in the unit. */
  base?: SourceLocation;
}

export const DEFINE_PROPS = 'defineProps';

/** Extension of single-file component units. */
export const UNIT_EXTENSION = '.tess';

export function emptyLogic(): LogicInfo {
  return {
    code: '',
    symbols: new Map(),
    props: [],
    state: [],
    exports: [],
    imports: [],
    definePropsRange: null,
  };
}

/**
 * Build the symbol table of a logic section.
 *
 * @throws LogicSyntaxError when the section does not parse, declares a name
 *   twice, or misuses `defineProps`.
 */
export function buildSymbolTable(code: string, options: SymbolTableOptions): LogicInfo {
  return new SymbolCollector(code, options).collect();
}

class SymbolCollector {
  private info: LogicInfo;
  private locate: Locator;

  constructor(
    private code: string,
    private options: SymbolTableOptions,
  ) {
    this.info = { ...emptyLogic(), code };
    this.locate = createLocator(code, options.base ?? START);
  }

  collect(): LogicInfo {
    const program = this.parseProgram();

    for (const statement of program.body) {
      this.visitTopLevel(statement);
    }

    return this.info;
  }

  private parseProgram(): Program {
    try {
      return parse(this.code, { ecmaVersion: 'latest', sourceType: 'module' });
    } catch (err) {
      if (err instanceof SyntaxError) {
        const pos = 'pos' in err && typeof err.pos === 'number' ? err.pos : 0;
        // acorn appends " (line:col)" relative to the section; drop it.
        const message = err.message.replace(/\s*\(\d+:\d+\)$/, '');
        throw new LogicSyntaxError(message, this.options.unitId, { location: this.locate(pos) });
      }
      throw err;
    }
  }

  // ---- Statements -----------------------------------------------------------

  private visitTopLevel(node: Statement | ModuleDeclaration): void {
    switch (node.type) {
      case 'ImportDeclaration': {
        const source = String(node.source.value);
        const names: string[] = [];
        for (const spec of node.specifiers) {
          const isComponent = spec.type === 'ImportDefaultSpecifier' && source.endsWith(UNIT_EXTENSION);
          this.declare(spec.local.name, isComponent ? 'component' : 'import', spec.local, source);
          names.push(spec.local.name);
        }
        this.info.imports.push({ source, names, sourceStart: node.source.start, sourceEnd: node.source.end });
        break;
      }

      case 'ExportNamedDeclaration':
        if (node.declaration) {
          const before = this.info.symbols.size;
          this.visitTopLevel(node.declaration);
          this.info.exports.push(...[...this.info.symbols.keys()].slice(before));
        } else {
          for (const spec of node.specifiers) {
            const exported = spec.exported;
            this.info.exports.push(exported.type === 'Identifier' ? exported.name : String(exported.value));
          }
        }
        break;

      case 'ExportDefaultDeclaration':
        throw this.error('`export default` is reserved for the component definition', node);

      case 'ExportAllDeclaration':
        break;

      case 'FunctionDeclaration':
        if (node.id) this.declare(node.id.name, 'method', node.id);
        break;

      case 'ClassDeclaration':
        if (node.id) {
          this.declare(node.id.name, 'state', node.id);
          this.info.state.push(node.id.name);
        }
        break;

      case 'VariableDeclaration':
        for (const decl of node.declarations) {
          if (decl.init && this.isDefinePropsCall(decl.init)) {
            // The binding holds the prop table, not prop values.
            this.readProps(decl.init);
            continue;
          }
          const kind = decl.init && isFunctionExpression(decl.init) ? 'method' : 'state';
          for (const id of patternIdentifiers(decl.id)) {
            this.declare(id.name, kind, id);
            if (kind === 'state') this.info.state.push(id.name);
          }
        }
        break;

      case 'ExpressionStatement':
        if (this.isDefinePropsCall(node.expression)) {
          this.readProps(node.expression);
        }
        break;

      default:
        break;
    }
  }

  // ---- defineProps ----------------------------------------------------------

  private isDefinePropsCall(node: Expression): boolean {
    return node.type === 'CallExpression' && node.callee.type === 'Identifier' && node.callee.name === DEFINE_PROPS;
  }

  private readProps(call: Expression): void {
    if (call.type !== 'CallExpression') return;
    if (this.info.definePropsRange) {
      throw this.error(`${DEFINE_PROPS}() may only be called once`, call);
    }
    this.info.definePropsRange = { start: call.start, end: call.end };

    const [arg] = call.arguments;
    if (call.arguments.length !== 1 || arg.type === 'SpreadElement') {
      throw this.error(`${DEFINE_PROPS}() expects a single object or array argument`, call);
    }

    if (arg.type === 'ArrayExpression') {
      for (const element of arg.elements) {
        if (!element || element.type !== 'Literal' || typeof element.value !== 'string') {
          throw this.error('Prop names must be string literals', element ?? arg);
        }
        this.addProp(element.value, { required: false, type: null, default: null }, element);
      }
      return;
    }

    if (arg.type !== 'ObjectExpression') {
      throw this.error(`${DEFINE_PROPS}() expects a single object or array argument`, arg);
    }

    for (const prop of arg.properties) {
      if (prop.type !== 'Property' || prop.computed) {
        throw this.error('Prop definitions must use static keys', prop);
      }
      const name = prop.key.type === 'Identifier' ? prop.key.name : prop.key.type === 'Literal' ? String(prop.key.value) : null;
      if (name === null) throw this.error('Prop definitions must use static keys', prop);

      const value = prop.value;
      if (value.type !== 'ObjectExpression') {
        // `title: String` or `id: [String, Number]`
        this.addProp(name, { required: true, type: this.text(value), default: null }, prop);
        continue;
      }

      let type: string | null = null;
      let defaultText: string | null = null;
      let requiredOption: boolean | null = null;
      for (const option of value.properties) {
        if (option.type !== 'Property' || option.key.type !== 'Identifier') continue;
        if (option.key.name === 'type') type = this.text(option.value);
        else if (option.key.name === 'default') defaultText = this.text(option.value);
        else if (option.key.name === 'required' && option.value.type === 'Literal') {
          requiredOption = option.value.value === true;
        }
      }
      this.addProp(
        name,
        { required: defaultText === null && requiredOption !== false, type, default: defaultText },
        prop,
      );
    }
  }

  private addProp(name: string, def: Omit<PropDefinition, 'name' | 'location'>, node: Node): void {
    const location = this.locate(node.start);
    this.declare(name, 'prop', node);
    this.info.props.push({ name, ...def, location });
  }

  // ---- Helpers --------------------------------------------------------------

  private declare(name: string, kind: SymbolKind, node: Node, source?: string): void {
    if (isReservedName(name)) {
      throw this.error(`"${name}" is reserved for generated code`, node);
    }
    const existing = this.info.symbols.get(name);
    if (existing) {
      throw this.error(
        `"${name}" is already declared as a ${existing.kind} at line ${existing.location.line}`,
        node,
      );
    }
    const symbol: SymbolInfo = { name, kind, location: this.locate(node.start) };
    if (source !== undefined) symbol.source = source;
    this.info.symbols.set(name, symbol);
  }

  private text(node: Node): string {
    return this.code.slice(node.start, node.end);
  }

  private error(message: string, node: Node): LogicSyntaxError {
    return new LogicSyntaxError(message, this.options.unitId, { location: this.locate(node.start) });
  }
}

/** Generated modules use `_ctx` and names starting with `__`. */
export function isReservedName(name: string): boolean {
  return name === '_ctx' || name.startsWith('__');
}

function isFunctionExpression(node: Expression): boolean {
  return node.type === 'ArrowFunctionExpression' || node.type === 'FunctionExpression';
}

/** Every identifier a binding pattern declares. */
export function patternIdentifiers(pattern: Pattern): Identifier[] {
  switch (pattern.type) {
    case 'Identifier':
      return [pattern];
    case 'ObjectPattern':
      return pattern.properties.flatMap((p) =>
        p.type === 'RestElement' ? patternIdentifiers(p.argument) : patternIdentifiers(p.value),
      );
    case 'ArrayPattern':
      return pattern.elements.flatMap((e) => (e ? patternIdentifiers(e) : []));
    case 'RestElement':
      return patternIdentifiers(pattern.argument);
    case 'AssignmentPattern':
      return patternIdentifiers(pattern.left);
    case 'MemberExpression':
      return [];
  }
}

// ---- Unit ids -----------------------------------------------------------------

/**
 * Resolve an import specifier of `fromId` to a unit id.  Relative specifiers
 * resolve against the importing unit's directory; others are returned as-is.
 */
export function resolveUnitId(fromId: string, specifier: string): string {
  if (!specifier.startsWith('./') && !specifier.startsWith('../')) return specifier;
  return posix.normalize(posix.join(posix.dirname(fromId), specifier));
}

/** `components/Card.tess` -> `Card` */
export function componentName(unitId: string): string {
  return posix.basename(unitId, UNIT_EXTENSION);
}
