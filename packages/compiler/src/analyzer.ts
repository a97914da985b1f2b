// ---------------------------------------------------------------------------
// analyzer.ts — Semantic analysis of a unit
// ---------------------------------------------------------------------------
// Walks the template with a chain of scopes and checks that:
//
//   - every identifier in an expression resolves to a logic symbol, a loop
//     variable of an enclosing loop, a global or (in handlers) `$event`;
//   - every component tag names an imported component, and every required
//     prop of that component is supplied;
//   - named slot content targets a slot the component declares.
//
// All problems are collected; analysis never stops at the first one.
// ---------------------------------------------------------------------------

import {
  CircularDependencyError,
  CompileError,
  ExpressionSyntaxError,
  MissingRequiredPropError,
  TemplateSyntaxError,
  UnresolvedSymbolError,
  warning,
  type Diagnostic,
} from './errors';
import {
  EVENT_BINDING,
  isAssignable,
  parseExpression,
  Scope,
  type ParsedExpression,
} from './expressions';
import type { SourceLocation } from './location';
import { componentName, resolveUnitId, type LogicInfo } from './symbols';
import type { Directive, ElementNode, TemplateNode } from './template-parser';

/** What a unit offers to the units that use it. */
export interface ComponentInterface {
  id: string;
  name: string;
  props: Array<{ name: string; required: boolean; type: string | null }>;
  /** Slot names; the unnamed slot is `default`. */
  slots: string[];
  /** Names exported by the logic section. */
  exports: string[];
}

export interface AnalyzeOptions {
  unitId: string;
  logic: LogicInfo;
  /** Interfaces of already-compiled dependencies, by unit id. */
  dependencies?: ReadonlyMap<string, ComponentInterface>;
}

export interface AnalysisResult {
  errors: CompileError[];
  warnings: Diagnostic[];
  /** Local component name -> unit id. */
  components: Map<string, string>;
  interface: ComponentInterface;
}

export const DEFAULT_SLOT = 'default';

/** `<Badge>` is a component usage, `<badge>` an element. */
export function isComponentTag(tag: string): boolean {
  return /^[A-Z]/.test(tag);
}

/** `aria-label` -> `ariaLabel` */
export function camelize(name: string): string {
  return name.replace(/-([a-z])/g, (_, c: string) => c.toUpperCase());
}

export function analyze(nodes: TemplateNode[], options: AnalyzeOptions): AnalysisResult {
  return new Analyzer(options).run(nodes);
}

class Analyzer {
  private errors: CompileError[] = [];
  private warnings: Diagnostic[] = [];
  private slots = new Set<string>();
  private components = new Map<string, string>();

  constructor(private options: AnalyzeOptions) {
    for (const symbol of options.logic.symbols.values()) {
      if (symbol.kind === 'component' && symbol.source !== undefined) {
        this.components.set(symbol.name, resolveUnitId(options.unitId, symbol.source));
      }
    }
  }

  run(nodes: TemplateNode[]): AnalysisResult {
    this.visitAll(nodes, Scope.root(this.options.logic.symbols));

    const { logic, unitId } = this.options;
    return {
      errors: this.errors,
      warnings: this.warnings,
      components: this.components,
      interface: {
        id: unitId,
        name: componentName(unitId),
        props: logic.props.map((p) => ({ name: p.name, required: p.required, type: p.type })),
        slots: [...this.slots],
        exports: [...logic.exports],
      },
    };
  }

  // ---- Tree walk ------------------------------------------------------------

  private visitAll(nodes: TemplateNode[], scope: Scope, parent: ElementNode | null = null): void {
    for (const node of nodes) this.visit(node, scope, parent);
  }

  private visit(node: TemplateNode, scope: Scope, parent: ElementNode | null): void {
    switch (node.type) {
      case 'text':
        break;

      case 'interpolation':
        this.expression(node.expression, scope, node.location);
        for (const filter of node.filters) {
          if (!scope.resolve(filter.name)) {
            this.errors.push(new UnresolvedSymbolError(filter.name, this.options.unitId, node.location));
          }
          if (filter.args !== null && filter.args.trim()) {
            this.expression(`[${filter.args}]`, scope, node.location);
          }
        }
        break;

      case 'conditional':
        this.expression(node.condition, scope, node.location);
        this.visitAll(node.then, scope, parent);
        if (node.else) this.visitAll(node.else, scope, parent);
        break;

      case 'loop': {
        this.expression(node.iterable, scope, node.location);
        const inner = scope.extend([node.item, node.index]);
        if (node.key !== null) this.expression(node.key, inner, node.location);
        this.visitAll(node.body, inner, parent);
        break;
      }

      case 'slot':
        this.slots.add(node.name ?? DEFAULT_SLOT);
        this.visitAll(node.fallback, scope);
        break;

      case 'element':
        this.element(node, scope, parent);
        break;
    }
  }

  private element(node: ElementNode, scope: Scope, parent: ElementNode | null): void {
    const isComponent = isComponentTag(node.tag);

    if (isComponent) {
      const resolved = scope.resolve(node.tag);
      if (!resolved || resolved.kind !== 'component') {
        this.errors.push(new UnresolvedSymbolError(node.tag, this.options.unitId, node.location));
      }
    }

    for (const dir of node.directives) {
      this.directive(dir, node, scope, parent);
    }

    if (isComponent) this.componentUsage(node);
    this.visitAll(node.children, scope, node);
  }

  private directive(dir: Directive, node: ElementNode, scope: Scope, parent: ElementNode | null): void {
    switch (dir.kind) {
      case 'bind':
        this.expression(dir.expression, scope, dir.location);
        break;

      case 'on':
        if (dir.arg === null) {
          this.errors.push(this.syntaxError(`${dir.name} requires an event name`, dir.location));
          break;
        }
        this.expression(dir.expression, scope.extend([EVENT_BINDING]), dir.location);
        break;

      case 'model': {
        const parsed = this.expression(dir.expression, scope, dir.location);
        if (parsed && !isAssignable(parsed)) {
          this.errors.push(
            new ExpressionSyntaxError(
              `${dir.name} requires an assignable expression, got "${dir.expression}"`,
              this.options.unitId,
              { location: dir.location },
            ),
          );
        }
        break;
      }

      case 'slot':
        if (node.tag !== 'template' || !parent || !isComponentTag(parent.tag)) {
          this.errors.push(
            this.syntaxError(`${dir.name} is only allowed on a <template> directly inside a component`, dir.location),
          );
        } else if (dir.expression.trim()) {
          this.errors.push(this.syntaxError(`${dir.name} does not take a value`, dir.location));
        }
        break;
    }
  }

  // ---- Component usage sites ------------------------------------------------

  private componentUsage(node: ElementNode): void {
    const id = this.components.get(node.tag);
    const target = id === undefined ? undefined : this.options.dependencies?.get(id);
    if (!target) return;

    // A spread binding may supply anything.
    const spread = node.directives.some((d) => d.kind === 'bind' && d.arg === null);
    if (!spread) {
      const supplied = new Set<string>();
      for (const attr of node.attrs) supplied.add(camelize(attr.name));
      for (const dir of node.directives) {
        if (dir.kind === 'bind' && dir.arg !== null) supplied.add(camelize(dir.arg));
        if (dir.kind === 'model') supplied.add(camelize(dir.arg ?? 'modelValue'));
      }
      for (const prop of target.props) {
        if (prop.required && !supplied.has(prop.name)) {
          this.errors.push(new MissingRequiredPropError(prop.name, node.tag, this.options.unitId, node.location));
        }
      }
    }

    for (const child of node.children) {
      if (child.type !== 'element') continue;
      const slotDir = child.directives.find((d) => d.kind === 'slot');
      if (!slotDir) continue;
      const slotName = slotDir.arg ?? DEFAULT_SLOT;
      if (!target.slots.includes(slotName)) {
        this.warnings.push(
          warning(
            'unknown-slot',
            this.options.unitId,
            `<${node.tag}> has no slot named "${slotName}"`,
            slotDir.location,
          ),
        );
      }
    }
  }

  // ---- Expressions ----------------------------------------------------------

  private expression(source: string, scope: Scope, location: SourceLocation): ParsedExpression | null {
    let parsed: ParsedExpression;
    try {
      parsed = parseExpression(source, { unitId: this.options.unitId, location });
    } catch (err) {
      if (err instanceof CompileError) {
        this.errors.push(err);
        return null;
      }
      throw err;
    }

    const reported = new Set<string>();
    for (const ref of parsed.references) {
      if (reported.has(ref.name) || scope.resolve(ref.name)) continue;
      reported.add(ref.name);
      this.errors.push(new UnresolvedSymbolError(ref.name, this.options.unitId, location));
    }
    return parsed;
  }

  private syntaxError(message: string, location: SourceLocation): TemplateSyntaxError {
    return new TemplateSyntaxError(message, this.options.unitId, { location });
  }
}

// ---------------------------------------------------------------------------
// Import cycles
// ---------------------------------------------------------------------------

/**
 * Find import cycles by depth-first traversal.  Each cycle is reported once,
 * whichever of its members the traversal entered it from; members are listed
 * in import order starting from the first one visited.
 */
export function detectCycles(graph: ReadonlyMap<string, Iterable<string>>): CircularDependencyError[] {
  const state = new Map<string, 'active' | 'done'>();
  const stack: string[] = [];
  const seen = new Set<string>();
  const cycles: CircularDependencyError[] = [];

  const visit = (id: string): void => {
    state.set(id, 'active');
    stack.push(id);

    for (const dep of graph.get(id) ?? []) {
      const depState = state.get(dep);
      if (depState === 'active') {
        const cycle = stack.slice(stack.indexOf(dep));
        const key = canonicalCycle(cycle);
        if (!seen.has(key)) {
          seen.add(key);
          cycles.push(new CircularDependencyError(cycle));
        }
      } else if (depState === undefined && graph.has(dep)) {
        visit(dep);
      }
    }

    stack.pop();
    state.set(id, 'done');
  };

  for (const id of [...graph.keys()].sort()) {
    if (!state.has(id)) visit(id);
  }

  return cycles;
}

/** Rotate a cycle so that its smallest member comes first. */
function canonicalCycle(cycle: string[]): string {
  let start = 0;
  for (let i = 1; i < cycle.length; i++) {
    if (cycle[i] < cycle[start]) start = i;
  }
  return [...cycle.slice(start), ...cycle.slice(0, start)].join('\u0000');
}
