/**
 * @tessera/runtime — Component definitions
 *
 * Every compiled .tess unit default-exports a ComponentDefinition.  This
 * module validates props against it and invokes its render routine.
 */

import { flatten, type SlotFactory, type VNode } from './vnode.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A constructor used as a prop type: `String`, `Number`, `Array`, a class... */
export type PropType = abstract new (...args: never[]) => unknown;

export interface PropOptions {
  type?: PropType | PropType[];
  required: boolean;
  /** A function default is called for non-function props (object factories). */
  default?: unknown;
}

export interface RenderContext {
  [name: string]: unknown;
  $slots: Record<string, SlotFactory>;
}

/**
 * A ComponentDefinition is the object the compiler produces for each .tess
 * single-file component.
 */
export interface ComponentDefinition {
  name: string;
  /** The scope attribute the unit's elements carry, if it has scoped styles. */
  scopeId: string | null;
  props: Record<string, PropOptions>;
  /** Initial state values from the `<script>` section. */
  state: () => Record<string, unknown>;
  render: (ctx: RenderContext) => VNode[];
}

export class PropValidationError extends Error {
  override name = 'PropValidationError';

  constructor(
    message: string,
    readonly component: string,
    readonly prop: string,
  ) {
    super(`<${component}> ${message}`);
  }
}

// ---------------------------------------------------------------------------
// Props
// ---------------------------------------------------------------------------

/**
 * Apply defaults and check required props and declared types.
 *
 * @throws PropValidationError when a required prop is missing or a value
 *   does not match its declared type.
 */
export function resolveProps(
  definition: Pick<ComponentDefinition, 'name' | 'props'>,
  raw: Record<string, unknown>,
): Record<string, unknown> {
  const resolved: Record<string, unknown> = { ...raw };

  for (const [name, options] of Object.entries(definition.props)) {
    let value = raw[name];

    if (value === undefined) {
      if (options.required) {
        throw new PropValidationError(`Missing required prop "${name}"`, definition.name, name);
      }
      if (!('default' in options)) continue;
      value =
        typeof options.default === 'function' && !acceptsFunction(options.type)
          ? options.default()
          : options.default;
    }

    if (options.type !== undefined && value !== null && !matchesType(value, options.type)) {
      throw new PropValidationError(
        `Invalid prop "${name}": expected ${typeNames(options.type)}, got ${describe(value)}`,
        definition.name,
        name,
      );
    }

    resolved[name] = value;
  }

  return resolved;
}

function acceptsFunction(type: PropType | PropType[] | undefined): boolean {
  if (type === undefined) return false;
  return (Array.isArray(type) ? type : [type]).some((t) => t === Function);
}

function matchesType(value: unknown, type: PropType | PropType[]): boolean {
  const types = Array.isArray(type) ? type : [type];
  return types.some((t) => {
    if (t === String) return typeof value === 'string';
    if (t === Number) return typeof value === 'number';
    if (t === Boolean) return typeof value === 'boolean';
    if (t === Function) return typeof value === 'function';
    if (t === Array) return Array.isArray(value);
    if (t === Object) return typeof value === 'object' && value !== null && !Array.isArray(value);
    return value instanceof t;
  });
}

function typeNames(type: PropType | PropType[]): string {
  return (Array.isArray(type) ? type : [type]).map((t) => t.name).join(' | ');
}

function describe(value: unknown): string {
  if (Array.isArray(value)) return 'Array';
  return typeof value;
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

/**
 * Run a definition's render routine with resolved props, its initial state
 * and the given slot factories.
 */
export function renderComponent(
  definition: ComponentDefinition,
  props: Record<string, unknown> = {},
  slots: Record<string, SlotFactory> = {},
): VNode[] {
  const ctx: RenderContext = {
    ...definition.state(),
    ...resolveProps(definition, props),
    $slots: slots,
  };
  return definition.render(ctx);
}

/**
 * Replace every component node in a forest with the nodes it renders,
 * recursively.  Fragments and empty markers are kept.
 */
export function expand(nodes: VNode[]): VNode[] {
  return flatten(
    nodes.map((node): VNode | VNode[] => {
      switch (node.type) {
        case 'component':
          return expand(renderComponent(node.definition, node.props, node.slots));
        case 'element':
          return { ...node, children: expand(node.children) };
        case 'fragment':
          return { ...node, children: expand(node.children) };
        default:
          return node;
      }
    }),
  );
}
