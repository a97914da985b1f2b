/**
 * @tessera/runtime — Control-flow helpers
 *
 * These functions are called by the code the compiler emits for loops
 * (`t-for`), slots, child components and event modifiers in .tess templates.
 */

import type { ComponentDefinition } from './component.js';
import {
  flatten,
  fragment,
  type EventHandler,
  type Key,
  type SlotFactory,
  type VChild,
  type VComponent,
  type VNode,
} from './vnode.js';

// ---------------------------------------------------------------------------
// renderList
// ---------------------------------------------------------------------------

/**
 * Render the body once per item, in iteration order.
 *
 * Accepts arrays and other iterables, a number `n` (items `1..n`) and plain
 * objects (values, with the property name as index).  `null` and `undefined`
 * render nothing.
 *
 * For a number source `T` cannot be inferred and items arrive as `unknown`.
 *
 * When `keyOf` is given, the key is attached to the node an iteration
 * produces; an iteration producing several nodes is wrapped in one keyed
 * fragment.
 */
export function renderList<T>(
  source: Iterable<T> | Record<string, T> | number | null | undefined,
  body: (item: T, index: number | string) => VChild[],
  keyOf?: (item: T, index: number | string) => Key,
): VNode[];
export function renderList(
  source: unknown,
  body: (item: unknown, index: number | string) => VChild[],
  keyOf?: (item: unknown, index: number | string) => Key,
): VNode[] {
  const out: VNode[] = [];

  const run = (item: unknown, index: number | string): void => {
    const nodes = flatten(body(item, index));
    if (!keyOf) {
      out.push(...nodes);
      return;
    }
    const key = keyOf(item, index);
    const [only] = nodes;
    if (nodes.length === 1 && (only.type === 'element' || only.type === 'fragment' || only.type === 'component')) {
      out.push({ ...only, key });
    } else {
      out.push(fragment(nodes, key));
    }
  };

  if (source === null || source === undefined) return out;

  if (typeof source === 'number') {
    // `n in 3` -> 1, 2, 3
    for (let i = 0; i < source; i++) run(i + 1, i);
  } else if (isIterable(source)) {
    let index = 0;
    for (const item of source) run(item, index++);
  } else if (typeof source === 'object') {
    for (const [name, item] of Object.entries(source)) run(item, name);
  }

  return out;
}

function isIterable(value: unknown): value is Iterable<unknown> {
  if (typeof value === 'string') return true;
  return typeof value === 'object' && value !== null && Symbol.iterator in value;
}

// ---------------------------------------------------------------------------
// renderSlot
// ---------------------------------------------------------------------------

/**
 * Render the content the parent passed for `name`, or the fallback when it
 * passed none.
 */
export function renderSlot(
  slots: Record<string, SlotFactory> | undefined,
  name: string,
  fallback?: SlotFactory,
): VNode[] {
  const factory = slots?.[name];
  if (factory) return factory();
  return fallback ? fallback() : [];
}

// ---------------------------------------------------------------------------
// component
// ---------------------------------------------------------------------------

/**
 * A child component usage.  The child is not rendered here: props are
 * validated when a renderer (or `expand`) invokes its render routine.
 */
export function component(
  definition: ComponentDefinition,
  props: Record<string, unknown>,
  on: Record<string, EventHandler>,
  slots: Record<string, SlotFactory>,
  key: Key | null = null,
): VComponent {
  return { type: 'component', definition, props, on, slots, key };
}

// ---------------------------------------------------------------------------
// withModifiers
// ---------------------------------------------------------------------------

/** The parts of an event object the modifiers look at. */
export interface ModifiableEvent {
  key?: string;
  target?: unknown;
  currentTarget?: unknown;
  preventDefault?(): void;
  stopPropagation?(): void;
}

const KEY_MODIFIERS: Record<string, string> = {
  enter: 'Enter',
  esc: 'Escape',
  escape: 'Escape',
  space: ' ',
  tab: 'Tab',
  up: 'ArrowUp',
  down: 'ArrowDown',
  left: 'ArrowLeft',
  right: 'ArrowRight',
  delete: 'Delete',
};

/**
 * Wrap an event handler with `.prevent`, `.stop`, `.self`, `.once` and key
 * modifiers (`.enter`, `.esc`, ...).  Unknown modifiers are ignored.
 */
export function withModifiers(handler: EventHandler, modifiers: string[]): EventHandler {
  let called = false;

  return (event: unknown) => {
    const e: ModifiableEvent = typeof event === 'object' && event !== null ? event : {};

    if (modifiers.includes('self') && e.target !== e.currentTarget) return undefined;
    for (const modifier of modifiers) {
      const expected = KEY_MODIFIERS[modifier];
      if (expected !== undefined && e.key !== expected) return undefined;
    }
    if (modifiers.includes('once')) {
      if (called) return undefined;
      called = true;
    }
    if (modifiers.includes('prevent')) e.preventDefault?.();
    if (modifiers.includes('stop')) e.stopPropagation?.();

    return handler(event);
  };
}
