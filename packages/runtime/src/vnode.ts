/**
 * @tessera/runtime — Virtual node types and constructors
 *
 * Render routines produce plain-object trees; a renderer downstream turns
 * them into DOM, a string, or anything else.
 */

import type { ComponentDefinition } from './component.js';

export type Key = string | number | symbol;

export type EventHandler = (event: unknown) => unknown;

export interface VElement {
  type: 'element';
  tag: string;
  attrs: Record<string, unknown>;
  on: Record<string, EventHandler>;
  children: VNode[];
  key: Key | null;
}

export interface VText {
  type: 'text';
  text: string;
}

/** Placeholder for a conditional whose condition is false. */
export interface VEmpty {
  type: 'empty';
}

/** Several nodes that share one loop key. */
export interface VFragment {
  type: 'fragment';
  children: VNode[];
  key: Key | null;
}

export type SlotFactory = () => VNode[];

export interface VComponent {
  type: 'component';
  definition: ComponentDefinition;
  props: Record<string, unknown>;
  on: Record<string, EventHandler>;
  slots: Record<string, SlotFactory>;
  key: Key | null;
}

export type VNode = VElement | VText | VEmpty | VFragment | VComponent;

/** What a render routine may nest inside a children list. */
export type VChild = VNode | VChild[];

// ---------------------------------------------------------------------------
// Constructors (used by compiled render routines)
// ---------------------------------------------------------------------------

export function element(
  tag: string,
  attrs: Record<string, unknown>,
  on: Record<string, EventHandler>,
  children: VChild[],
  key: Key | null = null,
): VElement {
  return { type: 'element', tag, attrs, on, children: flatten(children), key };
}

/**
 * A text node.  `null` and `undefined` render as the empty string; objects
 * and arrays as JSON.
 */
export function text(value: unknown): VText {
  return { type: 'text', text: toDisplayString(value) };
}

export function empty(): VEmpty {
  return { type: 'empty' };
}

export function fragment(children: VChild[], key: Key | null = null): VFragment {
  return { type: 'fragment', children: flatten(children), key };
}

/** Flatten nested children lists into one list, preserving order. */
export function flatten(children: VChild[]): VNode[] {
  const out: VNode[] = [];
  const walk = (list: VChild[]): void => {
    for (const child of list) {
      if (Array.isArray(child)) walk(child);
      else out.push(child);
    }
  };
  walk(children);
  return out;
}

export function toDisplayString(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}
