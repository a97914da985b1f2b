/**
 * @tessera/runtime — Public API
 *
 * Re-exports everything that compiled .tess render modules and the code that
 * renders them need from the runtime.
 */

// ---------------------------------------------------------------------------
// Virtual nodes (used by compiled render routines)
// ---------------------------------------------------------------------------
export { element, text, empty, fragment, flatten, toDisplayString } from './vnode.js';

export type {
  EventHandler,
  Key,
  SlotFactory,
  VChild,
  VComponent,
  VElement,
  VEmpty,
  VFragment,
  VNode,
  VText,
} from './vnode.js';

// ---------------------------------------------------------------------------
// Control flow (used by compiled loops, slots and component usages)
// ---------------------------------------------------------------------------
export { renderList, renderSlot, component, withModifiers } from './directives.js';

export type { ModifiableEvent } from './directives.js';

// ---------------------------------------------------------------------------
// Component definitions
// ---------------------------------------------------------------------------
export { resolveProps, renderComponent, expand, PropValidationError } from './component.js';

export type { ComponentDefinition, PropOptions, PropType, RenderContext } from './component.js';
