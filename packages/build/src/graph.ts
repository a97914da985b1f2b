/**
 * @tessera/build — Dependency graph
 *
 * Edges point from a unit to the units its `<script>` section imports.  Only
 * units taking part in the build are nodes; imports of anything else are
 * kept aside as `missing`.
 */

import { detectCycles, type CircularDependencyError } from '@tessera/compiler';
import { scanImports, type SourceUnit } from './discovery';

export class DependencyGraph {
  /** unit id -> ids of the units it imports */
  readonly dependencies = new Map<string, string[]>();
  /** unit id -> ids of the units that import it */
  readonly dependents = new Map<string, string[]>();
  /** unit id -> imported ids that are not part of the build */
  readonly missing = new Map<string, string[]>();

  constructor(edges: ReadonlyMap<string, readonly string[]>) {
    for (const id of edges.keys()) this.dependents.set(id, []);

    for (const [id, imports] of edges) {
      const present: string[] = [];
      const absent: string[] = [];
      for (const dep of imports) {
        if (edges.has(dep)) present.push(dep);
        else absent.push(dep);
      }
      this.dependencies.set(id, present);
      if (absent.length > 0) this.missing.set(id, absent);
      for (const dep of present) this.dependents.get(dep)?.push(id);
    }
  }

  /** Build the graph from a shallow import scan of every unit. */
  static fromUnits(units: readonly SourceUnit[]): DependencyGraph {
    return new DependencyGraph(new Map(units.map((unit) => [unit.id, scanImports(unit)])));
  }

  get ids(): string[] {
    return [...this.dependencies.keys()];
  }

  dependenciesOf(id: string): readonly string[] {
    return this.dependencies.get(id) ?? [];
  }

  /** Every unit that imports `ids`, directly or through other units. */
  transitiveDependents(ids: Iterable<string>): Set<string> {
    const out = new Set<string>();
    const queue = [...ids];
    while (queue.length > 0) {
      const id = queue.pop();
      if (id === undefined) break;
      for (const dependent of this.dependents.get(id) ?? []) {
        if (out.has(dependent)) continue;
        out.add(dependent);
        queue.push(dependent);
      }
    }
    return out;
  }

  /** One `CircularDependencyError` per import cycle. */
  cycles(): CircularDependencyError[] {
    return detectCycles(this.dependencies);
  }

  /**
   * Units that sit on an import cycle: members of a strongly connected
   * component with more than one unit, or units importing themselves.
   */
  cyclicUnits(): Set<string> {
    const index = new Map<string, number>();
    const lowLink = new Map<string, number>();
    const onStack = new Set<string>();
    const stack: string[] = [];
    const cyclic = new Set<string>();
    let counter = 0;

    const connect = (id: string): void => {
      index.set(id, counter);
      lowLink.set(id, counter);
      counter++;
      stack.push(id);
      onStack.add(id);

      for (const dep of this.dependenciesOf(id)) {
        if (!index.has(dep)) {
          connect(dep);
          lowLink.set(id, Math.min(lowLink.get(id) ?? 0, lowLink.get(dep) ?? 0));
        } else if (onStack.has(dep)) {
          lowLink.set(id, Math.min(lowLink.get(id) ?? 0, index.get(dep) ?? 0));
        }
      }

      if (lowLink.get(id) !== index.get(id)) return;
      const component: string[] = [];
      let member: string | undefined;
      do {
        member = stack.pop();
        if (member === undefined) break;
        onStack.delete(member);
        component.push(member);
      } while (member !== id);

      if (component.length > 1 || this.dependenciesOf(id).includes(id)) {
        for (const m of component) cyclic.add(m);
      }
    };

    for (const id of this.dependencies.keys()) {
      if (!index.has(id)) connect(id);
    }
    return cyclic;
  }
}
