/**
 * @tessera/build — Build orchestrator
 *
 * One `build()` call is a pass over a set of units:
 *
 *   1. load the cache and prune entries of units that no longer exist
 *   2. scan imports into a dependency graph and reject import cycles
 *   3. hash every unit and mark stale ones along with their dependents
 *   4. schedule the rest in dependency order, `concurrency` at a time
 *   5. commit cache entries of units that fully succeeded, then persist
 *
 * A unit starts once all of its dependencies finished in this pass, so it
 * is compiled against their final component interfaces.
 */

import {
  BuildError,
  UnresolvedSymbolError,
  hasErrors,
  type CompileResult,
  type ComponentInterface,
  type Diagnostic,
} from '@tessera/compiler';
import { artifactRef, type ArtifactStore } from './artifacts';
import type { ArtifactRefs, BuildCache, CacheEntry } from './cache';
import type { SourceUnit } from './discovery';
import { DependencyGraph } from './graph';
import { contentHash, stableHash } from './hash';
import { resolveBuildOptions, type BuildOptions, type ResolvedBuildOptions } from './options';
import { createLimiter } from './queue';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type UnitStatus = 'compiled' | 'cached' | 'failed' | 'cancelled';

export interface UnitReport {
  unitId: string;
  status: UnitStatus;
  /** sha256 of the unit source. */
  hash: string;
  /** Set for compiled and cached units. */
  artifacts: ArtifactRefs | null;
  interface: ComponentInterface | null;
  diagnostics: Diagnostic[];
}

export interface BuildReport {
  /** `true` when every unit was compiled or served from the cache. */
  ok: boolean;
  /** One report per unit, sorted by unit id. */
  units: UnitReport[];
  /** Every diagnostic of the pass, each listed once. */
  diagnostics: Diagnostic[];
  /** Ids of units whose cache entries were dropped because they are gone. */
  pruned: string[];
  /** Number of times the pipeline ran in this pass. */
  compileCount: number;
}

export interface BuildRunOptions {
  /** Aborting cancels every unit that has not finished yet. */
  signal?: AbortSignal;
}

export interface Builder {
  readonly cache: BuildCache;
  readonly artifacts: ArtifactStore;
  build(units: readonly SourceUnit[], options?: BuildRunOptions): Promise<BuildReport>;
  /**
   * Mark units as changed.  Their cache entries are dropped; in a pass that
   * is still running, they and every unit depending on them are cancelled.
   */
  invalidate(ids: Iterable<string>): void;
}

/** State of a pass that is still running. */
interface Pass {
  graph: DependencyGraph;
  hashes: Map<string, string>;
  cancelled: Set<string>;
}

// ---------------------------------------------------------------------------
// createBuilder
// ---------------------------------------------------------------------------

export function createBuilder(options: BuildOptions = {}): Builder {
  const resolved = resolveBuildOptions(options);
  const { cache, artifacts, logger } = resolved;
  const active = new Set<Pass>();

  const optionsHash = stableHash({
    strict: resolved.strict,
    runtimeModule: resolved.runtimeModule ?? null,
    componentExtension: resolved.componentExtension,
  });

  function cancelIn(pass: Pass, ids: Iterable<string>): void {
    const roots = [...ids].filter((id) => pass.hashes.has(id));
    for (const id of [...roots, ...pass.graph.transitiveDependents(roots)]) {
      if (!pass.cancelled.has(id)) logger.debug(`cancelling ${id}`);
      pass.cancelled.add(id);
    }
  }

  function invalidate(ids: Iterable<string>): void {
    const list = [...ids];
    for (const id of list) cache.delete(id);
    for (const pass of active) cancelIn(pass, list);
  }

  async function build(units: readonly SourceUnit[], run: BuildRunOptions = {}): Promise<BuildReport> {
    const started = Date.now();
    const byId = new Map<string, SourceUnit>();
    for (const unit of units) {
      if (byId.has(unit.id)) throw new Error(`Duplicate unit id "${unit.id}"`);
      byId.set(unit.id, unit);
    }

    const hashes = new Map(units.map((unit) => [unit.id, contentHash(unit.source)]));

    // Units that changed again while an earlier pass still works on them.
    for (const pass of active) {
      const changed = [...hashes].filter(([id, hash]) => pass.hashes.has(id) && pass.hashes.get(id) !== hash);
      cancelIn(pass, changed.map(([id]) => id));
    }

    const graph = DependencyGraph.fromUnits(units);
    const pass: Pass = { graph, hashes, cancelled: new Set() };
    active.add(pass);
    logger.info(`building ${units.length} unit${units.length === 1 ? '' : 's'}`);

    try {
      const report = await runPass(resolved, optionsHash, byId, pass, run.signal);
      logger.info(
        `built in ${Date.now() - started}ms: ` +
          `${count(report, 'compiled')} compiled, ${count(report, 'cached')} cached, ` +
          `${count(report, 'failed')} failed, ${count(report, 'cancelled')} cancelled`,
      );
      return report;
    } finally {
      active.delete(pass);
    }
  }

  return { cache, artifacts, build, invalidate };
}

function count(report: BuildReport, status: UnitStatus): number {
  return report.units.filter((unit) => unit.status === status).length;
}

// ---------------------------------------------------------------------------
// A single pass
// ---------------------------------------------------------------------------

async function runPass(
  options: ResolvedBuildOptions,
  optionsHash: string,
  units: ReadonlyMap<string, SourceUnit>,
  pass: Pass,
  signal: AbortSignal | undefined,
): Promise<BuildReport> {
  const { cache, artifacts, logger } = options;
  const { graph, hashes } = pass;
  const passDiagnostics: Diagnostic[] = [];

  // ---- 1. Cache -------------------------------------------------------------

  for (const warning of await cache.load()) {
    logger.warn(warning.message);
    passDiagnostics.push(warning);
  }

  const pruned = cache.prune(new Set(units.keys()));
  for (const entry of pruned) {
    logger.debug(`pruned ${entry.unitId}`);
    await removeArtifacts(artifacts, entry.artifacts);
  }

  // ---- 2. Cycles ------------------------------------------------------------

  const reports = new Map<string, UnitReport>();
  const cyclic = graph.cyclicUnits();
  const cycles = graph.cycles().map((error) => ({ error, diagnostic: error.toDiagnostic() }));
  for (const id of cyclic) {
    const previous = cache.get(id);
    if (previous) {
      cache.delete(id);
      await removeArtifacts(artifacts, previous.artifacts);
    }
    reports.set(id, {
      ...blank(id, hashes),
      status: 'failed',
      diagnostics: cycles.filter(({ error }) => error.cycle.includes(id)).map(({ diagnostic }) => diagnostic),
    });
  }

  // ---- 3. Freshness ---------------------------------------------------------

  const fresh = new Map<string, boolean>();
  const isFresh = (id: string): boolean => {
    const known = fresh.get(id);
    if (known !== undefined) return known;

    const entry = cache.get(id);
    const deps = graph.dependenciesOf(id);
    const result =
      entry !== undefined &&
      !cyclic.has(id) &&
      !graph.missing.has(id) &&
      entry.hash === hashes.get(id) &&
      entry.optionsHash === optionsHash &&
      sameList(entry.dependencies, deps) &&
      deps.every((dep) => entry.dependencyHashes[dep] === hashes.get(dep) && isFresh(dep));

    fresh.set(id, result);
    return result;
  };

  // Settled before anything compiles: a recompiled dependency is committed
  // with an unchanged hash, so its dependents could not tell afterwards.
  const stale = new Set<string>();
  for (const id of units.keys()) {
    if (cyclic.has(id)) continue;
    const entry = cache.get(id);
    if (!entry || !isFresh(id) || !(await artifactsExist(artifacts, entry.artifacts))) stale.add(id);
  }
  for (const id of graph.transitiveDependents(stale)) {
    if (!cyclic.has(id)) stale.add(id);
  }

  // ---- 4. Schedule ----------------------------------------------------------

  const interfaces = new Map<string, ComponentInterface>();
  const limit = createLimiter(options.concurrency);
  const tasks = new Map<string, Promise<void>>();
  let compileCount = 0;

  const isCancelled = (id: string): boolean => signal?.aborted === true || pass.cancelled.has(id);

  const cancelled = (id: string): UnitReport => {
    logger.debug(`cancelled ${id}`);
    return { ...blank(id, hashes), status: 'cancelled' };
  };

  const crashed = (id: string, err: unknown): UnitReport => {
    const message = err instanceof Error ? err.message : String(err);
    logger.error(`${id}: ${message}`);
    // The old entry may point at artifacts this attempt overwrote.
    cache.delete(id);
    return { ...blank(id, hashes), status: 'failed', diagnostics: [new BuildError(message, id).toDiagnostic()] };
  };

  const runUnit = async (id: string, unit: SourceUnit): Promise<UnitReport> => {
    if (isCancelled(id)) return cancelled(id);
    const hash = hashes.get(id) ?? contentHash(unit.source);

    const entry = cache.get(id);
    if (entry && !stale.has(id)) {
      logger.debug(`cache hit ${id}`);
      interfaces.set(id, entry.interface);
      return {
        unitId: id,
        status: 'cached',
        hash,
        artifacts: entry.artifacts,
        interface: entry.interface,
        diagnostics: entry.warnings,
      };
    }

    const deps = graph.dependenciesOf(id);
    const dependencies = new Map<string, ComponentInterface>();
    for (const dep of deps) {
      const iface = interfaces.get(dep);
      if (iface) dependencies.set(dep, iface);
    }

    compileCount++;
    let result: CompileResult;
    try {
      result = await options.compile(unit.source, {
        unitId: id,
        strict: options.strict,
        runtimeModule: options.runtimeModule,
        componentExtension: options.componentExtension,
        dependencies,
      });
    } catch (err) {
      return crashed(id, err);
    }
    if (isCancelled(id)) return cancelled(id);

    const missing = (graph.missing.get(id) ?? []).map((dep) => new UnresolvedSymbolError(dep, id).toDiagnostic());
    const diagnostics = [...missing, ...result.diagnostics];
    if (hasErrors(diagnostics) || result.code === null || result.interface === null) {
      logger.debug(`failed ${id}`);
      return { ...blank(id, hashes), status: 'failed', diagnostics };
    }

    const refs: ArtifactRefs = {
      module: artifactRef(id, 'module', options.componentExtension),
      stylesheet: result.css === null ? null : artifactRef(id, 'stylesheet'),
    };
    try {
      await artifacts.write(refs.module, result.code);
      if (result.css !== null && refs.stylesheet !== null) {
        await artifacts.write(refs.stylesheet, result.css);
      } else if (entry?.artifacts.stylesheet) {
        await artifacts.remove(entry.artifacts.stylesheet);
      }
    } catch (err) {
      return crashed(id, err);
    }
    // Last check before committing: nothing may be cached for a unit that
    // was cancelled while its artifacts were being written.
    if (isCancelled(id)) return cancelled(id);

    const dependencyHashes: Record<string, string> = {};
    for (const dep of deps) dependencyHashes[dep] = hashes.get(dep) ?? '';
    cache.set({
      unitId: id,
      hash,
      optionsHash,
      dependencies: [...deps],
      dependencyHashes,
      artifacts: refs,
      interface: result.interface,
      warnings: diagnostics,
    } satisfies CacheEntry);
    interfaces.set(id, result.interface);
    logger.debug(`compiled ${id}`);

    return { unitId: id, status: 'compiled', hash, artifacts: refs, interface: result.interface, diagnostics };
  };

  const schedule = (id: string): Promise<void> => {
    const existing = tasks.get(id);
    if (existing) return existing;

    const task = (async () => {
      const deps = graph.dependenciesOf(id).filter((dep) => !cyclic.has(dep));
      // Dependencies settle on their own; their failures are in their reports.
      await Promise.allSettled(deps.map(schedule));
      const unit = units.get(id);
      if (!unit) return;
      reports.set(id, await limit(() => runUnit(id, unit)));
    })();
    tasks.set(id, task);
    return task;
  };

  const ids = [...units.keys()].filter((id) => !cyclic.has(id)).sort();
  const settled = await Promise.allSettled(ids.map(schedule));
  const rejected = settled.find((outcome): outcome is PromiseRejectedResult => outcome.status === 'rejected');
  if (rejected) throw rejected.reason;

  // ---- 5. Persist -----------------------------------------------------------

  await cache.flush();

  const unitReports = [...reports.values()].sort((a, b) => (a.unitId < b.unitId ? -1 : a.unitId > b.unitId ? 1 : 0));
  const diagnostics = [...new Set([...passDiagnostics, ...unitReports.flatMap((r) => r.diagnostics)])];

  return {
    ok: unitReports.every((r) => r.status === 'compiled' || r.status === 'cached'),
    units: unitReports,
    diagnostics,
    pruned: pruned.map((entry) => entry.unitId),
    compileCount,
  };
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function blank(id: string, hashes: ReadonlyMap<string, string>): Omit<UnitReport, 'status'> {
  return { unitId: id, hash: hashes.get(id) ?? '', artifacts: null, interface: null, diagnostics: [] };
}

function sameList(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((value, i) => value === b[i]);
}

async function removeArtifacts(store: ArtifactStore, refs: ArtifactRefs): Promise<void> {
  await store.remove(refs.module);
  if (refs.stylesheet !== null) await store.remove(refs.stylesheet);
}

async function artifactsExist(store: ArtifactStore, refs: ArtifactRefs): Promise<boolean> {
  if (!(await store.has(refs.module))) return false;
  return refs.stylesheet === null || store.has(refs.stylesheet);
}
