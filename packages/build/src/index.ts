/**
 * @tessera/build — Public API
 *
 * Incremental, parallel builds of .tess units: discovery, dependency graph,
 * content-hash cache and diagnostics reporting.
 */

export { createBuilder } from './builder';
export type { Builder, BuildReport, BuildRunOptions, UnitReport, UnitStatus } from './builder';

export { resolveBuildOptions, DEFAULT_CONCURRENCY } from './options';
export type { BuildOptions, CompileFn, ResolvedBuildOptions } from './options';

export { BuildCache } from './cache';
export type { ArtifactRefs, CacheEntry } from './cache';

export { MemoryCacheStore, FileCacheStore, CACHE_FILE, CACHE_VERSION } from './cache-store';
export type { CacheLoadResult, CacheStore } from './cache-store';

export { MemoryArtifactStore, FileArtifactStore, artifactRef } from './artifacts';
export type { ArtifactKind, ArtifactStore } from './artifacts';

export { discoverUnits, scanImports } from './discovery';
export type { SourceUnit } from './discovery';

export { DependencyGraph } from './graph';
export { contentHash, stableHash, stableSerialize } from './hash';
export { createLimiter } from './queue';
export type { Limiter } from './queue';

export { createConsoleLogger, silentLogger } from './logger';
export type { ConsoleLoggerOptions, Logger, LogLevel } from './logger';

export { formatDiagnostic, formatReport } from './reporter';
export type { ReportFormatOptions } from './reporter';
