/**
 * @tessera/build — Builder options
 */

import { compile, type CompileOptions, type CompileResult } from '@tessera/compiler';
import { MemoryArtifactStore, type ArtifactStore } from './artifacts';
import { BuildCache } from './cache';
import { MemoryCacheStore, type CacheStore } from './cache-store';
import { silentLogger, type Logger } from './logger';

/** The per-unit pipeline.  Defaults to `compile` from @tessera/compiler. */
export type CompileFn = (source: string, options: CompileOptions) => CompileResult | Promise<CompileResult>;

export interface BuildOptions {
  /** Cache shared across passes.  @default a new BuildCache over `store` */
  cache?: BuildCache;
  /** Backing store of the default cache.  @default MemoryCacheStore */
  store?: CacheStore;
  /** Where render modules and stylesheets go.  @default MemoryArtifactStore */
  artifacts?: ArtifactStore;
  /** Units compiled at the same time.  @default 4 */
  concurrency?: number;
  /** Unknown `t-` directives are errors.  @default false */
  strict?: boolean;
  /** @default '@tessera/runtime' */
  runtimeModule?: string;
  /** Extension of emitted render modules.  @default '.js' */
  componentExtension?: string;
  /** @default silentLogger */
  logger?: Logger;
  compile?: CompileFn;
}

export interface ResolvedBuildOptions {
  cache: BuildCache;
  artifacts: ArtifactStore;
  concurrency: number;
  strict: boolean;
  runtimeModule: string | undefined;
  componentExtension: string;
  logger: Logger;
  compile: CompileFn;
}

export const DEFAULT_CONCURRENCY = 4;

/**
 * Fill in defaults.
 *
 * @throws RangeError when `concurrency` is not a positive integer.
 */
export function resolveBuildOptions(options: BuildOptions = {}): ResolvedBuildOptions {
  const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`Concurrency must be a positive integer, got ${concurrency}`);
  }

  return {
    cache: options.cache ?? new BuildCache(options.store ?? new MemoryCacheStore()),
    artifacts: options.artifacts ?? new MemoryArtifactStore(),
    concurrency,
    strict: options.strict ?? false,
    runtimeModule: options.runtimeModule,
    componentExtension: options.componentExtension ?? '.js',
    logger: options.logger ?? silentLogger,
    compile: options.compile ?? compile,
  };
}
