/**
 * Render Cache
 *
 * Memoizes rendered artifacts per cue for the lifetime of a subtitle track.
 * Entries are append-only: never evicted, never replaced, so a cue is handed
 * to the renderer at most once and every later lookup returns the same
 * artifact reference. While an async render of a cue is in flight, a
 * synchronous lookup of the same cue is refused rather than rendered again.
 */

import type { Cue } from '../types/subtitle';
import type { AsyncRenderer, Renderer } from '../types/render';
import { serializeCueKey, estimateByteSize, formatBytes, type CueKey } from './cache-utils';
import { Mutex } from '../utils/async-utils';
import { ErrorCodes, RenderFailureError } from '../utils/error-handler';
import { createLogger } from '../utils/logger';

const logger = createLogger('RenderCache');

// ============================================================================
// Types
// ============================================================================

/**
 * Anything with pixel dimensions; used for size estimates
 */
export interface Sized {
  readonly width: number;
  readonly height: number;
}

export interface RenderCacheEntry<A> {
  /** Cue the artifact was rendered for */
  cue: Cue;

  /** Rendered artifact */
  artifact: A;

  /** Render timestamp */
  renderedAt: number;

  /** Render duration in milliseconds */
  renderMs: number;
}

export interface RenderCacheStats {
  /** Number of cached artifacts */
  count: number;

  /** Lookups answered from the cache */
  hits: number;

  /** Lookups that had to render */
  misses: number;

  /** Successful renders */
  renders: number;

  /** Renderer failures */
  failures: number;

  /** Hit rate percentage */
  hitRate: number;

  /** Estimated RGB frame size of all cached artifacts */
  estimatedBytes: number;
}

// ============================================================================
// Render Cache
// ============================================================================

export class RenderCache<A extends Sized> {
  private entries: Map<CueKey, RenderCacheEntry<A>> = new Map();
  private inFlight: Set<CueKey> = new Set();
  private readonly lock = new Mutex();
  private hits = 0;
  private misses = 0;
  private renders = 0;
  private failures = 0;

  /**
   * Return the cached artifact for `cue`, rendering it on first use.
   * A renderer failure is rethrown as RenderFailureError and nothing is stored.
   * Throws RENDER_IN_PROGRESS when an async render of the same cue is pending.
   */
  getOrRender(cue: Cue, renderer: Renderer<A>): A {
    const key = serializeCueKey(cue);
    const cached = this.entries.get(key);

    if (cached) {
      this.hits++;
      return cached.artifact;
    }

    if (this.inFlight.has(key)) {
      throw new RenderFailureError(`Cue ${cue.start}-${cue.end} is still rendering asynchronously`, {
        code: ErrorCodes.RENDER_IN_PROGRESS,
        context: { start: cue.start, end: cue.end },
      });
    }

    this.misses++;
    logger.debug('Rendering cue', { start: cue.start, end: cue.end });

    const startedAt = performance.now();
    let artifact: A;
    try {
      artifact = renderer(cue.content);
    } catch (error) {
      throw this.renderFailure(cue, error);
    }

    return this.store(key, cue, artifact, performance.now() - startedAt);
  }

  /**
   * Async variant of getOrRender. Check, render and store run inside one
   * critical section, so concurrent callers never render the same cue twice.
   */
  async getOrRenderAsync(cue: Cue, renderer: AsyncRenderer<A>): Promise<A> {
    const key = serializeCueKey(cue);

    return this.lock.run(async () => {
      const cached = this.entries.get(key);
      if (cached) {
        this.hits++;
        return cached.artifact;
      }

      this.misses++;
      logger.debug('Rendering cue (async)', { start: cue.start, end: cue.end, waiting: this.lock.waiting });

      const startedAt = performance.now();
      let artifact: A;
      this.inFlight.add(key);
      try {
        artifact = await renderer(cue.content);
      } catch (error) {
        throw this.renderFailure(cue, error);
      } finally {
        this.inFlight.delete(key);
      }

      return this.store(key, cue, artifact, performance.now() - startedAt);
    });
  }

  /**
   * Check whether a cue has been rendered
   */
  has(cue: Cue): boolean {
    return this.entries.has(serializeCueKey(cue));
  }

  /**
   * Get a cached artifact without rendering
   */
  get(cue: Cue): A | undefined {
    return this.entries.get(serializeCueKey(cue))?.artifact;
  }

  /**
   * Cached cues in render order
   */
  cues(): Cue[] {
    return Array.from(this.entries.values(), (entry) => entry.cue);
  }

  getStats(): RenderCacheStats {
    let estimatedBytes = 0;
    for (const { artifact } of this.entries.values()) {
      estimatedBytes += estimateByteSize(artifact.width, artifact.height, 3);
    }

    const totalRequests = this.hits + this.misses;

    return {
      count: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      renders: this.renders,
      failures: this.failures,
      hitRate: totalRequests > 0 ? (this.hits / totalRequests) * 100 : 0,
      estimatedBytes,
    };
  }

  get size(): number {
    return this.entries.size;
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private store(key: CueKey, cue: Cue, artifact: A, renderMs: number): A {
    this.entries.set(key, { cue, artifact, renderedAt: Date.now(), renderMs });
    this.renders++;

    logger.debug('Cached artifact', {
      width: artifact.width,
      height: artifact.height,
      renderMs: renderMs.toFixed(2),
      size: formatBytes(estimateByteSize(artifact.width, artifact.height, 3)),
    });

    return artifact;
  }

  private renderFailure(cue: Cue, error: unknown): RenderFailureError {
    this.failures++;

    const failure = error instanceof RenderFailureError
      ? error
      : new RenderFailureError(
          `Renderer failed for cue ${cue.start}-${cue.end}: ${error instanceof Error ? error.message : String(error)}`,
          {
            cause: error instanceof Error ? error : undefined,
            context: { start: cue.start, end: cue.end },
          }
        );

    logger.error('Render failed', failure);
    return failure;
  }
}
