/**
 * TraversalEngine - bidirectional, depth-bounded citation expansion
 *
 * Breadth-first, one level at a time. Each level is fetched by a bounded
 * worker pool; identifiers are claimed in the visited set the moment they
 * are discovered, so every identifier is fetched at most once and recorded
 * at its minimum hop distance from the root. Settled records are committed
 * in frontier order once the level finishes, which keeps the graph's
 * insertion order independent of network timing.
 */

import type {
  CitationGraph,
  FetchDirection,
  FetchFailure,
  Identifier,
  NodeRecord,
  TraversalProgress,
  TraversalResult,
} from '../../shared/types.js';
import {
  InvalidInputError,
  NotFoundError,
  ProviderUnavailableError,
  toError,
} from '../../shared/errors.js';
import { createLogger, type Logger } from '../../shared/logger.js';
import type {
  BackwardOutcome,
  CitationProvider,
  ForwardOutcome,
  ProviderFailure,
} from '../../providers/provider.js';
import { failed } from '../../providers/provider.js';
import { cloneRecord, createGraph, neighborsOf, uniqueIds } from '../graph/citation-graph.js';
import { VisitedSet } from './visited-set.js';
import { runPool } from './worker-pool.js';

export const DEFAULT_CONCURRENCY = 4;

export interface ExpandOptions {
  maxDepth: number;
  concurrency?: number;
  /**
   * Records of an earlier run of the same root. Reused without fetching,
   * except boundary leaves of that run which the new bound expands.
   */
  seed?: CitationGraph | null;
  signal?: AbortSignal;
  onProgress?: (progress: TraversalProgress) => void;
  /** Fires once per node as soon as its lookups settle */
  onRecord?: (record: NodeRecord, failures: FetchFailure[]) => void;
}

interface VisitOutcome {
  record: NodeRecord;
  failures: FetchFailure[];
  reused: boolean;
}

export class TraversalEngine {
  private readonly logger: Logger;

  constructor(
    private readonly provider: CitationProvider,
    logger?: Logger,
  ) {
    this.logger = logger ?? createLogger('TraversalEngine');
  }

  async expand(rootId: Identifier, options: ExpandOptions): Promise<TraversalResult> {
    const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    validateExpandInput(rootId, options.maxDepth, concurrency, options.seed ?? null);

    const startedAt = performance.now();
    const { maxDepth, signal } = options;
    const graph = createGraph(rootId, maxDepth);
    const visited = new VisitedSet();
    const failures: FetchFailure[] = [];
    let fetched = 0;
    let reused = 0;
    let failedNodes = 0;
    let boundary = 0;
    let settled = 0;
    let settledWithFailures = 0;
    let incomplete = false;

    this.logger.info(
      `Expanding ${rootId} to depth ${maxDepth} via ${this.provider.name} (concurrency ${concurrency})`,
    );

    visited.claim(rootId);
    let level: Identifier[] = [rootId];
    let depth = 0;

    while (level.length > 0) {
      if (signal?.aborted) {
        incomplete = true;
        break;
      }

      const levelDepth = depth;
      const levelSize = level.length;
      let levelSettled = 0;
      this.logger.debug(`Level ${levelDepth}: ${levelSize} node(s)`);

      const outcomes = await runPool(
        level,
        concurrency,
        async (id) => {
          const outcome = await this.visit(id, levelDepth, options);
          if (!outcome) return undefined;
          levelSettled++;
          settled++;
          if (outcome.failures.length > 0) settledWithFailures++;
          options.onRecord?.(outcome.record, outcome.failures);
          options.onProgress?.({
            visited: settled,
            failed: settledWithFailures,
            depth: levelDepth,
            pending: levelSize - levelSettled,
          });
          return outcome;
        },
        signal,
      );

      const next: Identifier[] = [];
      level.forEach((id, index) => {
        const outcome = outcomes[index];
        if (!outcome) {
          incomplete = true;
          return;
        }
        graph.nodes.set(id, outcome.record);
        failures.push(...outcome.failures);
        if (outcome.reused) reused++;
        else fetched++;
        if (outcome.failures.length > 0) failedNodes++;
        if (levelDepth === maxDepth) {
          boundary++;
          return;
        }
        for (const neighbor of neighborsOf(outcome.record)) {
          if (visited.claim(neighbor)) next.push(neighbor);
        }
      });

      if (incomplete) break;
      level = next;
      depth++;
    }

    const durationMs = Math.round(performance.now() - startedAt);
    this.logger.info(
      `${incomplete ? 'Aborted' : 'Finished'} ${rootId}: ${graph.nodes.size} node(s), ` +
        `${failures.length} failed lookup(s), ${durationMs}ms`,
    );

    return {
      graph,
      failures,
      stats: {
        visited: graph.nodes.size,
        fetched,
        reused,
        failedNodes,
        boundary,
        durationMs,
      },
      aborted: incomplete,
    };
  }

  /**
   * Settle one node. Returns undefined when the traversal was aborted while
   * its lookups were in flight; nothing of that node is kept.
   */
  private async visit(
    id: Identifier,
    depth: number,
    options: ExpandOptions,
  ): Promise<VisitOutcome | undefined> {
    const atBoundary = depth >= options.maxDepth;

    const seeded = reusableSeedRecord(options.seed, id, atBoundary);
    if (seeded) {
      const record = cloneRecord(seeded);
      record.depth = depth;
      if (atBoundary) {
        record.outgoingRefs = [];
        record.incomingCiters = [];
      }
      return { record, failures: [], reused: true };
    }

    const { signal } = options;
    const [forward, backward] = await Promise.all([
      this.fetchForward(id, signal),
      atBoundary ? Promise.resolve(null) : this.fetchBackward(id, signal),
    ]);
    if (signal?.aborted) return undefined;

    const record: NodeRecord = {
      id,
      metadata: null,
      outgoingRefs: [],
      incomingCiters: [],
      depth,
    };
    const failures: FetchFailure[] = [];

    if (forward.ok) {
      record.metadata = forward.metadata;
      if (!atBoundary) record.outgoingRefs = uniqueIds(forward.references);
    } else {
      failures.push(this.toFailure(id, 'forward', forward.error));
    }

    if (backward) {
      if (backward.ok) {
        record.incomingCiters = uniqueIds(backward.citers);
      } else {
        failures.push(this.toFailure(id, 'backward', backward.error));
      }
    }

    return { record, failures, reused: false };
  }

  private async fetchForward(id: Identifier, signal?: AbortSignal): Promise<ForwardOutcome> {
    try {
      return await this.provider.fetchForward(id, signal);
    } catch (err) {
      return failed(this.adapterThrew(id, 'forward', err));
    }
  }

  private async fetchBackward(id: Identifier, signal?: AbortSignal): Promise<BackwardOutcome> {
    try {
      return await this.provider.fetchBackward(id, signal);
    } catch (err) {
      return failed(this.adapterThrew(id, 'backward', err));
    }
  }

  private adapterThrew(
    id: Identifier,
    direction: FetchDirection,
    err: unknown,
  ): ProviderUnavailableError {
    const error = toError(err);
    this.logger.warn(`${this.provider.name} threw during ${direction} lookup of ${id}`, error);
    return new ProviderUnavailableError(id, error.message, null, error);
  }

  private toFailure(id: Identifier, direction: FetchDirection, error: ProviderFailure): FetchFailure {
    const reason = error instanceof NotFoundError ? 'not_found' : 'unavailable';
    this.logger.warn(`${direction} lookup of ${id} failed (${reason}): ${error.message}`);
    return { id, direction, reason, message: error.message };
  }
}

/**
 * A seed record stands in for a fetch unless it was a boundary leaf of the
 * seed run and now sits inside the bound: its lists were never looked up.
 */
function reusableSeedRecord(
  seed: CitationGraph | null | undefined,
  id: Identifier,
  atBoundary: boolean,
): NodeRecord | undefined {
  const record = seed?.nodes.get(id);
  if (!seed || !record) return undefined;
  if (atBoundary || record.depth < seed.maxDepth) return record;
  return undefined;
}

export function validateExpandInput(
  rootId: Identifier,
  maxDepth: number,
  concurrency: number,
  seed: CitationGraph | null,
): void {
  if (rootId.trim().length === 0) {
    throw new InvalidInputError('Root identifier must not be empty');
  }
  if (!Number.isInteger(maxDepth) || maxDepth < 0) {
    throw new InvalidInputError(`Depth must be a non-negative integer, got ${maxDepth}`);
  }
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new InvalidInputError(`Concurrency must be a positive integer, got ${concurrency}`);
  }
  if (seed && seed.root !== rootId) {
    throw new InvalidInputError(
      `Seed graph was built from root ${seed.root}, not ${rootId}`,
    );
  }
}
