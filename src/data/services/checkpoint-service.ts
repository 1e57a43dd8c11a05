/**
 * Checkpoint store for traversal runs
 *
 * Every settled node is written together with its edges and failures in a
 * single transaction, so a run interrupted at any point holds only whole
 * records. A later run over the same root can load them back as its seed.
 */

import { z } from 'zod';
import type { StatementCache } from '../statement-cache.js';
import type { RunRepository } from '../repositories/run-repository.js';
import type { NodeRepository } from '../repositories/node-repository.js';
import type { FailureRepository } from '../repositories/failure-repository.js';
import type { EdgeRow, NodeRow, RunRow } from '../types.js';
import type {
  CitationGraph,
  FetchFailure,
  Identifier,
  NodeRecord,
  RunSummary,
} from '../../shared/types.js';
import {
  CorruptDataError,
  DatabaseError,
  RunNotFoundError,
  toError,
} from '../../shared/errors.js';

const AuthorsSchema = z.array(z.string());

export const DEFAULT_RUN_LIMIT = 20;

export interface StoredRunGraph {
  run: RunSummary;
  graph: CitationGraph;
  failures: FetchFailure[];
}

export interface CheckpointService {
  startRun(root: Identifier, maxDepth: number, provider: string): number;
  /** false when the node was already recorded for this run */
  recordNode(runId: number, record: NodeRecord, failures: FetchFailure[]): boolean;
  /** Close a run; `order` renumbers its nodes to the final discovery order. */
  finishRun(runId: number, status: 'completed' | 'aborted', order?: readonly Identifier[]): void;
  getRun(runId: number): RunSummary;
  listRuns(limit?: number): RunSummary[];
  latestRunFor(root: Identifier): RunSummary | null;
  loadRun(runId: number): StoredRunGraph;
  findNode(id: Identifier): { runId: number; record: NodeRecord } | null;
}

export interface CheckpointRepositories {
  runs: RunRepository;
  nodes: NodeRepository;
  failures: FailureRepository;
}

export function createCheckpointService(
  cache: StatementCache,
  repos: CheckpointRepositories,
): CheckpointService {
  const requireRun = (runId: number): RunRow => {
    const row = repos.runs.findById(runId);
    if (!row) throw new RunNotFoundError(runId);
    return row;
  };

  return {
    startRun(root: Identifier, maxDepth: number, provider: string): number {
      return repos.runs.create({ root, max_depth: maxDepth, provider });
    },

    recordNode(runId: number, record: NodeRecord, failures: FetchFailure[]): boolean {
      try {
        return cache.transaction(() => {
          const inserted = repos.nodes.insert(runId, {
            id: record.id,
            depth: record.depth,
            metadata: record.metadata
              ? {
                  title: record.metadata.title,
                  authors: record.metadata.authors,
                  year: record.metadata.year,
                  venue: record.metadata.venue,
                  raw_id: record.metadata.rawId,
                }
              : null,
            references: record.outgoingRefs,
            citers: record.incomingCiters,
          });
          if (inserted) {
            repos.failures.insertMany(
              runId,
              failures.map((f) => ({
                node_id: f.id,
                direction: f.direction,
                reason: f.reason,
                message: f.message,
              })),
            );
          }
          return inserted;
        });
      } catch (err) {
        throw new DatabaseError(`Failed to checkpoint ${record.id} in run #${runId}`, toError(err));
      }
    },

    finishRun(runId: number, status: 'completed' | 'aborted', order?: readonly Identifier[]): void {
      requireRun(runId);
      cache.transaction(() => {
        if (order) repos.nodes.reorder(runId, order);
        repos.runs.finish(runId, status);
      });
    },

    getRun(runId: number): RunSummary {
      return toRunSummary(requireRun(runId));
    },

    listRuns(limit: number = DEFAULT_RUN_LIMIT): RunSummary[] {
      return repos.runs.list(limit).map(toRunSummary);
    },

    latestRunFor(root: Identifier): RunSummary | null {
      const row = repos.runs.findLatestByRoot(root);
      return row ? toRunSummary(row) : null;
    },

    loadRun(runId: number): StoredRunGraph {
      const run = toRunSummary(requireRun(runId));
      const source = `run #${runId}`;
      const graph: CitationGraph = { root: run.root, maxDepth: run.maxDepth, nodes: new Map() };

      const edgesByNode = new Map<Identifier, EdgeRow[]>();
      for (const edge of repos.nodes.findEdgesByRun(runId)) {
        const list = edgesByNode.get(edge.node_id) ?? [];
        list.push(edge);
        edgesByNode.set(edge.node_id, list);
      }

      for (const row of repos.nodes.findByRun(runId)) {
        graph.nodes.set(row.id, toNodeRecord(row, edgesByNode.get(row.id) ?? [], source));
      }

      const failures = repos.failures.findByRun(runId).map(
        (row): FetchFailure => ({
          id: row.node_id,
          direction: row.direction,
          reason: row.reason,
          message: row.message,
        }),
      );
      return { run, graph, failures };
    },

    findNode(id: Identifier): { runId: number; record: NodeRecord } | null {
      const runId = repos.nodes.findLatestRunId(id);
      if (runId === undefined) return null;
      const row = repos.nodes.findOne(runId, id);
      if (!row) return null;
      return {
        runId,
        record: toNodeRecord(row, repos.nodes.findEdges(runId, id), `run #${runId}`),
      };
    },
  };
}

function toRunSummary(row: RunRow): RunSummary {
  return {
    id: row.id,
    root: row.root,
    maxDepth: row.max_depth,
    provider: row.provider,
    status: row.status,
    startedAt: row.started_at,
    finishedAt: row.finished_at,
    nodeCount: row.node_count,
    failureCount: row.failure_count,
  };
}

function toNodeRecord(row: NodeRow, edges: EdgeRow[], source: string): NodeRecord {
  // edges arrive sorted by direction then position
  const outgoingRefs = edges.filter((e) => e.direction === 'reference').map((e) => e.neighbor_id);
  const incomingCiters = edges.filter((e) => e.direction === 'citer').map((e) => e.neighbor_id);

  if (row.has_metadata === 0) {
    return { id: row.id, metadata: null, outgoingRefs, incomingCiters, depth: row.depth };
  }

  let authors: string[] = [];
  if (row.authors !== null) {
    let raw: unknown;
    try {
      raw = JSON.parse(row.authors);
    } catch (err) {
      throw new CorruptDataError(`authors of ${row.id} are not valid JSON`, source, toError(err));
    }
    const parsed = AuthorsSchema.safeParse(raw);
    if (!parsed.success) {
      throw new CorruptDataError(`authors of ${row.id} are not a list of names`, source);
    }
    authors = parsed.data;
  }

  return {
    id: row.id,
    metadata: {
      title: row.title,
      authors,
      year: row.year,
      venue: row.venue,
      rawId: row.raw_id ?? row.id,
    },
    outgoingRefs,
    incomingCiters,
    depth: row.depth,
  };
}
