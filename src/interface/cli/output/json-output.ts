/**
 * JSON output mode for --json flag
 *
 * Keys on stdout are snake_case; the views below translate the camelCase
 * records of the core layer.
 */

import type { RunSummary, TraversalStats } from '../../../shared/types.js';

export interface JsonErrorBody {
  code?: string;
  message: string;
  cause?: string;
  hint?: string;
}

export function printJson(data: unknown): void {
  process.stdout.write(JSON.stringify(data, null, 2) + '\n');
}

export function printJsonError(error: JsonErrorBody): void {
  printJson({ error });
}

export function runToJson(run: RunSummary): Record<string, unknown> {
  return {
    id: run.id,
    root: run.root,
    max_depth: run.maxDepth,
    provider: run.provider,
    status: run.status,
    started_at: run.startedAt,
    finished_at: run.finishedAt,
    node_count: run.nodeCount,
    failure_count: run.failureCount,
  };
}

export function statsToJson(stats: TraversalStats): Record<string, number> {
  return {
    visited: stats.visited,
    fetched: stats.fetched,
    reused: stats.reused,
    failed_nodes: stats.failedNodes,
    boundary: stats.boundary,
    duration_ms: stats.durationMs,
  };
}
