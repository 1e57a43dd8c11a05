/**
 * Engine surface used by the MCP tools
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { CitegraphEngine } from '../../../core/engine.js';
import type { NodeRecord, RunSummary } from '../../../shared/types.js';

export type ToolEngine = Pick<CitegraphEngine, 'expand' | 'writeGraph' | 'getNode' | 'listRuns'>;

export interface ToolExtra {
  signal?: AbortSignal;
}

export function textResult(body: unknown): CallToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(body, null, 2) }],
  };
}

// --- snake_case views ---

export function toNodeView(record: NodeRecord): Record<string, unknown> {
  return {
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
    outgoing_refs: record.outgoingRefs,
    incoming_citers: record.incomingCiters,
  };
}

export function toRunView(run: RunSummary): Record<string, unknown> {
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
