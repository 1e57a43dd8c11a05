/**
 * citegraph_expand - Run a bounded bidirectional traversal
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { toMcpError } from '../errors.js';
import { logToStderr } from '../logger.js';
import { textResult, toNodeView, type ToolEngine, type ToolExtra } from './types.js';

export const expandInputShape = {
  root: z.string().min(1).describe('Identifier (DOI) of the root work'),
  depth: z
    .number()
    .int()
    .min(0)
    .max(5)
    .optional()
    .describe('Maximum hop distance from the root (default: configured depth)'),
  concurrency: z.number().int().min(1).max(32).optional().describe('Lookups in flight at once'),
  resume: z
    .boolean()
    .default(false)
    .describe('Reuse the latest checkpointed run of the same root instead of refetching'),
  include_nodes: z.boolean().default(false).describe('Return every node record in the response'),
  write_file: z
    .boolean()
    .default(false)
    .describe('Also write the graph to the configured output directory'),
};

export type ExpandToolInput = z.infer<z.ZodObject<typeof expandInputShape>>;

export function createExpandHandler(
  engine: ToolEngine,
): (input: ExpandToolInput, extra?: ToolExtra) => Promise<CallToolResult> {
  return async (input, extra) => {
    try {
      const result = await engine.expand({
        root: input.root,
        maxDepth: input.depth,
        concurrency: input.concurrency,
        resume: input.resume,
        signal: extra?.signal,
      });

      const output = input.write_file ? await engine.writeGraph(result.graph) : null;
      if (result.aborted) {
        logToStderr(`citegraph_expand for ${input.root} was cancelled`, 'warn');
      }

      return textResult({
        root: result.graph.root,
        max_depth: result.graph.maxDepth,
        run_id: result.runId,
        provider: result.provider,
        seed: result.seedSource,
        aborted: result.aborted,
        stats: {
          visited: result.stats.visited,
          fetched: result.stats.fetched,
          reused: result.stats.reused,
          failed_nodes: result.stats.failedNodes,
          boundary: result.stats.boundary,
          duration_ms: result.stats.durationMs,
        },
        failures: result.failures,
        output,
        ...(input.include_nodes ? { nodes: [...result.graph.nodes.values()].map(toNodeView) } : {}),
      });
    } catch (error) {
      throw toMcpError(error);
    }
  };
}

export function registerExpandTool(server: McpServer, engine: ToolEngine): void {
  server.tool(
    'citegraph_expand',
    [
      'Expand the citation graph around a work: follow references and citing works',
      'up to the given depth, deduplicating by identifier. Failed lookups are reported,',
      'not fatal. The run is checkpointed when the project is initialized.',
    ].join('\n'),
    expandInputShape,
    createExpandHandler(engine),
  );
}
