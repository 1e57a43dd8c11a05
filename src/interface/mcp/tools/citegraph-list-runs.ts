/**
 * citegraph_list_runs - Recorded traversal runs, newest first
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { toMcpError } from '../errors.js';
import { textResult, toRunView, type ToolEngine } from './types.js';

export const listRunsInputShape = {
  limit: z.number().int().min(1).max(200).default(20).describe('Maximum number of runs'),
};

export type ListRunsToolInput = z.infer<z.ZodObject<typeof listRunsInputShape>>;

export function createListRunsHandler(
  engine: ToolEngine,
): (input: ListRunsToolInput) => Promise<CallToolResult> {
  return async (input) => {
    try {
      const runs = engine.listRuns(input.limit);
      return textResult({ runs: runs.map(toRunView), total: runs.length });
    } catch (error) {
      throw toMcpError(error);
    }
  };
}

export function registerListRunsTool(server: McpServer, engine: ToolEngine): void {
  server.tool(
    'citegraph_list_runs',
    'List checkpointed traversal runs, newest first, with node and failure counts.',
    listRunsInputShape,
    createListRunsHandler(engine),
  );
}
