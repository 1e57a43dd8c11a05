/**
 * citegraph_get_node - One stored node record
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { toMcpError } from '../errors.js';
import { textResult, toNodeView, type ToolEngine } from './types.js';

export const getNodeInputShape = {
  id: z.string().min(1).describe('Identifier (DOI) of the work'),
};

export type GetNodeToolInput = z.infer<z.ZodObject<typeof getNodeInputShape>>;

export function createGetNodeHandler(
  engine: ToolEngine,
): (input: GetNodeToolInput) => Promise<CallToolResult> {
  return async (input) => {
    try {
      const { runId, record } = engine.getNode(input.id);
      return textResult({ run_id: runId, ...toNodeView(record) });
    } catch (error) {
      throw toMcpError(error);
    }
  };
}

export function registerGetNodeTool(server: McpServer, engine: ToolEngine): void {
  server.tool(
    'citegraph_get_node',
    'Look up a work in the checkpoint store: metadata, references and citing works, as recorded by the most recent run that reached it.',
    getNodeInputShape,
    createGetNodeHandler(engine),
  );
}
