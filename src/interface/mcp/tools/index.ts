/**
 * Register all MCP tools
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ToolEngine } from './types.js';
import { registerExpandTool } from './citegraph-expand.js';
import { registerGetNodeTool } from './citegraph-get-node.js';
import { registerListRunsTool } from './citegraph-list-runs.js';

export function registerAllTools(server: McpServer, engine: ToolEngine): void {
  registerExpandTool(server, engine);
  registerGetNodeTool(server, engine);
  registerListRunsTool(server, engine);
}
