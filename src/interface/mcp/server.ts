/**
 * MCP Server initialization and transport
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { registerAllTools } from './tools/index.js';
import { logToStderr, interceptConsole, initServeLogger } from './logger.js';
import { getVersion } from '../../shared/version.js';
import type { LogLevel } from '../../shared/logger.js';
import type { CitegraphEngine } from '../../core/engine.js';

export interface McpServerOptions {
  /** .citegraph directory receiving serve.log */
  projectDir: string;
  logLevel?: LogLevel;
}

export async function startMcpServer(
  engine: CitegraphEngine,
  options: McpServerOptions,
): Promise<McpServer> {
  interceptConsole();
  initServeLogger(options.projectDir, options.logLevel);

  const server = new McpServer({
    name: 'citegraph',
    version: getVersion(),
  });

  registerAllTools(server, engine);

  const transport = new StdioServerTransport();
  await server.connect(transport);

  logToStderr('MCP Server started (stdio transport)');
  return server;
}
