/**
 * MCP client configuration snippet printed after `citegraph init`
 */

import { resolve } from 'node:path';
import pc from 'picocolors';
import { indent } from './output/formatter.js';
import type { GlobalOptions } from './utils/global-options.js';

export interface McpServerEntry {
  command: string;
  args: string[];
}

export function generateMcpSnippet(projectPath: string): {
  mcpServers: Record<string, McpServerEntry>;
} {
  return {
    mcpServers: {
      citegraph: {
        command: 'citegraph',
        args: ['serve', '--cwd', resolve(projectPath)],
      },
    },
  };
}

export function renderMcpConfigSnippet(projectPath: string, globals: GlobalOptions): void {
  if (globals.json || globals.quiet) return;

  const divider = '─'.repeat(60);
  const snippet = JSON.stringify(generateMcpSnippet(projectPath), null, 2);

  process.stderr.write(
    `\n  ${pc.dim(`── MCP Configuration ${divider.slice(21)}`)}\n\n` +
      `${indent(snippet, 4)}\n\n` +
      `  ${pc.dim(divider)}\n`,
  );
}
