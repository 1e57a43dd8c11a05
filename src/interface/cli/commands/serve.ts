/**
 * citegraph serve - Expose the engine as an MCP server over stdio
 */

import { Command } from 'commander';
import { resolveGlobalOptions } from '../utils/global-options.js';
import { openEngine } from '../utils/open-engine.js';
import { handleCommandError } from '../output/error-display.js';
import { startMcpServer } from '../../mcp/server.js';
import { logToStderr } from '../../mcp/logger.js';
import { resolveProjectDir } from '../../../config/config.js';
import { toError } from '../../../shared/errors.js';

export function serveCommand(): Command {
  return new Command('serve')
    .description('Start the MCP server (stdio transport)')
    .action(async (_options: Record<string, never>, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);

      try {
        const engine = await openEngine(globals);
        const server = await startMcpServer(engine, {
          projectDir: resolveProjectDir(globals.cwd),
          logLevel: globals.verbose ? 'debug' : globals.quiet ? 'error' : 'info',
        });

        let shuttingDown = false;

        const gracefulShutdown = async (signal: string): Promise<void> => {
          if (shuttingDown) return;
          shuttingDown = true;

          logToStderr(`Received ${signal}. Shutting down...`);
          try {
            await server.close();
          } catch (error) {
            logToStderr(`Error while closing the transport: ${toError(error).message}`, 'warn');
          }
          engine.close();
          process.exit(0);
        };

        process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
        process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}
