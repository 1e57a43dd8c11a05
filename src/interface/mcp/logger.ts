/**
 * MCP serve logging - stderr + .citegraph/serve.log
 * stdout is reserved for MCP protocol (JSON-RPC)
 */

import { join } from 'node:path';
import { configureLogger, createLogger, type LogLevel } from '../../shared/logger.js';

const log = createLogger('MCP');

export function initServeLogger(projectDir: string, level: LogLevel = 'info'): void {
  configureLogger({ level, file: join(projectDir, 'serve.log') });
}

export function logToStderr(message: string, level: LogLevel = 'info'): void {
  log[level](message);
}

/**
 * Intercept console.log/info to prevent accidental stdout writes
 * during MCP serve mode
 */
export function interceptConsole(): void {
  console.log = (...args: unknown[]) => {
    logToStderr(args.map(String).join(' '), 'info');
  };
  console.info = (...args: unknown[]) => {
    logToStderr(args.map(String).join(' '), 'info');
  };
}
