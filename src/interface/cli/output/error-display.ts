/**
 * 3-layer error display: Error / Cause / Hint
 */

import pc from 'picocolors';
import { formatError, formatHint } from './formatter.js';
import { printJsonError } from './json-output.js';
import type { GlobalOptions } from '../utils/global-options.js';
import { CitegraphError } from '../../../shared/errors.js';

export interface ErrorDisplay {
  code?: string;
  message: string;
  cause?: string;
  hint?: string;
  stack?: string;
}

export function toErrorDisplay(error: unknown): ErrorDisplay {
  if (error instanceof CitegraphError) {
    return {
      code: error.code,
      message: error.message,
      cause: error.cause?.message,
      hint: getHintForCode(error.code),
      stack: error.stack,
    };
  }
  if (error instanceof Error) {
    return {
      message: error.message,
      cause: error.cause instanceof Error ? error.cause.message : undefined,
      stack: error.stack,
    };
  }
  return { message: String(error) };
}

export function getHintForCode(code: string): string | undefined {
  switch (code) {
    case 'CONFIG_ERROR':
      return 'Check your .citegraph/config.json file.';
    case 'DATABASE_ERROR':
      return 'Delete .citegraph/citegraph.db to start a fresh checkpoint store.';
    case 'CHECKPOINT_UNAVAILABLE':
      return "Run 'citegraph init' to create the checkpoint store.";
    case 'CORRUPT_DATA':
      return "Regenerate the file with 'citegraph expand'.";
    case 'RUN_NOT_FOUND':
      return "Run 'citegraph runs' to list recorded runs.";
    case 'NODE_NOT_FOUND':
      return 'Expand a graph that reaches this identifier first.';
    case 'PROVIDER_UNAVAILABLE':
      return 'Check the network connection, or use --provider shards.';
    case 'INVALID_INPUT':
      return 'Run the command with --help for usage.';
    default:
      return undefined;
  }
}

export function renderError(error: ErrorDisplay, globals: GlobalOptions): void {
  if (globals.json) {
    printJsonError({
      code: error.code,
      message: error.message,
      cause: error.cause,
      hint: error.hint,
    });
    return;
  }

  const lines: string[] = [];
  lines.push(formatError(error.message));

  if (error.cause) {
    lines.push(`  Cause: ${error.cause}`);
  }

  if (error.hint) {
    lines.push(`  ${formatHint(error.hint)}`);
  }

  if (globals.verbose && error.stack) {
    lines.push('');
    lines.push(pc.dim(error.stack));
  }

  process.stderr.write(lines.join('\n') + '\n');
}

export function exitWithError(error: ErrorDisplay, globals: GlobalOptions): never {
  renderError(error, globals);
  process.exit(1);
}

export function handleCommandError(error: unknown, globals: GlobalOptions): never {
  exitWithError(toErrorDisplay(error), globals);
}
