/**
 * Global CLI options shared across all commands
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { InvalidArgumentError, type Command } from 'commander';

export interface GlobalOptions {
  json: boolean;
  noColor: boolean;
  verbose: boolean;
  quiet: boolean;
  /** Absolute project directory */
  cwd: string;
}

export function addGlobalOptions(program: Command): void {
  program
    .option('--json', 'Machine-readable output on stdout', false)
    .option('--no-color', 'Disable color output')
    .option('-v, --verbose', 'Verbose output (debug logging, stack traces)', false)
    .option('-q, --quiet', 'Minimal output (errors only)', false)
    .option('--cwd <path>', 'Project directory holding .citegraph/', parseProjectDirectory);
}

/** Resolves against the process directory; the target must be a directory. */
export function parseProjectDirectory(value: string): string {
  const resolved = path.resolve(value);
  let isDirectory: boolean;
  try {
    isDirectory = fs.statSync(resolved).isDirectory();
  } catch {
    throw new InvalidArgumentError(`No such directory: ${resolved}`);
  }
  if (!isDirectory) {
    throw new InvalidArgumentError(`Not a directory: ${resolved}`);
  }
  return resolved;
}

export function resolveGlobalOptions(cmd: Command): GlobalOptions {
  const opts = cmd.optsWithGlobals<{
    json?: boolean;
    color?: boolean;
    verbose?: boolean;
    quiet?: boolean;
    cwd?: string;
  }>();
  const verbose = opts.verbose ?? false;
  return {
    json: opts.json ?? false,
    noColor: opts.color === false || !!process.env['NO_COLOR'] || !process.stderr.isTTY,
    verbose,
    // --verbose wins over --quiet
    quiet: !verbose && (opts.quiet ?? false),
    cwd: opts.cwd ?? process.cwd(),
  };
}
