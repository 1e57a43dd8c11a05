/**
 * Engine bootstrap for CLI commands
 */

import { InvalidArgumentError } from 'commander';
import { createCitegraphEngine, type CitegraphEngine } from '../../../core/engine.js';
import { configureLogger } from '../../../shared/logger.js';
import type { GlobalOptions } from './global-options.js';

/**
 * Open the project in globals.cwd. --verbose and --quiet override the
 * configured log level.
 */
export async function openEngine(globals: GlobalOptions): Promise<CitegraphEngine> {
  const engine = await createCitegraphEngine(globals.cwd);
  if (globals.verbose) {
    configureLogger({ level: 'debug' });
  } else if (globals.quiet) {
    configureLogger({ level: 'error' });
  }
  return engine;
}

// --- Option parsers ---

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}
