/**
 * Configuration loading and validation
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import type { CitegraphConfig } from './types.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { ConfigError, ConfigNotFoundError, toError } from '../shared/errors.js';

const CONFIG_DIR = '.citegraph';
const CONFIG_FILE = 'config.json';

const ConfigFileSchema = z.object({
  provider: z
    .object({ kind: z.enum(['live', 'shards', 'shards-then-live']).optional() })
    .optional(),
  live: z
    .object({
      crossref_url: z.string().url().optional(),
      opencitations_url: z.string().url().optional(),
      timeout_ms: z.number().int().positive().optional(),
      mailto: z.string().nullable().optional(),
    })
    .optional(),
  shards: z
    .object({
      dir: z.string().min(1).optional(),
      journals: z.record(z.string()).optional(),
      doi_prefixes: z.record(z.string()).optional(),
    })
    .optional(),
  traversal: z
    .object({
      max_depth: z.number().int().min(0).optional(),
      concurrency: z.number().int().min(1).optional(),
    })
    .optional(),
  output: z
    .object({
      dir: z.string().min(1).optional(),
      layout: z.enum(['flat', 'tree']).optional(),
    })
    .optional(),
  log: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
      file: z.string().nullable().optional(),
    })
    .optional(),
});

export type PartialConfig = z.infer<typeof ConfigFileSchema>;

/**
 * Resolve the .citegraph directory path from a given working directory.
 */
export function resolveProjectDir(cwd: string): string {
  return path.join(cwd, CONFIG_DIR);
}

export function resolveConfigPath(cwd: string): string {
  return path.join(resolveProjectDir(cwd), CONFIG_FILE);
}

/**
 * Resolve the checkpoint database path.
 */
export function resolveDbPath(cwd: string): string {
  return path.join(resolveProjectDir(cwd), 'citegraph.db');
}

export function configExists(cwd: string): boolean {
  return fs.existsSync(resolveConfigPath(cwd));
}

/**
 * Load config from disk, merging with defaults.
 */
export function loadConfig(cwd: string): CitegraphConfig {
  const configPath = resolveConfigPath(cwd);

  if (!fs.existsSync(configPath)) {
    throw new ConfigNotFoundError(configPath);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(
      `Failed to load config from ${configPath}: ${toError(err).message}`,
      toError(err),
    );
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'invalid shape';
    throw new ConfigError(`Invalid config in ${configPath}: ${where}`);
  }
  return mergeWithDefaults(parsed.data);
}

export function saveConfig(cwd: string, config: CitegraphConfig): void {
  fs.mkdirSync(resolveProjectDir(cwd), { recursive: true });
  fs.writeFileSync(resolveConfigPath(cwd), JSON.stringify(config, null, 2) + '\n', 'utf-8');
}

/**
 * Merge a partial config with defaults.
 */
export function mergeWithDefaults(partial: PartialConfig): CitegraphConfig {
  return {
    provider: {
      kind: partial.provider?.kind ?? DEFAULT_CONFIG.provider.kind,
    },
    live: {
      crossref_url: partial.live?.crossref_url ?? DEFAULT_CONFIG.live.crossref_url,
      opencitations_url: partial.live?.opencitations_url ?? DEFAULT_CONFIG.live.opencitations_url,
      timeout_ms: partial.live?.timeout_ms ?? DEFAULT_CONFIG.live.timeout_ms,
      mailto: partial.live?.mailto ?? DEFAULT_CONFIG.live.mailto,
    },
    shards: {
      dir: partial.shards?.dir ?? DEFAULT_CONFIG.shards.dir,
      journals: { ...(partial.shards?.journals ?? DEFAULT_CONFIG.shards.journals) },
      doi_prefixes: { ...(partial.shards?.doi_prefixes ?? DEFAULT_CONFIG.shards.doi_prefixes) },
    },
    traversal: {
      max_depth: partial.traversal?.max_depth ?? DEFAULT_CONFIG.traversal.max_depth,
      concurrency: partial.traversal?.concurrency ?? DEFAULT_CONFIG.traversal.concurrency,
    },
    output: {
      dir: partial.output?.dir ?? DEFAULT_CONFIG.output.dir,
      layout: partial.output?.layout ?? DEFAULT_CONFIG.output.layout,
    },
    log: {
      level: partial.log?.level ?? DEFAULT_CONFIG.log.level,
      file: partial.log?.file ?? DEFAULT_CONFIG.log.file,
    },
  };
}
