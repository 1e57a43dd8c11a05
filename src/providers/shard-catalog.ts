/**
 * Local shard dataset: <venue>_<year>.json files
 *
 * Each shard maps a full DOI to { info, references } as harvested from
 * Crossref for one journal and one publication year. Shards are read-only;
 * parsed contents are cached for the life of the catalog.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import type { Identifier, ShardFile } from '../shared/types.js';
import { createLogger, type Logger } from '../shared/logger.js';
import { toError } from '../shared/errors.js';

const SHARD_FILE_PATTERN = /^(.+)_(\d{4})\.json$/;

const ShardRecordSchema = z.object({
  info: z
    .object({
      title: z.string().nullable().optional(),
      authors: z.string().nullable().optional(),
      year: z.union([z.number(), z.string()]).nullable().optional(),
      doi: z.string().nullable().optional(),
    })
    .optional(),
  references: z.array(z.string()).optional(),
});

const ShardSchema = z.record(ShardRecordSchema);

export type ShardRecord = z.infer<typeof ShardRecordSchema>;
export type ShardData = Map<Identifier, ShardRecord>;

export function parseShardFileName(filename: string): { venue: string; year: number } | null {
  const match = SHARD_FILE_PATTERN.exec(filename);
  if (!match || !match[1] || !match[2]) return null;
  return { venue: match[1], year: Number.parseInt(match[2], 10) };
}

export class ShardCatalog {
  private files: Promise<ShardFile[]> | null = null;
  private readonly contents = new Map<string, Promise<ShardData | null>>();
  private readonly logger: Logger;

  constructor(
    private readonly dir: string,
    logger?: Logger,
  ) {
    this.logger = logger ?? createLogger('ShardCatalog');
  }

  get directory(): string {
    return this.dir;
  }

  /** All shard files, ordered by venue then year. A failed scan is retried on the next call. */
  async list(): Promise<ShardFile[]> {
    if (this.files) return this.files;
    const pending = this.scan();
    this.files = pending;
    try {
      return await pending;
    } catch (err) {
      this.files = null;
      throw err;
    }
  }

  async listVenue(venue: string): Promise<ShardFile[]> {
    return (await this.list()).filter((f) => f.venue === venue);
  }

  /** Parsed shard contents, or null when the file cannot be used. */
  read(file: ShardFile): Promise<ShardData | null> {
    let pending = this.contents.get(file.filepath);
    if (!pending) {
      pending = this.load(file);
      this.contents.set(file.filepath, pending);
    }
    return pending;
  }

  /**
   * Longest common DOI prefix of every record, per venue.
   */
  async deriveDoiPrefixes(): Promise<Record<string, string>> {
    const byVenue = new Map<string, Identifier[]>();
    for (const file of await this.list()) {
      const data = await this.read(file);
      if (!data) continue;
      const ids = byVenue.get(file.venue) ?? [];
      ids.push(...data.keys());
      byVenue.set(file.venue, ids);
    }

    const prefixes: Record<string, string> = {};
    for (const [venue, ids] of byVenue) {
      const prefix = commonPrefix(ids);
      if (prefix) prefixes[venue] = prefix;
    }
    return prefixes;
  }

  private async scan(): Promise<ShardFile[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.dir);
    } catch (err) {
      const error = toError(err);
      if ('code' in error && error.code === 'ENOENT') {
        this.logger.warn(`Shard directory does not exist: ${this.dir}`);
        return [];
      }
      throw error;
    }

    const files: ShardFile[] = [];
    for (const name of entries) {
      const parsed = parseShardFileName(name);
      if (!parsed) continue;
      files.push({ ...parsed, filepath: path.join(this.dir, name) });
    }
    return files.sort((a, b) => a.venue.localeCompare(b.venue) || a.year - b.year);
  }

  private async load(file: ShardFile): Promise<ShardData | null> {
    let raw: unknown;
    try {
      raw = JSON.parse(await fs.readFile(file.filepath, 'utf-8'));
    } catch (err) {
      this.logger.warn(`Skipping unreadable shard ${file.filepath}`, toError(err));
      return null;
    }

    const parsed = ShardSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn(`Skipping malformed shard ${file.filepath}`);
      return null;
    }
    return new Map(Object.entries(parsed.data));
  }
}

export function commonPrefix(ids: readonly string[]): string {
  const first = ids[0];
  if (first === undefined) return '';
  let prefix = first;
  for (const id of ids) {
    while (!id.startsWith(prefix)) {
      prefix = prefix.slice(0, -1);
      if (!prefix) return '';
    }
  }
  return prefix;
}
