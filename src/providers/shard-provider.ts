/**
 * Offline provider backed by the shard catalog
 *
 * Shards only store outgoing references, so citers come from an inverted
 * index over every shard, built on first use.
 */

import type { Identifier, PaperMetadata, ShardFile } from '../shared/types.js';
import { NotFoundError, ProviderUnavailableError, toError } from '../shared/errors.js';
import { failed, type BackwardOutcome, type CitationProvider, type ForwardOutcome } from './provider.js';
import type { ShardCatalog, ShardRecord } from './shard-catalog.js';

export interface ShardLookupTables {
  /** ISSN -> journal name */
  journals: Readonly<Record<string, string>>;
  /** ISSN -> common DOI prefix */
  doiPrefixes: Readonly<Record<string, string>>;
}

type Located =
  | { kind: 'found'; shard: ShardFile; record: ShardRecord }
  | { kind: 'missing' }
  | { kind: 'unreadable' };

interface CiterIndex {
  citers: Map<Identifier, Identifier[]>;
  known: Set<Identifier>;
  unreadable: boolean;
}

const UNKNOWN = 'unknown';

export class ShardProvider implements CitationProvider {
  readonly name = 'shards';
  private citerIndex: Promise<CiterIndex> | null = null;
  private readonly tables: ShardLookupTables;

  constructor(
    private readonly catalog: ShardCatalog,
    tables: ShardLookupTables,
  ) {
    this.tables = {
      journals: Object.freeze({ ...tables.journals }),
      doiPrefixes: Object.freeze({ ...tables.doiPrefixes }),
    };
  }

  async fetchForward(id: Identifier): Promise<ForwardOutcome> {
    let located: Located;
    try {
      located = await this.locate(id);
    } catch (err) {
      return failed(this.directoryUnreadable(id, err));
    }
    switch (located.kind) {
      case 'found':
        return {
          ok: true,
          metadata: this.toMetadata(id, located.shard, located.record),
          references: located.record.references ?? [],
        };
      case 'unreadable':
        return failed(new ProviderUnavailableError(id, 'a candidate shard could not be read'));
      case 'missing':
        return failed(new NotFoundError(id, `shards in ${this.catalog.directory}`));
    }
  }

  async fetchBackward(id: Identifier): Promise<BackwardOutcome> {
    let index: CiterIndex;
    try {
      index = await this.buildCiterIndex();
    } catch (err) {
      this.citerIndex = null;
      return failed(this.directoryUnreadable(id, err));
    }
    const citers = index.citers.get(id);
    if (citers || index.known.has(id)) {
      return { ok: true, citers: citers ? [...citers] : [] };
    }
    if (index.unreadable) {
      return failed(new ProviderUnavailableError(id, 'some shards could not be read'));
    }
    return failed(new NotFoundError(id, `shards in ${this.catalog.directory}`));
  }

  /**
   * Shards that may hold the identifier: venues whose DOI prefix starts it,
   * or whose name is its registrant prefix. Without any prefix table every
   * shard is a candidate.
   */
  candidateShards(shards: readonly ShardFile[], id: Identifier): ShardFile[] {
    const registrant = id.split('/')[0] ?? id;
    const matching = shards.filter((shard) => {
      if (shard.venue === registrant) return true;
      const prefix = this.tables.doiPrefixes[shard.venue];
      return prefix !== undefined && prefix.length > 0 && id.startsWith(prefix);
    });
    if (matching.length === 0 && Object.keys(this.tables.doiPrefixes).length === 0) {
      return [...shards];
    }
    return matching;
  }

  private async locate(id: Identifier): Promise<Located> {
    const candidates = this.candidateShards(await this.catalog.list(), id);
    let unreadable = false;
    for (const shard of candidates) {
      const data = await this.catalog.read(shard);
      if (!data) {
        unreadable = true;
        continue;
      }
      const record = data.get(id);
      if (record) return { kind: 'found', shard, record };
    }
    return unreadable ? { kind: 'unreadable' } : { kind: 'missing' };
  }

  private buildCiterIndex(): Promise<CiterIndex> {
    if (!this.citerIndex) {
      this.citerIndex = (async () => {
        const index: CiterIndex = { citers: new Map(), known: new Set(), unreadable: false };
        for (const shard of await this.catalog.list()) {
          const data = await this.catalog.read(shard);
          if (!data) {
            index.unreadable = true;
            continue;
          }
          for (const [citing, record] of data) {
            index.known.add(citing);
            for (const cited of record.references ?? []) {
              const list = index.citers.get(cited) ?? [];
              if (!list.includes(citing)) list.push(citing);
              index.citers.set(cited, list);
            }
          }
        }
        return index;
      })();
    }
    return this.citerIndex;
  }

  private directoryUnreadable(id: Identifier, err: unknown): ProviderUnavailableError {
    const error = toError(err);
    return new ProviderUnavailableError(
      id,
      `shard directory ${this.catalog.directory} could not be read: ${error.message}`,
      null,
      error,
    );
  }

  private toMetadata(id: Identifier, shard: ShardFile, record: ShardRecord): PaperMetadata {
    const info: NonNullable<ShardRecord['info']> = record.info ?? {};
    return {
      title: known(info.title),
      authors: splitAuthors(known(info.authors)),
      year: parseYear(info.year) ?? shard.year,
      venue: this.tables.journals[shard.venue] ?? null,
      rawId: known(info.doi) ?? id,
    };
  }
}

function known(value: string | null | undefined): string | null {
  if (value === undefined || value === null) return null;
  const trimmed = value.trim();
  return trimmed.length === 0 || trimmed === UNKNOWN ? null : trimmed;
}

function splitAuthors(value: string | null): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((a) => a.trim())
    .filter((a) => a.length > 0);
}

function parseYear(value: number | string | null | undefined): number | null {
  if (typeof value === 'number') return Number.isInteger(value) ? value : null;
  if (typeof value === 'string' && /^\d{4}$/.test(value.trim())) {
    return Number.parseInt(value.trim(), 10);
  }
  return null;
}
