/**
 * Build the configured provider
 */

import * as path from 'node:path';
import type { CitegraphConfig, ProviderKind } from '../config/types.js';
import type { CitationProvider } from './provider.js';
import { LiveProvider } from './live-provider.js';
import { ShardCatalog } from './shard-catalog.js';
import { ShardProvider } from './shard-provider.js';
import { ChainedProvider } from './chained-provider.js';

export function createShardProvider(config: CitegraphConfig, cwd: string): ShardProvider {
  const catalog = new ShardCatalog(path.resolve(cwd, config.shards.dir));
  return new ShardProvider(catalog, {
    journals: config.shards.journals,
    doiPrefixes: config.shards.doi_prefixes,
  });
}

export function createProvider(
  config: CitegraphConfig,
  cwd: string,
  version: string,
  kind: ProviderKind = config.provider.kind,
): CitationProvider {
  switch (kind) {
    case 'live':
      return new LiveProvider(config.live, version);
    case 'shards':
      return createShardProvider(config, cwd);
    case 'shards-then-live':
      return new ChainedProvider([
        createShardProvider(config, cwd),
        new LiveProvider(config.live, version),
      ]);
  }
}
