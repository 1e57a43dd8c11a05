/**
 * citegraph configuration types
 */

import type { GraphLayout } from '../shared/types.js';

export type ProviderKind = 'live' | 'shards' | 'shards-then-live';

export interface CitegraphConfig {
  provider: {
    kind: ProviderKind;
  };

  /** Crossref (references + metadata) and OpenCitations (citers) */
  live: {
    crossref_url: string;
    opencitations_url: string;
    timeout_ms: number;
    /** Contact address for the Crossref polite pool */
    mailto: string | null;
  };

  /** Offline journal/year shards */
  shards: {
    /** Relative to the project root */
    dir: string;
    /** ISSN -> journal name */
    journals: Record<string, string>;
    /** ISSN -> common DOI prefix */
    doi_prefixes: Record<string, string>;
  };

  traversal: {
    max_depth: number;
    concurrency: number;
  };

  output: {
    dir: string;
    layout: GraphLayout;
  };

  log: {
    level: 'debug' | 'info' | 'warn' | 'error';
    file: string | null;
  };
}
