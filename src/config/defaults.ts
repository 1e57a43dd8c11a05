import type { CitegraphConfig } from './types.js';

/** Journals covered by the bundled shard harvests, keyed by ISSN */
export const DEFAULT_JOURNALS: Readonly<Record<string, string>> = Object.freeze({
  '1936-0851': 'ACS Nano',
  '1936-086X': 'ACS Nano',
  '2574-0970': 'ACS Applied Nano Materials',
  '2399-3650': 'Communications Physics',
  '0036-8075': 'Science',
  '1095-9203': 'Science',
  '0028-0836': 'Nature',
  '1476-4687': 'Nature',
  '2041-1723': 'Nature Communications',
  '1745-2473': 'Nature Physics',
  '1745-2481': 'Nature Physics',
  '1476-4636': 'Nature Physics',
  '1748-3387': 'Nature Nanotechnology',
  '1748-3395': 'Nature Nanotechnology',
  '0034-6748': 'Review of Scientific Instruments',
  '1089-7623': 'Review of Scientific Instruments',
  '0031-9007': 'Physical Review Letters',
  '1079-7114': 'Physical Review Letters',
  '0003-6951': 'Applied Physics Letters',
  '1077-3118': 'Applied Physics Letters',
});

export const DEFAULT_CONFIG: CitegraphConfig = {
  provider: {
    kind: 'live',
  },
  live: {
    crossref_url: 'https://api.crossref.org',
    opencitations_url: 'https://opencitations.net/index/coci/api/v1',
    timeout_ms: 10_000,
    mailto: null,
  },
  shards: {
    dir: 'journal_data',
    journals: { ...DEFAULT_JOURNALS },
    doi_prefixes: {},
  },
  traversal: {
    max_depth: 2,
    concurrency: 4,
  },
  output: {
    dir: '.',
    layout: 'flat',
  },
  log: {
    level: 'warn',
    file: null,
  },
};
