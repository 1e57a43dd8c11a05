/**
 * Live provider: Crossref forward, OpenCitations backward
 */

import type { Identifier } from '../shared/types.js';
import type { CitegraphConfig } from '../config/types.js';
import type { BackwardOutcome, CitationProvider, ForwardOutcome } from './provider.js';
import { CrossrefClient } from './crossref-provider.js';
import { OpenCitationsClient } from './opencitations-provider.js';

export function buildUserAgent(version: string, mailto: string | null): string {
  return mailto ? `citegraph/${version} (mailto:${mailto})` : `citegraph/${version}`;
}

export class LiveProvider implements CitationProvider {
  readonly name = 'live';
  private readonly crossref: CrossrefClient;
  private readonly openCitations: OpenCitationsClient;

  constructor(live: CitegraphConfig['live'], version: string) {
    const userAgent = buildUserAgent(version, live.mailto);
    this.crossref = new CrossrefClient({
      baseUrl: live.crossref_url,
      timeoutMs: live.timeout_ms,
      userAgent,
    });
    this.openCitations = new OpenCitationsClient({
      baseUrl: live.opencitations_url,
      timeoutMs: live.timeout_ms,
      userAgent,
    });
  }

  fetchForward(id: Identifier, signal?: AbortSignal): Promise<ForwardOutcome> {
    return this.crossref.fetchWork(id, signal);
  }

  fetchBackward(id: Identifier, signal?: AbortSignal): Promise<BackwardOutcome> {
    return this.openCitations.fetchCiters(id, signal);
  }
}
