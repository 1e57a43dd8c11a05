/**
 * OpenCitations COCI: incoming citations
 */

import { z } from 'zod';
import type { Identifier } from '../shared/types.js';
import { NotFoundError, ProviderUnavailableError } from '../shared/errors.js';
import { failed, type BackwardOutcome } from './provider.js';
import { encodeIdentifierPath, getJson, joinUrl } from './http.js';

const CitationsSchema = z.array(z.object({ citing: z.string().optional() }));

export interface OpenCitationsOptions {
  baseUrl: string;
  timeoutMs: number;
  userAgent: string;
}

export class OpenCitationsClient {
  constructor(private readonly options: OpenCitationsOptions) {}

  async fetchCiters(id: Identifier, signal?: AbortSignal): Promise<BackwardOutcome> {
    const url = joinUrl(this.options.baseUrl, 'citations', encodeIdentifierPath(id));
    const response = await getJson(url, {
      timeoutMs: this.options.timeoutMs,
      signal,
      headers: { 'User-Agent': this.options.userAgent },
    });

    if (!response.ok) {
      if (response.status === 404) {
        return failed(new NotFoundError(id, 'OpenCitations'));
      }
      return failed(
        new ProviderUnavailableError(id, `OpenCitations: ${response.message}`, response.status),
      );
    }

    const parsed = CitationsSchema.safeParse(response.body);
    if (!parsed.success) {
      return failed(
        new ProviderUnavailableError(id, 'OpenCitations: malformed citation list', response.status),
      );
    }

    return {
      ok: true,
      citers: parsed.data.flatMap((c) => (c.citing ? [c.citing] : [])),
    };
  }
}
