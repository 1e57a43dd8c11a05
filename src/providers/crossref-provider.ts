/**
 * Crossref works API: metadata and outgoing references
 */

import { z } from 'zod';
import type { Identifier, PaperMetadata } from '../shared/types.js';
import { NotFoundError, ProviderUnavailableError } from '../shared/errors.js';
import { failed, type ForwardOutcome } from './provider.js';
import { encodeIdentifierPath, getJson, joinUrl } from './http.js';

const DateSchema = z.object({
  'date-parts': z.array(z.array(z.number().nullable())).optional(),
});

const WorkSchema = z.object({
  message: z.object({
    DOI: z.string().optional(),
    title: z.array(z.string()).optional(),
    author: z
      .array(
        z.object({
          given: z.string().optional(),
          family: z.string().optional(),
          name: z.string().optional(),
        }),
      )
      .optional(),
    'published-print': DateSchema.optional(),
    issued: DateSchema.optional(),
    'container-title': z.array(z.string()).optional(),
    reference: z.array(z.object({ DOI: z.string().optional() })).optional(),
  }),
});

type Work = z.infer<typeof WorkSchema>['message'];

export interface CrossrefOptions {
  baseUrl: string;
  timeoutMs: number;
  userAgent: string;
}

export class CrossrefClient {
  constructor(private readonly options: CrossrefOptions) {}

  async fetchWork(id: Identifier, signal?: AbortSignal): Promise<ForwardOutcome> {
    const url = joinUrl(this.options.baseUrl, 'works', encodeIdentifierPath(id));
    const response = await getJson(url, {
      timeoutMs: this.options.timeoutMs,
      signal,
      headers: { 'User-Agent': this.options.userAgent },
    });

    if (!response.ok) {
      if (response.status === 404) {
        return failed(new NotFoundError(id, 'Crossref'));
      }
      return failed(new ProviderUnavailableError(id, `Crossref: ${response.message}`, response.status));
    }

    const parsed = WorkSchema.safeParse(response.body);
    if (!parsed.success) {
      return failed(new ProviderUnavailableError(id, 'Crossref: malformed work record', response.status));
    }

    const work = parsed.data.message;
    return {
      ok: true,
      metadata: toMetadata(id, work),
      references: (work.reference ?? []).flatMap((ref) => (ref.DOI ? [ref.DOI] : [])),
    };
  }
}

export function toMetadata(id: Identifier, work: Work): PaperMetadata {
  return {
    title: work.title?.[0] ?? null,
    authors: (work.author ?? [])
      .map((a) => a.name ?? [a.given, a.family].filter(Boolean).join(' '))
      .filter((name) => name.length > 0),
    year: firstYear(work['published-print']) ?? firstYear(work.issued),
    venue: work['container-title']?.[0] ?? null,
    rawId: work.DOI ?? id,
  };
}

function firstYear(date: z.infer<typeof DateSchema> | undefined): number | null {
  return date?.['date-parts']?.[0]?.[0] ?? null;
}
