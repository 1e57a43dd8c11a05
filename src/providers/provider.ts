/**
 * Metadata provider contract
 *
 * Adapters report every retrieval problem through the outcome value and
 * never throw past this boundary.
 */

import type { Identifier, PaperMetadata } from '../shared/types.js';
import type { NotFoundError, ProviderUnavailableError } from '../shared/errors.js';

export type ProviderFailure = ProviderUnavailableError | NotFoundError;

export type ForwardOutcome =
  | { ok: true; metadata: PaperMetadata; references: Identifier[] }
  | { ok: false; error: ProviderFailure };

export type BackwardOutcome =
  | { ok: true; citers: Identifier[] }
  | { ok: false; error: ProviderFailure };

export interface CitationProvider {
  readonly name: string;
  /** Metadata and outgoing references of a work */
  fetchForward(id: Identifier, signal?: AbortSignal): Promise<ForwardOutcome>;
  /** Works that cite this one */
  fetchBackward(id: Identifier, signal?: AbortSignal): Promise<BackwardOutcome>;
}

export function failed(error: ProviderFailure): { ok: false; error: ProviderFailure } {
  return { ok: false, error };
}
