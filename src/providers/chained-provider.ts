/**
 * Try providers in order; the first successful outcome wins.
 * When all of them fail, the last failure is reported.
 */

import type { Identifier } from '../shared/types.js';
import { InvalidInputError, ProviderUnavailableError } from '../shared/errors.js';
import type { BackwardOutcome, CitationProvider, ForwardOutcome } from './provider.js';

export class ChainedProvider implements CitationProvider {
  readonly name: string;

  constructor(private readonly providers: readonly CitationProvider[]) {
    if (providers.length === 0) {
      throw new InvalidInputError('ChainedProvider needs at least one provider');
    }
    this.name = providers.map((p) => p.name).join('-then-');
  }

  async fetchForward(id: Identifier, signal?: AbortSignal): Promise<ForwardOutcome> {
    let last: ForwardOutcome | null = null;
    for (const provider of this.providers) {
      if (signal?.aborted) break;
      last = await provider.fetchForward(id, signal);
      if (last.ok) return last;
    }
    return last ?? this.aborted(id);
  }

  async fetchBackward(id: Identifier, signal?: AbortSignal): Promise<BackwardOutcome> {
    let last: BackwardOutcome | null = null;
    for (const provider of this.providers) {
      if (signal?.aborted) break;
      last = await provider.fetchBackward(id, signal);
      if (last.ok) return last;
    }
    return last ?? this.aborted(id);
  }

  private aborted(id: Identifier): { ok: false; error: ProviderUnavailableError } {
    return { ok: false, error: new ProviderUnavailableError(id, 'aborted') };
  }
}
