import { InvalidArgumentError } from 'commander';
import type { ProviderKind } from '../../../config/types.js';
import type { GraphLayout } from '../../../shared/types.js';

const PROVIDER_KINDS: readonly ProviderKind[] = ['live', 'shards', 'shards-then-live'];
const LAYOUTS: readonly GraphLayout[] = ['flat', 'tree'];

export function parseProviderKind(value: string): ProviderKind {
  const kind = PROVIDER_KINDS.find((candidate) => candidate === value);
  if (!kind) {
    throw new InvalidArgumentError(`Expected one of: ${PROVIDER_KINDS.join(', ')}.`);
  }
  return kind;
}

export function parseLayout(value: string): GraphLayout {
  const layout = LAYOUTS.find((candidate) => candidate === value);
  if (!layout) {
    throw new InvalidArgumentError(`Expected one of: ${LAYOUTS.join(', ')}.`);
  }
  return layout;
}
