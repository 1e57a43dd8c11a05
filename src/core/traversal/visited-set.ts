import type { Identifier } from '../../shared/types.js';

/**
 * Identifiers already claimed by the current traversal.
 *
 * claim() is a synchronous test-and-set: workers only interleave at await
 * points, so two workers can never both win the same identifier.
 */
export class VisitedSet {
  private readonly ids = new Set<Identifier>();

  claim(id: Identifier): boolean {
    if (this.ids.has(id)) return false;
    this.ids.add(id);
    return true;
  }

  has(id: Identifier): boolean {
    return this.ids.has(id);
  }

  get size(): number {
    return this.ids.size;
  }
}
