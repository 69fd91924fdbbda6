import type { MaskCandidate } from '../types/types.js';
import { Mask } from './mask.js';

/**
 * Fluent identity queries over one mask. Candidates are compared with
 * {@link Mask.equals}, so a layer candidate only matches a single-layer mask.
 *
 * ```typescript
 * Mask.of(Layer.UI).is().exactly(Layer.UI); // true
 * Mask.of(Layer.UI, Layer.Water).is().any(Layer.UI, Layer.Water); // false
 * ```
 */
export class MaskIsQuery {
  constructor(private readonly mask: Mask) {}

  /** The mask is exactly the union of all candidates. */
  exactly(...candidates: MaskCandidate[]): boolean {
    return this.mask.equals(Mask.of(...candidates));
  }

  /** The mask equals at least one candidate on its own. */
  any(...candidates: MaskCandidate[]): boolean {
    return candidates.some((candidate) => this.mask.equals(candidate));
  }

  not(...candidates: MaskCandidate[]): boolean {
    return !this.exactly(...candidates);
  }

  /** The mask equals none of the candidates on its own. */
  none(...candidates: MaskCandidate[]): boolean {
    return !this.any(...candidates);
  }
}
