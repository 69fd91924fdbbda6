import type { MaskCandidate } from '../types/types.js';
import { Mask } from './mask.js';

/**
 * Fluent containment queries over one mask.
 *
 * ```typescript
 * mask.contains().all(Layer.Default, Layer.Water);
 * mask.contains().any(playerMask, Layer.UI);
 * mask.contains().none(Layer.IgnoreRaycast);
 * mask.contains().only(Layer.Default, Layer.Water);
 * ```
 *
 * A layer candidate matches when its bit is set. A mask-shaped candidate (a
 * mask or a collection) matches in `all` when it is contained, and in `any`
 * only when it is contained and non-empty: the empty mask is contained by
 * everything, so it never counts as a hit.
 */
export class MaskContainsQuery {
  constructor(private readonly mask: Mask) {}

  /** Every candidate is contained. True for an empty candidate list. */
  all(...candidates: MaskCandidate[]): boolean {
    return candidates.every((candidate) => this.mask.contains(candidate));
  }

  /** At least one candidate is contained and has at least one layer. */
  any(...candidates: MaskCandidate[]): boolean {
    return candidates.some((candidate) =>
      typeof candidate === 'number'
        ? this.mask.contains(candidate)
        : this.mask.containsAndNotEmpty(candidate)
    );
  }

  /** Negation of {@link MaskContainsQuery.any}. */
  none(...candidates: MaskCandidate[]): boolean {
    return !this.any(...candidates);
  }

  /**
   * Every candidate is contained and together they account for every layer
   * of the mask.
   */
  only(...candidates: MaskCandidate[]): boolean {
    // Each candidate is read once; iterator candidates cannot be replayed.
    const masks = candidates.map((candidate) => Mask.from(candidate));
    return this.all(...masks) && Mask.fromMasks(masks).layerCount === this.mask.layerCount;
  }
}
