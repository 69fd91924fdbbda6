import type { Mask } from '../core/mask.js';

/**
 * A single element of a layer collection: a mask, or a layer index.
 *
 * A bare number is always read as a layer index (0-31), never as raw bits.
 * Raw bits only enter through {@link Mask.fromBits}.
 */
export type MaskItem = Mask | number;

/**
 * Any operand shape accepted by mask algebra, equality and containment.
 *
 * - `Mask` is used as is
 * - `number` is a layer index, promoted to a single-layer mask
 * - `Iterable<Mask | number>` is promoted to the union of its elements
 *
 * @example
 * ```typescript
 * mask.union(Layer.Water);
 * mask.union([Layer.Water, Layer.UI]);
 * mask.union(Mask.of(Layer.Water));
 * ```
 */
export type MaskOperand = MaskItem | Iterable<MaskItem>;

/**
 * Candidate accepted by the query façades. Same shapes as {@link MaskOperand};
 * a collection counts as one mask-shaped candidate.
 */
export type MaskCandidate = MaskOperand;

/**
 * Source for a {@link LayerNameTable}: labels in layer order,
 * `[index, label]` pairs, or a record keyed by index.
 */
export type LayerLabelSource =
  | readonly string[]
  | Iterable<readonly [number, string]>
  | Readonly<Partial<Record<number, string>>>;
