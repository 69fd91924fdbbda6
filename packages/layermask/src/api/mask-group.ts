import { Mask } from '../core/mask.js';
import type { MaskOperand } from '../types/types.js';

/**
 * Build several named masks at once.
 * Useful for declaring the layer sets a feature or module works with in one
 * place.
 *
 * @param definitions - Operand per name (layer, mask, or collection)
 * @returns Frozen object with the same keys and a Mask per key
 *
 * @example
 * ```typescript
 * const masks = createMaskGroup({
 *   Walkable: [Layer.Default, Layer.Water],
 *   Interface: Layer.UI,
 *   Pickable: Mask.of(Layer.Clickables, Layer.UI),
 * });
 * // masks.Walkable: Mask
 * // masks.Interface: Mask
 * ```
 */
export function createMaskGroup<K extends string>(
  definitions: Readonly<Record<K, MaskOperand>>
): Readonly<Record<K, Mask>> {
  const result = {} as Record<K, Mask>;

  (Object.keys(definitions) as K[]).forEach((key) => {
    result[key] = Mask.from(definitions[key]);
  });

  return Object.freeze(result);
}
