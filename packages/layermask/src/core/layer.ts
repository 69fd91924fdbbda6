import { LayerOutOfRangeError } from '../errors/errors.js';

/**
 * The 32 layers of the host's classification scheme.
 *
 * A layer is a label, not a quantity: `Layer.Water | Layer.UI` is meaningless
 * and yields an unrelated index. Combine layers through {@link Mask} instead:
 *
 * ```typescript
 * const visible = Mask.of(Layer.Default, Layer.Water, Layer.UI);
 * ```
 *
 * Unnamed slots keep their index as a name (`L3`, `L6`, ...) so that every
 * index in [0, 31] has exactly one member.
 */
export const Layer = Object.freeze({
  Default: 0,
  TransparentFX: 1,
  IgnoreRaycast: 2,
  L3: 3,
  Water: 4,
  UI: 5,
  L6: 6,
  L7: 7,
  Clickables: 8,
  L9: 9,
  L10: 10,
  L11: 11,
  L12: 12,
  L13: 13,
  L14: 14,
  L15: 15,
  L16: 16,
  L17: 17,
  L18: 18,
  L19: 19,
  L20: 20,
  L21: 21,
  L22: 22,
  L23: 23,
  L24: 24,
  L25: 25,
  L26: 26,
  L27: 27,
  L28: 28,
  L29: 29,
  L30: 30,
  L31: 31,
} as const);

/**
 * Layer index literal type inferred from {@link Layer}.
 *
 * Union type: 0 | 1 | ... | 31
 */
export type Layer = (typeof Layer)[keyof typeof Layer];

/** Member name of {@link Layer}, e.g. 'Water'. */
export type LayerKey = keyof typeof Layer;

export const LAYER_COUNT = 32;
export const MIN_LAYER = 0;
export const MAX_LAYER = LAYER_COUNT - 1;

/** Every layer index, ascending. */
export const ALL_LAYERS: readonly Layer[] = Object.freeze(
  Object.values(Layer).sort((a, b) => a - b)
);

// Reverse lookup, index -> member name. Built once from the enumeration.
const KEYS_BY_INDEX: readonly LayerKey[] = (() => {
  const keys = new Array<LayerKey>(LAYER_COUNT);
  for (const key of Object.keys(Layer) as LayerKey[]) keys[Layer[key]] = key;
  return Object.freeze(keys);
})();

/**
 * Runtime type guard for layer indices.
 *
 * @returns true if value is an integer in [0, 31]
 */
export function isLayer(value: unknown): value is Layer {
  return (
    typeof value === 'number' &&
    Number.isInteger(value) &&
    value >= MIN_LAYER &&
    value <= MAX_LAYER
  );
}

/**
 * Fail fast on anything that is not a valid layer index.
 *
 * Unlike the bit helpers, this never wraps or truncates: `32` is an error,
 * not layer 0.
 */
export function assertLayer(value: unknown): asserts value is Layer {
  if (!isLayer(value)) throw new LayerOutOfRangeError(value);
}

/**
 * Enumeration member name for a layer index.
 *
 * @example
 * ```typescript
 * layerName(4); // 'Water'
 * ```
 */
export function layerName(layer: number): LayerKey {
  assertLayer(layer);
  return KEYS_BY_INDEX[layer];
}
