export { Mask } from './core/mask.js';
export { MaskContainsQuery } from './core/contains-query.js';
export { MaskIsQuery } from './core/is-query.js';

export {
  ALL_LAYERS,
  LAYER_COUNT,
  Layer,
  MAX_LAYER,
  MIN_LAYER,
  assertLayer,
  isLayer,
  layerName,
} from './core/layer.js';
export type { LayerKey } from './core/layer.js';

export { createMaskGroup } from './api/mask-group.js';
export { LayerNameTable, LayerNames } from './registry/layer-names.js';

export type { LayerLabelSource, MaskCandidate, MaskItem, MaskOperand } from './types/types.js';

// Errors
export {
  InvalidBitsError,
  InvalidLayerLabelEntryError,
  InvalidMaskOperandError,
  LayerOutOfRangeError,
  UnknownLayerLabelError,
} from './errors/errors.js';
