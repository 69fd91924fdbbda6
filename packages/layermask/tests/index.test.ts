import { describe, expect, it } from 'vitest';

import {
  ALL_LAYERS,
  InvalidBitsError,
  InvalidLayerLabelEntryError,
  InvalidMaskOperandError,
  Layer,
  LayerNameTable,
  LayerNames,
  LayerOutOfRangeError,
  Mask,
  MaskContainsQuery,
  MaskIsQuery,
  UnknownLayerLabelError,
  createMaskGroup,
  isLayer,
} from '../src/index.js';
import { createMaskGroup as createMaskGroupImpl } from '../src/api/mask-group.js';
import { MaskContainsQuery as ContainsImpl } from '../src/core/contains-query.js';
import { MaskIsQuery as IsImpl } from '../src/core/is-query.js';
import { ALL_LAYERS as AllLayersImpl, Layer as LayerImpl } from '../src/core/layer.js';
import { Mask as MaskImpl } from '../src/core/mask.js';
import * as errors from '../src/errors/errors.js';
import { LayerNameTable as TableImpl, LayerNames as NamesImpl } from '../src/registry/layer-names.js';

describe('package public index', () => {
  it('re-exports core api surface', () => {
    expect(Mask).toBe(MaskImpl);
    expect(MaskContainsQuery).toBe(ContainsImpl);
    expect(MaskIsQuery).toBe(IsImpl);
    expect(Layer).toBe(LayerImpl);
    expect(ALL_LAYERS).toBe(AllLayersImpl);
    expect(LayerNameTable).toBe(TableImpl);
    expect(LayerNames).toBe(NamesImpl);
    expect(createMaskGroup).toBe(createMaskGroupImpl);
    expect(typeof isLayer).toBe('function');
  });

  it('re-exports errors', () => {
    expect(LayerOutOfRangeError).toBe(errors.LayerOutOfRangeError);
    expect(UnknownLayerLabelError).toBe(errors.UnknownLayerLabelError);
    expect(InvalidBitsError).toBe(errors.InvalidBitsError);
    expect(InvalidMaskOperandError).toBe(errors.InvalidMaskOperandError);
    expect(InvalidLayerLabelEntryError).toBe(errors.InvalidLayerLabelEntryError);
  });
});
