/**
 * Global type declarations for layermask runtime state.
 */

import type { LayerNameTable } from '../registry/layer-names.js';

declare global {
  /**
   * Process-wide layer name table, managed by `LayerNames`.
   *
   * Shared through globalThis so duplicated bundles of the package agree on
   * one table. `undefined` until first use or after `LayerNames.reset()`.
   */
  var __LAYERMASK_NAMES__: LayerNameTable | undefined;
}

export {};
