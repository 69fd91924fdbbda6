import {
  InvalidLayerLabelEntryError,
  LayerOutOfRangeError,
  UnknownLayerLabelError,
} from '../errors/errors.js';
import { ALL_LAYERS, assertLayer, isLayer, layerName, type Layer } from '../core/layer.js';
import type { LayerLabelSource } from '../types/types.js';

type LabelEntry = readonly [number, string | undefined];

function isLabelList(source: LayerLabelSource): source is readonly string[] {
  return Array.isArray(source) && source.every((label) => typeof label === 'string');
}

function isPairIterable(source: LayerLabelSource): source is Iterable<readonly [number, string]> {
  return typeof (source as Iterable<unknown>)[Symbol.iterator] === 'function';
}

function toPair(entry: unknown): LabelEntry {
  if (
    Array.isArray(entry) &&
    entry.length === 2 &&
    typeof entry[0] === 'number' &&
    typeof entry[1] === 'string'
  ) {
    return [entry[0], entry[1]];
  }
  throw new InvalidLayerLabelEntryError(entry);
}

function readEntries(source: LayerLabelSource): LabelEntry[] {
  if (isLabelList(source)) return source.map((label, index) => [index, label] as const);
  if (isPairIterable(source)) {
    const pairs: LabelEntry[] = [];
    for (const entry of source) pairs.push(toPair(entry));
    return pairs;
  }
  return Object.keys(source).map((key) => [Number(key), source[Number(key)]] as const);
}

/**
 * Display names for layer indices.
 *
 * The table is owned by the host: the enumeration only knows indices, and
 * the host decides what each one is called. Lookups never fall back to a
 * placeholder. A missing entry is reported as {@link UnknownLayerLabelError}
 * so that drift between the enumeration and its labels shows up on first use.
 *
 * @example
 * ```typescript
 * const names = new LayerNameTable({ 0: 'Default', 8: 'IgnoreTopDown' });
 * names.label(8); // 'IgnoreTopDown'
 * names.label(9); // throws UnknownLayerLabelError
 * ```
 *
 * A project table usually renames the generic slots. Here slot 8, which the
 * enumeration calls `Clickables`, is labelled `IgnoreTopDown`:
 *
 * ```typescript
 * LayerNames.install(
 *   new LayerNameTable([
 *     'Layer.Default', 'Layer.TransparentFX', 'Layer.IgnoreRaycast', 'Layer.L3',
 *     'Layer.Water', 'Layer.UI', 'Layer.L6', 'Layer.L7',
 *     'Layer.IgnoreTopDown', 'Layer.Selectable', 'Layer.IgnoreVR', 'Layer.Floor',
 *     'Layer.Player', 'Layer.Wall', 'Layer.EscapeRoute', 'Layer.TestOBJ',
 *     'Layer.IgnorePhysics', 'Layer.VROnly', 'Layer.MiniModelPreview', 'Layer.SelectableIcon',
 *     'Layer.EndlessPlane', 'Layer.ExteriorObjectBlocking', 'Layer.L22', 'Layer.L23',
 *     'Layer.L24', 'Layer.L25', 'Layer.L26', 'Layer.L27',
 *     'Layer.L28', 'Layer.L29', 'Layer.L30', 'Layer.L31',
 *   ])
 * );
 * Mask.of(Layer.Clickables, Layer.L12).toString(); // 'Mask(Layer.IgnoreTopDown | Layer.Player)'
 * ```
 */
export class LayerNameTable {
  private readonly labels = new Map<Layer, string>();

  /**
   * @param source - `[index, label]` pairs, labels in layer order, or a
   * record keyed by index
   * @throws LayerOutOfRangeError if any index is not a layer index
   * @throws InvalidLayerLabelEntryError if a pair is malformed
   */
  constructor(source: LayerLabelSource = []) {
    const pairs = readEntries(source);

    // Keep entries() ascending regardless of input order.
    pairs.sort(([a], [b]) => a - b);
    for (const [index, label] of pairs) {
      if (label === undefined) continue;
      assertLayer(index);
      this.labels.set(index, label);
    }
  }

  /**
   * Table labelling every member of {@link Layer} as `Layer.<Key>`.
   */
  static fromEnum(): LayerNameTable {
    return new LayerNameTable(ALL_LAYERS.map((layer) => [layer, `Layer.${layerName(layer)}`] as const));
  }

  /** Number of labelled layers. */
  get size(): number {
    return this.labels.size;
  }

  has(layer: number): boolean {
    return isLayer(layer) && this.labels.has(layer);
  }

  /**
   * Label for a layer index.
   *
   * @throws LayerOutOfRangeError if layer is not in [0, 31]
   * @throws UnknownLayerLabelError if the table has no entry for it
   */
  label(layer: number): string {
    if (!isLayer(layer)) throw new LayerOutOfRangeError(layer);
    const label = this.labels.get(layer);
    if (label === undefined) throw new UnknownLayerLabelError(layer, [...this.labels.keys()]);
    return label;
  }

  /** `[index, label]` pairs, ascending by index. */
  entries(): Array<[Layer, string]> {
    return [...this.labels];
  }
}

/**
 * Process-wide name table used by `Mask.toString()`.
 *
 * The table lives on globalThis so that a single table is shared even when
 * the package is bundled more than once (e.g. in monorepos). Until a table is
 * installed, the enumeration's own names are used.
 */
export class LayerNames {
  /**
   * Currently installed table, created from the enumeration on first use.
   */
  static current(): LayerNameTable {
    return (globalThis.__LAYERMASK_NAMES__ ??= LayerNameTable.fromEnum());
  }

  /**
   * Replace the process-wide table.
   *
   * @returns The previously installed table, to allow restoring it.
   */
  static install(table: LayerNameTable): LayerNameTable {
    const previous = LayerNames.current();
    globalThis.__LAYERMASK_NAMES__ = table;
    return previous;
  }

  /**
   * Drop the installed table; the next lookup rebuilds the default.
   *
   * ⚠️ Intended for test environments.
   */
  static reset(): void {
    globalThis.__LAYERMASK_NAMES__ = undefined;
  }
}
