import { InvalidBitsError, InvalidMaskOperandError } from '../errors/errors.js';
import { LayerNames, type LayerNameTable } from '../registry/layer-names.js';
import type { MaskCandidate, MaskOperand } from '../types/types.js';
import {
  EMPTY_BITS,
  MAX_RAW_BITS,
  MIN_RAW_BITS,
  UNIVERSE_BITS,
  andBits,
  bitOf,
  clearBits,
  hasBit,
  invertBits,
  orBits,
  toUint32,
  xorBits,
} from './bits.js';
import { MaskContainsQuery } from './contains-query.js';
import { MaskIsQuery } from './is-query.js';
import { ALL_LAYERS, assertLayer, type Layer } from './layer.js';

function isIterable(value: unknown): value is Iterable<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    typeof (value as Iterable<unknown>)[Symbol.iterator] === 'function'
  );
}

/**
 * Bits of a single collection element. Elements are masks or layer indices;
 * nested collections are not flattened.
 */
function itemBits(item: unknown): number {
  if (item instanceof Mask) return item.bits;
  if (typeof item === 'number') {
    assertLayer(item);
    return bitOf(item);
  }
  throw new InvalidMaskOperandError(item);
}

/**
 * Normalize any operand shape to its bit pattern.
 *
 * This is the single coercion step behind every algebra, equality and
 * containment method: a number is a layer index, a collection is the union of
 * its elements.
 */
function operandBits(operand: unknown): number {
  if (typeof operand === 'number' || operand instanceof Mask) return itemBits(operand);
  if (isIterable(operand)) {
    let bits = EMPTY_BITS;
    for (const item of operand) bits = orBits(bits, itemBits(item));
    return bits;
  }
  throw new InvalidMaskOperandError(operand);
}

function unionBits(operands: readonly unknown[]): number {
  let bits = EMPTY_BITS;
  for (const operand of operands) bits = orBits(bits, operandBits(operand));
  return bits;
}

/**
 * Immutable set of layers backed by a 32-bit pattern.
 *
 * Every number handed to a Mask is read as a layer index (0-31), never as a
 * bitmask. That removes the layer/bitmask ambiguity of plain integers: the
 * only way to build a mask from raw bits is {@link Mask.fromBits}.
 *
 * Equality is stricter than containment. A mask equals a layer only when that
 * layer is its single member, and equals a collection only when it is exactly
 * the union of that collection:
 *
 * ```typescript
 * const m = Mask.of(Layer.Default, Layer.Water);
 * m.contains(Layer.Water); // true
 * m.equals(Layer.Water); // false
 * m.equals([Layer.Water, Layer.Default]); // true
 * ```
 *
 * Operators are exposed as methods. Each accepts a mask, a layer index or a
 * collection of either, and the static forms accept those shapes on the left
 * as well.
 */
export class Mask implements Iterable<Layer> {
  /** The empty mask; identity element of union. */
  static readonly None: Mask = new Mask(EMPTY_BITS);

  /** Every layer 0-31. */
  static readonly AllLayers: Mask = new Mask(UNIVERSE_BITS);

  /**
   * Canonical bit pattern, unsigned 32-bit. Bit i is set iff layer i is a
   * member. Two masks are the same value iff their bits are equal.
   */
  readonly bits: number;

  /** Member layers, ascending. Computed once; the mask never changes. */
  private readonly layers: readonly Layer[];

  private constructor(bits: number) {
    this.bits = toUint32(bits);
    this.layers = Object.freeze(ALL_LAYERS.filter((layer) => hasBit(this.bits, layer)));
    Object.freeze(this);
  }

  // ---- construction ----

  /**
   * Mask with exactly one layer.
   *
   * @throws LayerOutOfRangeError if layer is not an integer in [0, 31]
   */
  static fromLayer(layer: number): Mask {
    return Mask.wrap(itemBits(layer));
  }

  /** Union of the given layer indices. */
  static fromLayers(layers: Iterable<number>): Mask {
    return Mask.wrap(operandBits(layers));
  }

  /** Union of the given masks. */
  static fromMasks(masks: Iterable<Mask>): Mask {
    return Mask.wrap(operandBits(masks));
  }

  /**
   * Union of any mix of layers, masks and collections of those.
   *
   * @example
   * ```typescript
   * Mask.of(Layer.Default, Layer.UI);
   * Mask.of(groundMask, [Layer.Water, Layer.L12]);
   * Mask.of(); // Mask.None
   * ```
   */
  static of(...items: MaskOperand[]): Mask {
    return Mask.wrap(unionBits(items));
  }

  /**
   * Coerce a single operand to a mask. Masks are returned unchanged.
   *
   * @throws InvalidMaskOperandError for values of an unsupported shape
   */
  static from(operand: MaskOperand): Mask {
    if (operand instanceof Mask) return operand;
    return Mask.wrap(operandBits(operand));
  }

  /**
   * Build a mask from a raw bit pattern, bit i selecting layer i.
   *
   * This is the only path where an integer is not read as a layer index.
   * Signed patterns are accepted, so `Mask.fromBits(-1)` is every layer.
   *
   * @throws InvalidBitsError if bits is not an integer in [-2^31, 2^32 - 1]
   */
  static fromBits(bits: number): Mask {
    if (!Number.isInteger(bits) || bits < MIN_RAW_BITS || bits > MAX_RAW_BITS) {
      throw new InvalidBitsError(bits);
    }
    return Mask.wrap(bits);
  }

  // Shared instances for the two constant patterns; everything else is fresh.
  private static wrap(bits: number): Mask {
    const normalized = toUint32(bits);
    if (normalized === EMPTY_BITS) return Mask.None;
    if (normalized === UNIVERSE_BITS) return Mask.AllLayers;
    return new Mask(normalized);
  }

  // ---- static algebra (any operand shape on either side) ----

  static union(left: MaskOperand, right: MaskOperand): Mask {
    return Mask.from(left).union(right);
  }

  static intersect(left: MaskOperand, right: MaskOperand): Mask {
    return Mask.from(left).intersect(right);
  }

  static subtract(left: MaskOperand, right: MaskOperand): Mask {
    return Mask.from(left).subtract(right);
  }

  static complement(operand: MaskOperand): Mask {
    return Mask.from(operand).complement();
  }

  static equals(left: MaskOperand, right: MaskOperand): boolean {
    return operandBits(left) === operandBits(right);
  }

  // ---- views ----

  /** Number of member layers (popcount of bits). */
  get layerCount(): number {
    return this.layers.length;
  }

  /** Member layers, ascending. The array is frozen. */
  getLayers(): readonly Layer[] {
    return this.layers;
  }

  isEmpty(): boolean {
    return this.bits === EMPTY_BITS;
  }

  isNonEmpty(): boolean {
    return this.bits !== EMPTY_BITS;
  }

  /** Equal masks hash equally: the hash is the bit pattern. */
  hashCode(): number {
    return this.bits;
  }

  /**
   * Member layers in ascending order. Each call starts a fresh pass over the
   * cached members.
   */
  *[Symbol.iterator](): Iterator<Layer> {
    yield* this.layers;
  }

  // ---- algebra ----

  /**
   * Layers set in this mask or in any operand.
   *
   * @example
   * ```typescript
   * Mask.of(Layer.Default).union(Layer.Water, [Layer.UI]);
   * ```
   */
  union(...operands: MaskOperand[]): Mask {
    return this.derive(orBits(this.bits, unionBits(operands)));
  }

  /** Alias of {@link Mask.union}. */
  plus(...operands: MaskOperand[]): Mask {
    return this.union(...operands);
  }

  /** Alias of {@link Mask.union} for layer lists. */
  with(...layers: number[]): Mask {
    return this.union(layers);
  }

  /** Layers set both here and in the union of the operands. */
  intersect(...operands: MaskOperand[]): Mask {
    return this.derive(andBits(this.bits, unionBits(operands)));
  }

  /**
   * This mask with every layer of the operands cleared. Layers the operands
   * name but this mask lacks are ignored.
   */
  subtract(...operands: MaskOperand[]): Mask {
    return this.derive(clearBits(this.bits, unionBits(operands)));
  }

  /** Alias of {@link Mask.subtract} for layer lists. */
  without(...layers: number[]): Mask {
    return this.subtract(layers);
  }

  /** Layers set in exactly one of this mask and the operand. */
  toggle(operand: MaskOperand): Mask {
    return this.derive(xorBits(this.bits, operandBits(operand)));
  }

  /** Every layer of the 32-layer universe that is not in this mask. */
  complement(): Mask {
    return this.derive(invertBits(this.bits));
  }

  // ---- equality ----

  /**
   * Strict equality against any operand shape:
   * - mask: same bits
   * - layer: this mask is exactly `{layer}`
   * - collection: this mask is exactly the union of the collection
   */
  equals(operand: MaskOperand): boolean {
    return this.bits === operandBits(operand);
  }

  notEquals(operand: MaskOperand): boolean {
    return !this.equals(operand);
  }

  // ---- containment ----

  /** Fluent containment queries: `mask.contains().any(...)`. */
  contains(): MaskContainsQuery;
  /**
   * Whether every layer of the operand is a member. Every mask contains the
   * empty mask.
   */
  contains(operand: MaskOperand): boolean;
  contains(operand?: MaskOperand): MaskContainsQuery | boolean {
    if (operand === undefined) return new MaskContainsQuery(this);
    return clearBits(operandBits(operand), this.bits) === EMPTY_BITS;
  }

  /**
   * Like {@link Mask.contains}, but false when the operand has no layers.
   * Separates a real overlap from trivially containing the empty set.
   */
  containsAndNotEmpty(operand: MaskOperand): boolean {
    const other = operandBits(operand);
    return other !== EMPTY_BITS && clearBits(other, this.bits) === EMPTY_BITS;
  }

  /** Whether this mask and the operand share at least one layer. */
  overlaps(operand: MaskOperand): boolean {
    return andBits(this.bits, operandBits(operand)) !== EMPTY_BITS;
  }

  // ---- identity ----

  /** Fluent identity queries: `mask.is().any(...)`. */
  is(): MaskIsQuery;
  /** Shorthand for `mask.is().exactly(...candidates)`. */
  is(candidate: MaskCandidate, ...more: MaskCandidate[]): boolean;
  is(...candidates: MaskCandidate[]): MaskIsQuery | boolean {
    const query = new MaskIsQuery(this);
    return candidates.length === 0 ? query : query.exactly(...candidates);
  }

  // ---- diagnostics ----

  /**
   * Render member labels through an explicit name table.
   *
   * @throws UnknownLayerLabelError if the table lacks a member's label
   */
  describe(table: LayerNameTable): string {
    if (this.layers.length === 0) return 'Mask(<empty>)';
    return `Mask(${this.layers.map((layer) => table.label(layer)).join(' | ')})`;
  }

  /** Render through the installed table, see {@link LayerNames.install}. */
  toString(): string {
    return this.describe(LayerNames.current());
  }

  toJSON(): Layer[] {
    return [...this.layers];
  }

  private derive(bits: number): Mask {
    return bits === this.bits ? this : Mask.wrap(bits);
  }
}
