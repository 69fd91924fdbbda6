/*
 * Layer Bit Layout
 * ----------------
 * A mask stores one bit per layer in an unsigned 32-bit integer.
 *
 * Memory layout (32-bit integer):
 *   Bit  0:    Layer 0 (Layer.Default)
 *   Bit  1:    Layer 1 (Layer.TransparentFX)
 *   ...
 *   Bit 31:    Layer 31
 *
 * JavaScript bitwise operators produce signed 32-bit results, so every helper
 * here ends in `>>> 0` to keep values in [0, 2^32 - 1]. Callers pass layer
 * indices that have already been validated.
 */

/** No layer set. */
export const EMPTY_BITS = 0;

/** Every layer set. Usage: `(~bits) & UNIVERSE_BITS`. */
export const UNIVERSE_BITS = 0xffffffff;

/** Smallest value Mask.fromBits() accepts (int32 minimum, i.e. bit 31 set). */
export const MIN_RAW_BITS = -0x80000000;

/** Largest value Mask.fromBits() accepts. */
export const MAX_RAW_BITS = UNIVERSE_BITS;

/** Bit for a single layer index. */
export const bitOf = (layer: number): number => (1 << layer) >>> 0;

/** Whether `layer`'s bit is set in `bits`. */
export const hasBit = (bits: number, layer: number): boolean => ((bits >>> layer) & 1) === 1;

/** Reinterpret any int32/uint32 pattern as unsigned. */
export const toUint32 = (bits: number): number => bits >>> 0;

export const orBits = (a: number, b: number): number => (a | b) >>> 0;
export const andBits = (a: number, b: number): number => (a & b) >>> 0;
export const xorBits = (a: number, b: number): number => (a ^ b) >>> 0;

/** `a` with every bit of `b` cleared, whether or not it was set in `a`. */
export const clearBits = (a: number, b: number): number => (a & ~b) >>> 0;

/** Bitwise inversion confined to the 32-layer universe. */
export const invertBits = (bits: number): number => ~bits >>> 0;
