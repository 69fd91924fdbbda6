const IS_PROD = typeof process !== 'undefined' && process.env?.NODE_ENV === 'production';

const join = (lines: string[]): string => lines.join('\n');
const format = (prod: string, devLines: string[]): string => (IS_PROD ? prod : join(devLines));

/**
 * Render an arbitrary value for a diagnostic message.
 * Falls back to String() for values JSON cannot represent (bigint, cycles).
 */
function show(value: unknown): string {
  if (typeof value === 'number' || typeof value === 'undefined') return String(value);
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

/**
 * A layer index outside [0, 31], or one that is not an integer at all.
 */
export class LayerOutOfRangeError extends Error {
  constructor(public value: unknown) {
    const received = show(value);
    const dev = [
      'Layer index out of range',
      '',
      `Received: ${received}`,
      '',
      'A layer is an integer index from 0 to 31.',
      '',
      'To fix this:',
      '  1. Use a member of the Layer enumeration, e.g. Layer.Water',
      `  2. If ${received} is a bitmask rather than a layer, use Mask.fromBits(${received})`,
    ];
    super(format(`Layer index ${received} is out of range [0, 31].`, dev));
    this.name = 'LayerOutOfRangeError';
  }
}

/**
 * The name table has no label for a valid layer index.
 */
export class UnknownLayerLabelError extends Error {
  constructor(
    public layer: number,
    public knownLayers: number[]
  ) {
    const dev = [
      `No label registered for layer ${layer}.`,
      '',
      knownLayers.length > 0
        ? `Labelled layers: ${knownLayers.join(', ')}`
        : 'The name table is empty.',
      '',
      'The layer enumeration and its name table have drifted apart.',
      `Add an entry for ${layer} to the table, or install a complete one with LayerNames.install().`,
    ];
    super(format(`No label registered for layer ${layer}.`, dev));
    this.name = 'UnknownLayerLabelError';
  }
}

/**
 * Raw bits passed to Mask.fromBits() do not fit in 32 bits.
 */
export class InvalidBitsError extends Error {
  constructor(public value: unknown) {
    const received = show(value);
    const dev = [
      'Invalid bit pattern',
      '',
      `Received: ${received}`,
      '',
      'Mask.fromBits() takes an integer between -2147483648 and 4294967295.',
      'Bit i of the pattern selects layer i.',
    ];
    super(format(`Invalid bit pattern ${received}.`, dev));
    this.name = 'InvalidBitsError';
  }
}

/**
 * An entry of a name table source that is not an `[index, label]` pair.
 */
export class InvalidLayerLabelEntryError extends Error {
  constructor(public entry: unknown) {
    const dev = [
      'Invalid layer label entry',
      '',
      `Received: ${show(entry)}`,
      '',
      'A name table is built from one of:',
      "  - [index, label] pairs, e.g. [[0, 'Default'], [4, 'Water']]",
      "  - labels in layer order, e.g. ['Default', 'TransparentFX']",
      "  - a record keyed by index, e.g. { 0: 'Default', 4: 'Water' }",
    ];
    super(format(`Invalid layer label entry ${show(entry)}.`, dev));
    this.name = 'InvalidLayerLabelEntryError';
  }
}

/**
 * A value that is neither a mask, a layer index nor a collection of those.
 */
export class InvalidMaskOperandError extends Error {
  constructor(public operand: unknown) {
    const dev = [
      'Invalid mask operand',
      '',
      'Valid operand shapes:',
      '  - A Mask',
      '  - A layer index (0-31), e.g. Layer.UI',
      '  - An iterable of masks and layer indices, e.g. [Layer.Default, otherMask]',
      '',
      'Received:',
      `  ${show(operand)}`,
    ];
    super(format('Invalid mask operand.', dev));
    this.name = 'InvalidMaskOperandError';
  }
}
