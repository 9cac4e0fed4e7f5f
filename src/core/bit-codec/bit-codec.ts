/**
 * Width in bits of a community payload.
 */
export const WORD_BITS = 16;

/**
 * Highest value a 16-bit word can hold.
 */
export const WORD_MAX = 0xffff;

function maskFor(bits: number): number {
  return bits >= 32 ? 0xffffffff : (1 << bits) - 1;
}

function assertWidth(bits: number): void {
  if (!Number.isInteger(bits) || bits < 1 || bits > 32) {
    throw new RangeError(`Invalid field width: ${bits} bits`);
  }
}

function assertWord(word: number): void {
  if (!Number.isInteger(word) || word < 0 || word > WORD_MAX) {
    throw new RangeError(`Not a 16-bit unsigned value: ${word}`);
  }
}

/**
 * Reads unsigned fields from a byte buffer, most significant bit first.
 * The first field read occupies the highest bits of the first byte.
 */
export class BitReader {
  private offset = 0;

  constructor(private readonly bytes: Uint8Array) {}

  /** Bits not yet consumed. */
  get remaining(): number {
    return this.bytes.byteLength * 8 - this.offset;
  }

  /**
   * Reads the next `bits` bits as an unsigned integer.
   * @throws RangeError when fewer than `bits` bits remain
   */
  readUint(bits: number): number {
    assertWidth(bits);
    if (bits > this.remaining) {
      throw new RangeError(
        `Read past end: wanted ${bits} bits, ${this.remaining} remaining`
      );
    }

    let value = 0;
    for (let i = 0; i < bits; i++) {
      const pos = this.offset + i;
      const bit = (this.bytes[pos >> 3] >> (7 - (pos & 7))) & 1;
      value = value * 2 + bit;
    }

    this.offset += bits;
    return value;
  }

  /**
   * Advances past `bits` bits without decoding them.
   */
  skip(bits: number): void {
    if (bits < 0 || bits > this.remaining) {
      throw new RangeError(
        `Skip past end: wanted ${bits} bits, ${this.remaining} remaining`
      );
    }
    this.offset += bits;
  }
}

/**
 * Writes unsigned fields into a fixed-size byte buffer, most significant bit first.
 *
 * A value that does not fit its width is truncated to its low bits, the same
 * way a cast to a narrower unsigned integer behaves.
 */
export class BitWriter {
  private readonly bytes: Uint8Array;
  private offset = 0;

  /**
   * @param byteLength Size of the output buffer
   */
  constructor(byteLength: number) {
    this.bytes = new Uint8Array(byteLength);
  }

  /** Bits still free in the buffer. */
  get remaining(): number {
    return this.bytes.byteLength * 8 - this.offset;
  }

  writeUint(bits: number, value: number): void {
    assertWidth(bits);
    if (!Number.isInteger(value)) {
      throw new RangeError(`Field value must be an integer, got ${value}`);
    }
    if (bits > this.remaining) {
      throw new RangeError(
        `Write past end: wanted ${bits} bits, ${this.remaining} remaining`
      );
    }

    const masked = (value & maskFor(bits)) >>> 0;
    for (let i = 0; i < bits; i++) {
      const bit = Math.floor(masked / 2 ** (bits - 1 - i)) & 1;
      if (bit) {
        const pos = this.offset + i;
        this.bytes[pos >> 3] |= 0x80 >> (pos & 7);
      }
    }

    this.offset += bits;
  }

  /**
   * Writes `bits` zero bits.
   */
  pad(bits: number): void {
    this.writeUint(bits, 0);
  }

  /**
   * Returns the written buffer. Unwritten trailing bits stay zero.
   */
  finish(): Uint8Array {
    return this.bytes;
  }
}

/**
 * Serializes a 16-bit word as two bytes in network byte order.
 */
export function toNetworkBytes(word: number): Uint8Array {
  assertWord(word);
  const buf = new Uint8Array(2);
  new DataView(buf.buffer).setUint16(0, word, false);
  return buf;
}

/**
 * Reads a 16-bit word from two bytes in network byte order.
 */
export function fromNetworkBytes(bytes: Uint8Array): number {
  if (bytes.byteLength < 2) {
    throw new RangeError(
      `Buffer too small: expected 2 bytes, got ${bytes.byteLength}`
    );
  }
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).getUint16(0, false);
}

function assertFillsWord(widths: readonly number[]): void {
  const total = widths.reduce((sum, w) => sum + w, 0);
  if (total !== WORD_BITS) {
    throw new RangeError(`Field widths must sum to ${WORD_BITS} bits, got ${total}`);
  }
}

/**
 * Splits a 16-bit word into fields of the given widths, first field from the
 * most significant bits.
 *
 * @example
 * ```ts
 * unpackBits(0x4001, [2, 14]); // [1, 1]
 * ```
 */
export function unpackBits(word: number, widths: readonly number[]): number[] {
  assertWord(word);
  assertFillsWord(widths);

  const reader = new BitReader(toNetworkBytes(word));
  return widths.map((bits) => reader.readUint(bits));
}

/**
 * Packs `[value, width]` pairs into one 16-bit word, first pair in the most
 * significant bits. Values wider than their field keep only their low bits.
 *
 * @example
 * ```ts
 * packBits([[1, 2], [1, 14]]); // 0x4001
 * ```
 */
export function packBits(
  fields: ReadonlyArray<readonly [value: number, width: number]>
): number {
  assertFillsWord(fields.map(([, width]) => width));

  const writer = new BitWriter(2);
  for (const [value, width] of fields) {
    writer.writeUint(width, value);
  }
  return fromNetworkBytes(writer.finish());
}

/**
 * An unsigned integer field occupying `bits` bits.
 */
export type UintField = {
  readonly kind: "uint";
  readonly bits: number;
};

/**
 * Reserved bits. Written as zero and skipped on read.
 */
export type PadField = {
  readonly kind: "pad";
  readonly bits: number;
};

export type BitField = UintField | PadField;

/**
 * A layout mapping keys to bit fields.
 * The order of iteration defines the bit order.
 *
 * IMPORTANT:
 * Property order is respected as insertion order.
 * Do not rely on computed or dynamic keys.
 */
export type BitLayout = Record<string, BitField>;

/**
 * Value keys of a layout (pad fields carry no value).
 */
export type ValueKeys<L extends BitLayout> = {
  [K in keyof L]: L[K] extends PadField ? never : K;
}[keyof L] & string;

/**
 * The decoded shape of a layout: one number per non-pad field.
 */
export type InferLayout<L extends BitLayout> = {
  [K in ValueKeys<L>]: number;
};

/**
 * Layout-driven bit packing.
 */
export class BitCodec {
  /** Unsigned field of the given width */
  static uint(bits: number): UintField {
    assertWidth(bits);
    return { kind: "uint", bits };
  }

  /** Zero-filled reserved bits */
  static pad(bits: number): PadField {
    assertWidth(bits);
    return { kind: "pad", bits };
  }

  /**
   * Total width of a layout in bits.
   */
  static sizeOf(layout: BitLayout): number {
    let size = 0;
    for (const key of Object.keys(layout)) {
      size += layout[key].bits;
    }
    return size;
  }

  /**
   * Writes every field of `layout` into `writer` in property order.
   */
  static encode<L extends BitLayout>(
    layout: L,
    values: InferLayout<L>,
    writer: BitWriter
  ): void {
    for (const key of Object.keys(layout)) {
      const field: BitField = layout[key];
      if (field.kind === "pad") {
        writer.pad(field.bits);
        continue;
      }

      const value: unknown = Reflect.get(values, key);
      if (typeof value !== "number") {
        throw new RangeError(`Missing numeric value for field "${key}"`);
      }
      writer.writeUint(field.bits, value);
    }
  }

  /**
   * Reads every field of `layout` from `reader` in property order.
   */
  static decode<L extends BitLayout>(layout: L, reader: BitReader): InferLayout<L> {
    const target: Record<string, number> = {};
    for (const key of Object.keys(layout)) {
      const field: BitField = layout[key];
      if (field.kind === "pad") {
        reader.skip(field.bits);
      } else {
        target[key] = reader.readUint(field.bits);
      }
    }
    return target as InferLayout<L>;
  }
}
