import { describe, it, expect } from "vitest";
import {
  BitCodec,
  BitReader,
  BitWriter,
  packBits,
  unpackBits,
  toNetworkBytes,
  fromNetworkBytes,
  type BitLayout,
} from "./bit-codec";

describe("BitReader", () => {
  it("should read fields most significant bit first", () => {
    const reader = new BitReader(Uint8Array.of(0b10110000));

    expect(reader.readUint(1)).toBe(1);
    expect(reader.readUint(2)).toBe(1);
    expect(reader.readUint(1)).toBe(1);
    expect(reader.remaining).toBe(4);
  });

  it("should read fields spanning byte boundaries", () => {
    const reader = new BitReader(Uint8Array.of(0x8c, 0x70));

    expect(reader.readUint(2)).toBe(2);
    expect(reader.readUint(4)).toBe(3);
    reader.skip(2);
    expect(reader.readUint(4)).toBe(7);
    expect(reader.readUint(2)).toBe(0);
  });

  it("should throw when reading past the end", () => {
    const reader = new BitReader(Uint8Array.of(0xff));
    reader.skip(8);

    expect(() => reader.readUint(1)).toThrow(
      "Read past end: wanted 1 bits, 0 remaining"
    );
  });

  it("should throw when skipping past the end", () => {
    const reader = new BitReader(Uint8Array.of(0xff));
    expect(() => reader.skip(9)).toThrow(RangeError);
  });
});

describe("BitWriter", () => {
  it("should write fields most significant bit first", () => {
    const writer = new BitWriter(1);
    writer.writeUint(3, 0b101);
    writer.pad(2);
    writer.writeUint(3, 0b111);

    expect(Array.from(writer.finish())).toEqual([0xa7]);
  });

  it("should keep only the low bits of an oversized value", () => {
    const writer = new BitWriter(1);
    writer.writeUint(4, 16);
    writer.writeUint(4, 0x1f);

    expect(Array.from(writer.finish())).toEqual([0x0f]);
  });

  it("should reject non-integer values", () => {
    const writer = new BitWriter(1);
    expect(() => writer.writeUint(4, 1.5)).toThrow(
      "Field value must be an integer, got 1.5"
    );
  });

  it("should throw when writing past the end", () => {
    const writer = new BitWriter(1);
    writer.writeUint(6, 0);
    expect(() => writer.writeUint(3, 0)).toThrow(RangeError);
  });
});

describe("network bytes", () => {
  it("should serialize the most significant byte first", () => {
    expect(Array.from(toNetworkBytes(0x1234))).toEqual([0x12, 0x34]);
  });

  it("should read the most significant byte first", () => {
    expect(fromNetworkBytes(Uint8Array.of(0xab, 0xcd))).toBe(0xabcd);
  });

  it("should reject values outside 16 bits", () => {
    expect(() => toNetworkBytes(0x10000)).toThrow(
      "Not a 16-bit unsigned value: 65536"
    );
    expect(() => toNetworkBytes(-1)).toThrow(RangeError);
  });

  it("should reject short buffers", () => {
    expect(() => fromNetworkBytes(Uint8Array.of(1))).toThrow(
      "Buffer too small: expected 2 bytes, got 1"
    );
  });
});

describe("unpackBits", () => {
  it("should split a counter word", () => {
    expect(unpackBits(0x4001, [2, 14])).toEqual([1, 1]);
  });

  it("should split a position word including pad fields", () => {
    expect(unpackBits(0x8c70, [2, 4, 2, 4, 2, 2])).toEqual([2, 3, 0, 7, 0, 0]);
  });

  it("should require widths summing to 16", () => {
    expect(() => unpackBits(0, [2, 13])).toThrow(
      "Field widths must sum to 16 bits, got 15"
    );
  });

  it("should reject a value that is not a 16-bit word", () => {
    expect(() => unpackBits(65536, [16])).toThrow(
      "Not a 16-bit unsigned value: 65536"
    );
  });
});

describe("packBits", () => {
  it("should pack fields into a word", () => {
    expect(packBits([[1, 2], [1, 14]])).toBe(0x4001);
    expect(packBits([[3, 2], [0x3fff, 14]])).toBe(0xffff);
  });

  it("should wrap a value one past its width to zero", () => {
    expect(packBits([[1, 2], [16384, 14]])).toBe(packBits([[1, 2], [0, 14]]));
  });

  it("should require widths summing to 16", () => {
    expect(() => packBits([[0, 8], [0, 9]])).toThrow(
      "Field widths must sum to 16 bits, got 17"
    );
  });
});

describe("BitCodec", () => {
  const layout = {
    a: BitCodec.uint(4),
    reserved: BitCodec.pad(4),
    b: BitCodec.uint(8),
  };

  it("should compute the layout size", () => {
    expect(BitCodec.sizeOf(layout)).toBe(16);
  });

  it("should encode fields in property order with zeroed pads", () => {
    const writer = new BitWriter(2);
    BitCodec.encode(layout, { a: 0xa, b: 0x5c }, writer);

    expect(Array.from(writer.finish())).toEqual([0xa0, 0x5c]);
  });

  it("should decode fields and skip pads", () => {
    const decoded = BitCodec.decode(layout, new BitReader(Uint8Array.of(0xaf, 0x5c)));

    expect(decoded).toEqual({ a: 10, b: 92 });
  });

  it("should throw when a field value is missing", () => {
    const loose: BitLayout = { a: BitCodec.uint(4) };
    expect(() => BitCodec.encode(loose, {}, new BitWriter(1))).toThrow(
      'Missing numeric value for field "a"'
    );
  });

  it("should reject invalid widths", () => {
    expect(() => BitCodec.uint(0)).toThrow("Invalid field width: 0 bits");
  });
});
