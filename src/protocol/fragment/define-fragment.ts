import {
  BitCodec,
  BitReader,
  BitWriter,
  fromNetworkBytes,
  toNetworkBytes,
  unpackBits,
  WORD_BITS,
  type BitField,
  type BitLayout,
  type InferLayout,
} from "../../core/bit-codec";
import { FieldOutOfRangeError } from "../errors";

/** Width of the type tag at the top of every fragment word. */
export const TYPE_TAG_BITS = 2;

/**
 * Known fragment type tags. Tags 0 and 3 are invalid on the wire.
 */
export enum FragmentType {
  Counter = 1,
  Position = 2,
}

/**
 * What to do with a field value wider than its declared bits.
 * - `truncate`: keep the low bits (a move counter of 16384 encodes as 0)
 * - `reject`: throw FieldOutOfRangeError
 */
export type OverflowPolicy = "truncate" | "reject";

export interface EncodeOptions {
  /** Defaults to `truncate` */
  overflow?: OverflowPolicy;
}

/**
 * Encodes one fragment to and from a tagged 16-bit word.
 */
export interface FragmentCodec<T> {
  encode(values: T, options?: EncodeOptions): number;
  decode(word: number): T;
}

/**
 * Configuration for defining a fragment type.
 * @template K The type tag (numeric literal type)
 * @template L The layout of the bits after the tag
 */
export interface FragmentDefinition<K extends number, L extends BitLayout> {
  /** 2-bit type tag */
  type: K;
  /** Fields following the tag, most significant first; must fill the word */
  layout: L;
}

/**
 * Result of defineFragment.
 */
export interface DefinedFragment<K extends number, L extends BitLayout> {
  type: K;
  layout: L;
  codec: FragmentCodec<InferLayout<L>>;
}

/**
 * Infers the decoded field shape of a defined fragment.
 *
 * @example
 * ```ts
 * type CounterFields = InferFragment<typeof CounterFragment>; // { moveCounter: number }
 * ```
 */
export type InferFragment<F> = F extends DefinedFragment<number, infer L extends BitLayout>
  ? InferLayout<L>
  : never;

/**
 * Reads the type tag of a community payload.
 */
export function readFragmentType(word: number): number {
  const [type] = unpackBits(word, [TYPE_TAG_BITS, WORD_BITS - TYPE_TAG_BITS]);
  return type;
}

class LayoutFragmentCodec<L extends BitLayout> implements FragmentCodec<InferLayout<L>> {
  constructor(
    private readonly type: number,
    private readonly layout: L
  ) {}

  encode(values: InferLayout<L>, options: EncodeOptions = {}): number {
    if (options.overflow === "reject") {
      this.assertInRange(values);
    }

    const writer = new BitWriter(WORD_BITS / 8);
    writer.writeUint(TYPE_TAG_BITS, this.type);
    BitCodec.encode(this.layout, values, writer);
    return fromNetworkBytes(writer.finish());
  }

  decode(word: number): InferLayout<L> {
    const reader = new BitReader(toNetworkBytes(word));
    const type = reader.readUint(TYPE_TAG_BITS);
    if (type !== this.type) {
      throw new Error(`Expected fragment type ${this.type}, got ${type}`);
    }
    return BitCodec.decode(this.layout, reader);
  }

  private assertInRange(values: InferLayout<L>): void {
    for (const key of Object.keys(this.layout)) {
      const field: BitField = this.layout[key];
      if (field.kind === "pad") continue;

      const value: unknown = Reflect.get(values, key);
      if (typeof value === "number" && (value < 0 || value > 2 ** field.bits - 1)) {
        throw new FieldOutOfRangeError(key, value, field.bits);
      }
    }
  }
}

/**
 * Define a fragment: a 2-bit type tag followed by a bit layout that fills
 * the rest of a 16-bit community payload.
 *
 * @throws Error when the tag does not fit 2 bits or the layout does not
 * fill exactly the remaining 14 bits
 *
 * @example
 * ```ts
 * const CounterFragment = defineFragment({
 *   type: FragmentType.Counter,
 *   layout: { moveCounter: BitCodec.uint(14) },
 * });
 *
 * CounterFragment.codec.encode({ moveCounter: 1 }); // 0x4001
 * ```
 */
export function defineFragment<K extends number, L extends BitLayout>(
  definition: FragmentDefinition<K, L>
): DefinedFragment<K, L> {
  const { type, layout } = definition;

  if (!Number.isInteger(type) || type < 0 || type >= 2 ** TYPE_TAG_BITS) {
    throw new Error(`Fragment type ${type} does not fit in ${TYPE_TAG_BITS} bits`);
  }

  const size = BitCodec.sizeOf(layout);
  if (size !== WORD_BITS - TYPE_TAG_BITS) {
    throw new Error(
      `Fragment type ${type} layout is ${size} bits, expected ${WORD_BITS - TYPE_TAG_BITS}`
    );
  }

  return {
    type,
    layout,
    codec: new LayoutFragmentCodec(type, layout),
  };
}
