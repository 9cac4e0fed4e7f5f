export {
  BitCodec,
  BitReader,
  BitWriter,
  packBits,
  unpackBits,
  toNetworkBytes,
  fromNetworkBytes,
  WORD_BITS,
  WORD_MAX,
} from "./bit-codec";
export type {
  BitField,
  BitLayout,
  InferLayout,
  PadField,
  UintField,
  ValueKeys,
} from "./bit-codec";
