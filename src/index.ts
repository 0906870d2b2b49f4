export type { Codec, CompositeCodec, ValueOf } from './codecs/Codec';
export { widthOf, byteLengthFor, packToBytes, unpackFromBytes } from './codecs/Codec';
export { BooleanCodec } from './codecs/BooleanCodec';
export { UnsignedIntegerCodec, SignedIntegerCodec, MAX_NUMBER_WIDTH } from './codecs/IntegerCodec';
export { BigUnsignedIntegerCodec, BigSignedIntegerCodec } from './codecs/BigIntegerCodec';
export { ArrayCodec, array } from './codecs/ArrayCodec';
export type { ArrayOptions } from './codecs/ArrayCodec';
export { TupleCodec, EmptyTupleCodec, tuple } from './codecs/TupleCodec';
export type { TupleCodecs, TupleChain } from './codecs/TupleCodec';
export { StructCodec, struct } from './codecs/StructCodec';
export type { StructField, StructOptions, StructCodecs } from './codecs/StructCodec';
export {
  POINTER_WIDTH,
  bool,
  uint8,
  uint16,
  uint32,
  uint64,
  uint128,
  uintptr,
  int8,
  int16,
  int32,
  int64,
  int128,
  intptr,
} from './primitives';
export {
  assertCapacity,
  readBits,
  writeBits,
  fromBinaryString,
  toBinaryString,
  toHex,
} from './helpers';
