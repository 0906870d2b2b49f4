import { BooleanCodec } from './codecs/BooleanCodec';
import { UnsignedIntegerCodec, SignedIntegerCodec } from './codecs/IntegerCodec';
import { BigUnsignedIntegerCodec, BigSignedIntegerCodec } from './codecs/BigIntegerCodec';

/** Pointer-sized integers are 64 bits wide. */
export const POINTER_WIDTH = 64;

export const bool = new BooleanCodec();

export const uint8 = new UnsignedIntegerCodec(8);
export const uint16 = new UnsignedIntegerCodec(16);
export const uint32 = new UnsignedIntegerCodec(32);
export const uint64 = new BigUnsignedIntegerCodec(64);
export const uint128 = new BigUnsignedIntegerCodec(128);
export const uintptr = new BigUnsignedIntegerCodec(POINTER_WIDTH);

export const int8 = new SignedIntegerCodec(8);
export const int16 = new SignedIntegerCodec(16);
export const int32 = new SignedIntegerCodec(32);
export const int64 = new BigSignedIntegerCodec(64);
export const int128 = new BigSignedIntegerCodec(128);
export const intptr = new BigSignedIntegerCodec(POINTER_WIDTH);
