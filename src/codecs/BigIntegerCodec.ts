import { Codec } from './Codec';
import {
  assertCapacity,
  readBits,
  writeBits,
  bigintToLanes,
  lanesToBigint,
} from '../helpers';

function checkWidth(name: string, width: number): void {
  if (!Number.isInteger(width) || width < 1) {
    throw new Error(`${name}: width must be a positive integer, got ${width}`);
  }
}

/**
 * Unsigned integer codec of any width, valued as `bigint`.
 * Used for 64-bit, 128-bit and pointer-sized integers.
 */
export class BigUnsignedIntegerCodec implements Codec<bigint> {
  readonly width: number;
  readonly max: bigint;

  constructor(width: number) {
    checkWidth('BigUnsignedIntegerCodec', width);
    this.width = width;
    this.max = (1n << BigInt(width)) - 1n;
  }

  pack(value: bigint, buffer: Uint8Array, offset: number): void {
    assertCapacity('BigUnsignedIntegerCodec', buffer, offset, this.width);
    this.validate(value);
    this.write(value, buffer, offset);
  }

  write(value: bigint, buffer: Uint8Array, offset: number): void {
    writeBits(buffer, offset, bigintToLanes(value, this.width), this.width);
  }

  unpack(buffer: Uint8Array, offset: number): bigint {
    assertCapacity('BigUnsignedIntegerCodec', buffer, offset, this.width);
    return lanesToBigint(readBits(buffer, offset, this.width), this.width);
  }

  validate(value: bigint): void {
    if (typeof value !== 'bigint') {
      throw new Error(`BigUnsignedIntegerCodec: expected a bigint, got ${typeof value}`);
    }
    if (value < 0n || value > this.max) {
      throw new Error(`BigUnsignedIntegerCodec: value ${value} out of range [0, ${this.max}]`);
    }
  }
}

/**
 * Signed (two's complement) integer codec of any width, valued as `bigint`.
 * Delegates to the same-width unsigned codec.
 */
export class BigSignedIntegerCodec implements Codec<bigint> {
  readonly width: number;
  readonly min: bigint;
  readonly max: bigint;
  private readonly unsigned: BigUnsignedIntegerCodec;

  constructor(width: number) {
    checkWidth('BigSignedIntegerCodec', width);
    this.width = width;
    this.unsigned = new BigUnsignedIntegerCodec(width);
    this.min = -(1n << BigInt(width - 1));
    this.max = (1n << BigInt(width - 1)) - 1n;
  }

  pack(value: bigint, buffer: Uint8Array, offset: number): void {
    assertCapacity('BigSignedIntegerCodec', buffer, offset, this.width);
    this.validate(value);
    this.write(value, buffer, offset);
  }

  write(value: bigint, buffer: Uint8Array, offset: number): void {
    this.unsigned.write(BigInt.asUintN(this.width, value), buffer, offset);
  }

  unpack(buffer: Uint8Array, offset: number): bigint {
    assertCapacity('BigSignedIntegerCodec', buffer, offset, this.width);
    return BigInt.asIntN(this.width, this.unsigned.unpack(buffer, offset));
  }

  validate(value: bigint): void {
    if (typeof value !== 'bigint') {
      throw new Error(`BigSignedIntegerCodec: expected a bigint, got ${typeof value}`);
    }
    if (value < this.min || value > this.max) {
      throw new Error(
        `BigSignedIntegerCodec: value ${value} out of range [${this.min}, ${this.max}]`
      );
    }
  }
}
