import { Codec } from './Codec';
import {
  assertCapacity,
  readBits,
  writeBits,
  numberToLanes,
  lanesToNumber,
} from '../helpers';

/** Largest width representable by the `number`-valued integer codecs. */
export const MAX_NUMBER_WIDTH = 32;

function checkWidth(name: string, width: number): void {
  if (!Number.isInteger(width) || width < 1 || width > MAX_NUMBER_WIDTH) {
    throw new Error(`${name}: width must be an integer in 1..${MAX_NUMBER_WIDTH}, got ${width}`);
  }
}

/**
 * Unsigned integer codec for widths 1..32, valued as `number`.
 * Stored MSB first at any bit offset.
 */
export class UnsignedIntegerCodec implements Codec<number> {
  readonly width: number;
  /** Largest representable value (2^width - 1). */
  readonly max: number;

  constructor(width: number) {
    checkWidth('UnsignedIntegerCodec', width);
    this.width = width;
    this.max = 2 ** width - 1;
  }

  pack(value: number, buffer: Uint8Array, offset: number): void {
    assertCapacity('UnsignedIntegerCodec', buffer, offset, this.width);
    this.validate(value);
    this.write(value, buffer, offset);
  }

  write(value: number, buffer: Uint8Array, offset: number): void {
    writeBits(buffer, offset, numberToLanes(value, this.width), this.width);
  }

  unpack(buffer: Uint8Array, offset: number): number {
    assertCapacity('UnsignedIntegerCodec', buffer, offset, this.width);
    return lanesToNumber(readBits(buffer, offset, this.width), this.width);
  }

  validate(value: number): void {
    if (!Number.isInteger(value) || value < 0 || value > this.max) {
      throw new Error(`UnsignedIntegerCodec: value ${value} out of range [0, ${this.max}]`);
    }
  }
}

/**
 * Signed (two's complement) integer codec for widths 1..32, valued as `number`.
 * Shares the bit pattern of the same-width unsigned codec.
 */
export class SignedIntegerCodec implements Codec<number> {
  readonly width: number;
  readonly min: number;
  readonly max: number;
  private readonly unsigned: UnsignedIntegerCodec;

  constructor(width: number) {
    checkWidth('SignedIntegerCodec', width);
    this.width = width;
    this.unsigned = new UnsignedIntegerCodec(width);
    this.min = -(2 ** (width - 1));
    this.max = 2 ** (width - 1) - 1;
  }

  pack(value: number, buffer: Uint8Array, offset: number): void {
    assertCapacity('SignedIntegerCodec', buffer, offset, this.width);
    this.validate(value);
    this.write(value, buffer, offset);
  }

  write(value: number, buffer: Uint8Array, offset: number): void {
    this.unsigned.write(value < 0 ? value + 2 ** this.width : value, buffer, offset);
  }

  unpack(buffer: Uint8Array, offset: number): number {
    assertCapacity('SignedIntegerCodec', buffer, offset, this.width);
    const u = this.unsigned.unpack(buffer, offset);
    return u > this.max ? u - 2 ** this.width : u;
  }

  validate(value: number): void {
    if (!Number.isInteger(value) || value < this.min || value > this.max) {
      throw new Error(
        `SignedIntegerCodec: value ${value} out of range [${this.min}, ${this.max}]`
      );
    }
  }
}
