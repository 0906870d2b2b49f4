import { Codec, CompositeCodec } from './Codec';
import { assertCapacity } from '../helpers';

export interface ArrayOptions<T> {
  /** Codec for each element. */
  itemCodec: Codec<T>;
  /** Exact number of elements. */
  length: number;
}

/**
 * Fixed-length homogeneous array codec.
 * Element `i` occupies bits `[offset + i * E, offset + (i + 1) * E)`.
 */
export class ArrayCodec<T> implements CompositeCodec<T[]> {
  readonly width: number;
  readonly length: number;
  readonly memberOffsets: readonly number[];
  private readonly itemCodec: Codec<T>;

  constructor(options: ArrayOptions<T>) {
    const { itemCodec, length } = options;
    if (!Number.isInteger(length) || length < 0) {
      throw new Error(`ArrayCodec: length must be a non-negative integer, got ${length}`);
    }
    this.itemCodec = itemCodec;
    this.length = length;
    this.width = length * itemCodec.width;
    this.memberOffsets = Array.from({ length }, (_, i) => i * itemCodec.width);
  }

  pack(value: T[], buffer: Uint8Array, offset: number): void {
    assertCapacity('ArrayCodec', buffer, offset, this.width);
    this.validate(value);
    this.write(value, buffer, offset);
  }

  write(value: T[], buffer: Uint8Array, offset: number): void {
    for (let i = 0; i < this.length; i++) {
      this.itemCodec.write(value[i], buffer, offset + this.memberOffsets[i]);
    }
  }

  unpack(buffer: Uint8Array, offset: number): T[] {
    assertCapacity('ArrayCodec', buffer, offset, this.width);
    const result: T[] = [];
    for (let i = 0; i < this.length; i++) {
      result.push(this.itemCodec.unpack(buffer, offset + this.memberOffsets[i]));
    }
    return result;
  }

  validate(value: T[]): void {
    if (!Array.isArray(value)) {
      throw new Error(`ArrayCodec: expected an array, got ${typeof value}`);
    }
    if (value.length !== this.length) {
      throw new Error(`ArrayCodec: expected ${this.length} items, got ${value.length}`);
    }
    for (const item of value) {
      this.itemCodec.validate(item);
    }
  }
}

/** Shorthand for `new ArrayCodec({ itemCodec, length })`. */
export function array<T>(itemCodec: Codec<T>, length: number): ArrayCodec<T> {
  return new ArrayCodec({ itemCodec, length });
}
