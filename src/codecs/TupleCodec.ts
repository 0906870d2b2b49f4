import { Codec, CompositeCodec } from './Codec';
import { assertCapacity } from '../helpers';

/** Maps a tuple of value types to the tuple of codecs that pack them. */
export type TupleCodecs<T extends unknown[]> = { [K in keyof T]: Codec<T[K]> };

/** A link in a head/tail tuple chain. */
export interface TupleChain<T extends unknown[]> extends CompositeCodec<T> {
  /** Every member codec from this link to the end of the chain, in layout order. */
  readonly members: readonly Codec<unknown>[];
}

/**
 * Zero-width codec for the empty tuple. Packs and unpacks nothing;
 * terminates every head/tail chain built by {@link tuple}.
 */
export class EmptyTupleCodec implements TupleChain<[]> {
  readonly width = 0;
  readonly memberOffsets: readonly number[] = [];
  readonly members: readonly Codec<unknown>[] = [];

  pack(value: [], buffer: Uint8Array, offset: number): void {
    assertCapacity('EmptyTupleCodec', buffer, offset, this.width);
    this.validate(value);
  }

  write(_value: [], _buffer: Uint8Array, _offset: number): void {}

  unpack(buffer: Uint8Array, offset: number): [] {
    assertCapacity('EmptyTupleCodec', buffer, offset, this.width);
    return [];
  }

  validate(value: []): void {
    if (!Array.isArray(value) || value.length !== 0) {
      throw new Error('EmptyTupleCodec: expected an empty array');
    }
  }
}

/**
 * Heterogeneous tuple codec, defined as a head member followed by a tail tuple.
 * The head occupies `[offset, offset + head.width)`, the tail starts right
 * after it, with no padding between members.
 */
export class TupleCodec<H, R extends unknown[]> implements TupleChain<[H, ...R]> {
  readonly width: number;
  readonly memberOffsets: readonly number[];
  readonly members: readonly Codec<unknown>[];
  readonly head: Codec<H>;
  readonly tail: TupleChain<R>;

  constructor(head: Codec<H>, tail: TupleChain<R>) {
    this.head = head;
    this.tail = tail;
    this.width = head.width + tail.width;
    this.memberOffsets = [0, ...tail.memberOffsets.map(o => o + head.width)];
    this.members = [head, ...tail.members];
  }

  /** Number of members. */
  get arity(): number {
    return this.memberOffsets.length;
  }

  pack(value: [H, ...R], buffer: Uint8Array, offset: number): void {
    assertCapacity('TupleCodec', buffer, offset, this.width);
    this.validate(value);
    this.write(value, buffer, offset);
  }

  write(value: [H, ...R], buffer: Uint8Array, offset: number): void {
    this.members.forEach((member, i) => {
      member.write(value[i], buffer, offset + this.memberOffsets[i]);
    });
  }

  unpack(buffer: Uint8Array, offset: number): [H, ...R] {
    assertCapacity('TupleCodec', buffer, offset, this.width);
    return [
      this.head.unpack(buffer, offset),
      ...this.tail.unpack(buffer, offset + this.head.width),
    ];
  }

  validate(value: [H, ...R]): void {
    if (!Array.isArray(value)) {
      throw new Error(`TupleCodec: expected an array, got ${typeof value}`);
    }
    if (value.length !== this.arity) {
      throw new Error(`TupleCodec: expected ${this.arity} members, got ${value.length}`);
    }
    this.members.forEach((member, i) => member.validate(value[i]));
  }
}

/**
 * Build a tuple codec from its member codecs, in layout order.
 *
 * @example
 * const header = tuple(uint16, bool, uint16, bool); // Codec<[number, boolean, number, boolean]>
 * header.width; // 34
 */
export function tuple<T extends unknown[]>(...members: TupleCodecs<T>): CompositeCodec<T>;
export function tuple(...members: Codec<unknown>[]): CompositeCodec<unknown[]> {
  let codec: TupleChain<unknown[]> = new EmptyTupleCodec();
  for (let i = members.length - 1; i >= 0; i--) {
    codec = new TupleCodec(members[i], codec);
  }
  return codec;
}
