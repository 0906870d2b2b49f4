/**
 * Base interface for all fixed-width bit codecs.
 * @template T The TypeScript type this codec packs/unpacks.
 */
export interface Codec<T> {
  /** Number of bits every value occupies. Does not depend on the value. */
  readonly width: number;

  /**
   * Write `value` into `buffer` starting at bit `offset` (MSB first).
   * Only the bits in `[offset, offset + width)` change.
   * Throws if the buffer is too small or the value is not representable.
   */
  pack(value: T, buffer: Uint8Array, offset: number): void;

  /**
   * Write `value` with no capacity or value check. Composite codecs call this
   * on their members once the whole value has passed `validate`.
   */
  write(value: T, buffer: Uint8Array, offset: number): void;

  /** Read a value starting at bit `offset`. Throws if the buffer is too small. */
  unpack(buffer: Uint8Array, offset: number): T;

  /** Throw if `value` cannot be packed by this codec. */
  validate(value: T): void;
}

/** Codec whose value is laid out as consecutive members. */
export interface CompositeCodec<T> extends Codec<T> {
  /** Start bit of each member relative to the codec's own offset, in layout order. */
  readonly memberOffsets: readonly number[];
}

/** Extract the value type of a codec. */
export type ValueOf<C> = C extends Codec<infer T> ? T : never;

/** Width of a value, for call sites that hold the value alongside its codec. */
export function widthOf<T>(codec: Codec<T>, _value: T): number {
  return codec.width;
}

/** Bytes needed to hold one value of `codec` starting at bit `offset`. */
export function byteLengthFor(codec: Codec<unknown>, offset = 0): number {
  return Math.ceil((offset + codec.width) / 8);
}

/** Pack `value` into a freshly allocated, zero-filled buffer of the exact size. */
export function packToBytes<T>(codec: Codec<T>, value: T, offset = 0): Uint8Array {
  const buffer = new Uint8Array(byteLengthFor(codec, offset));
  codec.pack(value, buffer, offset);
  return buffer;
}

/** Unpack a value of `codec` from `bytes` at bit `offset`. */
export function unpackFromBytes<T>(codec: Codec<T>, bytes: Uint8Array, offset = 0): T {
  return codec.unpack(bytes, offset);
}
