import { Codec, CompositeCodec } from './Codec';
import { tuple } from './TupleCodec';
import { assertCapacity } from '../helpers';

export interface StructField {
  /** Field name (used as key in the JS object). */
  name: string;
  /** Codec for this field's type. */
  codec: Codec<unknown>;
}

export interface StructOptions {
  /** Fields in layout order. */
  fields: readonly StructField[];
}

/** Maps a record of value types to the record of codecs that pack them. */
export type StructCodecs<T> = { [K in keyof T]: Codec<T[K]> };

/**
 * Fixed-layout record codec. Fields are laid out back to back in
 * definition order, exactly like the members of a tuple.
 */
export class StructCodec implements CompositeCodec<Record<string, unknown>> {
  private readonly fields: readonly StructField[];
  private readonly layout: CompositeCodec<unknown[]>;

  constructor(options: StructOptions) {
    const seen = new Set<string>();
    for (const field of options.fields) {
      if (seen.has(field.name)) {
        throw new Error(`StructCodec: duplicate field '${field.name}'`);
      }
      seen.add(field.name);
    }
    this.fields = options.fields.map(({ name, codec }) => ({ name, codec }));
    this.layout = tuple<unknown[]>(...this.fields.map(f => f.codec));
  }

  get width(): number {
    return this.layout.width;
  }

  get memberOffsets(): readonly number[] {
    return this.layout.memberOffsets;
  }

  /** Field names in layout order. */
  get fieldNames(): string[] {
    return this.fields.map(f => f.name);
  }

  /** Start bit of a field relative to the struct's own offset. */
  offsetOf(name: string): number {
    const idx = this.fields.findIndex(f => f.name === name);
    if (idx < 0) {
      throw new Error(`StructCodec: unknown field '${name}'`);
    }
    return this.layout.memberOffsets[idx];
  }

  pack(value: Record<string, unknown>, buffer: Uint8Array, offset: number): void {
    assertCapacity('StructCodec', buffer, offset, this.width);
    this.validate(value);
    this.write(value, buffer, offset);
  }

  write(value: Record<string, unknown>, buffer: Uint8Array, offset: number): void {
    this.layout.write(this.fields.map(f => value[f.name]), buffer, offset);
  }

  unpack(buffer: Uint8Array, offset: number): Record<string, unknown> {
    assertCapacity('StructCodec', buffer, offset, this.width);
    const values = this.layout.unpack(buffer, offset);
    const result: Record<string, unknown> = {};
    this.fields.forEach((field, i) => {
      // defineProperty keeps a field named `__proto__` as an own key
      Object.defineProperty(result, field.name, {
        value: values[i],
        enumerable: true,
        writable: true,
        configurable: true,
      });
    });
    return result;
  }

  validate(value: Record<string, unknown>): void {
    if (typeof value !== 'object' || value === null) {
      throw new Error(`StructCodec: expected an object, got ${value === null ? 'null' : typeof value}`);
    }
    for (const field of this.fields) {
      if (!(field.name in value)) {
        throw new Error(`StructCodec: missing field '${field.name}'`);
      }
      field.codec.validate(value[field.name]);
    }
  }
}

/**
 * Build a struct codec from a record of field codecs. Fields are laid out in
 * the record's key order, so integer-like keys (which JS orders first) should
 * be avoided; use {@link StructCodec} with an explicit field list instead.
 *
 * @example
 * const sample = struct({ channel: new UnsignedIntegerCodec(4), level: uint16, clipped: bool });
 * sample.width; // 21
 */
export function struct<T extends Record<string, unknown>>(codecs: StructCodecs<T>): CompositeCodec<T>;
export function struct(codecs: Record<string, Codec<unknown>>): CompositeCodec<Record<string, unknown>> {
  return new StructCodec({
    fields: Object.entries(codecs).map(([name, codec]) => ({ name, codec })),
  });
}
