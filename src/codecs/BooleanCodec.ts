import { Codec } from './Codec';
import { assertCapacity } from '../helpers';

/**
 * Boolean codec. Occupies a single bit: 0 = false, 1 = true.
 */
export class BooleanCodec implements Codec<boolean> {
  readonly width = 1;

  pack(value: boolean, buffer: Uint8Array, offset: number): void {
    assertCapacity('BooleanCodec', buffer, offset, this.width);
    this.validate(value);
    this.write(value, buffer, offset);
  }

  write(value: boolean, buffer: Uint8Array, offset: number): void {
    const byteIndex = offset >> 3;
    const bitIndex = 7 - (offset & 7);
    buffer[byteIndex] &= ~(1 << bitIndex);
    buffer[byteIndex] |= (value ? 1 : 0) << bitIndex;
  }

  unpack(buffer: Uint8Array, offset: number): boolean {
    assertCapacity('BooleanCodec', buffer, offset, this.width);
    const byteIndex = offset >> 3;
    const bitIndex = 7 - (offset & 7);
    return ((buffer[byteIndex] >> bitIndex) & 1) === 1;
  }

  validate(value: boolean): void {
    if (typeof value !== 'boolean') {
      throw new Error(`BooleanCodec: expected a boolean, got ${typeof value}`);
    }
  }
}
