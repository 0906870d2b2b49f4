/**
 * Bit-addressing primitives shared by every codec.
 *
 * Values travel through here as left-aligned byte lanes: an N-bit field is
 * ceil(N / 8) bytes, MSB first, with the unused trailing bits of the last
 * byte zero. Buffers are addressed by absolute bit position
 * `8 * byteIndex + bitInByte`, bit 0 being the most significant bit.
 */

/** Mask selecting the top `count` bits of a byte (0..8). */
function topMask(count: number): number {
  return (0xff << (8 - count)) & 0xff;
}

/**
 * Throw unless `bitLength` bits starting at `offset` fit inside `buffer`.
 * Checked on every pack/unpack, in all builds.
 */
export function assertCapacity(
  name: string, buffer: Uint8Array, offset: number, bitLength: number
): void {
  if (!Number.isInteger(offset) || offset < 0) {
    throw new Error(`${name}: offset must be a non-negative integer, got ${offset}`);
  }
  const available = buffer.length * 8;
  if (available - offset < bitLength) {
    throw new Error(
      `${name}: need ${bitLength} bits at offset ${offset}, buffer holds ${available}`
    );
  }
}

/**
 * Read `bitLength` bits starting at `offset`.
 * Returns the bits left-aligned; trailing bits of the last byte are zero.
 */
export function readBits(buffer: Uint8Array, offset: number, bitLength: number): Uint8Array {
  const byteCount = Math.ceil(bitLength / 8);
  const byteOff = offset >> 3;
  const bitOff = offset & 7;

  if (bitOff === 0 && (bitLength & 7) === 0) {
    return buffer.slice(byteOff, byteOff + byteCount);
  }

  const out = new Uint8Array(byteCount);
  for (let k = 0; k < byteCount; k++) {
    const bits = Math.min(8, bitLength - 8 * k);
    const idx = byteOff + k;
    let b = (buffer[idx] << bitOff) & 0xff;
    if (bitOff + bits > 8) {
      b |= buffer[idx + 1] >> (8 - bitOff);
    }
    out[k] = b & topMask(bits);
  }
  return out;
}

/**
 * Write the first `bitLength` bits of `src` (left-aligned) at `offset`.
 * Bits of the touched boundary bytes outside the field are preserved.
 */
export function writeBits(
  buffer: Uint8Array, offset: number, src: Uint8Array, bitLength: number
): void {
  const byteCount = Math.ceil(bitLength / 8);
  const byteOff = offset >> 3;
  const bitOff = offset & 7;

  if (bitOff === 0 && (bitLength & 7) === 0) {
    buffer.set(src.subarray(0, byteCount), byteOff);
    return;
  }

  for (let k = 0; k < byteCount; k++) {
    const bits = Math.min(8, bitLength - 8 * k);
    const mask = topMask(bits);
    const b = src[k] & mask;
    const idx = byteOff + k;

    const headMask = mask >> bitOff;
    buffer[idx] = (buffer[idx] & ~headMask & 0xff) | (b >> bitOff);

    if (bitOff + bits > 8) {
      const spillMask = (mask << (8 - bitOff)) & 0xff;
      buffer[idx + 1] = (buffer[idx + 1] & ~spillMask & 0xff) | ((b << (8 - bitOff)) & 0xff);
    }
  }
}

/**
 * Left-aligned byte lanes of an unsigned `number` of `bitLength` bits (1..32).
 * Arithmetic stays in float64, which is exact below 2^53.
 */
export function numberToLanes(value: number, bitLength: number): Uint8Array {
  const byteCount = Math.ceil(bitLength / 8);
  const out = new Uint8Array(byteCount);
  let v = value * 2 ** (byteCount * 8 - bitLength);
  for (let k = byteCount - 1; k >= 0; k--) {
    out[k] = v % 256;
    v = Math.floor(v / 256);
  }
  return out;
}

/** Inverse of {@link numberToLanes}. */
export function lanesToNumber(lanes: Uint8Array, bitLength: number): number {
  let v = 0;
  for (const b of lanes) {
    v = v * 256 + b;
  }
  return v / 2 ** (lanes.length * 8 - bitLength);
}

/** Left-aligned byte lanes of an unsigned `bigint` of `bitLength` bits. */
export function bigintToLanes(value: bigint, bitLength: number): Uint8Array {
  const byteCount = Math.ceil(bitLength / 8);
  const out = new Uint8Array(byteCount);
  let v = value << BigInt(byteCount * 8 - bitLength);
  for (let k = byteCount - 1; k >= 0; k--) {
    out[k] = Number(v & 0xffn);
    v >>= 8n;
  }
  return out;
}

/** Inverse of {@link bigintToLanes}. */
export function lanesToBigint(lanes: Uint8Array, bitLength: number): bigint {
  let v = 0n;
  for (const b of lanes) {
    v = (v << 8n) | BigInt(b);
  }
  return v >> BigInt(lanes.length * 8 - bitLength);
}

/** Parse a binary string ('0' and '1' characters, `_` and spaces ignored) into bytes. */
export function fromBinaryString(bits: string): Uint8Array {
  const digits = bits.replace(/[_\s]/g, '');
  const out = new Uint8Array(Math.ceil(digits.length / 8));
  for (let i = 0; i < digits.length; i++) {
    const ch = digits[i];
    if (ch !== '0' && ch !== '1') {
      throw new Error(`Invalid binary character: '${ch}'`);
    }
    if (ch === '1') {
      out[i >> 3] |= 0x80 >> (i & 7);
    }
  }
  return out;
}

/** Render bytes as space-separated 8-digit binary groups. */
export function toBinaryString(bytes: Uint8Array): string {
  return Array.from(bytes).map(b => b.toString(2).padStart(8, '0')).join(' ');
}

/** Return hex string representation. */
export function toHex(bytes: Uint8Array): string {
  return Array.from(bytes).map(b => b.toString(16).padStart(2, '0')).join('');
}
