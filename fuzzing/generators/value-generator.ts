/**
 * Seeded random value generation for codec fuzzing.
 */

import type { Codec } from '../../src/codecs/Codec';

/** Seeded PRNG so failures reproduce from the seed alone. */
export class Rng {
  private state: number;

  constructor(seed: number) {
    this.state = seed;
  }

  /** Returns a float in [0, 1). */
  next(): number {
    // xorshift32
    this.state ^= this.state << 13;
    this.state ^= this.state >> 17;
    this.state ^= this.state << 5;
    return (this.state >>> 0) / 0x100000000;
  }

  /** Returns an integer in [min, max] inclusive. */
  int(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  /** Returns a random element from an array. */
  pick<T>(arr: readonly T[]): T {
    return arr[this.int(0, arr.length - 1)];
  }

  /** Returns true with the given probability. */
  chance(p: number): boolean {
    return this.next() < p;
  }

  /** Returns `count` random bytes. */
  bytes(count: number): Uint8Array {
    const out = new Uint8Array(count);
    for (let i = 0; i < count; i++) {
      out[i] = this.int(0, 255);
    }
    return out;
  }
}

/** A codec paired with a generator of values it accepts. */
export interface Arbitrary<T> {
  name: string;
  codec: Codec<T>;
  gen: (rng: Rng) => T;
}

export function arbitrary<T>(name: string, codec: Codec<T>, gen: (rng: Rng) => T): Arbitrary<T> {
  return { name, codec, gen };
}

// Edge values turn up often enough to hit all-ones and all-zeros lanes.
const EDGE_CHANCE = 0.2;

export function unsignedNumber(rng: Rng, width: number): number {
  const max = 2 ** width - 1;
  if (rng.chance(EDGE_CHANCE)) {
    return rng.pick([0, 1, max, Math.floor(max / 2)]);
  }
  return Math.floor(rng.next() * 2 ** width);
}

export function signedNumber(rng: Rng, width: number): number {
  const u = unsignedNumber(rng, width);
  return u > 2 ** (width - 1) - 1 ? u - 2 ** width : u;
}

export function unsignedBigint(rng: Rng, width: number): bigint {
  const max = (1n << BigInt(width)) - 1n;
  if (rng.chance(EDGE_CHANCE)) {
    return rng.pick([0n, 1n, max, max >> 1n]);
  }
  let v = 0n;
  for (let i = 0; i < Math.ceil(width / 32); i++) {
    v = (v << 32n) | BigInt(rng.int(0, 0xffffffff));
  }
  return BigInt.asUintN(width, v);
}

export function signedBigint(rng: Rng, width: number): bigint {
  return BigInt.asIntN(width, unsignedBigint(rng, width));
}

export function booleans(rng: Rng, count: number): boolean[] {
  return Array.from({ length: count }, () => rng.chance(0.5));
}
