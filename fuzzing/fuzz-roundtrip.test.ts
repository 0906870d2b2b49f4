/**
 * Randomized round-trip tests for every built-in codec.
 *
 * Each value is packed at offsets 0..16 into a buffer pre-filled with noise,
 * then unpacked again. The value must survive and every bit outside the
 * field must keep its noise.
 */

import {
  bool,
  uint8, uint16, uint32, uint64, uint128, uintptr,
  int8, int16, int32, int64, int128, intptr,
} from '../src/primitives';
import { UnsignedIntegerCodec, SignedIntegerCodec } from '../src/codecs/IntegerCodec';
import { BigUnsignedIntegerCodec } from '../src/codecs/BigIntegerCodec';
import { array } from '../src/codecs/ArrayCodec';
import { tuple } from '../src/codecs/TupleCodec';
import { struct } from '../src/codecs/StructCodec';
import { toBinaryString } from '../src/helpers';
import {
  Rng,
  Arbitrary,
  arbitrary,
  unsignedNumber,
  signedNumber,
  unsignedBigint,
  signedBigint,
  booleans,
} from './generators/value-generator';

const FUZZ_ITERATIONS = Number(process.env.FUZZ_ITERATIONS) || 200;
const MAX_OFFSET = 16;

const uint12 = new UnsignedIntegerCodec(12);
const int5 = new SignedIntegerCodec(5);
const uint40 = new BigUnsignedIntegerCodec(40);

const ARBITRARIES: Arbitrary<unknown>[] = [
  arbitrary('bool', bool, rng => rng.chance(0.5)),
  arbitrary('uint8', uint8, rng => unsignedNumber(rng, 8)),
  arbitrary('uint16', uint16, rng => unsignedNumber(rng, 16)),
  arbitrary('uint32', uint32, rng => unsignedNumber(rng, 32)),
  arbitrary('uint64', uint64, rng => unsignedBigint(rng, 64)),
  arbitrary('uint128', uint128, rng => unsignedBigint(rng, 128)),
  arbitrary('uintptr', uintptr, rng => unsignedBigint(rng, 64)),
  arbitrary('int8', int8, rng => signedNumber(rng, 8)),
  arbitrary('int16', int16, rng => signedNumber(rng, 16)),
  arbitrary('int32', int32, rng => signedNumber(rng, 32)),
  arbitrary('int64', int64, rng => signedBigint(rng, 64)),
  arbitrary('int128', int128, rng => signedBigint(rng, 128)),
  arbitrary('intptr', intptr, rng => signedBigint(rng, 64)),
  arbitrary('uint12', uint12, rng => unsignedNumber(rng, 12)),
  arbitrary('int5', int5, rng => signedNumber(rng, 5)),
  arbitrary('uint40', uint40, rng => unsignedBigint(rng, 40)),
  arbitrary('bool[14]', array(bool, 14), rng => booleans(rng, 14)),
  arbitrary('bool[64]', array(bool, 64), rng => booleans(rng, 64)),
  arbitrary('int16[5]', array(int16, 5), rng =>
    Array.from({ length: 5 }, () => signedNumber(rng, 16))),
  arbitrary('(uint8, uint16, uint32)', tuple(uint8, uint16, uint32), rng => [
    unsignedNumber(rng, 8),
    unsignedNumber(rng, 16),
    unsignedNumber(rng, 32),
  ]),
  arbitrary('(int8, uint16, int128)', tuple(int8, uint16, int128), rng => [
    signedNumber(rng, 8),
    unsignedNumber(rng, 16),
    signedBigint(rng, 128),
  ]),
  arbitrary(
    '(uint8, uint16, uint32, uint64, uint128, uintptr)',
    tuple(uint8, uint16, uint32, uint64, uint128, uintptr),
    rng => [
      unsignedNumber(rng, 8),
      unsignedNumber(rng, 16),
      unsignedNumber(rng, 32),
      unsignedBigint(rng, 64),
      unsignedBigint(rng, 128),
      unsignedBigint(rng, 64),
    ],
  ),
  arbitrary(
    '(int8, int16, int32, int64, int128, intptr)',
    tuple(int8, int16, int32, int64, int128, intptr),
    rng => [
      signedNumber(rng, 8),
      signedNumber(rng, 16),
      signedNumber(rng, 32),
      signedBigint(rng, 64),
      signedBigint(rng, 128),
      signedBigint(rng, 64),
    ],
  ),
  arbitrary(
    '{ kind: uint12, flags: bool[3], delta: int5 }',
    struct({ kind: uint12, flags: array(bool, 3), delta: int5 }),
    rng => ({
      kind: unsignedNumber(rng, 12),
      flags: booleans(rng, 3),
      delta: signedNumber(rng, 5),
    }),
  ),
];

function bitAt(buffer: Uint8Array, index: number): number {
  return (buffer[index >> 3] >> (7 - (index & 7))) & 1;
}

/** Bit positions outside `[start, end)` whose value differs between `a` and `b`. */
function changedOutside(a: Uint8Array, b: Uint8Array, start: number, end: number): number[] {
  const changed: number[] = [];
  for (let i = 0; i < a.length * 8; i++) {
    if ((i < start || i >= end) && bitAt(a, i) !== bitAt(b, i)) {
      changed.push(i);
    }
  }
  return changed;
}

describe('Round-trip fuzzing: every codec at offsets 0..16', () => {
  for (const [index, arb] of ARBITRARIES.entries()) {
    it(`round-trips ${arb.name} without disturbing neighbouring bits`, () => {
      const rng = new Rng(index * 7919 + 100000);
      const byteLength = Math.floor(arb.codec.width / 8) + 3;

      for (let i = 0; i < FUZZ_ITERATIONS; i++) {
        const value = arb.gen(rng);
        for (let offset = 0; offset <= MAX_OFFSET; offset++) {
          const before = rng.bytes(byteLength);
          const buffer = new Uint8Array(before);

          arb.codec.pack(value, buffer, offset);
          const unpacked = arb.codec.unpack(buffer, offset);
          if (!isEqual(unpacked, value)) {
            console.error(`${arb.name} at offset ${offset}: ${toBinaryString(buffer)}`);
          }
          expect(unpacked).toEqual(value);
          expect(changedOutside(before, buffer, offset, offset + arb.codec.width)).toEqual([]);
        }
      }
    });
  }
});

describe('Round-trip fuzzing: aligned offsets match big-endian bytes', () => {
  const cases: Array<[string, number, (rng: Rng) => bigint]> = [
    ['uint16', 16, rng => BigInt(unsignedNumber(rng, 16))],
    ['uint32', 32, rng => BigInt(unsignedNumber(rng, 32))],
    ['uint64', 64, rng => unsignedBigint(rng, 64)],
    ['uint128', 128, rng => unsignedBigint(rng, 128)],
  ];

  for (const [name, width, gen] of cases) {
    it(`packs ${name} at byte-aligned offsets as its big-endian bytes`, () => {
      const rng = new Rng(width + 200000);
      for (let i = 0; i < FUZZ_ITERATIONS; i++) {
        const value = gen(rng);
        const hex = value.toString(16).padStart(width / 4, '0');
        const pairs: string[] = hex.match(/../g) ?? [];
        const expected = new Uint8Array(pairs.map(h => parseInt(h, 16)));

        for (const offset of [0, 8, 16]) {
          const buffer = new Uint8Array(width / 8 + 3);
          if (width <= 32) {
            const codec = width === 16 ? uint16 : uint32;
            codec.pack(Number(value), buffer, offset);
          } else {
            const codec = width === 64 ? uint64 : uint128;
            codec.pack(value, buffer, offset);
          }
          expect(buffer.subarray(offset / 8, offset / 8 + width / 8)).toEqual(expected);
        }
      }
    });
  }
});

describe('Round-trip fuzzing: tuples equal their members packed by hand', () => {
  it('packs (uint16, bool, uint16, bool) like four separate packs', () => {
    const codec = tuple(uint16, bool, uint16, bool);
    const rng = new Rng(424242);

    for (let i = 0; i < FUZZ_ITERATIONS; i++) {
      const value: [number, boolean, number, boolean] = [
        unsignedNumber(rng, 16),
        rng.chance(0.5),
        unsignedNumber(rng, 16),
        rng.chance(0.5),
      ];
      for (let offset = 0; offset <= MAX_OFFSET; offset++) {
        const manual = new Uint8Array(8);
        const packed = new Uint8Array(8);
        uint16.pack(value[0], manual, offset);
        bool.pack(value[1], manual, offset + 16);
        uint16.pack(value[2], manual, offset + 17);
        bool.pack(value[3], manual, offset + 33);

        codec.pack(value, packed, offset);
        expect(packed).toEqual(manual);
        expect(codec.unpack(packed, offset)).toEqual(value);
      }
    }
  });
});

function isEqual(a: unknown, b: unknown): boolean {
  return JSON.stringify(a, replacer) === JSON.stringify(b, replacer);
}

function replacer(_key: string, v: unknown): unknown {
  return typeof v === 'bigint' ? `${v}n` : v;
}
