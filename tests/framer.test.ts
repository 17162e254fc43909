/**
 * Message Framing Tests
 */

import { describe, it, expect } from 'vitest';
import { CapacityMismatchError } from '../src/errors.js';
import { bitsToBytes, bytesToBits, frame, HEADER_BITS, unframe } from '../src/steganography/index.js';
import type { Bit } from '../src/types/index.js';

const identity = (bit: Bit) => bit;

function header(value: number): Bit[] {
  return Array.from({ length: 32 }, (_, i) => (Math.floor(value / 2 ** (31 - i)) % 2 === 1 ? 1 : 0));
}

describe('bytesToBits', () => {
  it('should emit the most significant bit first', () => {
    expect(bytesToBits(Uint8Array.from([0x68]))).toEqual([0, 1, 1, 0, 1, 0, 0, 0]);
    expect(bytesToBits(Uint8Array.from([0x01, 0x80]))).toEqual([0, 0, 0, 0, 0, 0, 0, 1, 1, 0, 0, 0, 0, 0, 0, 0]);
  });
});

describe('bitsToBytes', () => {
  it('should group bits most significant first', () => {
    expect(Array.from(bitsToBytes([0, 1, 1, 0, 1, 0, 0, 1]))).toEqual([0x69]);
  });

  it('should reject a partial byte', () => {
    expect(() => bitsToBytes([1, 0, 1])).toThrow(RangeError);
  });
});

describe('frame', () => {
  it('should prefix a 32-bit count of payload bits', () => {
    const bits = frame(new TextEncoder().encode('hi'));

    expect(bits).toHaveLength(48);
    expect(bits.slice(0, HEADER_BITS)).toEqual(header(16));
    expect(bits.slice(32, 40)).toEqual([0, 1, 1, 0, 1, 0, 0, 0]);
    expect(bits.slice(40)).toEqual([0, 1, 1, 0, 1, 0, 0, 1]);
  });

  it('should frame an empty payload as a zero header', () => {
    expect(frame(new Uint8Array(0))).toEqual(header(0));
  });

  it('should encode large counts big-endian', () => {
    const bits = frame(new Uint8Array(300));
    expect(bits.slice(0, HEADER_BITS)).toEqual(header(2400));
  });
});

describe('unframe', () => {
  it('should recover the framed payload', () => {
    const payload = Uint8Array.from([0, 7, 128, 255, 42]);
    expect(Array.from(unframe(frame(payload), identity))).toEqual([0, 7, 128, 255, 42]);
  });

  it('should ignore slots after the declared length', () => {
    const bits: Bit[] = [...frame(Uint8Array.from([0x41])), 1, 1, 0, 1];
    expect(Array.from(unframe(bits, identity))).toEqual([0x41]);
  });

  it('should read an empty payload', () => {
    expect(unframe(header(0), identity)).toHaveLength(0);
  });

  it('should reject a header longer than the remaining slots', () => {
    const bits: Bit[] = [...header(24), ...Array<Bit>(16).fill(0)];
    expect(() => unframe(bits, identity)).toThrow(CapacityMismatchError);
  });

  it('should reject a header that declares a partial byte', () => {
    const bits: Bit[] = [...header(4), 1, 0, 1, 0, 0, 0, 0, 0];
    expect(() => unframe(bits, identity)).toThrow(/partial byte/);
  });

  it('should reject fewer slots than the header needs', () => {
    expect(() => unframe(Array<Bit>(31).fill(0), identity)).toThrow(CapacityMismatchError);
  });

  it('should read bits through the supplied reader in slot order', () => {
    const slots = frame(Uint8Array.from([0xa5])).map((bit, position) => ({ bit, position }));
    const visited: number[] = [];

    const payload = unframe(slots, slot => {
      visited.push(slot.position);
      return slot.bit;
    });

    expect(Array.from(payload)).toEqual([0xa5]);
    expect(visited).toEqual(Array.from({ length: 40 }, (_, i) => i));
  });
});
