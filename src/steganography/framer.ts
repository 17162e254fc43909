import { CapacityExceededError, CapacityMismatchError } from '../errors.js';
import type { Bit } from '../types/index.js';

/** Length header size, in bits */
export const HEADER_BITS = 32;

const MAX_PAYLOAD_BITS = 0xffff_ffff;

/**
 * Bytes to bits, most significant bit first
 */
export function bytesToBits(bytes: Uint8Array): Bit[] {
  const bits: Bit[] = [];
  for (const byte of bytes) {
    for (let shift = 7; shift >= 0; shift--) {
      bits.push((byte >> shift) & 1 ? 1 : 0);
    }
  }
  return bits;
}

/**
 * Bits to bytes, most significant bit first. `bits.length` must be a
 * multiple of 8.
 */
export function bitsToBytes(bits: readonly Bit[]): Uint8Array {
  if (bits.length % 8 !== 0) {
    throw new RangeError(`Bit count ${bits.length} is not a whole number of bytes`);
  }

  const bytes = new Uint8Array(bits.length / 8);
  for (let i = 0; i < bytes.length; i++) {
    let byte = 0;
    for (let j = 0; j < 8; j++) {
      byte = (byte << 1) | bits[i * 8 + j];
    }
    bytes[i] = byte;
  }
  return bytes;
}

function uint32ToBits(value: number): Bit[] {
  const bits: Bit[] = [];
  for (let i = HEADER_BITS - 1; i >= 0; i--) {
    bits.push(Math.floor(value / 2 ** i) % 2 === 1 ? 1 : 0);
  }
  return bits;
}

/**
 * Length-prefixed bitstring: 32-bit big-endian count of payload bits, then
 * the payload bits.
 */
export function frame(payload: Uint8Array): Bit[] {
  const payloadBits = payload.length * 8;
  if (payloadBits > MAX_PAYLOAD_BITS) {
    throw new CapacityExceededError(payloadBits + HEADER_BITS, MAX_PAYLOAD_BITS + HEADER_BITS);
  }
  return [...uint32ToBits(payloadBits), ...bytesToBits(payload)];
}

/**
 * Read a framed payload back out of `slots`, in order.
 *
 * Fails with CapacityMismatchError when the header cannot be read, declares
 * more bits than the remaining slots hold, or declares a partial byte.
 */
export function unframe<S>(slots: readonly S[], readBit: (slot: S) => Bit): Uint8Array {
  if (slots.length < HEADER_BITS) {
    throw new CapacityMismatchError(HEADER_BITS, slots.length, 'too few slots for a length header');
  }

  let declared = 0;
  for (let i = 0; i < HEADER_BITS; i++) {
    declared = declared * 2 + readBit(slots[i]);
  }

  if (declared + HEADER_BITS > slots.length) {
    throw new CapacityMismatchError(declared, slots.length);
  }
  if (declared % 8 !== 0) {
    throw new CapacityMismatchError(declared, slots.length, 'header declares a partial byte');
  }

  const bits: Bit[] = [];
  for (let i = HEADER_BITS; i < HEADER_BITS + declared; i++) {
    bits.push(readBit(slots[i]));
  }
  return bitsToBytes(bits);
}
