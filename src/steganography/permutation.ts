import { sha256 } from '../crypto/index.js';

/**
 * Identifier of the keyed shuffle below. Stego-objects written under one
 * version can only be read back by the same version.
 */
export const PERMUTATION_ALGORITHM = 'sha256-ctr-fy/1';

const UINT32_RANGE = 0x1_0000_0000;

/**
 * Deterministic word stream derived from a stego-key.
 *
 * seed    = SHA-256(utf8(key))
 * block i = SHA-256(seed || uint32_be(i)), read as eight big-endian words
 */
export class KeyedGenerator {
  private readonly seed: Buffer;
  private counter = 0;
  private block: Buffer = Buffer.alloc(0);
  private offset = 0;

  constructor(key: string) {
    this.seed = sha256(key);
  }

  nextUint32(): number {
    if (this.offset >= this.block.length) {
      const counter = Buffer.alloc(4);
      counter.writeUInt32BE(this.counter);
      this.block = sha256(Buffer.concat([this.seed, counter]));
      this.counter++;
      this.offset = 0;
    }

    const word = this.block.readUInt32BE(this.offset);
    this.offset += 4;
    return word;
  }

  /**
   * Unbiased integer in [0, bound) by rejection sampling
   */
  nextIndex(bound: number): number {
    if (!Number.isInteger(bound) || bound < 1 || bound > UINT32_RANGE) {
      throw new RangeError(`Index bound must be an integer in [1, 2^32], got ${bound}`);
    }

    const limit = Math.floor(UINT32_RANGE / bound) * bound;
    let word = this.nextUint32();
    while (word >= limit) {
      word = this.nextUint32();
    }
    return word % bound;
  }
}

/**
 * Fisher-Yates shuffle of a copy of `items`, driven only by `key`.
 * The same key and length always give the same order.
 */
export function permute<T>(items: readonly T[], key: string): T[] {
  const shuffled = [...items];
  const generator = new KeyedGenerator(key);

  for (let i = shuffled.length - 1; i > 0; i--) {
    const j = generator.nextIndex(i + 1);
    [shuffled[i], shuffled[j]] = [shuffled[j], shuffled[i]];
  }

  return shuffled;
}
