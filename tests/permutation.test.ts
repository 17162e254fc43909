/**
 * Keyed Permutation Tests
 */

import { describe, it, expect } from 'vitest';
import { KeyedGenerator, permute, PERMUTATION_ALGORITHM } from '../src/steganography/index.js';

const range = (n: number) => Array.from({ length: n }, (_, i) => i);

describe('permute', () => {
  it('should be reproducible for the same key', () => {
    expect(permute(range(100), 'test-secret')).toEqual(permute(range(100), 'test-secret'));
  });

  it('should be a bijection on the input', () => {
    const shuffled = permute(range(100), 'test-secret');
    expect([...shuffled].sort((a, b) => a - b)).toEqual(range(100));
  });

  it('should give different orders for different keys', () => {
    const orders = ['alpha', 'beta', 'gamma', 'delta'].map(key => permute(range(40), key).join(','));
    expect(new Set(orders).size).toBe(4);
  });

  it('should actually reorder', () => {
    expect(permute(range(40), 'test-secret')).not.toEqual(range(40));
  });

  it('should not modify its input', () => {
    const items = range(10);
    permute(items, 'test-secret');
    expect(items).toEqual(range(10));
  });

  it('should handle empty and single-item lists', () => {
    expect(permute([], 'test-secret')).toEqual([]);
    expect(permute(['only'], 'test-secret')).toEqual(['only']);
  });

  it('should treat keys as UTF-8 text', () => {
    expect(permute(range(30), 'clé')).not.toEqual(permute(range(30), 'cle'));
  });

  it('should carry a version tag', () => {
    expect(PERMUTATION_ALGORITHM).toBe('sha256-ctr-fy/1');
  });
});

describe('KeyedGenerator', () => {
  it('should produce the same stream for the same key', () => {
    const a = new KeyedGenerator('test-secret');
    const b = new KeyedGenerator('test-secret');
    const draw = (g: KeyedGenerator) => range(20).map(() => g.nextUint32());

    expect(draw(a)).toEqual(draw(b));
  });

  it('should move to a new block after eight words', () => {
    const generator = new KeyedGenerator('test-secret');
    const words = range(16).map(() => generator.nextUint32());

    expect(words.slice(0, 8)).not.toEqual(words.slice(8));
    expect(words.every(word => Number.isInteger(word) && word >= 0 && word < 2 ** 32)).toBe(true);
  });

  it('should keep indices within bounds', () => {
    const generator = new KeyedGenerator('test-secret');
    for (let bound = 1; bound <= 200; bound++) {
      const index = generator.nextIndex(bound);
      expect(index).toBeGreaterThanOrEqual(0);
      expect(index).toBeLessThan(bound);
    }
  });

  it('should always return 0 for a bound of 1', () => {
    expect(new KeyedGenerator('test-secret').nextIndex(1)).toBe(0);
  });

  it('should reject invalid bounds', () => {
    const generator = new KeyedGenerator('test-secret');
    expect(() => generator.nextIndex(0)).toThrow(RangeError);
    expect(() => generator.nextIndex(2.5)).toThrow(RangeError);
    expect(() => generator.nextIndex(2 ** 32 + 1)).toThrow(RangeError);
  });
});
