/**
 * Bit Codec Tests
 */

import { describe, it, expect } from 'vitest';
import { SvgDocument } from '../src/document/index.js';
import {
  applyEdits,
  digitForBit,
  discoverSlots,
  embedBit,
  extractBit,
  planBit,
  slotText,
} from '../src/steganography/index.js';
import { firstDigit, svgSource } from './setup.js';

function twoSlotDocument() {
  const doc = SvgDocument.parse(svgSource('<path d="M 1.50 22.25"/>'));
  const [first, second] = discoverSlots(doc);
  if (!first || !second) throw new Error('expected two slots');
  const d = () => doc.elementsByTagName(['path'])[0]?.getAttribute('d');
  return { first, second, d };
}

describe('digitForBit', () => {
  it('should pick even digits from 2-8 for a zero bit', () => {
    expect([0, 1, 2, 3].map(i => digitForBit(0, () => i))).toEqual(['2', '4', '6', '8']);
  });

  it('should pick odd digits from 3-9 for a one bit', () => {
    expect([0, 1, 2, 3].map(i => digitForBit(1, () => i))).toEqual(['3', '5', '7', '9']);
  });

  it('should never write 0 or 1 with system randomness', () => {
    for (let i = 0; i < 200; i++) {
      const digit = digitForBit(i % 2 === 0 ? 0 : 1);
      expect(['0', '1']).not.toContain(digit);
      expect(Number(digit) % 2).toBe(i % 2);
    }
  });

  it('should reject an out-of-range digit source', () => {
    expect(() => digitForBit(0, () => 4)).toThrow(RangeError);
  });
});

describe('embedBit', () => {
  it('should change only the final digit of the literal', () => {
    const { first, d } = twoSlotDocument();

    embedBit(1, first, firstDigit);

    expect(d()).toBe('M 1.53 22.25');
  });

  it('should leave sibling offsets valid', () => {
    const { first, second, d } = twoSlotDocument();

    embedBit(1, first, firstDigit);
    embedBit(0, second, () => 3);

    expect(d()).toBe('M 1.53 22.28');
    expect(slotText(second)).toBe('22.28');
  });
});

describe('applyEdits', () => {
  it('should rebuild a shared attribute value once from all edits', () => {
    const { first, second, d } = twoSlotDocument();

    applyEdits([planBit(0, second, () => 1), planBit(1, first, () => 2)]);

    expect(d()).toBe('M 1.57 22.24');
  });

  it('should do nothing for an empty batch', () => {
    const { d } = twoSlotDocument();
    applyEdits([]);
    expect(d()).toBe('M 1.50 22.25');
  });
});

describe('extractBit', () => {
  it('should read parity of the final digit', () => {
    const { first, second } = twoSlotDocument();

    expect(extractBit(first)).toBe(0);
    expect(extractBit(second)).toBe(1);
  });

  it('should read back what embedBit wrote', () => {
    const { first, second } = twoSlotDocument();

    embedBit(1, first);
    embedBit(0, second);

    expect(extractBit(first)).toBe(1);
    expect(extractBit(second)).toBe(0);
  });

  it('should not modify the document', () => {
    const { first, d } = twoSlotDocument();
    extractBit(first);
    expect(d()).toBe('M 1.50 22.25');
  });
});
