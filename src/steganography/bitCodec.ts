import { randomInt } from '../crypto/index.js';
import { slotText } from './slots.js';
import type { Bit, CarrierElement, DigitSource, EmbeddingSlot } from '../types/index.js';

// 0 and 1 never appear as written digits
export const EVEN_DIGITS = ['2', '4', '6', '8'] as const;
export const ODD_DIGITS = ['3', '5', '7', '9'] as const;

/**
 * System randomness, kept apart from the keyed permutation stream
 */
export const defaultDigitSource: DigitSource = bound => randomInt(0, bound);

export interface SlotEdit {
  slot: EmbeddingSlot;
  digit: string;
}

/**
 * Pick a final digit whose parity encodes `bit`
 */
export function digitForBit(bit: Bit, source: DigitSource = defaultDigitSource): string {
  const digits = bit === 0 ? EVEN_DIGITS : ODD_DIGITS;
  const pick = source(digits.length);
  const digit = digits[pick];
  if (digit === undefined) {
    throw new RangeError(`Digit source returned ${pick}, expected an integer in [0, ${digits.length})`);
  }
  return digit;
}

/**
 * Decide the replacement digit for one slot without touching the document
 */
export function planBit(bit: Bit, slot: EmbeddingSlot, source: DigitSource = defaultDigitSource): SlotEdit {
  return { slot, digit: digitForBit(bit, source) };
}

/**
 * Write a batch of slot edits. Edits that share an attribute value are
 * applied to one copy of that value from right to left, then written back
 * once, so no edit ever reads offsets made stale by another.
 */
export function applyEdits(edits: readonly SlotEdit[]): void {
  const byElement = new Map<CarrierElement, Map<string, SlotEdit[]>>();

  for (const edit of edits) {
    const { element, attribute } = edit.slot;
    let byAttribute = byElement.get(element);
    if (!byAttribute) {
      byAttribute = new Map();
      byElement.set(element, byAttribute);
    }
    const group = byAttribute.get(attribute);
    if (group) {
      group.push(edit);
    } else {
      byAttribute.set(attribute, [edit]);
    }
  }

  for (const [element, byAttribute] of byElement) {
    for (const [attribute, group] of byAttribute) {
      const original = element.getAttribute(attribute);
      if (original === null) {
        throw new Error(`Attribute ${attribute} was removed from <${element.tagName}>`);
      }

      let value = original;
      const rightToLeft = [...group].sort((a, b) => b.slot.start - a.slot.start);
      for (const { slot, digit } of rightToLeft) {
        const last = slot.end - 1;
        value = value.slice(0, last) + digit + value.slice(slot.end);
      }

      element.setAttribute(attribute, value);
    }
  }
}

/**
 * Replace the final digit of the slot's literal with one of matching parity
 */
export function embedBit(bit: Bit, slot: EmbeddingSlot, source: DigitSource = defaultDigitSource): void {
  applyEdits([planBit(bit, slot, source)]);
}

/**
 * Parity of the literal's final digit, read from the current attribute value
 */
export function extractBit(slot: EmbeddingSlot): Bit {
  const text = slotText(slot);
  const digit = Number.parseInt(text.charAt(text.length - 1), 10);
  if (Number.isNaN(digit)) {
    throw new Error(`Slot at ${slot.start}-${slot.end} of ${slot.attribute} no longer ends in a digit`);
  }
  return digit % 2 === 0 ? 0 : 1;
}
