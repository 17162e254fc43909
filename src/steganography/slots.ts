import { EMBED_TAGS } from './embedTags.js';
import type { CarrierDocument, EmbedTagMap, EmbeddingSlot } from '../types/index.js';

// Unsigned, non-exponent decimals only: "12.50" yes, "12" and ".5" no
const DECIMAL_LITERAL = /[0-9]+\.[0-9]+/g;

/**
 * Find every decimal literal in the mapped attributes of `document`.
 *
 * Slots come back in canonical order: element document order, then
 * attribute name, then offset within the attribute value. Both embedding and
 * extraction depend on this order, so it must not follow map or attribute
 * declaration order.
 *
 * Call this once, before any slot is written.
 */
export function discoverSlots(
  document: CarrierDocument,
  tags: EmbedTagMap = EMBED_TAGS,
): readonly EmbeddingSlot[] {
  const slots: EmbeddingSlot[] = [];

  for (const element of document.elementsByTagName(Object.keys(tags))) {
    const attributes = [...new Set(tags[element.tagName] ?? [])].sort();

    for (const attribute of attributes) {
      const value = element.getAttribute(attribute);
      if (value === null) continue;

      for (const match of value.matchAll(DECIMAL_LITERAL)) {
        const start = match.index ?? 0;
        slots.push(Object.freeze({
          element,
          attribute,
          start,
          end: start + match[0].length,
        }));
      }
    }
  }

  return Object.freeze(slots);
}

/**
 * Literal text currently covered by `slot`
 */
export function slotText(slot: EmbeddingSlot): string {
  const value = slot.element.getAttribute(slot.attribute);
  if (value === null) {
    throw new Error(`Attribute ${slot.attribute} was removed from <${slot.element.tagName}>`);
  }
  return value.slice(slot.start, slot.end);
}
