import { EMBED_TAGS } from './embedTags.js';
import { HEADER_BITS } from './framer.js';
import { discoverSlots } from './slots.js';
import type { CapacityReport, CarrierDocument, EmbedTagMap } from '../types/index.js';

export function capacityForSlots(slots: number): CapacityReport {
  const headerFits = slots >= HEADER_BITS;
  return {
    slots,
    headerBits: HEADER_BITS,
    capacityBytes: headerFits ? Math.floor((slots - HEADER_BITS) / 8) : 0,
    headerFits,
  };
}

export function describeCapacity(document: CarrierDocument, tags: EmbedTagMap = EMBED_TAGS): CapacityReport {
  return capacityForSlots(discoverSlots(document, tags).length);
}

/**
 * Payload bytes `document` can carry, never negative
 */
export function capacity(document: CarrierDocument, tags: EmbedTagMap = EMBED_TAGS): number {
  return describeCapacity(document, tags).capacityBytes;
}
