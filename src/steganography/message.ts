import { CapacityExceededError } from '../errors.js';
import { applyEdits, defaultDigitSource, extractBit, planBit } from './bitCodec.js';
import { EMBED_TAGS } from './embedTags.js';
import { frame, unframe } from './framer.js';
import { PERMUTATION_ALGORITHM, permute } from './permutation.js';
import { discoverSlots } from './slots.js';
import type { CarrierDocument, DigitSource, EmbedTagMap } from '../types/index.js';

export interface MessageOptions {
  tags?: EmbedTagMap;
}

export interface EmbedOptions extends MessageOptions {
  digitSource?: DigitSource;
}

export interface EmbedResult {
  slots: number;
  bitsWritten: number;
  algorithm: string;
}

/**
 * Hide `payload` in `document` (mutated in place) under `key`.
 * Nothing is written unless the whole framed payload fits.
 */
export function embedMessage(
  document: CarrierDocument,
  key: string,
  payload: Uint8Array,
  options: EmbedOptions = {},
): EmbedResult {
  const { tags = EMBED_TAGS, digitSource = defaultDigitSource } = options;

  const slots = permute(discoverSlots(document, tags), key);
  const bits = frame(payload);

  if (bits.length > slots.length) {
    throw new CapacityExceededError(bits.length, slots.length);
  }

  applyEdits(bits.map((bit, i) => planBit(bit, slots[i], digitSource)));

  return {
    slots: slots.length,
    bitsWritten: bits.length,
    algorithm: PERMUTATION_ALGORITHM,
  };
}

/**
 * Recover the payload hidden under `key`. Never modifies `document`.
 */
export function extractMessage(
  document: CarrierDocument,
  key: string,
  options: MessageOptions = {},
): Uint8Array {
  const slots = permute(discoverSlots(document, options.tags ?? EMBED_TAGS), key);
  return unframe(slots, extractBit);
}
