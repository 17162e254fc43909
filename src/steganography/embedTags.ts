import { z } from 'zod';
import type { EmbedTagMap } from '../types/index.js';

export const EmbedTagMapSchema = z.record(
  z.string().min(1),
  z.array(z.string().min(1)).nonempty(),
);

/**
 * Validate a tag -> attributes map supplied by a caller
 */
export function parseEmbedTagMap(input: unknown): EmbedTagMap {
  return EmbedTagMapSchema.parse(input);
}

// Attributes whose values hold plain decimal coordinates
export const EMBED_TAGS: EmbedTagMap = parseEmbedTagMap({
  linearGradient: ['x1', 'y1', 'x2', 'y2'],
  radialGradient: ['cx', 'cy', 'r', 'gradientTransform'],
  path: ['d'],
});
