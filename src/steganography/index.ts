export {
  embedMessage,
  extractMessage,
  type EmbedOptions,
  type EmbedResult,
  type MessageOptions,
} from './message.js';

export {
  capacity,
  capacityForSlots,
  describeCapacity,
} from './capacity.js';

export {
  discoverSlots,
  slotText,
} from './slots.js';

export {
  KeyedGenerator,
  permute,
  PERMUTATION_ALGORITHM,
} from './permutation.js';

export {
  embedBit,
  extractBit,
  digitForBit,
  planBit,
  applyEdits,
  defaultDigitSource,
  EVEN_DIGITS,
  ODD_DIGITS,
  type SlotEdit,
} from './bitCodec.js';

export {
  frame,
  unframe,
  bytesToBits,
  bitsToBytes,
  HEADER_BITS,
} from './framer.js';

export {
  EMBED_TAGS,
  EmbedTagMapSchema,
  parseEmbedTagMap,
} from './embedTags.js';
