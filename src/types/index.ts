/**
 * Element handle exposed by a parsed carrier document
 */
export interface CarrierElement {
  readonly tagName: string;
  /** Position among all elements of the document, in document order */
  readonly index: number;
  getAttribute(name: string): string | null;
  setAttribute(name: string, value: string): void;
}

/**
 * Parsed carrier document (the Document Adapter seam)
 */
export interface CarrierDocument {
  elementsByTagName(tagNames: Iterable<string>): CarrierElement[];
  serialize(): string;
}

export type Bit = 0 | 1;

/**
 * Tag name -> ordered attribute names that hold embeddable numbers
 */
export type EmbedTagMap = Readonly<Record<string, readonly string[]>>;

/**
 * One decimal literal inside one attribute value. `start`/`end` are offsets
 * into the attribute string as it was when the slot was discovered.
 */
export interface EmbeddingSlot {
  readonly element: CarrierElement;
  readonly attribute: string;
  readonly start: number;
  readonly end: number;
}

/**
 * Returns an integer in [0, bound)
 */
export type DigitSource = (bound: number) => number;

export interface CapacityReport {
  slots: number;
  headerBits: number;
  /** Clamped to zero when the header alone does not fit */
  capacityBytes: number;
  headerFits: boolean;
}
