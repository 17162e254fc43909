export * from './steganography/index.js';
export { SvgDocument, SVG_SYSTEM_IDS, loadSvg, readPayload } from './document/index.js';
export * from './errors.js';
export type * from './types/index.js';
