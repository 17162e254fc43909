export { SvgDocument, SVG_SYSTEM_IDS } from './svgDocument.js';
export { loadSvg, readPayload, writeOutput } from './files.js';
