export { embedCommand, type EmbedCommandOptions } from './embed.js';
export { extractCommand, type ExtractCommandOptions } from './extract.js';
export { capacityCommand, formatCapacityReport, type CapacityCommandOptions } from './capacity.js';
