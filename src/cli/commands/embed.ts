import { loadSvg, readPayload, writeOutput } from '../../document/index.js';
import { embedMessage } from '../../steganography/index.js';
import { formatBytes, startProgress } from '../progress.js';
import type { CommandContext } from '../context.js';

export interface EmbedCommandOptions {
  output?: string;
}

/**
 * Embed command handler
 */
export async function embedCommand(
  messageFile: string,
  coverFile: string,
  key: string,
  options: EmbedCommandOptions,
  { config, logger }: CommandContext,
): Promise<void> {
  const progress = startProgress('Reading cover image...', config, logger);

  try {
    const payload = await readPayload(messageFile);
    const svg = await loadSvg(coverFile);

    progress.update('Embedding message...');
    const result = embedMessage(svg, key, payload);
    await writeOutput(svg.serialize(), options.output);

    progress.succeed(`Embedded ${formatBytes(payload.length)} into ${coverFile}`);
    logger.debug(`${result.bitsWritten} of ${result.slots} slots used (${result.algorithm})`);
  } catch (error) {
    progress.fail('Embedding failed');
    throw error;
  }
}
