import { loadSvg, writeOutput } from '../../document/index.js';
import { extractMessage } from '../../steganography/index.js';
import { formatBytes, startProgress } from '../progress.js';
import type { CommandContext } from '../context.js';

export interface ExtractCommandOptions {
  output?: string;
}

/**
 * Extract command handler
 */
export async function extractCommand(
  stegoFile: string,
  key: string,
  options: ExtractCommandOptions,
  { config, logger }: CommandContext,
): Promise<void> {
  const progress = startProgress('Reading stego-object...', config, logger);

  try {
    const svg = await loadSvg(stegoFile);

    progress.update('Extracting message...');
    const payload = extractMessage(svg, key);
    await writeOutput(payload, options.output);

    progress.succeed(`Extracted ${formatBytes(payload.length)}`);
  } catch (error) {
    progress.fail('Extraction failed');
    throw error;
  }
}
