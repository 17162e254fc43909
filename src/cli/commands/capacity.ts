import chalk from 'chalk';
import { loadSvg } from '../../document/index.js';
import { describeCapacity } from '../../steganography/index.js';
import type { CapacityReport } from '../../types/index.js';
import type { CommandContext } from '../context.js';

export interface CapacityCommandOptions {
  json?: boolean;
}

export function formatCapacityReport(report: CapacityReport): string[] {
  const lines = [`Embedding capacity: ${report.capacityBytes} ASCII characters.`];

  if (report.headerFits) {
    lines.push(chalk.gray(`(${report.slots} slots, ${report.headerBits} reserved for the length header)`));
  } else {
    lines.push(chalk.yellow(
      `(${report.slots} slots, fewer than the ${report.headerBits} needed for the length header)`,
    ));
  }

  return lines;
}

/**
 * Capacity command handler
 */
export async function capacityCommand(
  coverFile: string,
  options: CapacityCommandOptions,
  { logger }: CommandContext,
): Promise<void> {
  const svg = await loadSvg(coverFile);
  const report = describeCapacity(svg);
  logger.debug(`${report.slots} embedding slots in ${coverFile}`);

  if (options.json) {
    console.log(JSON.stringify({
      file: coverFile,
      slots: report.slots,
      headerBits: report.headerBits,
      capacityBytes: report.capacityBytes,
    }));
    return;
  }

  for (const line of formatCapacityReport(report)) {
    console.log(line);
  }
}
