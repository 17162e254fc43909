import { Command, CommanderError } from 'commander';
import chalk from 'chalk';
import { createRequire } from 'module';
import { z } from 'zod';
import { isSteganographyError, UsageError } from '../errors.js';
import { capacityCommand, embedCommand, extractCommand } from './commands/index.js';
import { createContext, type CommandContext } from './context.js';
import { createLogger } from './logger.js';

// Get version from package.json
const require = createRequire(import.meta.url);
const pkg = z.object({ version: z.string() }).parse(require('../../package.json'));

export const USAGE = [
  'Usage:',
  '  vectorsteg embed <message-file> <cover-file> <key>',
  '  vectorsteg extract <stego-file> <key>',
  '  vectorsteg capacity <cover-file>',
].join('\n');

export function createProgram(ctx: CommandContext): Command {
  const program = new Command();

  program
    .name('vectorsteg')
    .description('Hide messages in the decimal digits of SVG images')
    .version(pkg.version, '-v, --version', 'Show version number')
    .exitOverride()
    .showHelpAfterError()
    .configureOutput({
      outputError: (str, write) => write(chalk.red(str)),
    });

  // Embed command
  program
    .command('embed <message-file> <cover-file> <key>')
    .description('Embed a message file in a cover image and print the result')
    .option('-o, --output <file>', 'Write the stego-object to a file instead of stdout')
    .allowExcessArguments(false)
    .action(async (messageFile: string, coverFile: string, key: string, options: { output?: string }) => {
      await embedCommand(messageFile, coverFile, key, options, ctx);
    });

  // Extract command
  program
    .command('extract <stego-file> <key>')
    .description('Extract a message from a stego-object')
    .option('-o, --output <file>', 'Write the message to a file instead of stdout')
    .allowExcessArguments(false)
    .action(async (stegoFile: string, key: string, options: { output?: string }) => {
      await extractCommand(stegoFile, key, options, ctx);
    });

  // Capacity command
  program
    .command('capacity <cover-file>')
    .description('Show how many bytes a cover image can carry')
    .option('--json', 'Print the report as JSON')
    .allowExcessArguments(false)
    .action(async (coverFile: string, options: { json?: boolean }) => {
      await capacityCommand(coverFile, options, ctx);
    });

  return program;
}

/**
 * Run the CLI and return the process exit status
 */
export async function run(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  let ctx: CommandContext;
  try {
    ctx = createContext(env);
  } catch (error) {
    return report(error, createLogger('error'));
  }

  const program = createProgram(ctx);

  if (argv.length <= 2) {
    return report(new UsageError(`No command given\n${USAGE}`), ctx.logger);
  }

  try {
    await program.parseAsync(argv);
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      // commander has already printed its own message
      return error.exitCode === 0 ? 0 : new UsageError(error.message).exitCode;
    }
    return report(error, ctx.logger);
  }
}

function report(error: unknown, logger: CommandContext['logger']): number {
  if (isSteganographyError(error)) {
    logger.error(error.message);
    return error.exitCode;
  }
  logger.error(error instanceof Error ? error.message : String(error));
  return 1;
}
