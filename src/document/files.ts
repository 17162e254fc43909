import fs from 'fs/promises';
import { InvalidFileError } from '../errors.js';
import { SvgDocument } from './svgDocument.js';

async function readFileOrFail(filePath: string): Promise<Buffer> {
  try {
    return await fs.readFile(filePath);
  } catch (error) {
    throw new InvalidFileError(filePath, error);
  }
}

/**
 * Read and parse an SVG file
 */
export async function loadSvg(filePath: string): Promise<SvgDocument> {
  const content = await readFileOrFail(filePath);
  return SvgDocument.parse(content.toString('utf-8'), filePath);
}

/**
 * Read a message file as raw bytes
 */
export async function readPayload(filePath: string): Promise<Uint8Array> {
  const content = await readFileOrFail(filePath);
  return new Uint8Array(content);
}

/**
 * Write to `filePath`, or to `stream` (standard output) when none is given
 */
export async function writeOutput(
  data: string | Uint8Array,
  filePath?: string,
  stream: NodeJS.WritableStream = process.stdout,
): Promise<void> {
  if (filePath) {
    try {
      await fs.writeFile(filePath, data);
    } catch (error) {
      throw new InvalidFileError(filePath, error);
    }
    return;
  }

  await new Promise<void>((resolve, reject) => {
    stream.write(data, error => (error ? reject(error) : resolve()));
  });
}
