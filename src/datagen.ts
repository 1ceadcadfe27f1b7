/**
 * Sample file generation
 *
 * Produces files made of fixed-size blocks, each starting with a
 * "Block <n>" line and padded with 'A', for exercising a server by hand.
 */

import * as fs from 'fs';
import * as path from 'path';
import { TFTP_BLOCK_SIZE } from './types';
import { InvalidArgumentError } from './errors';

export const DEFAULT_SAMPLE_FILE = 'data.txt';
export const DEFAULT_SAMPLE_BLOCKS = 5;

/**
 * Builds the content of one sample block
 */
export function sampleBlock(index: number, blockSize: number = TFTP_BLOCK_SIZE): Buffer {
  const header = `Block ${index}\n`;
  if (header.length > blockSize) {
    throw new InvalidArgumentError(`Block size ${blockSize} cannot hold header "${header.trim()}"`);
  }
  return Buffer.from(header + 'A'.repeat(blockSize - header.length), 'ascii');
}

/**
 * Builds the content of a sample file with 'blocks' blocks numbered from 1
 */
export function generateSampleData(blocks: number = DEFAULT_SAMPLE_BLOCKS, blockSize: number = TFTP_BLOCK_SIZE): Buffer {
  if (!Number.isInteger(blocks) || blocks < 0) {
    throw new InvalidArgumentError(`Invalid block count: ${blocks}`);
  }

  const chunks: Buffer[] = [];
  for (let i = 1; i <= blocks; i++) {
    chunks.push(sampleBlock(i, blockSize));
  }
  return Buffer.concat(chunks);
}

/**
 * Writes a sample file, creating parent directories if needed
 *
 * If the file already exists, it will be truncated.
 */
export async function writeSampleFile(
  filename: string = DEFAULT_SAMPLE_FILE,
  blocks: number = DEFAULT_SAMPLE_BLOCKS,
  blockSize: number = TFTP_BLOCK_SIZE
): Promise<number> {
  const data = generateSampleData(blocks, blockSize);
  await fs.promises.mkdir(path.dirname(filename), { recursive: true });
  await fs.promises.writeFile(filename, data);
  return data.length;
}
