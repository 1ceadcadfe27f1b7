#!/usr/bin/env node
/**
 * Command-line entry point
 *
 *   tftp-read [file] [-m rx] [-p port] [-H host] [-o output] [-v]
 *   tftp-read generate [file] [-b blocks]
 */

import { Client } from './client';
import { writeSampleFile, DEFAULT_SAMPLE_BLOCKS, DEFAULT_SAMPLE_FILE } from './datagen';
import { InvalidArgumentError, TftpError } from './errors';
import { createLogger } from './logger';
import { DEFAULT_HOST, DEFAULT_PORT } from './types';

export const USAGE = [
  'Usage: tftp-read [file] [-m rx] [-p port] [-H host] [-o output] [-v]',
  '       tftp-read generate [file] [-b blocks]',
].join('\n');

export interface DownloadCommand {
  command: 'download';
  file: string;
  mode: string;
  host: string;
  port: number;
  output: string;
  verbose: boolean;
}

export interface GenerateCommand {
  command: 'generate';
  file: string;
  blocks: number;
}

export interface HelpCommand {
  command: 'help';
}

export type CliCommand = DownloadCommand | GenerateCommand | HelpCommand;

function parseInteger(flag: string, value: string | undefined): number {
  if (value === undefined || !/^\d+$/.test(value)) {
    throw new InvalidArgumentError(`${flag} expects an integer, got ${value ?? 'nothing'}`);
  }
  return parseInt(value, 10);
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined) {
    throw new InvalidArgumentError(`${flag} expects a value`);
  }
  return value;
}

/**
 * Parses arguments (without the node executable and script path)
 */
export function parseArguments(argv: string[]): CliCommand {
  const args = [...argv];

  if (args.includes('-h') || args.includes('--help')) {
    return { command: 'help' };
  }

  if (args[0] === 'generate') {
    args.shift();
    const generate: GenerateCommand = { command: 'generate', file: DEFAULT_SAMPLE_FILE, blocks: DEFAULT_SAMPLE_BLOCKS };
    let fileSeen = false;

    while (args.length > 0) {
      const arg = args.shift();
      if (arg === '-b') {
        generate.blocks = parseInteger(arg, args.shift());
      } else if (arg !== undefined && !arg.startsWith('-') && !fileSeen) {
        generate.file = arg;
        fileSeen = true;
      } else {
        throw new InvalidArgumentError(`Unexpected argument: ${arg}`);
      }
    }
    return generate;
  }

  let file = DEFAULT_SAMPLE_FILE;
  let fileSeen = false;
  let output: string | undefined;
  const download: Omit<DownloadCommand, 'file' | 'output'> = {
    command: 'download',
    mode: 'rx',
    host: DEFAULT_HOST,
    port: DEFAULT_PORT,
    verbose: false,
  };

  while (args.length > 0) {
    const arg = args.shift();
    switch (arg) {
      case '-m':
        download.mode = requireValue(arg, args.shift());
        break;
      case '-p':
        download.port = parseInteger(arg, args.shift());
        break;
      case '-H':
        download.host = requireValue(arg, args.shift());
        break;
      case '-o':
        output = requireValue(arg, args.shift());
        break;
      case '-v':
        download.verbose = true;
        break;
      default:
        if (arg !== undefined && !arg.startsWith('-') && !fileSeen) {
          file = arg;
          fileSeen = true;
        } else {
          throw new InvalidArgumentError(`Unexpected argument: ${arg}`);
        }
    }
  }

  return { ...download, file, output: output ?? file };
}

/**
 * Runs the CLI and returns the process exit code
 */
export async function main(argv: string[]): Promise<number> {
  const logger = createLogger('tftp');

  let command: CliCommand;
  try {
    command = parseArguments(argv);
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    console.error(USAGE);
    return 1;
  }

  if (command.command === 'help') {
    console.log(USAGE);
    return 0;
  }

  if (command.command === 'generate') {
    const size = await writeSampleFile(command.file, command.blocks);
    logger.info(`Wrote ${size} bytes (${command.blocks} blocks) to ${command.file}`);
    return 0;
  }

  if (command.mode !== 'rx') {
    console.error('Unsupported mode. Use -m rx for reading a file.');
    return 1;
  }

  if (command.verbose) {
    logger.setLevel('debug');
  }

  let client: Client;
  try {
    client = new Client({ host: command.host, port: command.port, logger });
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    return 1;
  }

  try {
    const result = await client.downloadToFile(command.file, command.output);
    logger.info(`Received ${result.bytesWritten} bytes in ${result.blocks} blocks into ${command.output}`);
    return 0;
  } catch (error) {
    if (error instanceof TftpError) {
      logger.error(`${error.kind}: ${error.message}`);
      return 1;
    }
    throw error;
  } finally {
    await client.close();
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    }
  );
}
