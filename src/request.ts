/**
 * Read Request issuance
 */

import * as fs from 'fs';
import { DatagramTransport, formatEndpoint } from './connection';
import { encodeReadRequest } from './protocol';
import { Endpoint } from './types';
import { FileNotFoundError, PermissionDeniedError } from './errors';
import { Logger, createLogger } from './logger';

/**
 * Checks that 'filename' names an existing, readable regular file
 *
 * The file's content is never read; the check only exists to fail early
 * with a precise diagnostic.
 */
export async function checkLocalFile(filename: string): Promise<void> {
  let stats: fs.Stats;
  try {
    stats = await fs.promises.stat(filename);
  } catch (error) {
    if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      throw new FileNotFoundError(filename);
    }
    if (isErrnoException(error) && error.code === 'EACCES') {
      throw new PermissionDeniedError(filename);
    }
    throw error;
  }

  if (!stats.isFile()) {
    throw new FileNotFoundError(filename);
  }

  try {
    await fs.promises.access(filename, fs.constants.R_OK);
  } catch (error) {
    if (isErrnoException(error) && (error.code === 'EACCES' || error.code === 'EPERM')) {
      throw new PermissionDeniedError(filename);
    }
    throw error;
  }
}

/**
 * Sends a Read Request for 'filename' to the server
 *
 * The local precondition check runs first; when it fails nothing is sent.
 * The request itself is sent exactly once. A lost request is only noticed
 * by the transfer engine's timeout path.
 */
export async function issueRequest(
  transport: DatagramTransport,
  endpoint: Endpoint,
  filename: string,
  logger: Logger = createLogger('tftp:request')
): Promise<void> {
  const packet = encodeReadRequest(filename);

  await checkLocalFile(filename);

  await transport.send(packet, endpoint);
  logger.info(`Starting TFTP transfer to ${formatEndpoint(endpoint)} to get FILE=${filename}`);
}

// fs rejections may come from another realm, so match on shape rather than prototype
function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error;
}
