/**
 * TFTP Error Definitions
 *
 * This module defines all error types for the TFTP client.
 * Errors are categorized into local precondition errors, protocol errors,
 * liveness errors, and network errors.
 */

import { ServerErrorCode } from './types';

/**
 * Stable identifier of each failure kind, used for diagnostics and exit reporting
 */
export type TftpErrorKind =
  | 'FileNotFound'
  | 'PermissionDenied'
  | 'UnexpectedOpcode'
  | 'OutOfOrderBlock'
  | 'InvalidPacket'
  | 'MaxRetriesExceeded'
  | 'Network'
  | 'InvalidArgument'
  | 'ClientClosed';

/**
 * Base exception for all TFTP errors
 */
export class TftpError extends Error {
  public readonly kind: TftpErrorKind;

  constructor(kind: TftpErrorKind, message: string) {
    super(message);
    this.name = 'TftpError';
    this.kind = kind;
    Object.setPrototypeOf(this, TftpError.prototype);
  }
}

/**
 * Client has been closed
 */
export class ClientClosedError extends TftpError {
  constructor() {
    super('ClientClosed', 'Client is closed');
    this.name = 'ClientClosedError';
    Object.setPrototypeOf(this, ClientClosedError.prototype);
  }
}

/**
 * Local path named in the request does not exist
 */
export class FileNotFoundError extends TftpError {
  public readonly filename: string;

  constructor(filename: string) {
    super('FileNotFound', `The file '${filename}' does not exist`);
    this.name = 'FileNotFoundError';
    this.filename = filename;
    Object.setPrototypeOf(this, FileNotFoundError.prototype);
  }
}

/**
 * Local path named in the request cannot be read
 */
export class PermissionDeniedError extends TftpError {
  public readonly filename: string;

  constructor(filename: string) {
    super('PermissionDenied', `The file '${filename}' cannot be read due to permission issues`);
    this.name = 'PermissionDeniedError';
    this.filename = filename;
    Object.setPrototypeOf(this, PermissionDeniedError.prototype);
  }
}

/**
 * Server answered with something other than a DATA packet
 *
 * When the server sent an ERROR packet, its code and message are kept.
 */
export class UnexpectedOpcodeError extends TftpError {
  public readonly opcode: number;
  public readonly serverCode?: number;
  public readonly serverMessage?: string;

  constructor(opcode: number, serverCode?: number, serverMessage?: string) {
    super(
      'UnexpectedOpcode',
      serverCode === undefined
        ? `Received packet with unexpected opcode ${opcode}`
        : `Received packet with unexpected opcode ${opcode}: server error ${serverCode} ` +
            `(${describeServerError(serverCode)})${serverMessage ? `: ${serverMessage}` : ''}`
    );
    this.name = 'UnexpectedOpcodeError';
    this.opcode = opcode;
    this.serverCode = serverCode;
    this.serverMessage = serverMessage;
    Object.setPrototypeOf(this, UnexpectedOpcodeError.prototype);
  }
}

/**
 * DATA packet carried a block number other than the expected one
 */
export class OutOfOrderBlockError extends TftpError {
  public readonly expected: number;
  public readonly received: number;

  constructor(expected: number, received: number) {
    super('OutOfOrderBlock', `Received out-of-order block #${received}. Expected block #${expected}`);
    this.name = 'OutOfOrderBlockError';
    this.expected = expected;
    this.received = received;
    Object.setPrototypeOf(this, OutOfOrderBlockError.prototype);
  }
}

/**
 * Datagram too short to carry a packet header
 */
export class InvalidPacketError extends TftpError {
  constructor(details?: string) {
    super('InvalidPacket', details ? `Invalid packet: ${details}` : 'Invalid packet');
    this.name = 'InvalidPacketError';
    Object.setPrototypeOf(this, InvalidPacketError.prototype);
  }
}

/**
 * Server stayed silent for more consecutive timeouts than allowed
 */
export class MaxRetriesExceededError extends TftpError {
  public readonly retries: number;

  constructor(retries: number) {
    super('MaxRetriesExceeded', `Timeout waiting for data, maximum retries (${retries}) reached`);
    this.name = 'MaxRetriesExceededError';
    this.retries = retries;
    Object.setPrototypeOf(this, MaxRetriesExceededError.prototype);
  }
}

/**
 * Invalid argument was provided
 */
export class InvalidArgumentError extends TftpError {
  constructor(details?: string) {
    super('InvalidArgument', details ? `Invalid argument: ${details}` : 'Invalid argument');
    this.name = 'InvalidArgumentError';
    Object.setPrototypeOf(this, InvalidArgumentError.prototype);
  }
}

/**
 * Socket-level failure during communication
 */
export class NetworkError extends TftpError {
  public readonly operation: string;
  public readonly addr: string;
  public readonly originalError: Error;

  constructor(operation: string, addr: string, originalError: Error) {
    super('Network', `Network error during ${operation} to ${addr}: ${originalError.message}`);
    this.name = 'NetworkError';
    this.operation = operation;
    this.addr = addr;
    this.originalError = originalError;
    Object.setPrototypeOf(this, NetworkError.prototype);
  }
}

/**
 * Maps TFTP ERROR packet codes to their RFC 1350 descriptions
 *
 *   0: Not defined
 *   1: File not found
 *   2: Access violation
 *   3: Disk full or allocation exceeded
 *   4: Illegal TFTP operation
 *   5: Unknown transfer ID
 *   6: File already exists
 *   7: No such user
 */
export function describeServerError(code: number): string {
  switch (code) {
    case ServerErrorCode.NOT_DEFINED:
      return 'Not defined';
    case ServerErrorCode.FILE_NOT_FOUND:
      return 'File not found';
    case ServerErrorCode.ACCESS_VIOLATION:
      return 'Access violation';
    case ServerErrorCode.DISK_FULL:
      return 'Disk full or allocation exceeded';
    case ServerErrorCode.ILLEGAL_OPERATION:
      return 'Illegal TFTP operation';
    case ServerErrorCode.UNKNOWN_TRANSFER_ID:
      return 'Unknown transfer ID';
    case ServerErrorCode.FILE_EXISTS:
      return 'File already exists';
    case ServerErrorCode.NO_SUCH_USER:
      return 'No such user';
    default:
      return 'Unknown';
  }
}
