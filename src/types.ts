/**
 * TFTP Protocol Types and Constants
 *
 * This module defines the protocol-level constants, opcodes, and data structures
 * used by the read-only TFTP client.
 */

import type { Logger } from './logger';

// Client Defaults
export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_PORT = 6969;
export const DEFAULT_TIMEOUT = 2000;
export const DEFAULT_MAX_RETRIES = 3;

// Packet Layout
export const TFTP_HEADER_LEN = 4; // 2 bytes opcode + 2 bytes block number / error code
export const TFTP_BLOCK_SIZE = 512;
export const TFTP_MAX_PACKET_LEN = TFTP_HEADER_LEN + TFTP_BLOCK_SIZE;
export const TFTP_BLOCK_MODULUS = 0x10000;

export const TRANSFER_MODE = 'octet';

/**
 * Packet opcodes (RFC 1350)
 */
export enum Opcode {
  RRQ = 1,
  WRQ = 2,
  DATA = 3,
  ACK = 4,
  ERROR = 5,
}

/**
 * Server error codes carried in ERROR packets
 */
export enum ServerErrorCode {
  NOT_DEFINED = 0,
  FILE_NOT_FOUND = 1,
  ACCESS_VIOLATION = 2,
  DISK_FULL = 3,
  ILLEGAL_OPERATION = 4,
  UNKNOWN_TRANSFER_ID = 5,
  FILE_EXISTS = 6,
  NO_SUCH_USER = 7,
}

/**
 * A UDP host/port pair
 */
export interface Endpoint {
  host: string;
  port: number;
}

/**
 * Read request sent once at the start of a transfer
 */
export interface ReadRequest {
  readonly opcode: Opcode.RRQ;
  readonly filename: string;
  readonly mode: typeof TRANSFER_MODE;
}

/**
 * DATA packet sent by the server
 */
export interface DataSegment {
  readonly opcode: Opcode.DATA;
  /** 1-based, wraps modulo 65536 */
  readonly block: number;
  /** 0 to 512 bytes; fewer than 512 marks the last segment */
  readonly payload: Buffer;
}

/**
 * ACK packet sent by the client
 */
export interface Acknowledgment {
  readonly opcode: Opcode.ACK;
  readonly block: number;
}

/**
 * ERROR packet sent by the server
 */
export interface ServerErrorPacket {
  readonly opcode: Opcode.ERROR;
  readonly code: number;
  readonly message: string;
}

/**
 * The fixed 4-byte prefix shared by DATA, ACK and ERROR packets
 */
export interface PacketHeader {
  /** Opcode in bytes 0-1 */
  opcode: number;
  /** Block number (DATA/ACK) or error code (ERROR) in bytes 2-3 */
  block: number;
}

/**
 * Summary of a completed download
 */
export interface TransferResult {
  /** Total payload bytes written to the sink */
  bytesWritten: number;
  /** Number of DATA segments accepted */
  blocks: number;
}

/**
 * Client configuration options
 */
export interface ClientConfig {
  /** Server host (default: 127.0.0.1) */
  host?: string;
  /** Server port (default: 6969) */
  port?: number;
  /** Receive timeout per wait in milliseconds (default: 2000) */
  timeout?: number;
  /** Timeouts tolerated in a row before giving up (default: 3) */
  maxRetries?: number;
  /** Logger used by the client and the transfer engine (default: console) */
  logger?: Logger;
}
