/**
 * TFTP Protocol Encoding and Decoding
 *
 * This module handles all packet-level encoding and decoding for the read flow.
 * All numeric fields are 16-bit big-endian.
 */

import {
  TFTP_HEADER_LEN,
  TFTP_BLOCK_SIZE,
  TFTP_BLOCK_MODULUS,
  TRANSFER_MODE,
  Opcode,
  PacketHeader,
  DataSegment,
  ServerErrorPacket,
} from './types';
import { InvalidArgumentError, InvalidPacketError } from './errors';

/**
 * Encodes a Read Request
 *
 * The packet format is:
 *   - Bytes 0-1: Opcode 1
 *   - Filename as UTF-8, terminated by 0x00
 *   - Mode string "octet", terminated by 0x00
 */
export function encodeReadRequest(filename: string): Buffer {
  if (!filename) {
    throw new InvalidArgumentError('Filename is required');
  }
  if (filename.includes('\0')) {
    throw new InvalidArgumentError(`Filename contains a NUL byte: ${JSON.stringify(filename)}`);
  }

  return Buffer.concat([
    encodeUInt16(Opcode.RRQ),
    nulTerminated(filename),
    nulTerminated(TRANSFER_MODE),
  ]);
}

/**
 * Encodes an ACK for the given block number
 */
export function encodeAck(block: number): Buffer {
  const packet = Buffer.alloc(TFTP_HEADER_LEN);
  packet.writeUInt16BE(Opcode.ACK, 0);
  packet.writeUInt16BE(block, 2);
  return packet;
}

/**
 * Encodes a DATA packet
 *
 * The client never sends DATA; this is the server side of the exchange,
 * used by in-process servers and fixtures.
 */
export function encodeData(block: number, payload: Buffer): Buffer {
  if (payload.length > TFTP_BLOCK_SIZE) {
    throw new InvalidArgumentError(`Payload too large: ${payload.length} bytes`);
  }
  const header = Buffer.alloc(TFTP_HEADER_LEN);
  header.writeUInt16BE(Opcode.DATA, 0);
  header.writeUInt16BE(block, 2);
  return Buffer.concat([header, payload]);
}

/**
 * Encodes an ERROR packet
 */
export function encodeError(code: number, message: string): Buffer {
  const header = Buffer.alloc(TFTP_HEADER_LEN);
  header.writeUInt16BE(Opcode.ERROR, 0);
  header.writeUInt16BE(code, 2);
  return Buffer.concat([header, nulTerminated(message)]);
}

/**
 * Decodes the opcode and block number from the first 4 bytes of a datagram
 */
export function decodeHeader(data: Buffer): PacketHeader {
  if (data.length < TFTP_HEADER_LEN) {
    throw new InvalidPacketError(`Header too short: ${data.length} bytes`);
  }

  return {
    opcode: data.readUInt16BE(0),
    block: data.readUInt16BE(2),
  };
}

/**
 * Decodes a DATA packet
 */
export function decodeData(data: Buffer): DataSegment {
  const header = decodeHeader(data);
  if (header.opcode !== Opcode.DATA) {
    throw new InvalidPacketError(`Expected DATA opcode, got ${header.opcode}`);
  }
  if (data.length - TFTP_HEADER_LEN > TFTP_BLOCK_SIZE) {
    throw new InvalidPacketError(`Payload too large: ${data.length - TFTP_HEADER_LEN} bytes`);
  }

  return {
    opcode: Opcode.DATA,
    block: header.block,
    payload: data.subarray(TFTP_HEADER_LEN),
  };
}

/**
 * Decodes an ERROR packet
 *
 * A missing NUL terminator is tolerated; the message then runs to the end.
 */
export function decodeError(data: Buffer): ServerErrorPacket {
  const header = decodeHeader(data);
  if (header.opcode !== Opcode.ERROR) {
    throw new InvalidPacketError(`Expected ERROR opcode, got ${header.opcode}`);
  }

  const body = data.subarray(TFTP_HEADER_LEN);
  const end = body.indexOf(0);

  return {
    opcode: Opcode.ERROR,
    code: header.block,
    message: (end === -1 ? body : body.subarray(0, end)).toString('utf8'),
  };
}

/**
 * Returns the block number that follows the given one, wrapping at 65536
 */
export function nextBlock(block: number): number {
  return (block + 1) % TFTP_BLOCK_MODULUS;
}

/**
 * Reports whether a payload of this length ends the transfer
 */
export function isFinalPayload(length: number): boolean {
  return length < TFTP_BLOCK_SIZE;
}

/**
 * Encodes a 16-bit integer to a 2-byte big-endian representation
 */
export function encodeUInt16(n: number): Buffer {
  const buffer = Buffer.alloc(2);
  buffer.writeUInt16BE(n, 0);
  return buffer;
}

/**
 * Encodes a string as UTF-8 followed by a single 0x00
 */
export function nulTerminated(s: string): Buffer {
  return Buffer.concat([Buffer.from(s, 'utf8'), Buffer.from([0])]);
}
