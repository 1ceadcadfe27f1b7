/**
 * Unit tests for protocol encoding and decoding functions
 */

import {
  encodeReadRequest,
  encodeAck,
  encodeData,
  encodeError,
  decodeHeader,
  decodeData,
  decodeError,
  nextBlock,
  isFinalPayload,
  nulTerminated,
} from '../src/protocol';
import { InvalidArgumentError, InvalidPacketError } from '../src/errors';
import { Opcode } from '../src/types';

describe('Protocol', () => {
  describe('encodeReadRequest', () => {
    it('should encode opcode, filename and mode', () => {
      const encoded = encodeReadRequest('data.txt');

      expect([...encoded]).toEqual([
        0x00, 0x01,
        0x64, 0x61, 0x74, 0x61, 0x2e, 0x74, 0x78, 0x74, 0x00,
        0x6f, 0x63, 0x74, 0x65, 0x74, 0x00,
      ]);
    });

    it('should encode non-ASCII filenames as UTF-8', () => {
      const encoded = encodeReadRequest('é');
      expect([...encoded]).toEqual([0x00, 0x01, 0xc3, 0xa9, 0x00, 0x6f, 0x63, 0x74, 0x65, 0x74, 0x00]);
    });

    it('should reject empty filenames and embedded NUL bytes', () => {
      expect(() => encodeReadRequest('')).toThrow(InvalidArgumentError);
      expect(() => encodeReadRequest('a\0b')).toThrow(InvalidArgumentError);
    });
  });

  describe('encodeAck', () => {
    it('should encode block numbers big-endian', () => {
      expect([...encodeAck(1)]).toEqual([0x00, 0x04, 0x00, 0x01]);
      expect([...encodeAck(0x1234)]).toEqual([0x00, 0x04, 0x12, 0x34]);
      expect([...encodeAck(65535)]).toEqual([0x00, 0x04, 0xff, 0xff]);
    });
  });

  describe('decodeHeader', () => {
    it('should read opcode and block number', () => {
      expect(decodeHeader(Buffer.from([0x00, 0x03, 0x01, 0x02, 0xaa]))).toEqual({ opcode: 3, block: 258 });
    });

    it('should throw error for short header data', () => {
      expect(() => decodeHeader(Buffer.from([0x00, 0x03, 0x00]))).toThrow(InvalidPacketError);
    });
  });

  describe('decodeData', () => {
    it('should split header and payload', () => {
      const segment = decodeData(Buffer.from([0x00, 0x03, 0x00, 0x07, 0x68, 0x69]));

      expect(segment.opcode).toBe(Opcode.DATA);
      expect(segment.block).toBe(7);
      expect(segment.payload.toString()).toBe('hi');
    });

    it('should accept an empty payload', () => {
      const segment = decodeData(encodeData(2, Buffer.alloc(0)));
      expect(segment.block).toBe(2);
      expect(segment.payload.length).toBe(0);
    });

    it('should reject other opcodes', () => {
      expect(() => decodeData(encodeAck(1))).toThrow(InvalidPacketError);
    });
  });

  describe('encodeData', () => {
    it('should refuse payloads over 512 bytes', () => {
      expect(() => encodeData(1, Buffer.alloc(513))).toThrow(InvalidArgumentError);
      expect(encodeData(1, Buffer.alloc(512)).length).toBe(516);
    });
  });

  describe('decodeError', () => {
    it('should read the code and message', () => {
      const packet = decodeError(encodeError(2, 'Access violation'));

      expect(packet.code).toBe(2);
      expect(packet.message).toBe('Access violation');
    });

    it('should tolerate a missing terminator', () => {
      const packet = decodeError(Buffer.from([0x00, 0x05, 0x00, 0x01, 0x6e, 0x6f]));
      expect(packet).toEqual({ opcode: Opcode.ERROR, code: 1, message: 'no' });
    });
  });

  describe('block arithmetic', () => {
    it('should wrap after 65535', () => {
      expect(nextBlock(1)).toBe(2);
      expect(nextBlock(65535)).toBe(0);
    });

    it('should treat payloads under 512 bytes as final', () => {
      expect(isFinalPayload(0)).toBe(true);
      expect(isFinalPayload(511)).toBe(true);
      expect(isFinalPayload(512)).toBe(false);
    });
  });

  describe('nulTerminated', () => {
    it('should append a single zero byte', () => {
      expect([...nulTerminated('ab')]).toEqual([0x61, 0x62, 0x00]);
    });
  });
});
