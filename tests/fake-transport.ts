/**
 * In-memory DatagramTransport for driving the protocol layers without sockets
 */

import { Datagram, DatagramTransport } from '../src/connection';
import { encodeData, decodeHeader } from '../src/protocol';
import { Endpoint, Opcode, TFTP_BLOCK_SIZE } from '../src/types';

export const SERVER: Endpoint = { host: '127.0.0.1', port: 6969 };

export interface SentDatagram {
  data: Buffer;
  to: Endpoint;
}

type SendHandler = (data: Buffer, to: Endpoint, transport: FakeTransport) => void;

/**
 * Records every send and hands out queued datagrams on receive.
 * An empty inbox behaves like a receive timeout.
 */
export class FakeTransport implements DatagramTransport {
  public sent: SentDatagram[] = [];
  public receiveTimeouts: number[] = [];
  public closed = false;
  private inbox: Datagram[] = [];
  private onSend?: SendHandler;

  constructor(onSend?: SendHandler) {
    this.onSend = onSend;
  }

  deliver(data: Buffer, from: Endpoint = SERVER): void {
    this.inbox.push({ data, from });
  }

  async send(data: Buffer, to: Endpoint): Promise<void> {
    if (this.closed) {
      throw new Error('FakeTransport closed');
    }
    this.sent.push({ data: Buffer.from(data), to });
    this.onSend?.(data, to, this);
  }

  async receive(timeout: number): Promise<Datagram | null> {
    this.receiveTimeouts.push(timeout);
    return this.inbox.shift() ?? null;
  }

  close(): void {
    this.closed = true;
  }

  /** Block numbers of every ACK sent, in order */
  ackedBlocks(): number[] {
    return this.sent
      .map((s) => decodeHeader(s.data))
      .filter((h) => h.opcode === Opcode.ACK)
      .map((h) => h.block);
  }
}

/**
 * Splits content into DATA payloads, adding an empty last block when the
 * content is a multiple of the block size
 */
export function splitBlocks(content: Buffer): Buffer[] {
  const blocks: Buffer[] = [];
  for (let offset = 0; offset <= content.length; offset += TFTP_BLOCK_SIZE) {
    blocks.push(content.subarray(offset, offset + TFTP_BLOCK_SIZE));
  }
  return blocks;
}

/**
 * Send handler of a well-behaved server: answers ACK n with block n + 1
 * and a read request with block 1
 */
export function wellBehavedServer(content: Buffer, from: Endpoint = SERVER): SendHandler {
  const blocks = splitBlocks(content);

  return (data, _to, transport) => {
    const header = decodeHeader(data);
    if (header.opcode === Opcode.RRQ) {
      transport.deliver(encodeData(1, blocks[0]), from);
    } else if (header.opcode === Opcode.ACK && header.block < blocks.length) {
      transport.deliver(encodeData(header.block + 1, blocks[header.block]), from);
    }
  };
}

/** Deterministic test content of the given length */
export function testContent(length: number): Buffer {
  const buffer = Buffer.alloc(length);
  for (let i = 0; i < length; i++) {
    buffer[i] = (i * 31 + 7) % 251;
  }
  return buffer;
}
