/**
 * TFTP Connection Management
 *
 * This module defines the datagram transport the protocol layers talk to,
 * and its UDP implementation over a dgram socket.
 */

import * as dgram from 'dgram';
import { Endpoint, TFTP_MAX_PACKET_LEN } from './types';
import { NetworkError, ClientClosedError } from './errors';

/** Datagrams kept while no receive is pending; older ones are dropped first */
export const MAX_QUEUED_DATAGRAMS = 16;

/**
 * A datagram together with the endpoint it came from
 */
export interface Datagram {
  data: Buffer;
  from: Endpoint;
}

/**
 * Minimal datagram transport used by the request issuer and the transfer engine
 *
 * Only one receive may be pending at a time.
 */
export interface DatagramTransport {
  /** Sends one datagram to the given endpoint */
  send(data: Buffer, to: Endpoint): Promise<void>;
  /** Waits for the next datagram; resolves null when the timeout elapses first */
  receive(timeout: number): Promise<Datagram | null>;
  /** Releases the underlying socket; safe to call more than once */
  close(): void;
}

/**
 * Formats an endpoint as "host:port"
 */
export function formatEndpoint(endpoint: Endpoint): string {
  return `${endpoint.host}:${endpoint.port}`;
}

/**
 * Represents a UDP socket used for one transfer
 *
 * Datagrams that arrive while nobody is waiting are queued in arrival order,
 * keeping at most 'maxQueued' of the most recent ones.
 * Datagrams longer than a full DATA packet are truncated to that size.
 */
export class UdpConnection implements DatagramTransport {
  private socket: dgram.Socket;
  private queue: Datagram[] = [];
  private waiter: ((datagram: Datagram | null, err?: Error) => void) | null = null;
  private failure: Error | null = null;
  private closed: boolean = false;
  private readonly maxQueued: number;

  constructor(socket: dgram.Socket, maxQueued: number = MAX_QUEUED_DATAGRAMS) {
    this.socket = socket;
    this.maxQueued = Math.max(1, maxQueued);

    this.socket.on('message', (msg: Buffer, rinfo: dgram.RemoteInfo) => {
      const datagram: Datagram = {
        data: msg.subarray(0, TFTP_MAX_PACKET_LEN),
        from: { host: rinfo.address, port: rinfo.port },
      };

      if (this.waiter) {
        const waiter = this.waiter;
        this.waiter = null;
        waiter(datagram);
      } else {
        this.queue.push(datagram);
        if (this.queue.length > this.maxQueued) {
          this.queue.shift();
        }
      }
    });

    this.socket.on('error', (err: Error) => {
      this.failure = err;
      if (this.waiter) {
        const waiter = this.waiter;
        this.waiter = null;
        waiter(null, err);
      }
    });
  }

  /**
   * Creates a UDP socket bound to an ephemeral local port
   */
  static async open(
    type: dgram.SocketType = 'udp4',
    maxQueued: number = MAX_QUEUED_DATAGRAMS
  ): Promise<UdpConnection> {
    const socket = dgram.createSocket(type);

    return new Promise((resolve, reject) => {
      const onError = (err: Error) => {
        socket.close();
        reject(new NetworkError('bind', 'local', err));
      };

      socket.once('error', onError);
      socket.bind(0, () => {
        socket.removeListener('error', onError);
        resolve(new UdpConnection(socket, maxQueued));
      });
    });
  }

  /**
   * Transmits one datagram
   */
  async send(data: Buffer, to: Endpoint): Promise<void> {
    if (this.closed) {
      throw new ClientClosedError();
    }

    const addr = formatEndpoint(to);

    return new Promise((resolve, reject) => {
      this.socket.send(data, to.port, to.host, (err) => {
        if (err) {
          reject(new NetworkError('send', addr, err));
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * Waits up to 'timeout' milliseconds for the next datagram
   */
  async receive(timeout: number): Promise<Datagram | null> {
    if (this.closed) {
      throw new ClientClosedError();
    }
    if (this.failure) {
      throw new NetworkError('receive', this.getLocalAddr(), this.failure);
    }
    if (this.waiter) {
      throw new NetworkError('receive', this.getLocalAddr(), new Error('Receive already pending'));
    }

    const queued = this.queue.shift();
    if (queued) {
      return queued;
    }

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve(null);
      }, timeout);

      this.waiter = (datagram, err) => {
        clearTimeout(timer);
        if (err) {
          reject(new NetworkError('receive', this.getLocalAddr(), err));
        } else {
          resolve(datagram);
        }
      };
    });
  }

  /**
   * Closes the socket and fails any pending receive
   *
   * It's safe to call close multiple times.
   */
  close(): void {
    if (this.closed) {
      return;
    }

    this.closed = true;
    this.queue.length = 0;

    if (this.waiter) {
      const waiter = this.waiter;
      this.waiter = null;
      waiter(null, new Error('Connection closed'));
    }

    this.socket.close();
  }

  /**
   * Returns the local endpoint the socket is bound to
   */
  getLocalEndpoint(): Endpoint {
    const address = this.socket.address();
    return { host: address.address, port: address.port };
  }

  isClosed(): boolean {
    return this.closed;
  }

  private getLocalAddr(): string {
    if (this.closed) {
      return 'closed socket';
    }
    try {
      return formatEndpoint(this.getLocalEndpoint());
    } catch {
      // address() throws until the socket is bound
      return 'unbound socket';
    }
  }
}
