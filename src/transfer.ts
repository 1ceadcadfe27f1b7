/**
 * TFTP Transfer Engine
 *
 * Drives the receive/acknowledge loop of a read transfer as an explicit
 * state machine. `transition` is pure: it maps a state and an event to the
 * next state plus the actions to perform. `runTransfer` feeds it events from
 * a DatagramTransport and carries out the actions in order.
 */

import { DatagramTransport, formatEndpoint } from './connection';
import { decodeError, decodeHeader, encodeAck, isFinalPayload, nextBlock } from './protocol';
import { OutputSink } from './sink';
import {
  DEFAULT_MAX_RETRIES,
  DEFAULT_TIMEOUT,
  Endpoint,
  Opcode,
  TFTP_HEADER_LEN,
  TransferResult,
} from './types';
import {
  InvalidPacketError,
  MaxRetriesExceededError,
  OutOfOrderBlockError,
  TftpError,
  UnexpectedOpcodeError,
} from './errors';
import { Logger, createLogger } from './logger';

export enum TransferStatus {
  AWAITING_SEGMENT = 'AWAITING_SEGMENT',
  TERMINATED_OK = 'TERMINATED_OK',
  TERMINATED_ERROR = 'TERMINATED_ERROR',
}

/**
 * Everything the engine remembers between loop iterations
 */
export interface TransferState {
  readonly status: TransferStatus;
  /** Block number the next DATA packet must carry */
  readonly expectedBlock: number;
  /** Consecutive timeouts since the last accepted segment */
  readonly retries: number;
  /** Last ACK sent, resent on timeout */
  readonly lastAck: Buffer | null;
  /** Endpoint the last accepted segment came from */
  readonly peer: Endpoint | null;
  readonly bytesWritten: number;
  readonly blocksReceived: number;
  /** Set only when status is TERMINATED_ERROR */
  readonly error: TftpError | null;
}

export type TransferEvent =
  | { type: 'datagram'; data: Buffer; from: Endpoint }
  | { type: 'timeout' };

export type TransferAction =
  | { type: 'write'; payload: Buffer }
  | { type: 'send'; packet: Buffer; to: Endpoint };

export interface TransitionResult {
  state: TransferState;
  actions: TransferAction[];
}

export interface TransferOptions {
  /** Wait per receive in milliseconds (default: 2000) */
  timeout?: number;
  /** Timeouts tolerated in a row (default: 3) */
  maxRetries?: number;
  logger?: Logger;
}

/**
 * Creates the state a transfer starts in, right after the request was sent
 */
export function initialState(): TransferState {
  return {
    status: TransferStatus.AWAITING_SEGMENT,
    expectedBlock: 1,
    retries: 0,
    lastAck: null,
    peer: null,
    bytesWritten: 0,
    blocksReceived: 0,
    error: null,
  };
}

function fail(state: TransferState, error: TftpError): TransitionResult {
  return {
    state: { ...state, status: TransferStatus.TERMINATED_ERROR, error },
    actions: [],
  };
}

/**
 * Computes the next state for one event
 *
 * 'endpoint' is the server the request went to; it receives resent ACKs
 * until a segment has revealed the server's actual transfer endpoint.
 * Terminal states ignore further events.
 */
export function transition(
  state: TransferState,
  event: TransferEvent,
  endpoint: Endpoint,
  maxRetries: number = DEFAULT_MAX_RETRIES
): TransitionResult {
  if (state.status !== TransferStatus.AWAITING_SEGMENT) {
    return { state, actions: [] };
  }

  if (event.type === 'timeout') {
    const retries = state.retries + 1;
    if (retries > maxRetries) {
      return fail({ ...state, retries }, new MaxRetriesExceededError(maxRetries));
    }

    const actions: TransferAction[] = state.lastAck
      ? [{ type: 'send', packet: state.lastAck, to: state.peer ?? endpoint }]
      : [];
    return { state: { ...state, retries }, actions };
  }

  const { data, from } = event;
  if (data.length < TFTP_HEADER_LEN) {
    return fail(state, new InvalidPacketError(`Datagram too short: ${data.length} bytes`));
  }

  const header = decodeHeader(data);
  if (header.opcode !== Opcode.DATA) {
    if (header.opcode === Opcode.ERROR) {
      const serverError = decodeError(data);
      return fail(state, new UnexpectedOpcodeError(header.opcode, serverError.code, serverError.message));
    }
    return fail(state, new UnexpectedOpcodeError(header.opcode));
  }

  if (header.block !== state.expectedBlock) {
    return fail(state, new OutOfOrderBlockError(state.expectedBlock, header.block));
  }

  const payload = data.subarray(TFTP_HEADER_LEN);
  const ack = encodeAck(header.block);

  return {
    state: {
      ...state,
      status: isFinalPayload(payload.length) ? TransferStatus.TERMINATED_OK : TransferStatus.AWAITING_SEGMENT,
      expectedBlock: nextBlock(state.expectedBlock),
      retries: 0,
      lastAck: ack,
      peer: from,
      bytesWritten: state.bytesWritten + payload.length,
      blocksReceived: state.blocksReceived + 1,
    },
    actions: [
      { type: 'write', payload },
      { type: 'send', packet: ack, to: from },
    ],
  };
}

/**
 * Receives a file from 'endpoint' into 'sink'
 *
 * Must be called right after the request was issued on the same transport.
 * Bytes already written stay in the sink when the transfer fails.
 * The caller owns both the transport and the sink and closes them.
 */
export async function runTransfer(
  transport: DatagramTransport,
  endpoint: Endpoint,
  sink: OutputSink,
  options: TransferOptions = {}
): Promise<TransferResult> {
  const timeout = options.timeout ?? DEFAULT_TIMEOUT;
  const maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
  const logger = options.logger ?? createLogger('tftp:transfer');

  let state = initialState();

  while (state.status === TransferStatus.AWAITING_SEGMENT) {
    const datagram = await transport.receive(timeout);
    const event: TransferEvent = datagram
      ? { type: 'datagram', data: datagram.data, from: datagram.from }
      : { type: 'timeout' };

    const result = transition(state, event, endpoint, maxRetries);
    logTransition(logger, state, result.state, maxRetries);
    state = result.state;

    for (const action of result.actions) {
      if (action.type === 'write') {
        await sink.write(action.payload);
        logger.debug(`Written ${action.payload.length} bytes to file`);
      } else {
        await transport.send(action.packet, action.to);
      }
    }
  }

  if (state.error) {
    throw state.error;
  }

  return { bytesWritten: state.bytesWritten, blocks: state.blocksReceived };
}

function logTransition(logger: Logger, before: TransferState, after: TransferState, maxRetries: number): void {
  if (after.error) {
    logger.error(`${after.error.message}. Terminating.`);
    return;
  }

  if (after.blocksReceived > before.blocksReceived) {
    logger.info(`Received block #${before.expectedBlock} from ${after.peer ? formatEndpoint(after.peer) : 'unknown'}`);
  } else if (after.retries > before.retries) {
    logger.warn(`Timeout waiting for data, retrying... (${after.retries}/${maxRetries})`);
  }

  if (after.status === TransferStatus.TERMINATED_OK) {
    logger.info(`Finished receiving file: ${after.bytesWritten} bytes in ${after.blocksReceived} blocks`);
  }
}
