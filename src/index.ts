/**
 * TFTP Read Client Library
 *
 * Downloads files from a TFTP server over UDP in octet mode, acknowledging
 * each block in order and recovering from lost packets by retransmission.
 *
 * @packageDocumentation
 */

export { Client } from './client';

export { UdpConnection, Datagram, DatagramTransport, formatEndpoint } from './connection';

export { issueRequest, checkLocalFile } from './request';

export {
  runTransfer,
  transition,
  initialState,
  TransferStatus,
  TransferState,
  TransferEvent,
  TransferAction,
  TransferOptions,
} from './transfer';

export { OutputSink, FileSink, BufferSink } from './sink';

export {
  encodeReadRequest,
  encodeAck,
  encodeData,
  encodeError,
  decodeHeader,
  decodeData,
  decodeError,
  nextBlock,
} from './protocol';

export { generateSampleData, writeSampleFile } from './datagen';

export { Logger, LogLevel, createLogger, silentLogger } from './logger';

export {
  ClientConfig,
  Endpoint,
  TransferResult,
  DataSegment,
  Acknowledgment,
  ReadRequest,
  ServerErrorPacket,
  Opcode,
  ServerErrorCode,
  DEFAULT_HOST,
  DEFAULT_PORT,
  DEFAULT_TIMEOUT,
  DEFAULT_MAX_RETRIES,
  TFTP_BLOCK_SIZE,
} from './types';

export {
  TftpError,
  TftpErrorKind,
  ClientClosedError,
  FileNotFoundError,
  PermissionDeniedError,
  UnexpectedOpcodeError,
  OutOfOrderBlockError,
  InvalidPacketError,
  MaxRetriesExceededError,
  InvalidArgumentError,
  NetworkError,
  describeServerError,
} from './errors';
