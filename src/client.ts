/**
 * TFTP Client
 *
 * Main client class for downloading files over TFTP.
 */

import { UdpConnection } from './connection';
import { issueRequest } from './request';
import { runTransfer } from './transfer';
import { FileSink, OutputSink } from './sink';
import {
  ClientConfig,
  DEFAULT_HOST,
  DEFAULT_MAX_RETRIES,
  DEFAULT_PORT,
  DEFAULT_TIMEOUT,
  Endpoint,
  TransferResult,
} from './types';
import { ClientClosedError, InvalidArgumentError } from './errors';
import { Logger, createLogger } from './logger';

/**
 * TFTP client for read transfers
 *
 * Each download opens its own UDP socket and closes it, together with the
 * output sink, whether the transfer succeeds or fails.
 *
 * @example
 * ```typescript
 * const client = new Client({ host: '127.0.0.1', port: 6969 });
 * const result = await client.downloadToFile('data.txt', 'copy.txt');
 * console.log(`${result.bytesWritten} bytes`);
 * await client.close();
 * ```
 */
export class Client {
  private config: Required<ClientConfig>;
  private logger: Logger;
  private active: Set<UdpConnection> = new Set();
  private closed: boolean = false;

  constructor(config: ClientConfig = {}) {
    this.validateConfig(config);

    // Set defaults
    this.config = {
      host: config.host ?? DEFAULT_HOST,
      port: config.port ?? DEFAULT_PORT,
      timeout: config.timeout ?? DEFAULT_TIMEOUT,
      maxRetries: config.maxRetries ?? DEFAULT_MAX_RETRIES,
      logger: config.logger ?? createLogger('tftp'),
    };
    this.logger = this.config.logger;
  }

  /**
   * Validates the client configuration
   */
  private validateConfig(config: ClientConfig): void {
    if (config.host !== undefined && !config.host) {
      throw new InvalidArgumentError('Host must not be empty');
    }

    if (config.port !== undefined && (!Number.isInteger(config.port) || config.port < 1 || config.port > 65535)) {
      throw new InvalidArgumentError(`Invalid port: ${config.port}`);
    }

    if (config.timeout !== undefined && !(config.timeout > 0)) {
      throw new InvalidArgumentError(`Invalid timeout: ${config.timeout}`);
    }

    if (config.maxRetries !== undefined && (!Number.isInteger(config.maxRetries) || config.maxRetries < 0)) {
      throw new InvalidArgumentError(`Invalid retry count: ${config.maxRetries}`);
    }
  }

  /**
   * Checks if the client is closed and throws an error if so
   */
  private checkClosed(): void {
    if (this.closed) {
      throw new ClientClosedError();
    }
  }

  /**
   * Returns the server endpoint requests are sent to
   */
  getEndpoint(): Endpoint {
    return { host: this.config.host, port: this.config.port };
  }

  /**
   * Downloads 'filename' from the server into the given sink
   *
   * The sink is closed before this method settles.
   */
  async download(filename: string, sink: OutputSink): Promise<TransferResult> {
    this.checkClosed();
    let failed = false;
    try {
      return await this.transfer(filename, async () => sink);
    } catch (error) {
      failed = true;
      throw error;
    } finally {
      await this.releaseSink(sink, failed);
    }
  }

  /**
   * Downloads 'filename' and saves it to 'localFilename'
   *
   * The local file defaults to 'filename' itself and is overwritten.
   * The request is issued before the local file is truncated, so the
   * precondition check sees the file as it was.
   */
  async downloadToFile(filename: string, localFilename: string = filename): Promise<TransferResult> {
    this.checkClosed();
    return this.transfer(filename, () => FileSink.open(localFilename));
  }

  /**
   * Runs one request/transfer cycle on a fresh socket
   *
   * The sink is opened once the request is out. Socket and sink are
   * released on every exit path.
   */
  private async transfer(filename: string, openSink: () => Promise<OutputSink>): Promise<TransferResult> {
    const endpoint = this.getEndpoint();
    let conn: UdpConnection | null = null;
    let sink: OutputSink | null = null;
    let failed = false;

    try {
      conn = await UdpConnection.open();
      this.active.add(conn);

      await issueRequest(conn, endpoint, filename, this.logger.child('request'));
      sink = await openSink();

      return await runTransfer(conn, endpoint, sink, {
        timeout: this.config.timeout,
        maxRetries: this.config.maxRetries,
        logger: this.logger.child('transfer'),
      });
    } catch (error) {
      failed = true;
      throw error;
    } finally {
      if (conn) {
        this.active.delete(conn);
        conn.close();
      }
      if (sink) {
        await this.releaseSink(sink, failed);
      }
    }
  }

  /**
   * Closes a sink without letting a close failure replace the transfer's own error
   */
  private async releaseSink(sink: OutputSink, failed: boolean): Promise<void> {
    try {
      await sink.close();
    } catch (error) {
      if (!failed) {
        throw error;
      }
      this.logger.warn(`Failed to close output sink: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  /**
   * Closes the client and any socket still in use
   *
   * After calling close, all operations will throw ClientClosedError.
   * It's safe to call close multiple times.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }

    this.closed = true;

    for (const conn of this.active) {
      conn.close();
    }
    this.active.clear();
  }
}
