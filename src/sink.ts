/**
 * Output sinks for received file content
 */

import * as fs from 'fs';
import * as path from 'path';
import type { FileHandle } from 'fs/promises';

/**
 * Sequential byte sink written by the transfer engine
 */
export interface OutputSink {
  /** Appends bytes after everything written so far */
  write(chunk: Buffer): Promise<void>;
  /** Flushes and releases the sink; safe to call more than once */
  close(): Promise<void>;
}

/**
 * Sink backed by a local file
 *
 * The file is truncated on open, so each download starts from scratch.
 * Parent directories are created if needed.
 */
export class FileSink implements OutputSink {
  private handle: FileHandle | null;
  private readonly filename: string;
  private written: number = 0;

  private constructor(handle: FileHandle, filename: string) {
    this.handle = handle;
    this.filename = filename;
  }

  static async open(filename: string): Promise<FileSink> {
    await fs.promises.mkdir(path.dirname(filename), { recursive: true });
    const handle = await fs.promises.open(filename, 'w');
    return new FileSink(handle, filename);
  }

  async write(chunk: Buffer): Promise<void> {
    if (!this.handle) {
      throw new Error(`Sink closed: ${this.filename}`);
    }
    if (chunk.length === 0) {
      return;
    }
    // writeFile on a handle continues from the current position and
    // retries short writes until the whole chunk is out
    await this.handle.writeFile(chunk);
    this.written += chunk.length;
  }

  async close(): Promise<void> {
    if (!this.handle) {
      return;
    }
    const handle = this.handle;
    this.handle = null;
    await handle.close();
  }

  getFilename(): string {
    return this.filename;
  }

  getBytesWritten(): number {
    return this.written;
  }
}

/**
 * Sink that collects everything in memory
 */
export class BufferSink implements OutputSink {
  private chunks: Buffer[] = [];
  private closed: boolean = false;

  async write(chunk: Buffer): Promise<void> {
    if (this.closed) {
      throw new Error('Sink closed');
    }
    this.chunks.push(Buffer.from(chunk));
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  /**
   * Returns the concatenation of every chunk written so far
   */
  toBuffer(): Buffer {
    return Buffer.concat(this.chunks);
  }

  isClosed(): boolean {
    return this.closed;
  }
}
