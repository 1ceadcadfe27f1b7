/**
 * Unit tests for output sinks
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { BufferSink, FileSink } from '../src/sink';

describe('FileSink', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'tftp-sink-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should write every chunk in order', async () => {
    const filename = path.join(tempDir, 'nested', 'out.bin');
    const chunks = [Buffer.alloc(512, 0x61), Buffer.alloc(512, 0x62), Buffer.from('tail')];
    const sink = await FileSink.open(filename);

    for (const chunk of chunks) {
      await sink.write(chunk);
    }
    await sink.write(Buffer.alloc(0));
    await sink.close();

    expect(sink.getBytesWritten()).toBe(1028);
    expect(fs.readFileSync(filename).equals(Buffer.concat(chunks))).toBe(true);
  });

  it('should truncate an existing file on open', async () => {
    const filename = path.join(tempDir, 'out.bin');
    fs.writeFileSync(filename, 'previous content');

    const sink = await FileSink.open(filename);
    await sink.write(Buffer.from('new'));
    await sink.close();

    expect(fs.readFileSync(filename, 'utf8')).toBe('new');
  });

  it('should close idempotently and refuse writes afterwards', async () => {
    const sink = await FileSink.open(path.join(tempDir, 'out.bin'));
    await sink.close();
    await sink.close(); // Should not throw

    await expect(sink.write(Buffer.from('x'))).rejects.toThrow('Sink closed');
  });
});

describe('BufferSink', () => {
  it('should concatenate written chunks and refuse writes after close', async () => {
    const sink = new BufferSink();
    await sink.write(Buffer.from('ab'));
    await sink.write(Buffer.from('cd'));
    await sink.close();

    expect(sink.toBuffer().toString()).toBe('abcd');
    expect(sink.isClosed()).toBe(true);
    await expect(sink.write(Buffer.from('e'))).rejects.toThrow('Sink closed');
  });
});
