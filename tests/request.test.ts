/**
 * Unit tests for read request issuance
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { issueRequest, checkLocalFile } from '../src/request';
import { FileNotFoundError, InvalidArgumentError, PermissionDeniedError } from '../src/errors';
import { silentLogger } from '../src/logger';
import { FakeTransport, SERVER } from './fake-transport';

describe('issueRequest', () => {
  let tempDir: string;
  let localFile: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'tftp-request-'));
    localFile = path.join(tempDir, 'data.txt');
    fs.writeFileSync(localFile, 'local content is never sent');
  });

  afterEach(() => {
    jest.restoreAllMocks();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should send a single read request datagram', async () => {
    const transport = new FakeTransport();

    await issueRequest(transport, SERVER, localFile, silentLogger);

    const expected = Buffer.concat([
      Buffer.from([0x00, 0x01]),
      Buffer.from(localFile, 'utf8'),
      Buffer.from([0x00]),
      Buffer.from('octet', 'ascii'),
      Buffer.from([0x00]),
    ]);
    expect(transport.sent).toHaveLength(1);
    expect(transport.sent[0].data.equals(expected)).toBe(true);
    expect(transport.sent[0].to).toEqual(SERVER);
  });

  it('should fail with FileNotFoundError before sending anything', async () => {
    const transport = new FakeTransport();
    const missing = path.join(tempDir, 'missing.txt');

    const error = await issueRequest(transport, SERVER, missing, silentLogger).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FileNotFoundError);
    expect(error).toMatchObject({ kind: 'FileNotFound', filename: missing });
    expect(transport.sent).toHaveLength(0);
  });

  it('should treat a directory as not found', async () => {
    const transport = new FakeTransport();

    await expect(issueRequest(transport, SERVER, tempDir, silentLogger)).rejects.toThrow(FileNotFoundError);
    expect(transport.sent).toHaveLength(0);
  });

  it('should fail with PermissionDeniedError when the file is unreadable', async () => {
    const transport = new FakeTransport();
    const denied: NodeJS.ErrnoException = Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' });
    jest.spyOn(fs.promises, 'access').mockRejectedValueOnce(denied);

    const error = await issueRequest(transport, SERVER, localFile, silentLogger).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PermissionDeniedError);
    expect(error).toMatchObject({ kind: 'PermissionDenied' });
    expect(transport.sent).toHaveLength(0);
  });

  it('should recognize errno failures that are not Error instances', async () => {
    const transport = new FakeTransport();
    jest.spyOn(fs.promises, 'stat').mockRejectedValueOnce({ code: 'ENOENT', message: 'no such file or directory' });

    await expect(issueRequest(transport, SERVER, localFile, silentLogger)).rejects.toThrow(FileNotFoundError);
    expect(transport.sent).toHaveLength(0);
  });

  it('should reject an empty filename', async () => {
    const transport = new FakeTransport();

    await expect(issueRequest(transport, SERVER, '', silentLogger)).rejects.toThrow(InvalidArgumentError);
    expect(transport.sent).toHaveLength(0);
  });
});

describe('checkLocalFile', () => {
  it('should resolve for a readable file', async () => {
    const file = path.join(fs.mkdtempSync(path.join(os.tmpdir(), 'tftp-check-')), 'ok.bin');
    fs.writeFileSync(file, Buffer.from([1, 2, 3]));

    try {
      await expect(checkLocalFile(file)).resolves.toBeUndefined();
    } finally {
      fs.rmSync(path.dirname(file), { recursive: true, force: true });
    }
  });
});
