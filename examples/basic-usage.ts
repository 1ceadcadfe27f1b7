/**
 * Basic TFTP Client Usage Example
 *
 * This example demonstrates:
 * - Generating a sample file
 * - Downloading it from a server into memory
 * - Downloading it to a separate local file
 */

import { Client, BufferSink, writeSampleFile, TftpError } from '../src';

async function main() {
  console.log('TFTP Read Client - Basic Usage Example');
  console.log('='.repeat(50));

  // The request names a path that must exist locally as well
  const filename = 'data.txt';
  await writeSampleFile(filename, 5);

  const client = new Client({
    host: '127.0.0.1', // Replace with your server address
    port: 6969,
    timeout: 2000,
    maxRetries: 3,
  });

  try {
    console.log('\n1. Downloading into memory...');
    const sink = new BufferSink();
    const result = await client.download(filename, sink);
    console.log(`   Received ${result.bytesWritten} bytes in ${result.blocks} blocks`);
    console.log(`   First line: ${sink.toBuffer().toString('ascii').split('\n')[0]}`);

    console.log('\n2. Downloading to a file...');
    const saved = await client.downloadToFile(filename, 'downloads/data-copy.txt');
    console.log(`   Saved ${saved.bytesWritten} bytes to downloads/data-copy.txt`);

    console.log('\n' + '='.repeat(50));
    console.log('Example completed successfully!');
  } catch (error) {
    if (error instanceof TftpError) {
      console.error(`\n${error.kind}: ${error.message}`);
    } else {
      console.error('\nError:', error);
    }
  } finally {
    await client.close();
    console.log('\nClient closed.');
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
