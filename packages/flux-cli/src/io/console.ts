import type { Readable, Writable } from 'node:stream';

export interface CliStreams {
  stdin: Readable;
  stdout: Writable;
  stderr: Writable;
}

export function processStreams(): CliStreams {
  return { stdin: process.stdin, stdout: process.stdout, stderr: process.stderr };
}
