import type { Readable, Writable } from 'node:stream';

import type { ByteSink, ByteSource } from 'flux-lang';

function toBytes(chunk: unknown): Uint8Array {
  if (typeof chunk === 'string') return Buffer.from(chunk, 'utf8');
  if (chunk instanceof Uint8Array) return chunk;
  throw new TypeError('input stream produced a non-byte chunk');
}

/**
 * Byte-at-a-time view over a readable stream. The stream is not touched
 * until the first read, so programs without `,` leave stdin alone.
 */
export class StreamByteSource implements ByteSource {
  private iterator: AsyncIterator<unknown> | undefined;
  private chunk: Uint8Array = new Uint8Array();
  private offset = 0;
  private done = false;

  constructor(private readonly stream: Readable) {}

  async read(): Promise<number | null> {
    while (this.offset >= this.chunk.length) {
      if (this.done) return null;
      this.iterator ??= this.stream[Symbol.asyncIterator]();
      const next = await this.iterator.next();
      if (next.done) {
        this.done = true;
        return null;
      }
      this.chunk = toBytes(next.value);
      this.offset = 0;
    }
    const byte = this.chunk[this.offset];
    this.offset += 1;
    return byte;
  }
}

const failures = new WeakMap<Writable, Error>();
const watched = new WeakSet<Writable>();

/**
 * A failed write reports through its callback and then again as an `error`
 * event. The event is recorded here so it reaches the VM only as a rejected
 * write; one listener per stream, however many sinks wrap it.
 */
function watch(stream: Writable): void {
  if (watched.has(stream)) return;
  watched.add(stream);
  stream.on('error', (error: Error) => {
    if (!failures.has(stream)) failures.set(stream, error);
  });
}

export class StreamByteSink implements ByteSink {
  constructor(private readonly stream: Writable) {
    watch(stream);
  }

  write(bytes: Uint8Array): Promise<void> {
    const failed = failures.get(this.stream);
    if (failed) return Promise.reject(failed);
    return new Promise<void>((resolve, reject) => {
      this.stream.write(bytes, (error: Error | null | undefined) => {
        if (error) reject(error);
        else resolve();
      });
    });
  }
}
