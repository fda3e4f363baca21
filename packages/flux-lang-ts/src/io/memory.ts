import type { ByteSink, ByteSource } from './ports.js';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export class MemorySource implements ByteSource {
  private offset = 0;
  private readonly data: Uint8Array;

  constructor(data: string | Uint8Array = new Uint8Array()) {
    this.data = typeof data === 'string' ? encoder.encode(data) : data;
  }

  read(): number | null {
    if (this.offset >= this.data.length) return null;
    const byte = this.data[this.offset];
    this.offset += 1;
    return byte;
  }

  get remaining(): number {
    return this.data.length - this.offset;
  }
}

export const EmptySource: ByteSource = {
  read: () => null,
};

export class MemorySink implements ByteSink {
  private chunks: Uint8Array[] = [];
  private size = 0;

  write(bytes: Uint8Array): void {
    this.chunks.push(bytes.slice());
    this.size += bytes.length;
  }

  bytes(): Uint8Array {
    const out = new Uint8Array(this.size);
    let offset = 0;
    for (const chunk of this.chunks) {
      out.set(chunk, offset);
      offset += chunk.length;
    }
    return out;
  }

  text(): string {
    return decoder.decode(this.bytes());
  }
}
