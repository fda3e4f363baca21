/**
 * Where `,` reads from. Yields one byte (0-255), or null once the input is
 * exhausted. A throw or rejection is treated as an I/O failure.
 */
export interface ByteSource {
  read(): number | null | Promise<number | null>;
}

/** Where `.` and `#` write to. A throw or rejection is treated as an I/O failure. */
export interface ByteSink {
  write(bytes: Uint8Array): void | Promise<void>;
}
