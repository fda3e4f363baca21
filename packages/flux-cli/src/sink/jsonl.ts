import { closeSync, mkdirSync, openSync, writeSync } from 'node:fs';
import path from 'node:path';
import type { Writable } from 'node:stream';

import type { TraceTag } from 'flux-lang';

export interface TraceSink {
  write(tag: TraceTag): void;
  close(): void;
}

export function tagLine(tag: TraceTag): string {
  return `${JSON.stringify(tag)}\n`;
}

/**
 * Opens a `--trace` target for JSON Lines output. `-` writes to `fallback`.
 * File lines are written synchronously: a VM loop without I/O never yields,
 * and tags must still land while it runs.
 */
export function openTraceSink(target: string, fallback: Writable): TraceSink {
  if (target === '-' || target === '') {
    return {
      write: (tag) => {
        fallback.write(tagLine(tag));
      },
      close: () => {},
    };
  }
  const file = path.resolve(target);
  mkdirSync(path.dirname(file), { recursive: true });
  const fd = openSync(file, 'w');
  let closed = false;
  return {
    write: (tag) => {
      writeSync(fd, tagLine(tag));
    },
    close: () => {
      if (closed) return;
      closed = true;
      closeSync(fd);
    },
  };
}
