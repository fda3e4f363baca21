import { AsyncLocalStorage } from 'node:async_hooks';

import type { TraceTag } from './tags.js';
import { traceEnabled } from './flag.js';

type Recorder = (tag: TraceTag) => void;

const store = new AsyncLocalStorage<Recorder>();

export interface TraceLogOptions {
  enabled?: boolean;
  /**
   * Receives each tag as it is emitted. When set, nothing is buffered and the
   * returned `tags` is empty, so a program that never halts still streams.
   */
  onTag?: Recorder;
}

/**
 * Runs `fn` in a trace scope. Tags emitted anywhere below it (compiler, VM)
 * are collected, or forwarded to `onTag`; concurrent scopes stay apart.
 */
export async function withTraceLog<T>(
  fn: () => Promise<T> | T,
  options: TraceLogOptions = {}
): Promise<{ result: T; tags: TraceTag[] }> {
  const enabled = options.enabled ?? traceEnabled();
  if (!enabled) {
    return { result: await fn(), tags: [] };
  }
  const tags: TraceTag[] = [];
  const record: Recorder = options.onTag ?? ((tag) => {
    tags.push(tag);
  });
  const result = await store.run(record, fn);
  return { result, tags };
}

/** Records a tag in the enclosing trace scope, if any. */
export function emit(tag: TraceTag): void {
  store.getStore()?.(tag);
}
