const TRACE_ON = new Set(['1', 'true']);

let fromEnv: boolean | undefined;

/** `FLUX_TRACE=1` (or `true`) turns tracing on where a scope doesn't say. Read once. */
export function traceEnabled(): boolean {
  fromEnv ??= TRACE_ON.has((process.env.FLUX_TRACE ?? '').trim().toLowerCase());
  return fromEnv;
}

export function resetTraceFlagForTest(): void {
  fromEnv = undefined;
}
