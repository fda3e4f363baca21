import { withTraceLog, trace } from "flux-lang";

import type { CliStreams } from "../io/console.js";
import { parseCommandArgs } from "../flags.js";
import { executeProgram, loadProgramFile } from "../index.js";
import { openTraceSink } from "../sink/jsonl.js";

export const RUN_USAGE = "Usage: flux run <file> [--trace <path|->]";

export async function runFile(args: string[], streams: CliStreams): Promise<number> {
  const parsed = parseCommandArgs(args, { values: ["--trace"] });
  if (parsed.help) {
    streams.stdout.write(`${RUN_USAGE}\n`);
    return 0;
  }
  const [file, ...extra] = parsed.positionals;
  if (file === undefined || extra.length > 0) {
    streams.stderr.write(`${file === undefined ? "missing program file" : `unexpected argument: ${extra[0]}`}\n${RUN_USAGE}\n`);
    return 2;
  }

  const traceTarget = parsed.values.get("--trace") ?? (trace.traceEnabled() ? "-" : undefined);
  const sink = traceTarget === undefined ? undefined : openTraceSink(traceTarget, streams.stderr);
  try {
    const { result } = await withTraceLog(async () => {
      const loaded = await loadProgramFile(file);
      if (loaded.status === "error") {
        streams.stderr.write(`${loaded.message}\n`);
        return 1;
      }
      return executeProgram(loaded.program, streams);
    }, { enabled: sink !== undefined, onTag: sink && ((tag) => sink.write(tag)) });
    return result;
  } finally {
    sink?.close();
  }
}
