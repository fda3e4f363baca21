import { readFile } from "node:fs/promises";
import path from "node:path";

import {
  compile,
  formatCompileError,
  formatRuntimeError,
  parseProgram,
  run,
  type ByteSource,
  type Program,
} from "flux-lang";

import type { CliStreams } from "./io/console.js";
import { StreamByteSink, StreamByteSource } from "./io/streams.js";

export { DEMOS, type Demo } from "./demos.js";
export { GUIDE_TEXT } from "./docs/guide.js";
export { REFERENCE_TEXT } from "./docs/reference.js";
export { EXAMPLES_TEXT } from "./docs/examples.js";
export { processStreams, type CliStreams } from "./io/console.js";
export { StreamByteSink, StreamByteSource } from "./io/streams.js";

export const QUICK_REFERENCE =
  `    +    Increment accumulator       *    Push to stack\n` +
  `    -    Decrement accumulator       /    Pop from stack\n` +
  `    [    Start loop (skip if 0)      ]    End loop (repeat if not 0)\n` +
  `    .    Output as character         ,    Input character\n` +
  `    #    Output as number`;

export const HELP_TEXT = `flux: compile and run Flux programs\n\n` +
  `Usage:\n` +
  `  flux <command> [arguments]\n\n` +
  `Commands:\n` +
  `  help                          Show this message (also -h, --help)\n` +
  `  guide                         Show the beginner's guide\n` +
  `  reference                     Show the language reference (also ref)\n` +
  `  examples                      Show annotated example programs\n` +
  `  demo                          Run the built-in demonstration programs\n` +
  `  run <file> [--trace <path>]   Compile and execute a program (.flux source or .json bytecode)\n` +
  `  compile <file> [--json] [--out <path>]\n` +
  `                                Compile a program and show its bytecode\n` +
  `  interactive                   Start the interactive shell (also repl)\n\n` +
  `Quick reference:\n` +
  `${QUICK_REFERENCE}\n\n` +
  `Environment:\n` +
  `  FLUX_TRACE=1                  Write execution trace tags to stderr as JSON Lines\n\n` +
  `Exit codes:\n` +
  `  0  success\n` +
  `  1  compile error, runtime error or unreadable program\n` +
  `  2  CLI misuse (unknown command or flag, missing argument)`;

export function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export type LoadResult =
  | { status: "ok"; program: Program }
  | { status: "error"; message: string };

/** Source text compiles; a `.json` file is decoded as bytecode. */
export function programFromText(text: string, fileName = ""): LoadResult {
  if (path.extname(fileName).toLowerCase() === ".json") {
    try {
      return { status: "ok", program: parseProgram(text) };
    } catch (error) {
      return { status: "error", message: `Invalid bytecode: ${messageOf(error)}` };
    }
  }
  const result = compile(text);
  if (!result.ok) {
    return { status: "error", message: `Compilation error: ${formatCompileError(result.error)}` };
  }
  return { status: "ok", program: result.program };
}

export async function loadProgramFile(file: string): Promise<LoadResult> {
  let text: string;
  try {
    text = await readFile(file, "utf-8");
  } catch (error) {
    return { status: "error", message: `Error reading file '${file}': ${messageOf(error)}` };
  }
  return programFromText(text, file);
}

export interface ExecuteOptions {
  /** Defaults to the CLI's stdin. */
  input?: ByteSource;
}

/** Runs a program against the CLI streams. Returns the exit code. */
export async function executeProgram(
  program: Program,
  streams: CliStreams,
  options: ExecuteOptions = {}
): Promise<number> {
  const input = options.input ?? new StreamByteSource(streams.stdin);
  const result = await run(program, input, new StreamByteSink(streams.stdout));
  if (!result.ok) {
    streams.stderr.write(`Runtime error: ${formatRuntimeError(result.error)}\n`);
    return 1;
  }
  return 0;
}

/** Compiles and runs source text, reporting failures on stderr. */
export async function executeSource(
  source: string,
  streams: CliStreams,
  options: ExecuteOptions = {}
): Promise<number> {
  const loaded = programFromText(source);
  if (loaded.status === "error") {
    streams.stderr.write(`${loaded.message}\n`);
    return 1;
  }
  return executeProgram(loaded.program, streams, options);
}

