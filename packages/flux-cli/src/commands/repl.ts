import * as readline from "node:readline";

import { EmptySource } from "flux-lang";

import type { CliStreams } from "../io/console.js";
import { QUICK_REFERENCE, executeSource } from "../index.js";

export const REPL_BANNER =
  "FLUX INTERACTIVE MODE\n\n" +
  "Enter Flux code and press Enter to execute.\n" +
  "Type 'exit' or 'quit' to leave, 'help' for quick reference.\n\n";

export const PROMPT = "flux> ";

/**
 * Line-at-a-time shell. Every line is compiled and run on its own VM; the
 * shell owns stdin, so `,` inside a line always reads end of input.
 */
export async function runRepl(streams: CliStreams): Promise<number> {
  streams.stdout.write(REPL_BANNER);
  const rl = readline.createInterface({ input: streams.stdin, terminal: false });
  streams.stdout.write(PROMPT);
  // leaving the loop early closes the interface
  for await (const raw of rl) {
    const line = raw.trim();
    if (line === "exit" || line === "quit") {
      streams.stdout.write("Goodbye!\n");
      return 0;
    }
    if (line === "help") {
      streams.stdout.write(`Quick reference:\n${QUICK_REFERENCE}\n`);
    } else if (line !== "") {
      await executeSource(line, streams, { input: EmptySource });
      streams.stdout.write("\n");
    }
    streams.stdout.write(PROMPT);
  }
  streams.stdout.write("\n");
  return 0;
}
