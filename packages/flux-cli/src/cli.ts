#!/usr/bin/env node
import { exit } from "node:process";

import {
  EXAMPLES_TEXT,
  GUIDE_TEXT,
  HELP_TEXT,
  REFERENCE_TEXT,
  messageOf,
  processStreams,
  type CliStreams,
} from "./index.js";
import { UsageError } from "./flags.js";
import { compileFile } from "./commands/compile.js";
import { runDemos } from "./commands/demo.js";
import { runRepl } from "./commands/repl.js";
import { runFile } from "./commands/run.js";

function printText(streams: CliStreams, text: string): number {
  streams.stdout.write(`${text}\n`);
  return 0;
}

async function guarded(streams: CliStreams, fn: () => Promise<number>): Promise<number> {
  try {
    return await fn();
  } catch (error) {
    streams.stderr.write(`${messageOf(error)}\n`);
    return error instanceof UsageError ? 2 : 1;
  }
}

/** Dispatches one command line. Returns the process exit code. */
export async function dispatch(
  args: string[],
  streams: CliStreams = processStreams()
): Promise<number> {
  const [command, ...rest] = args;
  switch (command) {
    case undefined:
    case "help":
    case "-h":
    case "--help":
      return printText(streams, HELP_TEXT);
    case "guide":
      return printText(streams, GUIDE_TEXT);
    case "reference":
    case "ref":
      return printText(streams, REFERENCE_TEXT);
    case "examples":
      return printText(streams, EXAMPLES_TEXT);
    case "demo":
      return guarded(streams, () => runDemos(streams));
    case "run":
      return guarded(streams, () => runFile(rest, streams));
    case "compile":
      return guarded(streams, () => compileFile(rest, streams));
    case "interactive":
    case "repl":
      return guarded(streams, () => runRepl(streams));
    default: {
      streams.stderr.write(`unknown command: ${command}\nRun 'flux help' for usage information\n`);
      return 2;
    }
  }
}

async function main(): Promise<void> {
  const exitCode = await dispatch(process.argv.slice(2));
  exit(exitCode);
}

if (!process.env.VITEST) {
  main().catch((error) => {
    process.stderr.write(`${messageOf(error)}\n`);
    exit(2);
  });
}
