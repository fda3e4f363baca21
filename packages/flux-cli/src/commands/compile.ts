import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import { formatListing, programId, serializeProgram } from "flux-lang";

import type { CliStreams } from "../io/console.js";
import { parseCommandArgs } from "../flags.js";
import { loadProgramFile } from "../index.js";

export const COMPILE_USAGE = "Usage: flux compile <file> [--json] [--out <path>]";

const decoder = new TextDecoder();

export async function compileFile(args: string[], streams: CliStreams): Promise<number> {
  const parsed = parseCommandArgs(args, { values: ["--out"], toggles: ["--json"] });
  if (parsed.help) {
    streams.stdout.write(`${COMPILE_USAGE}\n`);
    return 0;
  }
  const [file, ...extra] = parsed.positionals;
  if (file === undefined || extra.length > 0) {
    streams.stderr.write(`${file === undefined ? "missing program file" : `unexpected argument: ${extra[0]}`}\n${COMPILE_USAGE}\n`);
    return 2;
  }

  const loaded = await loadProgramFile(file);
  if (loaded.status === "error") {
    streams.stderr.write(`${loaded.message}\n`);
    return 1;
  }
  const { program } = loaded;
  const bytes = serializeProgram(program);

  if (parsed.toggles.has("--json")) {
    streams.stdout.write(`${decoder.decode(bytes)}\n`);
  } else {
    const listing = formatListing(program);
    streams.stdout.write(
      `Successfully compiled ${file}\n` +
        `Total instructions: ${program.instrs.length}\n` +
        `Program id: ${programId(program)}\n\n` +
        `Bytecode listing:\n\n` +
        `Addr  Opcode      Argument\n` +
        (listing === "" ? "" : `${listing}\n`)
    );
  }

  const out = parsed.values.get("--out");
  if (out !== undefined) {
    await mkdir(path.dirname(path.resolve(out)), { recursive: true });
    await writeFile(out, bytes);
    streams.stderr.write(`wrote ${out}\n`);
  }
  return 0;
}
