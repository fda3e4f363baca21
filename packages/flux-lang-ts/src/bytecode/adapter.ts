import { blake3 } from "@noble/hashes/blake3.js";
import { bytesToHex } from "@noble/hashes/utils.js";
import { Ajv } from "ajv";
import type { ErrorObject } from "ajv";

import schema from "../../schema/flux-bytecode.schema.json" with { type: "json" };
import { canonicalJsonBytes } from "../canon/json.js";
import type { Instr, Program } from "../model/bytecode.js";

const decoder = new TextDecoder();

const ajv = new Ajv({ allErrors: true, strict: false });
const validateProgram = ajv.compile<Program>(schema);

const INSTR_PATH = /^\/instrs\/\d+$/;
const OP_PATH = /^\/instrs\/\d+\/op$/;
const ARG_PATH = /^\/instrs\/\d+\/arg$/;

/** JSON pointer of the failing value; `child` names a property below it. */
function pointerOf(error: ErrorObject, child?: string): string {
  const tail = child === undefined ? "" : `/${child.replace(/~/g, "~0").replace(/\//g, "~1")}`;
  return `${error.instancePath}${tail}` || "/";
}

function codeFor(pointer: string): string {
  if (pointer === "/version") return "E_BC_VERSION";
  if (pointer === "/instrs") return "E_BC_INSTRS";
  if (INSTR_PATH.test(pointer)) return "E_BC_INSTR";
  if (OP_PATH.test(pointer)) return "E_BC_OP_UNKNOWN";
  if (ARG_PATH.test(pointer)) return "E_BC_ARG";
  return "E_BC_TYPE";
}

function describeError(error: ErrorObject): string {
  switch (error.keyword) {
    case "additionalProperties":
      return `E_BC_FIELD_UNKNOWN ${pointerOf(error, String(error.params.additionalProperty))}`;
    case "required": {
      const target = pointerOf(error, String(error.params.missingProperty));
      return `${codeFor(target)} ${target}`;
    }
    case "not":
      // only reachable through the `else` branch: a non-jump op carrying an arg
      return `E_BC_ARG ${pointerOf(error, "arg")}`;
    default: {
      const pointer = pointerOf(error);
      return `${codeFor(pointer)} ${pointer}`;
    }
  }
}

function errorDepth(error: ErrorObject): number {
  const base = error.instancePath ? error.instancePath.split("/").filter(Boolean).length : 0;
  if (error.keyword === "additionalProperties" || error.keyword === "required" || error.keyword === "not") {
    return base + 1;
  }
  return base;
}

function firstRelevantError(errors: ErrorObject[] | null | undefined): ErrorObject | undefined {
  const relevant = (errors ?? []).filter((err) => err.keyword !== "if");
  // deepest first; ties keep schema order
  return [...relevant].sort((a, b) => errorDepth(b) - errorDepth(a))[0];
}

/** Re-derives the bracket pairing the compiler guarantees; files get no such guarantee. */
function verifyJumps(instrs: readonly Instr[]): void {
  const open: number[] = [];
  instrs.forEach((ins, address) => {
    if (ins.op === "LOOP_START") {
      open.push(address);
      return;
    }
    if (ins.op !== "LOOP_END") return;
    const start = open.pop();
    if (start === undefined || ins.arg !== start) {
      throw new Error(`E_BC_JUMP /instrs/${address}/arg`);
    }
    const opener = instrs[start];
    if (opener.op !== "LOOP_START" || opener.arg !== address + 1) {
      throw new Error(`E_BC_JUMP /instrs/${start}/arg`);
    }
  });
  const dangling = open.pop();
  if (dangling !== undefined) {
    throw new Error(`E_BC_JUMP /instrs/${dangling}/arg`);
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (cause) {
    throw new Error("E_BC_TYPE /", { cause });
  }
}

function parseInput(input: unknown): unknown {
  if (typeof input === "string") return parseJson(input);
  if (input instanceof Uint8Array) return parseJson(decoder.decode(input));
  return input;
}

/** Accepts JSON text, its UTF-8 bytes, or an already parsed value. */
export function parseProgram(input: unknown): Program {
  const obj = parseInput(input);
  if (!validateProgram(obj)) {
    const error = firstRelevantError(validateProgram.errors);
    throw new Error(error ? describeError(error) : "E_BC_TYPE /");
  }
  verifyJumps(obj.instrs);
  return obj;
}

export function serializeProgram(program: Program): Uint8Array {
  return canonicalJsonBytes({ version: program.version, instrs: program.instrs });
}

/** Content id of a program: blake3 over its canonical encoding. */
export function programId(program: Program): string {
  return bytesToHex(blake3(serializeProgram(program)));
}
