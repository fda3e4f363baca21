export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export interface CommandFlags {
  /** Flags that take a value, as `--flag value` or `--flag=value`. */
  values?: readonly string[];
  toggles?: readonly string[];
}

export interface CommandArgs {
  values: Map<string, string>;
  toggles: Set<string>;
  positionals: string[];
  /** `-h` or `--help` was given; every command accepts it. */
  help: boolean;
}

const HELP_FLAGS = new Set(["-h", "--help"]);

/**
 * Splits a command's arguments into flags and positionals. `-` alone is a
 * positional (stdin/stderr), and everything after `--` is taken as is.
 */
export function parseCommandArgs(args: readonly string[], flags: CommandFlags = {}): CommandArgs {
  const valued = new Set(flags.values ?? []);
  const toggled = new Set(flags.toggles ?? []);
  const parsed: CommandArgs = { values: new Map(), toggles: new Set(), positionals: [], help: false };

  const rest = [...args];
  for (let token = rest.shift(); token !== undefined; token = rest.shift()) {
    if (token === "--") {
      parsed.positionals.push(...rest);
      break;
    }
    if (token === "-" || !token.startsWith("-")) {
      parsed.positionals.push(token);
      continue;
    }
    if (HELP_FLAGS.has(token)) {
      parsed.help = true;
      continue;
    }
    if (!token.startsWith("--")) {
      throw new UsageError(`unknown flag: ${token}`);
    }

    const eq = token.indexOf("=");
    const flag = eq === -1 ? token : token.slice(0, eq);
    const inline = eq === -1 ? undefined : token.slice(eq + 1);
    if (toggled.has(flag)) {
      if (inline !== undefined) throw new UsageError(`flag ${flag} does not take a value`);
      parsed.toggles.add(flag);
    } else if (valued.has(flag)) {
      const value = inline ?? rest.shift();
      if (value === undefined || (inline === undefined && value.startsWith("--"))) {
        throw new UsageError(`missing value for ${flag}`);
      }
      parsed.values.set(flag, value);
    } else {
      throw new UsageError(`unknown flag: ${flag}`);
    }
  }
  return parsed;
}
