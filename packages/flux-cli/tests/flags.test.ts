import { describe, expect, it } from "vitest";

import { parseCommandArgs, UsageError } from "../src/flags.js";

describe("parseCommandArgs", () => {
  it("separates positionals, values and toggles", () => {
    const parsed = parseCommandArgs(["prog.flux", "--out=x.json", "--json"], {
      values: ["--out"],
      toggles: ["--json"],
    });
    expect(parsed.positionals).toEqual(["prog.flux"]);
    expect([...parsed.values]).toEqual([["--out", "x.json"]]);
    expect([...parsed.toggles]).toEqual(["--json"]);
    expect(parsed.help).toBe(false);
  });

  it("reads a value from the next argument, including -", () => {
    const parsed = parseCommandArgs(["--trace", "-", "a.flux"], { values: ["--trace"] });
    expect(parsed.values.get("--trace")).toBe("-");
    expect(parsed.positionals).toEqual(["a.flux"]);
  });

  it("keeps an inline value that contains =", () => {
    expect(parseCommandArgs(["--out=a=b.json"], { values: ["--out"] }).values.get("--out")).toBe("a=b.json");
  });

  it("recognizes help on every command", () => {
    expect(parseCommandArgs(["-h"]).help).toBe(true);
    expect(parseCommandArgs(["x.flux", "--help"]).help).toBe(true);
  });

  it("takes everything after -- as positionals", () => {
    expect(parseCommandArgs(["--", "--json", "-h"], { toggles: ["--json"] })).toEqual({
      values: new Map(),
      toggles: new Set(),
      positionals: ["--json", "-h"],
      help: false,
    });
  });

  it("rejects unknown flags", () => {
    expect(() => parseCommandArgs(["--nope"], { values: ["--out"] })).toThrowError(UsageError);
    expect(() => parseCommandArgs(["-x"])).toThrowError("unknown flag: -x");
  });

  it("rejects missing values and valued toggles", () => {
    expect(() => parseCommandArgs(["--out"], { values: ["--out"] })).toThrowError("missing value for --out");
    expect(() => parseCommandArgs(["--out", "--json"], { values: ["--out"], toggles: ["--json"] }))
      .toThrowError("missing value for --out");
    expect(() => parseCommandArgs(["--json=1"], { toggles: ["--json"] })).toThrowError("flag --json does not take a value");
  });
});
