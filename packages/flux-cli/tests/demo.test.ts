import { describe, expect, it } from "vitest";

import { DEMO_FOOTER, DEMO_HEADER, runDemos } from "../src/commands/demo.js";
import { DEMOS } from "../src/index.js";
import { makeStreams } from "./helpers/streams.js";

describe("demo", () => {
  it("runs every built-in demo", async () => {
    const streams = makeStreams();
    expect(await runDemos(streams)).toBe(0);
    const outputs = ["A", "42", "54321", "53", "Hello"];
    const expected = DEMOS.map(
      (demo, i) =>
        `Demo ${i + 1}: ${demo.name}\nDescription: ${demo.description}\nCode: ${demo.code}\nOutput: ${outputs[i]}\n\n`
    ).join("");
    expect(streams.stdout.text()).toBe(DEMO_HEADER + expected + DEMO_FOOTER);
  });

  it("keeps going after a failing demo", async () => {
    const streams = makeStreams();
    const code = await runDemos(streams, [
      { name: "broken", code: "]", description: "does not compile" },
      { name: "fine", code: "+#", description: "prints 1" },
    ]);
    expect(code).toBe(1);
    expect(streams.stdout.text()).toBe(
      DEMO_HEADER +
        "Demo 1: broken\nDescription: does not compile\nCode: ]\nOutput: \n\n" +
        "Demo 2: fine\nDescription: prints 1\nCode: +#\nOutput: 1\n\n" +
        DEMO_FOOTER
    );
    expect(streams.stderr.text()).toBe("Compilation error: unmatched ']' at position 0\n");
  });
});
