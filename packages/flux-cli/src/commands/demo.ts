import { EmptySource } from "flux-lang";

import type { CliStreams } from "../io/console.js";
import { DEMOS, type Demo } from "../demos.js";
import { executeSource } from "../index.js";

export const DEMO_HEADER = "FLUX DEMONSTRATION\n\n";
export const DEMO_FOOTER = "Try writing your own programs using these patterns!\n";

export async function runDemos(
  streams: CliStreams,
  demos: readonly Demo[] = DEMOS
): Promise<number> {
  streams.stdout.write(DEMO_HEADER);
  let status = 0;
  for (const [index, demo] of demos.entries()) {
    streams.stdout.write(
      `Demo ${index + 1}: ${demo.name}\n` +
        `Description: ${demo.description}\n` +
        `Code: ${demo.code}\n` +
        `Output: `
    );
    const code = await executeSource(demo.code, streams, { input: EmptySource });
    if (code !== 0) status = code;
    streams.stdout.write("\n\n");
  }
  streams.stdout.write(DEMO_FOOTER);
  return status;
}
