// src/prompt.ts
import readline from "node:readline";
import type { DuplicateGroup } from "./duplicates.js";
import { parseSurvivorInput, type SurvivorChooser } from "./resolve.js";

export const KEEP_PROMPT =
  "Enter the number of the file you want to KEEP (others will be deleted) press [ENTER] to skip: ";

export function formatGroupListing(group: DuplicateGroup): string {
  const lines = [`\nDuplicate files for hash ${group.digest}:`];
  group.paths.forEach((p, i) => lines.push(`${i + 1}. ${p}`));
  return lines.join("\n") + "\n";
}

/**
 * Survivor chooser backed by a line-oriented prompt. End of input skips
 * every remaining group.
 */
export function createConsoleChooser({
  input = process.stdin,
  output = process.stdout,
}: {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
} = {}): { choose: SurvivorChooser; close: () => void } {
  const rl = readline.createInterface({ input });
  const buffered: string[] = [];
  let waiting: ((line: string | null) => void) | null = null;
  let closed = false;

  rl.on("line", (line) => {
    if (waiting) {
      const deliver = waiting;
      waiting = null;
      deliver(line);
    } else {
      buffered.push(line);
    }
  });
  rl.once("close", () => {
    closed = true;
    waiting?.(null);
    waiting = null;
  });

  const nextLine = (): Promise<string | null> => {
    const line = buffered.shift();
    if (line !== undefined) return Promise.resolve(line);
    if (closed) return Promise.resolve(null);
    return new Promise((resolve) => {
      waiting = resolve;
    });
  };

  const choose: SurvivorChooser = async (group) => {
    output.write(formatGroupListing(group));
    output.write(KEEP_PROMPT);
    const answer = await nextLine();
    return answer == null ? null : parseSurvivorInput(answer);
  };

  return {
    choose,
    close: () => rl.close(),
  };
}
