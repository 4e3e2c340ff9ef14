import { createInterface } from "node:readline/promises";
import type { ConfirmPrompt } from "@dashboard-sync/core/sync";

/** Empty input (just enter) confirms; "n" or "no" declines. */
export function isAffirmative(answer: string): boolean {
  return !/^no?$/i.test(answer.trim());
}

export function createConfirmPrompt(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stderr,
): ConfirmPrompt {
  return async (message) => {
    const rl = createInterface({ input, output });
    try {
      const answer = await rl.question(`${message} `);
      return isAffirmative(answer);
    } finally {
      rl.close();
    }
  };
}
