import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import type { Prompt } from "./reports/templates.js";

export interface LinePrompt {
  prompt: Prompt;
  close: () => void;
}

/**
 * Line prompt over a readable stream. Lines that arrive before a question is
 * asked (piped stdin, typing ahead during API calls) are queued by the
 * interface iterator and answer the next question in order.
 */
export function createLinePrompt(input: Readable, output: Writable): LinePrompt {
  const rl = createInterface({ input, crlfDelay: Infinity });
  const lines = rl[Symbol.asyncIterator]();

  return {
    prompt: async (question) => {
      output.write(question);
      const next = await lines.next();
      return next.done ? null : next.value;
    },
    close: () => rl.close(),
  };
}
