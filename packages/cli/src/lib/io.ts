/**
 * Terminal and output stream seams
 */

import { createInterface } from "node:readline/promises";

/**
 * Anything output can be written to
 */
export interface OutputSink {
  write(chunk: string): unknown;
  /** Set on real terminals; enables colors */
  isTTY?: boolean;
}

/**
 * The controlling terminal, as far as confirmation prompts are concerned
 */
export interface Terminal {
  /** True only when a human can answer a prompt */
  isInteractive(): boolean;
  /** Ask a yes/no question; resolves true for "y" or "yes" */
  confirm(question: string): Promise<boolean>;
}

export function isAffirmative(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === "y" || normalized === "yes";
}

/**
 * Terminal backed by process stdin; prompts are written to stderr so that
 * stdout stays machine-readable
 */
export function processTerminal(
  input: NodeJS.ReadStream = process.stdin,
  output: NodeJS.WriteStream = process.stderr
): Terminal {
  return {
    isInteractive: () => input.isTTY === true,
    confirm: async (question) => {
      const rl = createInterface({ input, output });
      try {
        const answer = await rl.question(`${question} (y/N) `);
        return isAffirmative(answer);
      } finally {
        rl.close();
      }
    },
  };
}
