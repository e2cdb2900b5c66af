/**
 * Prompt Utility
 * Line-based questions on the terminal
 */

import { createInterface } from "node:readline/promises";

export type Prompt = (question: string) => Promise<string>;

/**
 * Ask a single question on stdin/stdout
 */
export const stdinPrompt: Prompt = async (question) => {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await rl.question(question);
  } finally {
    rl.close();
  }
};

/**
 * Ask a yes/no question until the answer is recognized
 * An empty answer counts as yes
 */
export async function confirm(prompt: Prompt, question: string): Promise<boolean> {
  for (;;) {
    const answer = (await prompt(`${question} [Y/n] `)).trim();
    if (answer === "" || answer === "y" || answer === "Y") return true;
    if (answer === "n" || answer === "N") return false;
  }
}
