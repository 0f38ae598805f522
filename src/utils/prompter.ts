/**
 * Console Prompts
 * Thin wrapper over inquirer so workflow code can be driven by a fake in tests.
 */

import input from "@inquirer/input";

export interface Prompter {
  input(message: string, options?: { defaultValue?: string }): Promise<string>;
}

export class PromptCancelled extends Error {
  constructor(message = "Prompt cancelled.") {
    super(message);
    this.name = "PromptCancelled";
  }
}

function isExitPromptError(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === "ExitPromptError" || error.message.includes("User force closed the prompt"))
  );
}

export function isInteractive(): boolean {
  if (process.env.CI) {
    return false;
  }
  return Boolean(process.stdin.isTTY && process.stdout.isTTY);
}

export function createInquirerPrompter(): Prompter {
  return {
    async input(message, options) {
      try {
        return await input({ message, default: options?.defaultValue });
      } catch (error) {
        if (isExitPromptError(error)) {
          throw new PromptCancelled();
        }
        throw error;
      }
    },
  };
}

/** Strips surrounding whitespace and quotes from a pasted path. */
export function cleanPath(value: string): string {
  return value.trim().replace(/^["']+|["']+$/g, "");
}
