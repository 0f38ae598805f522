/**
 * OpenAI Configuration
 * Used by the metadata agent.
 */

import { setDefaultOpenAIKey } from "@openai/agents";
import { getRequiredEnv } from "./env.js";

export const openaiConfig = {
  model: process.env.OPENAI_MODEL || "gpt-4o",
};

let configured = false;

/** Registers the API key with the Agents SDK once; throws if it is missing. */
export function ensureOpenAIConfigured(): void {
  if (!configured) {
    setDefaultOpenAIKey(getRequiredEnv("OPENAI_API_KEY"));
    configured = true;
  }
}
