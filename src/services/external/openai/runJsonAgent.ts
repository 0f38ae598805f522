/**
 * JSON Agent Runner
 * Uses OpenAI Agents SDK with strict JSON output validation.
 */

import { Agent, run } from "@openai/agents";
import { z } from "zod";
import { ensureOpenAIConfigured, openaiConfig } from "../../../config/openai.js";
import { ExternalServiceError } from "../../../utils/errors.js";

type RunJsonAgentParams<Output, Input> = {
  agentName: string;
  systemPrompt: string;
  input: unknown;
  schema: z.ZodType<Output, z.ZodTypeDef, Input>;
};

/**
 * Strips a ```json fence if the model added one and parses the content.
 * Throws on invalid JSON or a schema mismatch.
 */
export function parseAgentJson<Output, Input>(
  agentName: string,
  content: string,
  schema: z.ZodType<Output, z.ZodTypeDef, Input>
): Output {
  let cleanContent = content.trim();
  const codeBlockMatch = cleanContent.match(/^```(?:json)?\s*\n?([\s\S]*?)\n?```$/);
  if (codeBlockMatch) {
    cleanContent = codeBlockMatch[1].trim();
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(cleanContent);
  } catch {
    throw new ExternalServiceError(agentName, `Invalid JSON response: ${content.slice(0, 200)}`);
  }

  const validated = schema.safeParse(parsed);
  if (!validated.success) {
    throw new ExternalServiceError(agentName, `JSON validation failed: ${validated.error.message}`);
  }
  return validated.data;
}

/**
 * Runs an AI agent that returns strictly validated JSON.
 */
export async function runJsonAgent<Output, Input>(
  params: RunJsonAgentParams<Output, Input>
): Promise<Output> {
  const { agentName, systemPrompt, input, schema } = params;
  ensureOpenAIConfigured();

  const agent = new Agent({
    name: agentName,
    instructions: systemPrompt,
    model: openaiConfig.model,
  });

  const inputString = typeof input === "string" ? input : JSON.stringify(input);

  const inputTokenEstimate = Math.ceil(inputString.length / 4); // ~4 chars per token
  console.log(`[${agentName}] Input size: ${inputString.length} chars (~${inputTokenEstimate} tokens)`);
  if (inputTokenEstimate > 50000) {
    console.warn(`[${agentName}] ⚠️ Very large input (${inputTokenEstimate} tokens) - may hit context limits`);
  }

  const result = await run(agent, inputString);

  const content = result.finalOutput;
  if (!content) {
    throw new ExternalServiceError(agentName, "No response from agent");
  }

  return parseAgentJson(agentName, content, schema);
}
