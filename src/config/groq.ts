/**
 * Groq Configuration
 * Groq provides fast Whisper transcription with word timestamps.
 */

import Groq from "groq-sdk";
import { getRequiredEnv } from "./env.js";

export const groqConfig = {
  model: process.env.GROQ_TRANSCRIPTION_MODEL || "whisper-large-v3-turbo",
  language: "en",
} as const;

let client: Groq | null = null;

export function getGroqClient(): Groq {
  if (!client) {
    client = new Groq({ apiKey: getRequiredEnv("GROQ_API_KEY") });
  }
  return client;
}
