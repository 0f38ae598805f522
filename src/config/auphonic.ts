/**
 * Auphonic Configuration
 * Audio cleanup service used on the clipped homily.
 */

import { getRequiredEnv } from "./env.js";

export const auphonicConfig = {
  apiBase: "https://auphonic.com/api",
} as const;

export function getAuphonicApiKey(): string {
  return getRequiredEnv("AUPHONIC_API_KEY");
}
