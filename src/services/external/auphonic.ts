/**
 * Auphonic API Service
 * Uploads the clipped homily for leveling/denoising and downloads the result.
 */

import { openAsBlob } from "fs";
import { writeFile } from "fs/promises";
import path from "path";
import { setTimeout as sleep } from "timers/promises";
import { z } from "zod";
import { auphonicConfig, getAuphonicApiKey } from "../../config/auphonic.js";
import { ExternalServiceError } from "../../utils/errors.js";

const OutputFileSchema = z.object({
  ending: z.string().default("mp3"),
  download_url: z.string().nullish(),
});

const ProductionSchema = z.object({
  uuid: z.string(),
  status_string: z.string().default(""),
  error_message: z.string().nullish(),
  output_basename: z.string().nullish(),
  output_files: z.array(OutputFileSchema).default([]),
});
export type Production = z.infer<typeof ProductionSchema>;

const EnvelopeSchema = z.object({ data: ProductionSchema });

export interface AuphonicClientOptions {
  apiKey?: string;
  fetchImpl?: typeof fetch;
  pollIntervalSec?: number;
}

/**
 * Lowercase, dash-separated, extension dropped.
 * "Sunday_Homily 03.mp3" → "sunday-homily-03"
 */
export function toKebabCase(filename: string): string {
  const name = path.parse(filename).name;
  return name
    .replace(/[\s_]+/g, "-")
    .toLowerCase()
    .replace(/[^a-z0-9-]/g, "")
    .replace(/-+/g, "-")
    .replace(/^-+|-+$/g, "");
}

async function readProduction(response: Response, action: string): Promise<Production> {
  if (!response.ok) {
    throw new ExternalServiceError("Auphonic", `${action} failed (${response.status}): ${await response.text()}`);
  }
  const parsed = EnvelopeSchema.safeParse(await response.json());
  if (!parsed.success) {
    throw new ExternalServiceError("Auphonic", `${action} returned an unexpected body: ${parsed.error.message}`);
  }
  return parsed.data.data;
}

/**
 * Creates and starts a production for the file. Returns its UUID.
 */
export async function startProduction(
  audioPath: string,
  preset: string,
  options: AuphonicClientOptions = {}
): Promise<string> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const apiKey = options.apiKey ?? getAuphonicApiKey();
  const title = toKebabCase(path.basename(audioPath));

  const form = new FormData();
  form.set("preset", preset);
  form.set("title", title);
  form.set("action", "start");
  form.set("input_file", await openAsBlob(audioPath), path.basename(audioPath));

  console.log(`[auphonic] Uploading ${path.basename(audioPath)} as "${title}"...`);
  const response = await fetchImpl(`${auphonicConfig.apiBase}/simple/productions.json`, {
    method: "POST",
    headers: { Authorization: `bearer ${apiKey}` },
    body: form,
  });

  const production = await readProduction(response, "Production start");
  console.log(`[auphonic] ✓ Production started: ${production.uuid}`);
  return production.uuid;
}

/**
 * Polls until the production is done. Throws on an error status.
 */
export async function waitForProduction(
  uuid: string,
  options: AuphonicClientOptions = {}
): Promise<Production> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const apiKey = options.apiKey ?? getAuphonicApiKey();
  const intervalMs = (options.pollIntervalSec ?? 10) * 1000;

  for (;;) {
    const response = await fetchImpl(`${auphonicConfig.apiBase}/production/${uuid}.json`, {
      headers: { Authorization: `bearer ${apiKey}` },
    });
    const production = await readProduction(response, "Status check");
    const status = production.status_string.toLowerCase();
    console.log(`[auphonic] Status: ${status || "unknown"}`);

    if (status === "done") return production;
    if (status === "error" || status === "failed") {
      throw new ExternalServiceError("Auphonic", `Production failed: ${production.error_message ?? status}`);
    }
    await sleep(intervalMs);
  }
}

/**
 * Download URL of the first output file: the API's own link with the token
 * appended, else the audio-result path built from the basename.
 */
export function resultDownloadUrl(production: Production, apiKey: string): string | null {
  const [first] = production.output_files;
  if (!first) return null;
  if (first.download_url) {
    return `${first.download_url}?bearer_token=${encodeURIComponent(apiKey)}`;
  }
  const basename = production.output_basename ?? "output";
  return `${auphonicConfig.apiBase}/download/audio-result/${production.uuid}/${basename}.${first.ending}`;
}

/**
 * Saves the first output file into `directory`. Returns its path, or null
 * when the production has no outputs.
 */
export async function downloadProductionResult(
  production: Production,
  directory: string,
  options: AuphonicClientOptions = {}
): Promise<string | null> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const apiKey = options.apiKey ?? getAuphonicApiKey();

  const url = resultDownloadUrl(production, apiKey);
  const [first] = production.output_files;
  if (!url || !first) {
    console.warn("[auphonic] Production finished but has no output files");
    return null;
  }

  const response = await fetchImpl(url, { headers: { Authorization: `bearer ${apiKey}` } });
  if (!response.ok) {
    throw new ExternalServiceError("Auphonic", `Download failed (${response.status})`);
  }

  const localPath = path.join(directory, `${production.output_basename ?? "output"}.${first.ending}`);
  await writeFile(localPath, Buffer.from(await response.arrayBuffer()));
  console.log(`[auphonic] ✓ Downloaded ${localPath}`);
  return localPath;
}

/**
 * Upload, wait, download. Returns the cleaned file's path.
 */
export async function cleanAudio(
  audioPath: string,
  preset: string,
  directory: string,
  options: AuphonicClientOptions = {}
): Promise<string | null> {
  const uuid = await startProduction(audioPath, preset, options);
  const production = await waitForProduction(uuid, options);
  return downloadProductionResult(production, directory, options);
}
