import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  downloadProductionResult,
  resultDownloadUrl,
  startProduction,
  toKebabCase,
  waitForProduction,
  type Production,
} from "../../../src/services/external/auphonic.js";
import { ExternalServiceError } from "../../../src/utils/errors.js";
import { fakeFetch, jsonResponse } from "../../helpers/fakeFetch.js";

const API_KEY = "test-secret";

function production(overrides: Partial<Production> = {}): Production {
  return {
    uuid: "prod-1",
    status_string: "Done",
    error_message: null,
    output_basename: "sunday-homily",
    output_files: [{ ending: "mp3", download_url: null }],
    ...overrides,
  };
}

describe("toKebabCase", () => {
  it("lowercases and dashes the file name without its extension", () => {
    expect(toKebabCase("Sunday_Homily 03.mp3")).toBe("sunday-homily-03");
    expect(toKebabCase("  --Feast of St. Joseph!!.wav")).toBe("feast-of-st-joseph");
  });
});

describe("Auphonic client", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "homily-auphonic-"));
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("uploads the file with the preset and a kebab-case title", async () => {
    const audioPath = path.join(dir, "Sunday Homily.mp3");
    await writeFile(audioPath, "fake-audio");
    const { fetchImpl, requests } = fakeFetch(() => jsonResponse({ data: production({ status_string: "Waiting" }) }));

    const uuid = await startProduction(audioPath, "preset-1", { apiKey: API_KEY, fetchImpl });

    expect(uuid).toBe("prod-1");
    expect(requests[0].url).toBe("https://auphonic.com/api/simple/productions.json");
    expect(requests[0].method).toBe("POST");
    expect(requests[0].headers.get("authorization")).toBe("bearer test-secret");

    const form = requests[0].body;
    if (!(form instanceof FormData)) throw new Error("expected multipart form");
    expect(form.get("preset")).toBe("preset-1");
    expect(form.get("title")).toBe("sunday-homily");
    expect(form.get("action")).toBe("start");
  });

  it("polls until the production is done", async () => {
    const statuses = ["Audio Processing", "Done"];
    const { fetchImpl, requests } = fakeFetch(() =>
      jsonResponse({ data: production({ status_string: statuses.shift() ?? "Done" }) })
    );

    const result = await waitForProduction("prod-1", { apiKey: API_KEY, fetchImpl, pollIntervalSec: 0 });

    expect(result.status_string).toBe("Done");
    expect(requests).toHaveLength(2);
    expect(requests[1].url).toBe("https://auphonic.com/api/production/prod-1.json");
  });

  it("fails on an error status", async () => {
    const { fetchImpl } = fakeFetch(() =>
      jsonResponse({ data: production({ status_string: "Error", error_message: "Unsupported codec" }) })
    );

    const waiting = waitForProduction("prod-1", { apiKey: API_KEY, fetchImpl, pollIntervalSec: 0 });
    await expect(waiting).rejects.toBeInstanceOf(ExternalServiceError);
    await expect(waiting).rejects.toThrow("Production failed: Unsupported codec");
  });

  it("fails on an HTTP error", async () => {
    const { fetchImpl } = fakeFetch(() => new Response("nope", { status: 401 }));
    await expect(waitForProduction("prod-1", { apiKey: API_KEY, fetchImpl })).rejects.toThrow(
      "Status check failed (401): nope"
    );
  });

  it("prefers the API's download link", () => {
    const withLink = production({
      output_files: [{ ending: "mp3", download_url: "https://auphonic.com/api/download/file.mp3" }],
    });
    expect(resultDownloadUrl(withLink, API_KEY)).toBe(
      "https://auphonic.com/api/download/file.mp3?bearer_token=test-secret"
    );
    expect(resultDownloadUrl(production(), API_KEY)).toBe(
      "https://auphonic.com/api/download/audio-result/prod-1/sunday-homily.mp3"
    );
    expect(resultDownloadUrl(production({ output_files: [] }), API_KEY)).toBeNull();
  });

  it("saves the first output file", async () => {
    const { fetchImpl } = fakeFetch(() => new Response("clean-audio"));

    const saved = await downloadProductionResult(production(), dir, { apiKey: API_KEY, fetchImpl });

    expect(saved).toBe(path.join(dir, "sunday-homily.mp3"));
    expect(await readFile(path.join(dir, "sunday-homily.mp3"), "utf-8")).toBe("clean-audio");
  });

  it("returns null when there is nothing to download", async () => {
    const { fetchImpl, requests } = fakeFetch();
    expect(await downloadProductionResult(production({ output_files: [] }), dir, { apiKey: API_KEY, fetchImpl })).toBeNull();
    expect(requests).toHaveLength(0);
  });
});
