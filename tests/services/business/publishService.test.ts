import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { contentRepoTarget, publishToYouTube } from "../../../src/services/business/publishService.js";
import { parseFrontMatter } from "../../../src/services/business/mdxService.js";
import { fakeFetch, jsonResponse, type RecordedRequest } from "../../helpers/fakeFetch.js";

const MDX = [
  "---",
  'title: "The Narrow Gate"',
  'youtube_description: "About this video.\\nSubscribe."',
  'keywords: "Latin Mass, Faith"',
  'mdx_file: "src/mds/lectures/the-narrow-gate.mdx"',
  'media_path: ""',
  "---",
  "",
  "# The Narrow Gate",
].join("\n");

function bodyText(request: RecordedRequest): string {
  const { body } = request;
  if (typeof body === "string") return body;
  if (body instanceof Uint8Array) return Buffer.from(body).toString("utf-8");
  return "";
}

describe("contentRepoTarget", () => {
  const config = { repoDir: "/repo", subdir: "src/mds/lectures" };

  it("uses the file name declared in the front matter", () => {
    expect(contentRepoTarget("/work/final/homily.mdx", MDX, config)).toBe(
      path.join("/repo", "src/mds/lectures", "the-narrow-gate.mdx")
    );
  });

  it("falls back to the local file name", () => {
    expect(contentRepoTarget("/work/final/homily.mdx", "# No front matter", config)).toBe(
      path.join("/repo", "src/mds/lectures", "homily.mdx")
    );
  });
});

describe("publishToYouTube", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "homily-publish-"));
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("uploads, updates, sets the thumbnail and captions, then records the video ID", async () => {
    const files = {
      videoPath: path.join(dir, "final-video.mp4"),
      thumbnailPath: path.join(dir, "thumbnail.jpg"),
      captionsPath: path.join(dir, "video_captions.srt"),
      mdxPath: path.join(dir, "homily.mdx"),
    };
    await writeFile(files.videoPath, "video-bytes");
    await writeFile(files.thumbnailPath, "jpeg-bytes");
    await writeFile(files.captionsPath, "1\n00:00:11,000 --> 00:00:12,000\nAmen.\n\n");
    await writeFile(files.mdxPath, MDX);

    const { fetchImpl, requests } = fakeFetch(
      (req) =>
        req.url.includes("uploadType=resumable")
          ? new Response(null, { status: 200, headers: { location: "https://upload.test/session-1" } })
          : undefined,
      (req) => (req.url === "https://upload.test/session-1" ? jsonResponse({ id: "vid123" }) : undefined),
      (req) =>
        req.method === "GET"
          ? jsonResponse({ items: [{ id: "vid123", snippet: { title: "The Narrow Gate", description: "" } }] })
          : undefined,
      () => jsonResponse({})
    );

    const videoId = await publishToYouTube(
      { ...files, categoryId: "22", privacyStatus: "public" },
      { accessToken: "test-token", fetchImpl }
    );

    expect(videoId).toBe("vid123");
    expect(requests.map((r) => `${r.method} ${r.url.split("?")[0]}`)).toEqual([
      "POST https://www.googleapis.com/upload/youtube/v3/videos",
      "PUT https://upload.test/session-1",
      "GET https://www.googleapis.com/youtube/v3/videos",
      "PUT https://www.googleapis.com/youtube/v3/videos",
      "POST https://www.googleapis.com/upload/youtube/v3/thumbnails/set",
      "POST https://www.googleapis.com/upload/youtube/v3/captions",
    ]);
    expect(JSON.parse(bodyText(requests[0]))).toEqual({
      snippet: {
        title: "The Narrow Gate",
        description: "About this video.\nSubscribe.",
        tags: ["Latin Mass", "Faith"],
        categoryId: "22",
      },
      status: { privacyStatus: "public" },
    });
    expect(bodyText(requests[5])).toContain('"videoId":"vid123"');
    expect(parseFrontMatter(await readFile(files.mdxPath, "utf-8")).media_path).toBe("vid123");
  });
});
