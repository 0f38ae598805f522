/**
 * YouTube API Service
 * Uploads the finished video with YouTube Data API v3, then sets its
 * thumbnail and captions. Authenticated with an OAuth bearer token.
 */

import { openAsBlob } from "fs";
import { readFile } from "fs/promises";
import path from "path";
import { z } from "zod";
import { youtubeConfig, getYouTubeAccessToken } from "../../config/youtube.js";
import { AppError, NotFoundError } from "../../utils/errors.js";

export interface VideoMetadata {
  title: string;
  description: string;
  tags?: string[];
  categoryId: string;
  privacyStatus: "public" | "unlisted" | "private";
}

export interface YouTubeClientOptions {
  accessToken?: string;
  fetchImpl?: typeof fetch;
}

const VideoIdSchema = z.object({ id: z.string() });

const VideoSnippetSchema = z
  .object({
    title: z.string(),
    description: z.string().default(""),
    categoryId: z.string().optional(),
  })
  .passthrough();

const VideoListSchema = z.object({
  items: z.array(z.object({ id: z.string(), snippet: VideoSnippetSchema })).default([]),
});

function clientOf(options: YouTubeClientOptions) {
  return {
    fetchImpl: options.fetchImpl ?? fetch,
    token: options.accessToken ?? getYouTubeAccessToken(),
  };
}

async function ensureOk(response: Response, action: string): Promise<void> {
  if (!response.ok) {
    const error = await response.text();
    throw new AppError(`YouTube API error (${action}): ${error}`, response.status);
  }
}

/** "latin mass, homily" → ["latin mass", "homily"] */
export function splitKeywords(keywords: string | undefined): string[] {
  return (keywords ?? "")
    .split(",")
    .map((k) => k.trim())
    .filter((k) => k.length > 0);
}

export function buildVideoResource(meta: VideoMetadata) {
  return {
    snippet: {
      title: meta.title,
      description: meta.description,
      tags: meta.tags,
      categoryId: meta.categoryId,
    },
    status: { privacyStatus: meta.privacyStatus },
  };
}

/**
 * multipart/related body: a JSON part followed by the media part.
 */
export function buildMultipartRelated(
  metadata: unknown,
  media: Buffer,
  mediaType: string,
  boundary: string
): Buffer {
  const head =
    `--${boundary}\r\n` +
    "Content-Type: application/json; charset=UTF-8\r\n\r\n" +
    `${JSON.stringify(metadata)}\r\n` +
    `--${boundary}\r\n` +
    `Content-Type: ${mediaType}\r\n\r\n`;
  return Buffer.concat([Buffer.from(head, "utf-8"), media, Buffer.from(`\r\n--${boundary}--\r\n`, "utf-8")]);
}

/**
 * Resumable upload: open a session with the metadata, then send the file
 * in one request. Returns the new video ID.
 */
export async function uploadVideo(
  filePath: string,
  meta: VideoMetadata,
  options: YouTubeClientOptions = {}
): Promise<string> {
  const { fetchImpl, token } = clientOf(options);
  const file = await openAsBlob(filePath);

  console.log(`[youtube] Uploading ${path.basename(filePath)} (${(file.size / 1024 / 1024).toFixed(1)}MB)`);
  console.log(`[youtube] Title: ${meta.title} | category ${meta.categoryId} | ${meta.privacyStatus}`);

  const session = await fetchImpl(
    `${youtubeConfig.uploadBase}/videos?uploadType=resumable&part=snippet,status`,
    {
      method: "POST",
      headers: {
        Authorization: `Bearer ${token}`,
        "Content-Type": "application/json; charset=UTF-8",
        "X-Upload-Content-Type": "video/mp4",
        "X-Upload-Content-Length": String(file.size),
      },
      body: JSON.stringify(buildVideoResource(meta)),
    }
  );
  await ensureOk(session, "upload session");

  const uploadUrl = session.headers.get("location");
  if (!uploadUrl) {
    throw new AppError("YouTube API error (upload session): no upload URL returned", 502);
  }

  const upload = await fetchImpl(uploadUrl, {
    method: "PUT",
    headers: { Authorization: `Bearer ${token}`, "Content-Type": "video/mp4" },
    body: file,
  });
  await ensureOk(upload, "upload");

  const { id } = VideoIdSchema.parse(await upload.json());
  console.log(`[youtube] ✓ Uploaded video ${id}`);
  return id;
}

/**
 * Rewrites title and description, keeping the rest of the snippet.
 */
export async function updateVideo(
  videoId: string,
  changes: { title?: string; description?: string },
  options: YouTubeClientOptions = {}
): Promise<void> {
  const { fetchImpl, token } = clientOf(options);

  const listResponse = await fetchImpl(`${youtubeConfig.apiBase}/videos?part=snippet&id=${encodeURIComponent(videoId)}`, {
    headers: { Authorization: `Bearer ${token}` },
  });
  await ensureOk(listResponse, "videos.list");

  const [video] = VideoListSchema.parse(await listResponse.json()).items;
  if (!video) throw new NotFoundError("YouTube video", videoId);

  const snippet = {
    ...video.snippet,
    title: changes.title ?? video.snippet.title,
    description: changes.description ?? video.snippet.description,
  };

  const response = await fetchImpl(`${youtubeConfig.apiBase}/videos?part=snippet`, {
    method: "PUT",
    headers: { Authorization: `Bearer ${token}`, "Content-Type": "application/json" },
    body: JSON.stringify({ id: videoId, snippet }),
  });
  await ensureOk(response, "videos.update");
  console.log(`[youtube] ✓ Metadata updated for ${videoId}`);
}

export async function setThumbnail(
  videoId: string,
  imagePath: string,
  options: YouTubeClientOptions = {}
): Promise<void> {
  const { fetchImpl, token } = clientOf(options);

  const response = await fetchImpl(
    `${youtubeConfig.uploadBase}/thumbnails/set?uploadType=media&videoId=${encodeURIComponent(videoId)}`,
    {
      method: "POST",
      headers: { Authorization: `Bearer ${token}`, "Content-Type": "image/jpeg" },
      body: await readFile(imagePath),
    }
  );
  await ensureOk(response, "thumbnails.set");
  console.log(`[youtube] ✓ Thumbnail set for ${videoId}`);
}

export async function uploadCaptions(
  videoId: string,
  captionPath: string,
  options: YouTubeClientOptions & { language?: string; name?: string } = {}
): Promise<void> {
  const { fetchImpl, token } = clientOf(options);
  const boundary = `captions-${Date.now().toString(36)}`;

  const body = buildMultipartRelated(
    {
      snippet: {
        videoId,
        language: options.language ?? "en",
        name: options.name ?? "English Captions",
        isDraft: false,
      },
    },
    await readFile(captionPath),
    "application/octet-stream",
    boundary
  );

  const response = await fetchImpl(`${youtubeConfig.uploadBase}/captions?uploadType=multipart&part=snippet`, {
    method: "POST",
    headers: {
      Authorization: `Bearer ${token}`,
      "Content-Type": `multipart/related; boundary=${boundary}`,
    },
    body,
  });
  await ensureOk(response, "captions.insert");
  console.log(`[youtube] ✓ Captions uploaded for ${videoId}`);
}
