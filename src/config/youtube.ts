/**
 * YouTube API Configuration
 * Uploads need an OAuth access token with the youtube.upload and
 * youtube.force-ssl scopes; refreshing it happens outside this tool.
 */

import { getRequiredEnv } from "./env.js";

export const youtubeConfig = {
  apiBase: "https://www.googleapis.com/youtube/v3",
  uploadBase: "https://www.googleapis.com/upload/youtube/v3",
} as const;

export function getYouTubeAccessToken(): string {
  return getRequiredEnv("YOUTUBE_ACCESS_TOKEN");
}
