/**
 * Publish Service
 * Ships the finished video to YouTube and the MDX post to the site's
 * content repository.
 */

import { copyFile, mkdir, readFile, writeFile } from "fs/promises";
import path from "path";
import { execa } from "execa";
import {
  setThumbnail,
  splitKeywords,
  updateVideo,
  uploadCaptions,
  uploadVideo,
  type VideoMetadata,
  type YouTubeClientOptions,
} from "../external/youtube.js";
import { parseFrontMatter, setFrontMatterField } from "./mdxService.js";
import { ExternalServiceError } from "../../utils/errors.js";

export interface ContentRepoConfig {
  repoDir: string;
  /** Directory inside the repo that holds the posts */
  subdir: string;
  /** Pushed to when set; otherwise the current upstream */
  branch?: string;
}

export interface YouTubePublishInput {
  videoPath: string;
  thumbnailPath: string;
  captionsPath: string;
  mdxPath: string;
  categoryId: string;
  privacyStatus: VideoMetadata["privacyStatus"];
}

/**
 * Upload, re-apply title/description, thumbnail, captions. The video ID is
 * written back into the post's media_path. Returns the video ID.
 */
export async function publishToYouTube(
  input: YouTubePublishInput,
  options: YouTubeClientOptions = {}
): Promise<string> {
  const mdx = await readFile(input.mdxPath, "utf-8");
  const fm = parseFrontMatter(mdx);
  const title = fm.title ?? "Untitled Homily";
  const description = fm.youtube_description ?? "";

  const videoId = await uploadVideo(
    input.videoPath,
    {
      title,
      description,
      tags: splitKeywords(fm.keywords),
      categoryId: input.categoryId,
      privacyStatus: input.privacyStatus,
    },
    options
  );

  await updateVideo(videoId, { title, description }, options);
  await setThumbnail(videoId, input.thumbnailPath, options);
  await uploadCaptions(videoId, input.captionsPath, options);

  await writeFile(input.mdxPath, setFrontMatterField(mdx, "media_path", videoId), "utf-8");
  return videoId;
}

/**
 * Target path of the post: the front matter's mdx_file basename under
 * `subdir`, else the local file name.
 */
export function contentRepoTarget(mdxPath: string, mdx: string, config: ContentRepoConfig): string {
  const declared = parseFrontMatter(mdx).mdx_file;
  const fileName = declared ? path.basename(declared) : path.basename(mdxPath);
  return path.join(config.repoDir, config.subdir, fileName);
}

async function git(repoDir: string, args: string[]): Promise<string> {
  try {
    const { stdout } = await execa("git", args, { cwd: repoDir });
    return stdout;
  } catch (error) {
    throw new ExternalServiceError(
      "git",
      `git ${args[0]} failed: ${error instanceof Error ? error.message : String(error)}`,
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Copies the post into the content repo, then commits and pushes it.
 * Returns the repo-relative path.
 */
export async function publishMdxToContentRepo(mdxPath: string, config: ContentRepoConfig): Promise<string> {
  const mdx = await readFile(mdxPath, "utf-8");
  const target = contentRepoTarget(mdxPath, mdx, config);
  const relative = path.relative(config.repoDir, target);

  await mkdir(path.dirname(target), { recursive: true });
  await copyFile(mdxPath, target);
  console.log(`[publish] Copied post to ${target}`);

  await git(config.repoDir, ["add", relative]);
  const staged = await git(config.repoDir, ["diff", "--cached", "--name-only"]);
  if (staged.trim() === "") {
    console.log("[publish] Post unchanged; nothing to commit");
    return relative;
  }

  const title = parseFrontMatter(mdx).title ?? path.basename(target, ".mdx");
  await git(config.repoDir, ["commit", "-m", `Add homily: ${title}`]);
  await git(config.repoDir, config.branch ? ["push", "origin", config.branch] : ["push"]);
  console.log(`[publish] ✓ Pushed ${relative}`);
  return relative;
}
