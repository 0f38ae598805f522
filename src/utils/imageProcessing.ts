/**
 * Image Processing Utilities
 * Prepares the background image for use as a YouTube thumbnail.
 */

import sharp from "sharp";
import { BadRequestError } from "./errors.js";

export interface ThumbnailRequirements {
  width: number;
  height: number;
  quality: number;
}

/**
 * YouTube custom thumbnail: 16:9, 1280x720, under 2MB.
 */
export const YOUTUBE_THUMBNAIL_REQUIREMENTS: ThumbnailRequirements = {
  width: 1280,
  height: 720,
  quality: 90,
};

/**
 * Crops to 16:9 from the center, resizes and writes a JPEG.
 * Returns the output dimensions.
 */
export async function createThumbnail(
  imagePath: string,
  outputPath: string,
  requirements: ThumbnailRequirements = YOUTUBE_THUMBNAIL_REQUIREMENTS
): Promise<{ width: number; height: number }> {
  try {
    const metadata = await sharp(imagePath).metadata();
    if (!metadata.width || !metadata.height) {
      throw new BadRequestError("Unable to read image dimensions");
    }

    const info = await sharp(imagePath)
      .resize(requirements.width, requirements.height, {
        fit: "cover",
        position: "center",
        kernel: "lanczos3",
      })
      .jpeg({ quality: requirements.quality, mozjpeg: true })
      .toFile(outputPath);

    console.log(`[thumbnail] ✓ ${metadata.width}x${metadata.height} → ${info.width}x${info.height} ${outputPath}`);
    return { width: info.width, height: info.height };
  } catch (error) {
    if (error instanceof BadRequestError) {
      throw error;
    }
    throw new BadRequestError(`Failed to create thumbnail: ${error instanceof Error ? error.message : "Unknown error"}`);
  }
}
