import fs from "node:fs";
import path from "node:path";

import sharp from "sharp";

import { ArtworkError, errorMessage } from "../lib/errors.js";
import type { CropBox, ImageSize, NormalizedArt } from "./types.js";

export const CANONICAL_SIZE = 3000;
export const ART_EXTENSIONS = ["png", "jpg", "jpeg", "webp"] as const;

// Mild unsharp pass to offset Lanczos softening.
const SHARPEN_SIGMA = 0.6;
const SHARPEN_FLAT = 0.5;
const SHARPEN_JAGGED = 1;

/**
 * Locate the source artwork for a story. An explicit name is resolved against
 * the base directory unless absolute; otherwise `{slug}_art.*` then `{slug}.*`.
 */
export const findArtSource = (
  baseDir: string,
  slug: string,
  explicitName?: string,
): string => {
  if (explicitName) {
    const candidate = path.isAbsolute(explicitName)
      ? explicitName
      : path.join(baseDir, explicitName);
    if (fs.existsSync(candidate)) {
      return candidate;
    }
    throw new ArtworkError(`art not found: ${candidate}`);
  }

  for (const stem of [`${slug}_art`, slug]) {
    for (const extension of ART_EXTENSIONS) {
      const candidate = path.join(baseDir, `${stem}.${extension}`);
      if (fs.existsSync(candidate)) {
        return candidate;
      }
    }
  }

  throw new ArtworkError(
    `no art found in ${baseDir} for "${slug}" (expected ${slug}_art.(${ART_EXTENSIONS.join("|")}) or ${slug}.*)`,
  );
};

/** Largest centred square; the longer side is trimmed evenly. */
export const computeCenterCrop = (size: ImageSize): CropBox => {
  if (size.width <= 0 || size.height <= 0) {
    throw new ArtworkError(
      `image has zero area (${size.width}x${size.height})`,
    );
  }
  const side = Math.min(size.width, size.height);
  return {
    left: Math.floor((size.width - side) / 2),
    top: Math.floor((size.height - side) / 2),
    size: side,
  };
};

export const toDataUri = (buffer: Buffer, mimeType: string): string =>
  `data:${mimeType};base64,${buffer.toString("base64")}`;

const decodeOriented = async (
  sourcePath: string,
): Promise<{ data: Buffer; info: sharp.OutputInfo }> => {
  if (!fs.existsSync(sourcePath)) {
    throw new ArtworkError(`art not found: ${sourcePath}`);
  }
  try {
    return await sharp(sourcePath, { failOn: "error" })
      .rotate()
      .ensureAlpha()
      .raw()
      .toBuffer({ resolveWithObject: true });
  } catch (error: unknown) {
    throw new ArtworkError(
      `cannot decode ${path.basename(sourcePath)}: ${errorMessage(error)}`,
      { cause: error },
    );
  }
};

/** Decode, square and upscale/downscale artwork to the canonical canvas. */
export const normalizeArt = async (
  sourcePath: string,
  canonicalSize: number = CANONICAL_SIZE,
): Promise<NormalizedArt> => {
  const { data, info } = await decodeOriented(sourcePath);
  const size = { width: info.width, height: info.height };
  const raw = {
    raw: { width: info.width, height: info.height, channels: info.channels },
  };

  const alreadyCanonical =
    size.width === canonicalSize && size.height === canonicalSize;

  let pipeline = sharp(data, raw);
  if (!alreadyCanonical) {
    const crop = computeCenterCrop(size);
    pipeline = pipeline
      .extract({ left: crop.left, top: crop.top, width: crop.size, height: crop.size })
      .resize(canonicalSize, canonicalSize, { kernel: sharp.kernel.lanczos3 })
      .sharpen({ sigma: SHARPEN_SIGMA, m1: SHARPEN_FLAT, m2: SHARPEN_JAGGED });
  }

  let buffer: Buffer;
  try {
    buffer = await pipeline.png().toBuffer();
  } catch (error: unknown) {
    throw new ArtworkError(
      `cannot normalise ${path.basename(sourcePath)}: ${errorMessage(error)}`,
      { cause: error },
    );
  }

  return Object.freeze({
    sourcePath,
    sourceSize: size,
    buffer,
    width: canonicalSize,
    height: canonicalSize,
    mimeType: "image/png",
    dataUri: toDataUri(buffer, "image/png"),
    resized: !alreadyCanonical,
  });
};
