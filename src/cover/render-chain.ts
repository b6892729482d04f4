import path from "node:path";

import sharp from "sharp";

import { RenderError, errorMessage } from "../lib/errors.js";
import type { RendererFailure } from "../lib/errors.js";
import { deleteFileIfExists } from "../lib/fs.js";
import type { Logger } from "../lib/log.js";
import type { Renderer, RenderResult, VectorDocument } from "./types.js";

export const DEFAULT_JPEG_QUALITY = 92;

/**
 * Try each renderer in order until one writes a raster. A failing backend
 * is logged and skipped; exhausting the list raises RenderError.
 */
export const renderWithFallback = async (
  document: VectorDocument,
  renderers: Renderer[],
  workDir: string,
  logger: Logger,
): Promise<RenderResult> => {
  const failures: RendererFailure[] = [];

  for (const [index, renderer] of renderers.entries()) {
    const pngPath = path.join(workDir, `render-${index}-${renderer.name}.png`);
    try {
      await renderer.render(document, pngPath);
      logger.debug(`🖌️ Rendered with ${renderer.name}`);
      return { renderer: renderer.name, pngPath };
    } catch (error: unknown) {
      deleteFileIfExists(pngPath);
      const message = errorMessage(error);
      failures.push({ renderer: renderer.name, message });
      logger.warn(`⚠️ ${renderer.name} render failed: ${message}`);
    }
  }

  throw new RenderError(failures);
};

/**
 * Convert a raw render into the deliverable: canonical size, alpha flattened
 * against the background colour, sRGB baseline JPEG.
 */
export const finalizeCover = async (
  result: RenderResult,
  document: VectorDocument,
  targetPath: string,
  quality: number = DEFAULT_JPEG_QUALITY,
): Promise<void> => {
  try {
    await sharp(result.pngPath)
      .resize(document.width, document.height, { fit: "fill" })
      .flatten({ background: document.background })
      .toColourspace("srgb")
      .jpeg({ quality, chromaSubsampling: "4:4:4", mozjpeg: false })
      .toFile(targetPath);
  } catch (error: unknown) {
    deleteFileIfExists(targetPath);
    throw new RenderError([
      { renderer: `${result.renderer} (jpeg conversion)`, message: errorMessage(error) },
    ]);
  }
};
