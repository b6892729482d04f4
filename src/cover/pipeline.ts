import path from "node:path";

import type { CommandRunner } from "../lib/commands.js";
import { errorMessage } from "../lib/errors.js";
import { ensureDir, fileSize, moveFileAtomic } from "../lib/fs.js";
import type { Logger } from "../lib/log.js";
import { findArtSource, normalizeArt } from "./art.js";
import { bundleStoryFolder, zipNameForSlug } from "./bundler.js";
import { deleteSourceArt, withTempDir } from "./janitor.js";
import { composeCover } from "./layout.js";
import { resolvePalette } from "./palette.js";
import { finalizeCover, renderWithFallback } from "./render-chain.js";
import { embedCoverInAudio } from "./tagger.js";
import type {
  ArtCleanupOutcome,
  PipelineOutcome,
  Renderer,
  StoryConfig,
  TaggingReport,
} from "./types.js";

export interface PipelineDependencies {
  renderers: Renderer[];
  runner: CommandRunner;
  ffmpegPath: string;
  logger: Logger;
}

export interface CoverBuild {
  coverPath: string;
  coverBytes: number;
  artPath: string;
  renderer: string;
}

/**
 * Palette → art → layout → render → JPEG. The JPEG is produced in a scratch
 * directory and renamed onto the story folder path only once complete.
 */
export const buildCover = async (
  config: StoryConfig,
  deps: PipelineDependencies,
): Promise<CoverBuild> => {
  const { logger } = deps;
  ensureDir(config.storyDir);
  logger.info(`📁 Story: ${config.storyDir}`);

  const palette = resolvePalette(config.palette);
  logger.info(`🎨 Palette: ${config.palette}`);

  const artPath = findArtSource(config.baseDir, config.slug, config.artOverride);
  const art = await normalizeArt(artPath);
  logger.info(
    `🖼️ Art: ${path.basename(artPath)} ${art.sourceSize.width}x${art.sourceSize.height}` +
      (art.resized ? ` -> ${art.width}x${art.height}` : " (already canonical)"),
  );

  const document = composeCover({
    palette,
    artDataUri: art.dataUri,
    title: config.title,
    subtitle: config.subtitle,
    badge: config.badge,
    wrap: config.wrap,
    canvasSize: art.width,
  });
  logger.debug(`🧩 Layout: ${document.svg.length} bytes of SVG`);

  const coverPath = path.join(config.storyDir, config.outputName);
  const renderer = await withTempDir("render", async (workDir) => {
    const result = await renderWithFallback(
      document,
      deps.renderers,
      workDir,
      logger,
    );
    const stagedCover = path.join(workDir, config.outputName);
    await finalizeCover(result, document, stagedCover, config.jpegQuality);
    moveFileAtomic(stagedCover, coverPath);
    return result.renderer;
  });

  const coverBytes = fileSize(coverPath);
  logger.info(`✅ Cover written: ${coverPath}`);
  return { coverPath, coverBytes, artPath, renderer };
};

const cleanUpSourceArt = (
  artPath: string,
  baseDir: string,
  logger: Logger,
): ArtCleanupOutcome => {
  try {
    return deleteSourceArt(artPath, baseDir, logger);
  } catch (error: unknown) {
    logger.warn(`⚠️ Could not delete art (${artPath}): ${errorMessage(error)}`);
    return "failed";
  }
};

/** Full run for one story: cover, MP3 tagging, source-art cleanup, bundle. */
export const runStoryPipeline = async (
  config: StoryConfig,
  deps: PipelineDependencies,
): Promise<PipelineOutcome> => {
  const { logger } = deps;
  const cover = await buildCover(config, deps);

  let tagging: TaggingReport | undefined;
  if (config.embedCover) {
    tagging = await embedCoverInAudio(config.storyDir, cover.coverPath, {
      runner: deps.runner,
      ffmpegPath: deps.ffmpegPath,
      logger,
    });
  } else {
    logger.info("ℹ️ Skipping MP3 art embed");
  }

  let artCleanup: ArtCleanupOutcome;
  if (tagging && (tagging.skipped || tagging.failed.length > 0)) {
    logger.info(`ℹ️ Kept source art until every MP3 is tagged: ${cover.artPath}`);
    artCleanup = "kept-tagging-incomplete";
  } else {
    artCleanup = cleanUpSourceArt(cover.artPath, config.baseDir, logger);
  }
  const zipPath = await bundleStoryFolder(
    config.storyDir,
    zipNameForSlug(config.slug),
    logger,
  );

  return {
    coverPath: cover.coverPath,
    coverBytes: cover.coverBytes,
    renderer: cover.renderer,
    tagging,
    artCleanup,
    zipPath,
  };
};
