import fs from "node:fs";
import path from "node:path";

import type { CommandRunner } from "../lib/commands.js";
import { TaggingError, errorMessage } from "../lib/errors.js";
import { deleteFileIfExists } from "../lib/fs.js";
import type { Logger } from "../lib/log.js";
import type { TaggingReport } from "./types.js";

export const AUDIO_EXTENSION = ".mp3";
export const TAGGING_TEMP_PREFIX = "_tmp_";

export interface TaggerOptions {
  runner: CommandRunner;
  ffmpegPath: string;
  logger: Logger;
}

/**
 * Top-level `.mp3` entries of the story folder, sorted by name. Symlinks are
 * listed unresolved; the tagger checks each target when it gets to it.
 */
export const listAudioFiles = (storyDir: string): string[] =>
  fs
    .readdirSync(storyDir, { withFileTypes: true })
    .filter(
      (entry) =>
        !entry.isDirectory() &&
        path.extname(entry.name).toLowerCase() === AUDIO_EXTENSION &&
        !entry.name.startsWith(TAGGING_TEMP_PREFIX),
    )
    .map((entry) => entry.name)
    .sort()
    .map((name) => path.join(storyDir, name));

/** ffmpeg arguments that copy the audio stream and attach the cover as front art. */
export const buildTaggingArgs = (
  audioPath: string,
  coverPath: string,
  outputPath: string,
): string[] => [
  "-y",
  "-loglevel",
  "error",
  "-i",
  audioPath,
  "-i",
  coverPath,
  "-map",
  "0:a",
  "-map",
  "1:v",
  "-c:a",
  "copy",
  "-c:v",
  "mjpeg",
  "-disposition:v",
  "attached_pic",
  "-id3v2_version",
  "3",
  "-metadata:s:v",
  "title=Album cover",
  "-metadata:s:v",
  "comment=Cover (front)",
  outputPath,
];

const isFfmpegAvailable = async (options: TaggerOptions): Promise<boolean> => {
  try {
    await options.runner.run(options.ffmpegPath, ["-version"]);
    return true;
  } catch (error: unknown) {
    options.logger.warn(
      `⚠️ ffmpeg unavailable (${errorMessage(error)}); skipping MP3 art embed.`,
    );
    return false;
  }
};

/**
 * Embed the cover into every MP3 of the story folder. Each file is tagged
 * into a temp sibling and renamed over the original only on success; a
 * failing file is recorded and the loop moves on.
 */
export const embedCoverInAudio = async (
  storyDir: string,
  coverPath: string,
  options: TaggerOptions,
): Promise<TaggingReport> => {
  const report: TaggingReport = { tagged: [], failed: [], skipped: false };
  const audioFiles = listAudioFiles(storyDir);

  if (audioFiles.length === 0) {
    options.logger.warn(`⚠️ No MP3 files to tag in ${storyDir}`);
    return report;
  }

  if (!(await isFfmpegAvailable(options))) {
    report.skipped = true;
    return report;
  }

  for (const audioPath of audioFiles) {
    const name = path.basename(audioPath);
    const tempPath = path.join(storyDir, `${TAGGING_TEMP_PREFIX}${name}`);
    try {
      if (!fs.statSync(audioPath).isFile()) {
        throw new Error("not a regular file");
      }
      await options.runner.run(
        options.ffmpegPath,
        buildTaggingArgs(audioPath, coverPath, tempPath),
      );
      fs.renameSync(tempPath, audioPath);
      report.tagged.push(name);
      options.logger.info(`🎵 Embedded cover into ${name}`);
    } catch (error: unknown) {
      deleteFileIfExists(tempPath);
      report.failed.push(
        new TaggingError(name, errorMessage(error), { cause: error }),
      );
      options.logger.warn(
        `⚠️ Failed to embed cover into ${name}: ${errorMessage(error)}`,
      );
    }
  }

  return report;
};
