import fs from "node:fs";
import path from "node:path";

import type { CommandRunner } from "../lib/commands.js";
import {
  ConfigurationError,
  CoverPipelineError,
  errorMessage,
} from "../lib/errors.js";
import { deleteFileIfExists, ensureDir } from "../lib/fs.js";
import type { Logger } from "../lib/log.js";

export const MP3_BITRATE = "192k";
export const MP3_SAMPLE_RATE = "44100";

const VOICE_LABELS = new Map<string, string>([
  ["af_nicole", "Gentle_Feminine"],
  ["bm_lewis", "Warm_Adult"],
  ["am_michael", "Neutral_Storyteller"],
]);

export interface PrepareConfig {
  slug: string;
  baseDir: string;
  storyDir: string;
  stereo: boolean;
}

export interface PrepareOptions {
  runner: CommandRunner;
  ffmpegPath: string;
  logger: Logger;
}

export interface PrepareReport {
  converted: string[];
  narration?: { ssmlPath: string; plainPath: string };
  removedWavs: number;
}

/** Unknown tags are kept as-is (spaces removed) so files stay identifiable. */
export const labelForVoice = (tag: string): string => {
  const normalized = tag.replace(/ /g, "");
  return VOICE_LABELS.get(normalized) ?? normalized;
};

/** `friendly_dinosaurs_af_nicole` → `af_nicole` for slug `friendly_dinosaurs`. */
export const voiceTagFromName = (slug: string, baseName: string): string => {
  if (!baseName.startsWith(slug)) {
    return baseName;
  }
  return baseName.slice(slug.length).replace(/^[ _-]/, "");
};

export const mp3NameFor = (slug: string, label: string): string =>
  `${slug} - ${label}.mp3`;

export const findStoryWavs = (baseDir: string, slug: string): string[] => {
  if (!fs.existsSync(baseDir)) {
    return [];
  }
  return fs
    .readdirSync(baseDir)
    .filter((name) => name.startsWith(slug) && name.endsWith(".wav"))
    .sort()
    .map((name) => path.join(baseDir, name));
};

/** Strip SSML markup, turning pauses into line breaks. */
export const ssmlToPlainText = (ssml: string): string => {
  const stripped = ssml
    .replace(/\r/g, "")
    .replace(/<speak[^>]*>/gi, "")
    .replace(/<\/speak>/gi, "")
    .replace(/<break[^>]*1\.2s[^>]*\/>/gi, "\n\n")
    .replace(/<break[^>]*400ms[^>]*\/>/gi, "\n")
    .replace(/<break[^>]*\/>/gi, "\n")
    .replace(/<[^>]+>/g, "");

  const lines = stripped.split("\n");
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }

  const out: string[] = [];
  let blanks = 0;
  for (const rawLine of lines) {
    const line = rawLine.replace(/[ \t]+$/, "");
    if (line.length === 0) {
      blanks += 1;
      if (blanks < 3) {
        out.push("");
      }
      continue;
    }
    blanks = 0;
    out.push(line.replace(/[ \t]+/g, " "));
  }

  return out.length > 0 ? `${out.join("\n")}\n` : "";
};

const assertFfmpeg = async (options: PrepareOptions): Promise<void> => {
  try {
    await options.runner.run(options.ffmpegPath, ["-version"]);
  } catch (error: unknown) {
    throw new ConfigurationError(`ffmpeg not found: ${errorMessage(error)}`, {
      stage: "prepare",
      cause: error,
    });
  }
};

const convertWavs = async (
  config: PrepareConfig,
  wavs: string[],
  options: PrepareOptions,
): Promise<string[]> => {
  const channels = config.stereo ? "2" : "1";
  const converted: string[] = [];

  for (const wavPath of wavs) {
    const label = labelForVoice(
      voiceTagFromName(config.slug, path.basename(wavPath, ".wav")),
    );
    const outputPath = path.join(config.storyDir, mp3NameFor(config.slug, label));
    options.logger.info(
      `  • ${path.basename(wavPath)} -> ${path.basename(outputPath)}`,
    );
    try {
      await options.runner.run(options.ffmpegPath, [
        "-y",
        "-loglevel",
        "error",
        "-i",
        wavPath,
        "-ac",
        channels,
        "-ar",
        MP3_SAMPLE_RATE,
        "-b:a",
        MP3_BITRATE,
        outputPath,
      ]);
    } catch (error: unknown) {
      throw new CoverPipelineError(
        "prepare",
        `could not convert ${path.basename(wavPath)}: ${errorMessage(error)}`,
        { cause: error },
      );
    }
    converted.push(path.basename(outputPath));
  }

  return converted;
};

const moveNarration = (
  config: PrepareConfig,
  logger: Logger,
): PrepareReport["narration"] => {
  const source = path.join(config.baseDir, `${config.slug}_narration.txt`);
  if (!fs.existsSync(source)) {
    logger.warn(`⚠️ No narration file found: ${source}`);
    return undefined;
  }

  const ssmlPath = path.join(config.storyDir, `${config.slug}_narration.txt`);
  const plainPath = path.join(
    config.storyDir,
    `${config.slug}_narration_plain.txt`,
  );

  logger.info(`📝 Moving SSML narration to: ${path.basename(ssmlPath)}`);
  fs.copyFileSync(source, ssmlPath);
  logger.info(`🧹 Generating plain text -> ${path.basename(plainPath)}`);
  fs.writeFileSync(
    plainPath,
    ssmlToPlainText(fs.readFileSync(ssmlPath, "utf8")),
    "utf8",
  );
  deleteFileIfExists(source);

  return { ssmlPath, plainPath };
};

/**
 * Stage narration audio and text into the story folder: WAVs become labelled
 * MP3s, SSML narration gets a plain-text twin, and the base-folder originals
 * are removed once everything has been written.
 */
export const prepareStoryAssets = async (
  config: PrepareConfig,
  options: PrepareOptions,
): Promise<PrepareReport> => {
  const { logger } = options;
  await assertFfmpeg(options);
  ensureDir(config.storyDir);

  logger.info(`📁 Base:  ${config.baseDir}`);
  logger.info(`📁 Story: ${config.storyDir}`);
  logger.info(
    `🎚️ MP3:  ${config.stereo ? 2 : 1}ch @ ${MP3_SAMPLE_RATE} Hz, ${MP3_BITRATE}`,
  );

  const wavs = findStoryWavs(config.baseDir, config.slug);
  let converted: string[] = [];
  if (wavs.length === 0) {
    logger.warn(
      `⚠️ No WAVs found matching '${config.slug}*.wav' in ${config.baseDir}`,
    );
  } else {
    logger.info(
      `🎧 Converting ${wavs.length} WAV file(s) to MP3 with friendly labels...`,
    );
    converted = await convertWavs(config, wavs, options);
  }

  const narration = moveNarration(config, logger);

  if (wavs.length > 0) {
    logger.info("🧽 Deleting original WAVs from base...");
    for (const wavPath of wavs) {
      deleteFileIfExists(wavPath);
    }
  }

  logger.info(`✅ Ready: ${config.storyDir}`);
  return { converted, narration, removedWavs: wavs.length };
};
