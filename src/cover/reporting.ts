import { describeFailure } from "../lib/errors.js";
import type { Logger } from "../lib/log.js";
import type { PipelineOutcome, TaggingReport } from "./types.js";

const toMegabytes = (bytes: number): string => (bytes / 1024 / 1024).toFixed(2);

export const summarizeTagging = (report: TaggingReport): string => {
  if (report.skipped) {
    return "⚠️ MP3 tagging skipped (ffmpeg unavailable)";
  }
  const total = report.tagged.length + report.failed.length;
  if (total === 0) {
    return "ℹ️ No MP3 files were tagged";
  }
  const marker = report.failed.length > 0 ? "⚠️" : "🎵";
  return `${marker} Tagged ${report.tagged.length}/${total} MP3 file(s)`;
};

/** Print the end-of-run summary, including every tagging failure. */
export const logOutcome = (outcome: PipelineOutcome, logger: Logger): void => {
  logger.info(
    `✅ Cover ${outcome.coverPath} (${toMegabytes(outcome.coverBytes)} MB, rendered by ${outcome.renderer})`,
  );

  if (outcome.tagging) {
    logger.info(summarizeTagging(outcome.tagging));
    for (const failure of outcome.tagging.failed) {
      logger.warn(`   • ${describeFailure(failure)}`);
    }
  } else {
    logger.info("ℹ️ MP3 tagging disabled");
  }

  if (outcome.artCleanup === "failed") {
    logger.warn("⚠️ Source art could not be deleted");
  } else if (outcome.artCleanup === "kept-tagging-incomplete") {
    logger.info("ℹ️ Source art kept for a tagging retry");
  }
  logger.info(`📦 Bundle ${outcome.zipPath}`);
};
