import fs from "node:fs";
import path from "node:path";

import AdmZip from "adm-zip";

import { BundleError, errorMessage } from "../lib/errors.js";
import { collectFiles, moveFileAtomic } from "../lib/fs.js";
import type { Logger } from "../lib/log.js";
import { withTempDir } from "./janitor.js";

export const zipNameForSlug = (slug: string): string => `${slug}.zip`;

/** Archive entry names for the folder's current files, minus the archive itself. */
export const listBundleEntries = (storyDir: string, zipName: string): string[] =>
  collectFiles(storyDir)
    .map((filePath) => path.relative(storyDir, filePath).split(path.sep).join("/"))
    .filter((entryName) => entryName !== zipName);

/**
 * Zip the story folder. The archive is written in a scratch directory and
 * moved into the folder last, replacing any earlier bundle of the same name.
 */
export const bundleStoryFolder = async (
  storyDir: string,
  zipName: string,
  logger: Logger,
): Promise<string> => {
  const destination = path.join(storyDir, zipName);
  if (!fs.existsSync(storyDir)) {
    throw new BundleError(`story folder does not exist: ${storyDir}`);
  }

  try {
    await withTempDir("bundle", async (workDir) => {
      const zip = new AdmZip();
      for (const entryName of listBundleEntries(storyDir, zipName)) {
        const entryDir = path.posix.dirname(entryName);
        zip.addLocalFile(
          path.join(storyDir, ...entryName.split("/")),
          entryDir === "." ? "" : entryDir,
          path.posix.basename(entryName),
        );
      }
      const stagedZip = path.join(workDir, zipName);
      zip.writeZip(stagedZip);
      moveFileAtomic(stagedZip, destination);
    });
  } catch (error: unknown) {
    throw new BundleError(
      `could not bundle ${storyDir}: ${errorMessage(error)}`,
      { cause: error },
    );
  }

  logger.info(`📦 Created bundle: ${destination}`);
  return destination;
};
