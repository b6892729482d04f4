import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { removeIfExists } from "../lib/fs.js";
import type { Logger } from "../lib/log.js";
import type { ArtCleanupOutcome } from "./types.js";

export const TEMP_DIR_PREFIX = "storycover-";

const canonicalize = (targetPath: string): string | undefined => {
  try {
    return fs.realpathSync(targetPath);
  } catch {
    return undefined;
  }
};

/**
 * True when `childPath` sits strictly inside `parentPath` once both have had
 * symlinks and `..` segments resolved.
 */
export const isPathWithin = (childPath: string, parentPath: string): boolean => {
  const child = canonicalize(childPath);
  const parent = canonicalize(parentPath);
  if (child === undefined || parent === undefined) {
    return false;
  }

  const relative = path.relative(parent, child);
  return (
    relative.length > 0 &&
    relative !== ".." &&
    !relative.startsWith(`..${path.sep}`) &&
    !path.isAbsolute(relative)
  );
};

/** Remove the source artwork, but only when it belongs to the managed tree. */
export const deleteSourceArt = (
  artPath: string,
  baseDir: string,
  logger: Logger,
): ArtCleanupOutcome => {
  if (!fs.existsSync(artPath)) {
    logger.info(`ℹ️ Source art already gone: ${artPath}`);
    return "missing";
  }

  if (!fs.statSync(artPath).isFile() || !isPathWithin(artPath, baseDir)) {
    logger.info(`ℹ️ Skipped deleting art outside base: ${artPath}`);
    return "skipped-outside-base";
  }

  fs.unlinkSync(artPath);
  logger.info(`🗑️ Deleted source art: ${path.basename(artPath)}`);
  return "deleted";
};

/** Run `work` with a fresh scratch directory that is removed on every exit path. */
export const withTempDir = async <T>(
  label: string,
  work: (dirPath: string) => Promise<T>,
): Promise<T> => {
  const dirPath = fs.mkdtempSync(
    path.join(os.tmpdir(), `${TEMP_DIR_PREFIX}${label}-`),
  );
  try {
    return await work(dirPath);
  } finally {
    removeIfExists(dirPath);
  }
};
