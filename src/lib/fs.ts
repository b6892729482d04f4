import fs from "node:fs";
import path from "node:path";

export const ensureDir = (dirPath: string): void => {
  if (!fs.existsSync(dirPath)) {
    fs.mkdirSync(dirPath, { recursive: true });
  }
};

export const deleteFileIfExists = (filePath: string): void => {
  if (fs.existsSync(filePath)) {
    fs.rmSync(filePath, { force: true });
  }
};

export const removeIfExists = (targetPath: string): void => {
  if (fs.existsSync(targetPath)) {
    fs.rmSync(targetPath, { recursive: true, force: true });
  }
};

const isCrossDeviceError = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "EXDEV";

/**
 * Move a finished file onto its destination with a single rename. When the
 * source lives on another filesystem, the bytes are first copied to a sibling
 * of the destination so the final step is still a rename.
 */
export const moveFileAtomic = (sourcePath: string, targetPath: string): void => {
  ensureDir(path.dirname(targetPath));
  try {
    fs.renameSync(sourcePath, targetPath);
    return;
  } catch (error: unknown) {
    if (!isCrossDeviceError(error)) {
      throw error;
    }
  }

  const stagingPath = path.join(
    path.dirname(targetPath),
    `.${path.basename(targetPath)}.partial`,
  );
  try {
    fs.copyFileSync(sourcePath, stagingPath);
    fs.renameSync(stagingPath, targetPath);
  } finally {
    deleteFileIfExists(stagingPath);
  }
  deleteFileIfExists(sourcePath);
};

/** List files below a directory, depth-first, in sorted order. */
export const collectFiles = (dirPath: string): string[] => {
  if (!fs.existsSync(dirPath)) {
    return [];
  }
  const out: string[] = [];
  const entries = fs
    .readdirSync(dirPath, { withFileTypes: true })
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  for (const entry of entries) {
    const full = path.join(dirPath, entry.name);
    if (entry.isDirectory()) {
      out.push(...collectFiles(full));
      continue;
    }
    // Symlinks count only when they resolve to a regular file.
    if (
      entry.isSymbolicLink() &&
      !(fs.existsSync(full) && fs.statSync(full).isFile())
    ) {
      continue;
    }
    out.push(full);
  }
  return out;
};

export const fileSize = (filePath: string): number =>
  fs.existsSync(filePath) ? fs.statSync(filePath).size : 0;
