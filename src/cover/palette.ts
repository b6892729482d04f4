import fs from "node:fs";

import { z } from "zod";

import { ConfigurationError, errorMessage } from "../lib/errors.js";
import type { Palette } from "./types.js";

export const DEFAULT_PALETTE = "warm";

export const BUILT_IN_PALETTES = {
  warm: {
    BG1: "#1d2540",
    BG2: "#0c1326",
    TITLE_COLOR: "#F5F1E8",
    SUBTITLE_COLOR: "#E7DFCF",
    BADGE_BG: "#2A3358",
    BADGE_COLOR: "#F5F1E8",
  },
  cool: {
    BG1: "#10222b",
    BG2: "#0a1720",
    TITLE_COLOR: "#EAF6FF",
    SUBTITLE_COLOR: "#D3EAF8",
    BADGE_BG: "#1c2f3a",
    BADGE_COLOR: "#EAF6FF",
  },
  forest: {
    BG1: "#142117",
    BG2: "#0b140d",
    TITLE_COLOR: "#F2F6EA",
    SUBTITLE_COLOR: "#E6EDD9",
    BADGE_BG: "#1c2b1f",
    BADGE_COLOR: "#F2F6EA",
  },
} as const satisfies Record<string, Palette>;

export type BuiltInPaletteName = keyof typeof BUILT_IN_PALETTES;

const hexColorSchema = z
  .string()
  .trim()
  .regex(/^#(?:[0-9a-fA-F]{3}|[0-9a-fA-F]{6})$/, "must be a hex colour");

export const paletteFileSchema = z.object({
  BG1: hexColorSchema,
  BG2: hexColorSchema,
  TITLE_COLOR: hexColorSchema,
  SUBTITLE_COLOR: hexColorSchema,
  BADGE_BG: hexColorSchema,
  BADGE_COLOR: hexColorSchema,
});

const isBuiltInPalette = (name: string): name is BuiltInPaletteName =>
  Object.hasOwn(BUILT_IN_PALETTES, name);

const readPaletteFile = (filePath: string): Palette => {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (error: unknown) {
    throw new ConfigurationError(
      `palette file ${filePath} is unreadable: ${errorMessage(error)}`,
      { stage: "palette", cause: error },
    );
  }

  const parsed = paletteFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"} ${issue.message}`)
      .join(", ");
    throw new ConfigurationError(`palette file ${filePath} is invalid: ${issues}`, {
      stage: "palette",
    });
  }

  return Object.freeze({ ...parsed.data });
};

/** Resolve a built-in palette name or a path to a JSON palette definition. */
export const resolvePalette = (identifier: string | undefined): Palette => {
  const trimmed = (identifier ?? "").trim();
  if (trimmed.length === 0) {
    return BUILT_IN_PALETTES[DEFAULT_PALETTE];
  }

  const name = trimmed.toLowerCase();
  if (isBuiltInPalette(name)) {
    return BUILT_IN_PALETTES[name];
  }

  if (!fs.existsSync(trimmed)) {
    throw new ConfigurationError(
      `unknown palette "${trimmed}" (use ${Object.keys(BUILT_IN_PALETTES).join(", ")} or a JSON file path)`,
      { stage: "palette" },
    );
  }

  return readPaletteFile(trimmed);
};
