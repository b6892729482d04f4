import path from "node:path";

import { z } from "zod";

import type { Environment } from "../config/env.js";
import { ConfigurationError } from "../lib/errors.js";
import { DEFAULT_WRAP_LIMITS } from "./layout.js";
import { DEFAULT_PALETTE } from "./palette.js";
import { RENDERER_NAMES } from "./types.js";
import type { RendererName, StoryConfig } from "./types.js";

/** Raw per-run options as they arrive from the command line. */
export interface StoryOptions {
  slug?: string;
  title?: string;
  subtitle?: string;
  badge?: string;
  palette?: string;
  art?: string;
  base?: string;
  outName?: string;
  noEmbed?: boolean;
  titleWidth?: string;
  titleLines?: string;
  subtitleWidth?: string;
  subtitleLines?: string;
  renderers?: string;
}

const optionalText = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim() ?? "";
    return trimmed.length > 0 ? trimmed : undefined;
  });

const wrapNumber = (fallback: number) =>
  z.coerce.number().int().min(1).max(200).default(fallback);

const storyOptionsSchema = z.object({
  titleWidth: wrapNumber(DEFAULT_WRAP_LIMITS.titleWidth),
  titleLines: wrapNumber(DEFAULT_WRAP_LIMITS.titleLines),
  subtitleWidth: wrapNumber(DEFAULT_WRAP_LIMITS.subtitleWidth),
  subtitleLines: wrapNumber(DEFAULT_WRAP_LIMITS.subtitleLines),
  title: optionalText,
  subtitle: optionalText,
  badge: optionalText,
  palette: optionalText,
  art: optionalText,
  base: optionalText,
  outName: optionalText,
});

/** `friendly_dinosaurs` → `Friendly Dinosaurs`. */
export const humanizeSlug = (slug: string): string =>
  slug
    .replace(/[_-]+/g, " ")
    .trim()
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .map((word) => `${word.charAt(0).toUpperCase()}${word.slice(1).toLowerCase()}`)
    .join(" ");

export const validateSlug = (raw: string | undefined): string => {
  const slug = raw ?? "";
  if (slug.trim().length === 0) {
    throw new ConfigurationError("slug is required");
  }
  if (slug.trim() !== slug) {
    throw new ConfigurationError(
      `slug "${slug}" must not start or end with whitespace`,
    );
  }
  if (slug === "." || slug === ".." || /[\\/\0]/.test(slug)) {
    throw new ConfigurationError(
      `slug "${slug}" must be a single path segment`,
    );
  }
  return slug;
};

const validateOutputName = (name: string): string => {
  if (name === "." || name === ".." || path.basename(name) !== name) {
    throw new ConfigurationError(
      `output name "${name}" must be a bare filename`,
    );
  }
  return name;
};

const isRendererName = (value: string): value is RendererName =>
  RENDERER_NAMES.some((name) => name === value);

export const parseRendererOrder = (names: string[]): RendererName[] => {
  const order: RendererName[] = [];
  for (const raw of names) {
    const name = raw.trim().toLowerCase();
    if (name.length === 0) {
      continue;
    }
    if (!isRendererName(name)) {
      throw new ConfigurationError(
        `unknown renderer "${raw}" (expected one of ${RENDERER_NAMES.join(", ")})`,
      );
    }
    if (!order.includes(name)) {
      order.push(name);
    }
  }
  if (order.length === 0) {
    throw new ConfigurationError("renderer list is empty");
  }
  return order;
};

/** Merge CLI options with environment defaults into one resolved job. */
export const resolveStoryConfig = (
  options: StoryOptions,
  environment: Environment,
): StoryConfig => {
  const slug = validateSlug(options.slug);
  const parsed = storyOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `--${issue.path.join(".")}: ${issue.message}`)
      .join(", ");
    throw new ConfigurationError(`invalid options: ${issues}`);
  }
  const values = parsed.data;

  const baseDir = path.resolve(values.base ?? environment.STORY_BASE);
  const rendererNames =
    options.renderers !== undefined
      ? options.renderers.split(",")
      : environment.COVER_RENDERERS;

  return {
    slug,
    baseDir,
    storyDir: path.join(baseDir, slug),
    title: values.title ?? humanizeSlug(slug),
    subtitle: values.subtitle,
    badge: values.badge,
    palette: values.palette ?? DEFAULT_PALETTE,
    artOverride: values.art,
    outputName: validateOutputName(values.outName ?? `${slug}_cover.jpg`),
    embedCover: options.noEmbed !== true,
    wrap: {
      titleWidth: values.titleWidth,
      titleLines: values.titleLines,
      subtitleWidth: values.subtitleWidth,
      subtitleLines: values.subtitleLines,
    },
    jpegQuality: environment.COVER_JPEG_QUALITY,
    renderers: parseRendererOrder(rendererNames),
  };
};
