import type { TaggingError } from "../lib/errors.js";

export const PALETTE_ROLES = [
  "BG1",
  "BG2",
  "TITLE_COLOR",
  "SUBTITLE_COLOR",
  "BADGE_BG",
  "BADGE_COLOR",
] as const;

export type PaletteRole = (typeof PALETTE_ROLES)[number];
export type Palette = Readonly<Record<PaletteRole, string>>;

export const RENDERER_NAMES = [
  "sharp",
  "inkscape",
  "rsvg-convert",
  "magick",
  "chrome",
] as const;

export type RendererName = (typeof RENDERER_NAMES)[number];

export interface ImageSize {
  width: number;
  height: number;
}

export interface CropBox {
  left: number;
  top: number;
  size: number;
}

export interface TextWrapLimits {
  titleWidth: number;
  titleLines: number;
  subtitleWidth: number;
  subtitleLines: number;
}

export interface StoryConfig {
  slug: string;
  baseDir: string;
  storyDir: string;
  title: string;
  subtitle?: string;
  badge?: string;
  palette: string;
  artOverride?: string;
  outputName: string;
  embedCover: boolean;
  wrap: TextWrapLimits;
  jpegQuality: number;
  renderers: RendererName[];
}

export interface NormalizedArt {
  readonly sourcePath: string;
  readonly sourceSize: ImageSize;
  readonly buffer: Buffer;
  readonly width: number;
  readonly height: number;
  readonly mimeType: "image/png";
  readonly dataUri: string;
  /** False when the source was already canonical and used unmodified. */
  readonly resized: boolean;
}

export interface VectorDocument {
  readonly svg: string;
  readonly width: number;
  readonly height: number;
  /** Colour transparent pixels are flattened against. */
  readonly background: string;
}

export interface RenderResult {
  renderer: string;
  pngPath: string;
}

export interface Renderer {
  readonly name: string;
  render: (document: VectorDocument, outputPngPath: string) => Promise<void>;
}

export type ArtCleanupOutcome =
  | "deleted"
  | "skipped-outside-base"
  | "missing"
  | "kept-tagging-incomplete"
  | "failed";

export interface TaggingReport {
  tagged: string[];
  failed: TaggingError[];
  skipped: boolean;
}

export interface PipelineOutcome {
  coverPath: string;
  coverBytes: number;
  renderer: string;
  tagging?: TaggingReport;
  artCleanup: ArtCleanupOutcome;
  zipPath: string;
}
