import { config as loadEnv } from "dotenv";
import { z } from "zod";

loadEnv();

export const DEFAULT_STORY_BASE = "/mnt/ai_data/BedtimeStories";
export const DEFAULT_RENDERER_ORDER = "sharp,inkscape,rsvg-convert,magick";

const boolFromString = (value: string): boolean =>
  ["1", "true", "yes", "on"].includes(value.toLowerCase());

const csvToList = (value: string): string[] =>
  value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);

const environmentSchema = z.object({
  STORY_BASE: z.string().min(1).default(DEFAULT_STORY_BASE),
  COVER_RENDERERS: z
    .string()
    .default(DEFAULT_RENDERER_ORDER)
    .transform(csvToList),
  COVER_JPEG_QUALITY: z.coerce.number().int().min(1).max(100).default(92),
  FFMPEG_PATH: z.string().min(1).default("ffmpeg"),
  INKSCAPE_PATH: z.string().min(1).default("inkscape"),
  RSVG_CONVERT_PATH: z.string().min(1).default("rsvg-convert"),
  MAGICK_PATH: z.string().min(1).default("magick"),
  CHROME_PATH: z.string().min(1).optional(),
  COMMAND_TIMEOUT_MS: z.coerce.number().int().min(1).default(120_000),
  STEREO: z.string().default("false").transform(boolFromString),
  BUILD_VERBOSE: z.string().default("false").transform(boolFromString),
});

export type Environment = z.infer<typeof environmentSchema>;

export const parseEnvironment = (
  rawEnv: NodeJS.ProcessEnv = process.env,
): Environment => environmentSchema.parse(rawEnv);

export const env = parseEnvironment();
