import { ConfigurationError } from "../../lib/errors.js";
import type { StoryOptions } from "../../cover/story.js";

export interface ParsedArgs {
  positionals: string[];
  values: Map<string, string>;
  flags: Set<string>;
}

/**
 * Split argv into positionals, `--flag=value` / `--flag value` pairs and bare
 * boolean switches. Anything not listed is rejected.
 */
export const parseArgs = (
  argv: string[],
  valueFlags: readonly string[],
  booleanFlags: readonly string[],
): ParsedArgs => {
  const parsed: ParsedArgs = {
    positionals: [],
    values: new Map(),
    flags: new Set(),
  };

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (!token.startsWith("--")) {
      parsed.positionals.push(token);
      continue;
    }

    const [flag, inlineValue] = token.slice(2).split(/=(.*)/s, 2);
    if (booleanFlags.includes(flag) && inlineValue === undefined) {
      parsed.flags.add(flag);
      continue;
    }
    if (!valueFlags.includes(flag)) {
      throw new ConfigurationError(`unknown argument: ${token}`);
    }

    if (inlineValue !== undefined) {
      parsed.values.set(flag, inlineValue);
      continue;
    }
    const next = argv[i + 1];
    if (next === undefined || next.startsWith("--")) {
      throw new ConfigurationError(`missing value for --${flag}`);
    }
    parsed.values.set(flag, next);
    i += 1;
  }

  return parsed;
};

const STORY_VALUE_FLAGS = {
  title: "title",
  subtitle: "subtitle",
  badge: "badge",
  palette: "palette",
  art: "art",
  base: "base",
  "out-name": "outName",
  "title-width": "titleWidth",
  "title-lines": "titleLines",
  "subtitle-width": "subtitleWidth",
  "subtitle-lines": "subtitleLines",
  renderers: "renderers",
} as const satisfies Record<string, keyof StoryOptions>;

export const BUILD_COVER_USAGE =
  "Usage: build-cover <slug> [--title T] [--subtitle S] [--badge B] " +
  "[--palette warm|cool|forest|/path/palette.json] [--art FILE] [--base DIR] " +
  "[--out-name NAME] [--no-embed] [--renderers a,b,c] [--verbose]";

export interface BuildCoverCliArgs {
  options: StoryOptions;
  verbose: boolean;
}

const requireSingleSlug = (positionals: string[], usage: string): string => {
  if (positionals.length !== 1) {
    throw new ConfigurationError(usage);
  }
  return positionals[0];
};

export const parseBuildCoverArgs = (argv: string[]): BuildCoverCliArgs => {
  const parsed = parseArgs(argv, Object.keys(STORY_VALUE_FLAGS), [
    "no-embed",
    "verbose",
  ]);

  const options: StoryOptions = {
    slug: requireSingleSlug(parsed.positionals, BUILD_COVER_USAGE),
    noEmbed: parsed.flags.has("no-embed"),
  };
  for (const [flag, key] of Object.entries(STORY_VALUE_FLAGS)) {
    const value = parsed.values.get(flag);
    if (value !== undefined) {
      options[key] = value;
    }
  }

  return { options, verbose: parsed.flags.has("verbose") };
};

export const PREP_USAGE =
  "Usage: prep-story-assets <slug> [--base DIR] [--stereo] [--verbose]";

export interface PrepCliArgs {
  slug: string;
  base?: string;
  stereo: boolean;
  verbose: boolean;
}

export const parsePrepArgs = (argv: string[]): PrepCliArgs => {
  const parsed = parseArgs(argv, ["base"], ["stereo", "verbose"]);
  return {
    slug: requireSingleSlug(parsed.positionals, PREP_USAGE),
    base: parsed.values.get("base"),
    stereo: parsed.flags.has("stereo"),
    verbose: parsed.flags.has("verbose"),
  };
};
