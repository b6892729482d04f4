#!/usr/bin/env node
import path from "node:path";
import process from "node:process";

import { env } from "../config/env.js";
import { prepareStoryAssets } from "../cover/prepare.js";
import { validateSlug } from "../cover/story.js";
import { createCommandRunner } from "../lib/commands.js";
import { describeFailure } from "../lib/errors.js";
import { createConsoleLogger } from "../lib/log.js";
import { parsePrepArgs } from "./lib/story-cli.js";

const run = async (): Promise<void> => {
  const args = parsePrepArgs(process.argv.slice(2));
  const slug = validateSlug(args.slug);
  const baseDir = path.resolve(args.base ?? env.STORY_BASE);

  await prepareStoryAssets(
    {
      slug,
      baseDir,
      storyDir: path.join(baseDir, slug),
      stereo: args.stereo || env.STEREO,
    },
    {
      runner: createCommandRunner(env.COMMAND_TIMEOUT_MS),
      ffmpegPath: env.FFMPEG_PATH,
      logger: createConsoleLogger(args.verbose || env.BUILD_VERBOSE),
    },
  );
};

void run().catch((error: unknown) => {
  console.error(`❌ ${describeFailure(error)}`);
  process.exitCode = 1;
});
