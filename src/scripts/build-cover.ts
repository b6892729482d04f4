#!/usr/bin/env node
import process from "node:process";

import { env } from "../config/env.js";
import { logOutcome } from "../cover/reporting.js";
import { createRenderers } from "../cover/renderers.js";
import { runStoryPipeline } from "../cover/pipeline.js";
import { resolveStoryConfig } from "../cover/story.js";
import { createCommandRunner } from "../lib/commands.js";
import { describeFailure } from "../lib/errors.js";
import { createConsoleLogger } from "../lib/log.js";
import { parseBuildCoverArgs } from "./lib/story-cli.js";

const run = async (): Promise<void> => {
  const args = parseBuildCoverArgs(process.argv.slice(2));
  const logger = createConsoleLogger(args.verbose || env.BUILD_VERBOSE);
  const config = resolveStoryConfig(args.options, env);
  const runner = createCommandRunner(env.COMMAND_TIMEOUT_MS);

  const outcome = await runStoryPipeline(config, {
    renderers: createRenderers(config.renderers, {
      runner,
      inkscapePath: env.INKSCAPE_PATH,
      rsvgConvertPath: env.RSVG_CONVERT_PATH,
      magickPath: env.MAGICK_PATH,
      chromePath: env.CHROME_PATH,
    }),
    runner,
    ffmpegPath: env.FFMPEG_PATH,
    logger,
  });

  logOutcome(outcome, logger);
};

void run().catch((error: unknown) => {
  console.error(`❌ ${describeFailure(error)}`);
  process.exitCode = 1;
});
