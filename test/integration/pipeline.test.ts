import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";
import { after, test } from "node:test";

import AdmZip from "adm-zip";
import sharp from "sharp";

import { parseEnvironment } from "../../src/config/env.js";
import { buildCover, runStoryPipeline } from "../../src/cover/pipeline.js";
import type { PipelineDependencies } from "../../src/cover/pipeline.js";
import { createSharpRenderer } from "../../src/cover/renderers.js";
import { resolveStoryConfig } from "../../src/cover/story.js";
import type { StoryOptions } from "../../src/cover/story.js";
import type { Renderer, StoryConfig } from "../../src/cover/types.js";
import {
  ArtworkError,
  ConfigurationError,
  RenderError,
} from "../../src/lib/errors.js";
import {
  TAGGED_PREFIX,
  createFakeFfmpeg,
  createFakeRunner,
  createMemoryLogger,
  failingRenderer,
  makeTempDir,
  missingCommand,
  removeDir,
  solidRenderer,
  writeArt,
} from "../helpers/fixtures.js";
import type { FakeRunner, MemoryLogger } from "../helpers/fixtures.js";

const tempDir = makeTempDir("pipeline");
const environment = parseEnvironment({});

after(() => {
  removeDir(tempDir);
});

interface Harness {
  baseDir: string;
  config: StoryConfig;
  deps: PipelineDependencies & { runner: FakeRunner; logger: MemoryLogger };
}

const setUp = async (
  name: string,
  options: Omit<StoryOptions, "base">,
  renderers: Renderer[] = [solidRenderer("sharp")],
  failFor: string[] = [],
): Promise<Harness> => {
  const baseDir = path.join(tempDir, name);
  const slug = options.slug ?? "story";
  await writeArt(path.join(baseDir, `${slug}_art.png`), 1200, 900);
  const config = resolveStoryConfig({ ...options, base: baseDir }, environment);
  fs.mkdirSync(config.storyDir, { recursive: true });
  return {
    baseDir,
    config,
    deps: {
      renderers,
      runner: createFakeFfmpeg(failFor),
      ffmpegPath: "ffmpeg",
      logger: createMemoryLogger(),
    },
  };
};

const zipEntries = (zipPath: string): string[] =>
  new AdmZip(zipPath)
    .getEntries()
    .map((entry) => entry.entryName)
    .sort();

test("runStoryPipeline builds, tags, cleans up and bundles a story", async () => {
  const baseDir = path.join(tempDir, "full");
  const artPath = await writeArt(
    path.join(baseDir, "friendly_dinosaurs_art.png"),
    4000,
    2000,
  );
  const config = resolveStoryConfig(
    { slug: "friendly_dinosaurs", subtitle: "Age 3–7", base: baseDir },
    environment,
  );
  fs.mkdirSync(config.storyDir, { recursive: true });
  const warmAdult = path.join(config.storyDir, "friendly_dinosaurs - Warm_Adult.mp3");
  fs.writeFileSync(warmAdult, "warm");
  fs.writeFileSync(
    path.join(config.storyDir, "friendly_dinosaurs - Gentle_Feminine.mp3"),
    "gentle",
  );

  const outcome = await runStoryPipeline(config, {
    renderers: [createSharpRenderer()],
    runner: createFakeFfmpeg(),
    ffmpegPath: "ffmpeg",
    logger: createMemoryLogger(),
  });

  const coverPath = path.join(config.storyDir, "friendly_dinosaurs_cover.jpg");
  assert.equal(outcome.coverPath, coverPath);
  assert.equal(outcome.renderer, "sharp");
  assert.equal(outcome.coverBytes, fs.statSync(coverPath).size);
  const metadata = await sharp(coverPath).metadata();
  assert.equal(metadata.format, "jpeg");
  assert.equal(metadata.width, 3000);
  assert.equal(metadata.height, 3000);

  assert.deepEqual(outcome.tagging?.tagged, [
    "friendly_dinosaurs - Gentle_Feminine.mp3",
    "friendly_dinosaurs - Warm_Adult.mp3",
  ]);
  assert.equal(fs.readFileSync(warmAdult, "utf8"), `${TAGGED_PREFIX}warm`);

  assert.equal(outcome.artCleanup, "deleted");
  assert.equal(fs.existsSync(artPath), false);

  assert.equal(outcome.zipPath, path.join(config.storyDir, "friendly_dinosaurs.zip"));
  assert.deepEqual(zipEntries(outcome.zipPath), [
    "friendly_dinosaurs - Gentle_Feminine.mp3",
    "friendly_dinosaurs - Warm_Adult.mp3",
    "friendly_dinosaurs_cover.jpg",
  ]);
});

test("buildCover falls back to the next renderer", async () => {
  const { config, deps } = await setUp("fallback", { slug: "owl" }, [
    failingRenderer("inkscape", "inkscape exited with 1"),
    solidRenderer("rsvg-convert"),
  ]);

  const cover = await buildCover(config, deps);

  assert.equal(cover.renderer, "rsvg-convert");
  assert.equal(fs.existsSync(cover.coverPath), true);
  assert.deepEqual(deps.logger.messages("warn"), [
    "⚠️ inkscape render failed: inkscape exited with 1",
  ]);
});

test("buildCover leaves no cover behind when every renderer fails", async () => {
  const { config, deps } = await setUp("all-fail", { slug: "fox" }, [
    failingRenderer("inkscape", "no display"),
    failingRenderer("magick", "policy denied"),
  ]);

  await assert.rejects(
    buildCover(config, deps),
    (error: unknown) =>
      error instanceof RenderError &&
      error.stage === "render" &&
      error.message ===
        "all renderers failed (inkscape: no display; magick: policy denied)",
  );
  assert.deepEqual(fs.readdirSync(config.storyDir), []);
});

test("buildCover overwrites the previous cover in place", async () => {
  const { config, deps } = await setUp("rerun", { slug: "cat", badge: "New" });

  const first = await buildCover(config, deps);
  const second = await buildCover(config, deps);

  assert.equal(second.coverPath, first.coverPath);
  assert.deepEqual(fs.readdirSync(config.storyDir), ["cat_cover.jpg"]);
  const metadata = await sharp(second.coverPath).metadata();
  assert.equal(metadata.width, 3000);
});

test("runStoryPipeline keeps art that lives outside the base folder", async () => {
  const outsideArt = await writeArt(path.join(tempDir, "shared", "owl.png"), 800, 800);
  const { config, deps } = await setUp("outside", { slug: "owl", art: outsideArt });

  const outcome = await runStoryPipeline(config, deps);

  assert.equal(outcome.artCleanup, "skipped-outside-base");
  assert.equal(fs.existsSync(outsideArt), true);
});

test("runStoryPipeline skips tagging when embedding is disabled", async () => {
  const { config, deps } = await setUp("no-embed", { slug: "bee", noEmbed: true });
  const audio = path.join(config.storyDir, "bee - Warm_Adult.mp3");
  fs.writeFileSync(audio, "plain");

  const outcome = await runStoryPipeline(config, deps);

  assert.equal(outcome.tagging, undefined);
  assert.equal(fs.readFileSync(audio, "utf8"), "plain");
  assert.equal(deps.runner.calls.length, 0);
  assert.ok(deps.logger.messages("info").includes("ℹ️ Skipping MP3 art embed"));
});

test("runStoryPipeline bundles even when one MP3 cannot be tagged", async () => {
  const { config, deps } = await setUp(
    "tag-failure",
    { slug: "elk" },
    [solidRenderer("sharp")],
    ["elk - Gentle_Feminine.mp3"],
  );
  fs.writeFileSync(path.join(config.storyDir, "elk - Gentle_Feminine.mp3"), "g");
  fs.writeFileSync(path.join(config.storyDir, "elk - Warm_Adult.mp3"), "w");

  const outcome = await runStoryPipeline(config, deps);

  assert.deepEqual(outcome.tagging?.tagged, ["elk - Warm_Adult.mp3"]);
  assert.deepEqual(
    outcome.tagging?.failed.map((failure) => failure.file),
    ["elk - Gentle_Feminine.mp3"],
  );
  assert.deepEqual(zipEntries(outcome.zipPath), [
    "elk - Gentle_Feminine.mp3",
    "elk - Warm_Adult.mp3",
    "elk_cover.jpg",
  ]);
});

test("runStoryPipeline keeps the art while any MP3 is left untagged", async () => {
  const { config, deps } = await setUp(
    "tag-failure-art",
    { slug: "gnu" },
    [solidRenderer("sharp")],
    ["gnu - Warm_Adult.mp3"],
  );
  fs.writeFileSync(path.join(config.storyDir, "gnu - Warm_Adult.mp3"), "w");
  const artPath = path.join(config.baseDir, "gnu_art.png");

  const outcome = await runStoryPipeline(config, deps);

  assert.equal(outcome.artCleanup, "kept-tagging-incomplete");
  assert.equal(fs.existsSync(artPath), true);
  assert.ok(
    deps.logger
      .messages("info")
      .includes(`ℹ️ Kept source art until every MP3 is tagged: ${artPath}`),
  );

  const retry = await runStoryPipeline(config, { ...deps, runner: createFakeFfmpeg() });
  assert.equal(retry.artCleanup, "deleted");
  assert.equal(fs.existsSync(artPath), false);
});

test("runStoryPipeline keeps the art when ffmpeg is unavailable", async () => {
  const { config, deps } = await setUp("no-ffmpeg", { slug: "ibis" });
  fs.writeFileSync(path.join(config.storyDir, "ibis - Warm_Adult.mp3"), "w");
  const runner = createFakeRunner((command) => {
    throw missingCommand(command);
  });

  const outcome = await runStoryPipeline(config, { ...deps, runner });

  assert.equal(outcome.tagging?.skipped, true);
  assert.equal(outcome.artCleanup, "kept-tagging-incomplete");
  assert.equal(fs.existsSync(path.join(config.baseDir, "ibis_art.png")), true);
});

test("runStoryPipeline still bundles when an mp3 entry is a dangling symlink", async () => {
  const { config, deps } = await setUp("dangling", { slug: "ant" });
  fs.writeFileSync(path.join(config.storyDir, "ant - A.mp3"), "a");
  fs.symlinkSync(
    path.join(config.storyDir, "missing.mp3"),
    path.join(config.storyDir, "ant - B.mp3"),
  );

  const outcome = await runStoryPipeline(config, deps);

  assert.deepEqual(outcome.tagging?.tagged, ["ant - A.mp3"]);
  assert.deepEqual(
    outcome.tagging?.failed.map((failure) => failure.stage),
    ["tagging"],
  );
  assert.equal(outcome.artCleanup, "kept-tagging-incomplete");
  assert.deepEqual(zipEntries(outcome.zipPath), ["ant - A.mp3", "ant_cover.jpg"]);
});

test("buildCover reports missing art as an artwork failure", async () => {
  const { config, deps } = await setUp("missing-art", { slug: "yak" });
  fs.rmSync(path.join(config.baseDir, "yak_art.png"));

  await assert.rejects(
    buildCover(config, deps),
    (error: unknown) => error instanceof ArtworkError && error.stage === "artwork",
  );
});

test("buildCover rejects an unknown palette before rendering", async () => {
  const { config, deps } = await setUp("bad-palette", {
    slug: "emu",
    palette: "sepia",
  });

  await assert.rejects(
    buildCover(config, deps),
    (error: unknown) =>
      error instanceof ConfigurationError &&
      error.stage === "palette" &&
      error.message ===
        'unknown palette "sepia" (use warm, cool, forest or a JSON file path)',
  );
  assert.deepEqual(fs.readdirSync(config.storyDir), []);
});
