import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import sharp from "sharp";

import type { CommandResult, CommandRunner } from "../../src/lib/commands.js";
import { CommandError } from "../../src/lib/commands.js";
import type { Logger } from "../../src/lib/log.js";
import type { Renderer } from "../../src/cover/types.js";

export type LogLevel = "info" | "warn" | "error" | "debug";

export interface MemoryLogger extends Logger {
  lines: { level: LogLevel; message: string }[];
  messages: (level: LogLevel) => string[];
}

export const createMemoryLogger = (): MemoryLogger => {
  const lines: MemoryLogger["lines"] = [];
  const push = (level: LogLevel) => (message: string) => {
    lines.push({ level, message });
  };
  return {
    lines,
    messages: (level) =>
      lines.filter((line) => line.level === level).map((line) => line.message),
    info: push("info"),
    warn: push("warn"),
    error: push("error"),
    debug: push("debug"),
  };
};

export const makeTempDir = (label: string): string =>
  fs.mkdtempSync(path.join(os.tmpdir(), `storycover-test-${label}-`));

export const removeDir = (dirPath: string): void => {
  fs.rmSync(dirPath, { recursive: true, force: true });
};

export const writeArt = async (
  filePath: string,
  width: number,
  height: number,
  background = { r: 200, g: 120, b: 40 },
): Promise<string> => {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  await sharp({ create: { width, height, channels: 3, background } })
    .png()
    .toFile(filePath);
  return filePath;
};

export interface RecordedCall {
  command: string;
  args: string[];
}

export interface FakeRunner extends CommandRunner {
  calls: RecordedCall[];
}

/** Command runner whose behaviour is supplied by the test. */
export const createFakeRunner = (
  handler: (command: string, args: string[]) => CommandResult | Promise<CommandResult>,
): FakeRunner => {
  const calls: RecordedCall[] = [];
  return {
    calls,
    run: async (command, args) => {
      calls.push({ command, args });
      return handler(command, args);
    },
  };
};

export const missingCommand = (command: string): CommandError =>
  new CommandError(command, { exitCode: null, stderr: "", missing: true });

export const TAGGED_PREFIX = "tagged:";

/**
 * Stands in for ffmpeg: `-version` succeeds, and a conversion copies its
 * first input to the last argument with a marker prefix. Inputs whose base
 * name is listed in `failFor` exit with status 1.
 */
export const createFakeFfmpeg = (failFor: string[] = []): FakeRunner =>
  createFakeRunner((command, args) => {
    if (args[0] === "-version") {
      return { stdout: "ffmpeg version test", stderr: "" };
    }
    const input = args[args.indexOf("-i") + 1];
    const output = args[args.length - 1];
    if (failFor.includes(path.basename(input))) {
      throw new CommandError(command, {
        exitCode: 1,
        stderr: "Invalid data found when processing input",
        missing: false,
      });
    }
    fs.writeFileSync(
      output,
      Buffer.concat([Buffer.from(TAGGED_PREFIX), fs.readFileSync(input)]),
    );
    return { stdout: "", stderr: "" };
  });

export const solidRenderer = (name: string): Renderer => ({
  name,
  render: async (document, outputPngPath) => {
    await sharp({
      create: {
        width: document.width,
        height: document.height,
        channels: 4,
        background: { r: 40, g: 60, b: 90, alpha: 1 },
      },
    })
      .png()
      .toFile(outputPngPath);
  },
});

export const failingRenderer = (name: string, message: string): Renderer => ({
  name,
  render: async (_document, outputPngPath) => {
    fs.writeFileSync(outputPngPath, "partial");
    throw new Error(message);
  },
});
