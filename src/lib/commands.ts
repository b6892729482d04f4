import { execFileSync } from "node:child_process";

export interface CommandResult {
  stdout: string;
  stderr: string;
}

/** Runs one external program to completion. Rejects with CommandError. */
export interface CommandRunner {
  run: (command: string, args: string[]) => Promise<CommandResult>;
}

export class CommandError extends Error {
  readonly command: string;
  readonly exitCode: number | null;
  readonly stderr: string;
  /** True when the executable could not be found at all. */
  readonly missing: boolean;

  constructor(
    command: string,
    details: { exitCode: number | null; stderr: string; missing: boolean },
    options?: ErrorOptions,
  ) {
    const reason = details.missing
      ? "command not found"
      : `exited with ${details.exitCode ?? "signal"}`;
    const stderr = details.stderr.trim();
    super(
      `${command} ${reason}${stderr.length > 0 ? `: ${lastLine(stderr)}` : ""}`,
      options,
    );
    this.name = "CommandError";
    this.command = command;
    this.exitCode = details.exitCode;
    this.stderr = details.stderr;
    this.missing = details.missing;
  }
}

const lastLine = (text: string): string => {
  const lines = text.split(/\r?\n/).filter((line) => line.trim().length > 0);
  return lines[lines.length - 1] ?? text;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const readProperty = (value: unknown, key: string): unknown =>
  isRecord(value) ? value[key] : undefined;

const toText = (value: unknown): string => {
  if (typeof value === "string") {
    return value;
  }
  if (Buffer.isBuffer(value)) {
    return value.toString("utf8");
  }
  return "";
};

export const toCommandError = (command: string, error: unknown): CommandError => {
  const code = readProperty(error, "code");
  const status = readProperty(error, "status");
  return new CommandError(
    command,
    {
      exitCode: typeof status === "number" ? status : null,
      stderr: toText(readProperty(error, "stderr")),
      missing: code === "ENOENT",
    },
    { cause: error },
  );
};

export const createCommandRunner = (timeoutMs: number): CommandRunner => ({
  run: async (command, args) => {
    try {
      const stdout = execFileSync(command, args, {
        encoding: "utf8",
        stdio: "pipe",
        timeout: timeoutMs,
        maxBuffer: 16 * 1024 * 1024,
      });
      return { stdout, stderr: "" };
    } catch (error: unknown) {
      throw toCommandError(command, error);
    }
  },
});
