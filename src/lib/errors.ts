export type PipelineStage =
  | "config"
  | "palette"
  | "artwork"
  | "render"
  | "tagging"
  | "janitor"
  | "bundle"
  | "prepare";

export const errorMessage = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
};

/** Base class for every failure the cover pipeline reports with its stage. */
export class CoverPipelineError extends Error {
  readonly stage: PipelineStage;

  constructor(stage: PipelineStage, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "CoverPipelineError";
    this.stage = stage;
  }
}

export class ConfigurationError extends CoverPipelineError {
  constructor(
    message: string,
    options?: ErrorOptions & { stage?: "config" | "palette" | "prepare" },
  ) {
    super(options?.stage ?? "config", message, options);
    this.name = "ConfigurationError";
  }
}

export class ArtworkError extends CoverPipelineError {
  constructor(message: string, options?: ErrorOptions) {
    super("artwork", message, options);
    this.name = "ArtworkError";
  }
}

export interface RendererFailure {
  renderer: string;
  message: string;
}

export class RenderError extends CoverPipelineError {
  readonly failures: RendererFailure[];

  constructor(failures: RendererFailure[]) {
    const detail =
      failures.length === 0
        ? "no renderers configured"
        : failures
            .map((failure) => `${failure.renderer}: ${failure.message}`)
            .join("; ");
    super("render", `all renderers failed (${detail})`);
    this.name = "RenderError";
    this.failures = failures;
  }
}

/** Per-file tagging failure. Collected into a report, never thrown by the tagger. */
export class TaggingError extends CoverPipelineError {
  readonly file: string;

  constructor(file: string, message: string, options?: ErrorOptions) {
    super("tagging", `${file}: ${message}`, options);
    this.name = "TaggingError";
    this.file = file;
  }
}

export class BundleError extends CoverPipelineError {
  constructor(message: string, options?: ErrorOptions) {
    super("bundle", message, options);
    this.name = "BundleError";
  }
}

export const describeFailure = (error: unknown): string => {
  if (error instanceof CoverPipelineError) {
    return `[${error.stage}] ${error.message}`;
  }
  return errorMessage(error);
};
