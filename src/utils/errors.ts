/**
 * Pipeline Errors
 * Every error here is fatal: the driver aborts the run on the first one it sees
 */

export type PipelineErrorCode =
  | "ToolNotFound"
  | "ToolExecutionFailed"
  | "MissingArtifact"
  | "UnreadableArtifact"
  | "InvalidLanguageCode";

export class PipelineError extends Error {
  constructor(
    readonly code: PipelineErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ToolNotFoundError extends PipelineError {
  constructor(readonly tool: string) {
    super("ToolNotFound", `${tool} not found`);
  }
}

export class ToolExecutionFailedError extends PipelineError {
  constructor(
    readonly tool: string,
    readonly exitCode: number | null,
    readonly output: string,
    options?: { cause?: unknown; signal?: string | null },
  ) {
    const status = options?.signal
      ? `was killed by signal ${options.signal}`
      : `failed with return code ${exitCode}`;
    super("ToolExecutionFailed", `Program ${tool} ${status}. Abort.`, options);
  }
}

export class MissingArtifactError extends PipelineError {
  constructor(readonly path: string) {
    super("MissingArtifact", `Required/expected file '${path}' does not exist`);
  }
}

export class UnreadableArtifactError extends PipelineError {
  constructor(
    readonly path: string,
    reason: "permission" | "io",
    cause?: unknown,
  ) {
    const details = cause instanceof Error ? cause.message : String(cause);
    super(
      "UnreadableArtifact",
      reason === "permission" ? `${path} is not readable` : `${path} IO Error: ${details}`,
      { cause },
    );
  }
}

export class InvalidLanguageCodeError extends PipelineError {
  constructor(readonly lang: string) {
    super("InvalidLanguageCode", `Error: ${lang} is not a valid language code`);
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

/**
 * Node system errors carry a string `code` (ENOENT, EACCES, ...)
 */
export function getErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}
