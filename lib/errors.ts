/**
 * Error hierarchy for the pipeline.
 *
 * Every failure a stage can report is a PipelineError with a stable code,
 * so the CLI can print a specific message and exit non-zero.
 */

export type PipelineErrorCode =
  | "NOT_FOUND"
  | "INVALID_INPUT"
  | "EXTRACTION_ERROR"
  | "DEPENDENCY_MISSING"
  | "CONFIGURATION_ERROR";

export class PipelineError extends Error {
  public readonly code: PipelineErrorCode;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: PipelineErrorCode,
    options: { cause?: unknown; context?: Record<string, unknown> } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.code = code;
    this.context = options.context;
  }
}

export class NotFoundError extends PipelineError {
  constructor(filePath: string) {
    super(`File not found: ${filePath}`, "NOT_FOUND", {
      context: { path: filePath },
    });
  }
}

export class InvalidInputError extends PipelineError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "INVALID_INPUT", { context });
  }
}

export class ExtractionError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, "EXTRACTION_ERROR", { cause });
  }
}

export class DependencyMissingError extends PipelineError {
  constructor(capability: string, hint: string) {
    super(`${capability} is not available. ${hint}`, "DEPENDENCY_MISSING", {
      context: { capability },
    });
  }
}

export class ConfigurationError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, "CONFIGURATION_ERROR", { cause });
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
