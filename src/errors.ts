/**
 * Error taxonomy for the pipeline.
 *
 * Only ConfigurationError is meant to escape to the process entry point.
 * The others are caught at their module boundary and turned into skips,
 * empty outcomes or inline tool text.
 */

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class IngestionError extends Error {
  constructor(
    message: string,
    readonly url: string,
  ) {
    super(message);
    this.name = "IngestionError";
  }
}

export type RetrievalErrorKind = "embedding" | "storage" | "timeout";

export class RetrievalError extends Error {
  constructor(
    message: string,
    readonly kind: RetrievalErrorKind,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = "RetrievalError";
  }
}

export class ToolExecutionError extends Error {
  constructor(
    message: string,
    readonly toolName: string,
  ) {
    super(message);
    this.name = "ToolExecutionError";
  }
}

export class GenerationError extends Error {
  constructor(
    message: string,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = "GenerationError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
