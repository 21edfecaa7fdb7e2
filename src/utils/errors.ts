// src/utils/errors.ts
import type { AnalysisOutcome } from "../types";

export type ExtractionFailureReason = "UnsupportedFormat" | "ExtractionError";

export class TextExtractionError extends Error {
  constructor(
    message: string,
    public readonly reason: ExtractionFailureReason = "ExtractionError"
  ) {
    super(message);
    this.name = "TextExtractionError";
  }
}

export class AnalysisClientError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "AnalysisClientError";
  }
}

export class BatchConfigError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Invalid batch configuration: ${problems.join("; ")}`);
    this.name = "BatchConfigError";
  }
}

/** Raised when a run is aborted between chunks; keeps what already finished. */
export class BatchCancelledError extends Error {
  constructor(public readonly partialOutcomes: AnalysisOutcome[]) {
    super(
      `Batch cancelled after ${partialOutcomes.length} processed item(s)`
    );
    this.name = "BatchCancelledError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
