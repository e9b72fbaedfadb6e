/**
 * Error types raised by the pipeline
 */

import type { FetchFailureReason } from "../types";

/**
 * Root directory is missing, not a directory, or unreadable
 */
export class InvalidInputPathError extends Error {
  constructor(
    public readonly path: string,
    details: string,
  ) {
    super(`Invalid input path "${path}": ${details}`);
    this.name = "InvalidInputPathError";
  }
}

/**
 * A single image could not be retrieved
 */
export class FetchError extends Error {
  constructor(
    public readonly reason: FetchFailureReason,
    message: string,
  ) {
    super(message);
    this.name = "FetchError";
  }
}

/**
 * An image or document could not be written to disk
 */
export class WriteError extends Error {
  constructor(
    public readonly path: string,
    cause: unknown,
  ) {
    super(
      `Failed to write ${path}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
    this.name = "WriteError";
  }
}
