import { types } from "node:util";

import { CustomError } from "./utils/error.js";

import type { JobEvent, JobStatus } from "./job/state-machine.js";

// Set up custom errors
export class ValidationError extends CustomError {}

export class InvalidConfigError extends CustomError {}

export class JobNotFoundError extends CustomError {
  readonly jobId: string;

  constructor(jobId: string) {
    super(`Upload job "${jobId}" not found`);
    this.jobId = jobId;
  }
}

// Committing a chunk is not a state machine event, but is only legal while
// the job is uploading
export type JobAction = JobEvent | "commit";

export class InvalidTransitionError extends CustomError {
  readonly state: JobStatus;
  readonly event: JobAction;

  constructor(state: JobStatus, event: JobAction, message?: string) {
    super(message ?? `Cannot apply "${event}" to a job in state ${state}`);
    this.state = state;
    this.event = event;
  }
}

export class ChunkUploadFailedError extends CustomError {
  readonly index: number;
  readonly lastError: Error;

  constructor(index: number, lastError: Error) {
    super(`Chunk ${index} failed: ${lastError.message}`);
    this.index = index;
    this.lastError = lastError;
  }
}

/**
 * A chunk arrived with bytes that do not hash to the checksum sent along
 * with them. The transmission is broken, the chunk is not committed and the
 * sender may try again.
 */
export class ChecksumMismatchError extends CustomError {
  readonly index: number;

  constructor(index: number, expected: string, actual: string) {
    super(`Checksum mismatch for chunk ${index}: ${expected} !== ${actual}`);
    this.index = index;
  }
}

/**
 * A chunk was committed twice with different content. Never retried.
 */
export class IntegrityError extends CustomError {}

export class TimeoutExceededError extends CustomError {
  constructor(timeoutMs: number) {
    super(`Job did not finish within ${timeoutMs}ms`);
  }
}

export class CancelledByUserError extends CustomError {
  constructor(message: string = "Cancelled by user") {
    super(message);
  }
}

export type ErrorCode =
  | "InvalidConfig"
  | "ValidationError"
  | "JobNotFound"
  | "InvalidTransition"
  | "ChunkUploadFailed"
  | "ChecksumMismatch"
  | "IntegrityError"
  | "TimeoutExceeded"
  | "CancelledByUser"
  | "Unknown";

export const errorCode = (error: unknown): ErrorCode => {
  if (error instanceof InvalidConfigError) {
    return "InvalidConfig";
  } else if (error instanceof ValidationError) {
    return "ValidationError";
  } else if (error instanceof JobNotFoundError) {
    return "JobNotFound";
  } else if (error instanceof InvalidTransitionError) {
    return "InvalidTransition";
  } else if (error instanceof ChunkUploadFailedError) {
    return "ChunkUploadFailed";
  } else if (error instanceof ChecksumMismatchError) {
    return "ChecksumMismatch";
  } else if (error instanceof IntegrityError) {
    return "IntegrityError";
  } else if (error instanceof TimeoutExceededError) {
    return "TimeoutExceeded";
  } else if (error instanceof CancelledByUserError) {
    return "CancelledByUser";
  }
  return "Unknown";
};

// Failures after which the same bytes can be sent again
export const isTransient = (error: unknown): boolean =>
  error instanceof ChunkUploadFailedError ||
  error instanceof TimeoutExceededError;

// Errors raised by Node's own modules may come from another realm under a test runner
export const toError = (error: unknown): Error =>
  types.isNativeError(error) || error instanceof Error
    ? error
    : new Error(String(error));
