/**
 * Error classes for failures that stop a batch before any job launches.
 *
 * Job-level failures are never thrown out of the runner; they are captured
 * into the job's outcome via describeError().
 */

import type { JobError } from '../types/batch';

export interface ErrorPayload {
  error: string;
  code: string;
  details?: string;
}

/** Base orchestrator error with a machine-readable code. */
export class OrchestratorError extends Error {
  readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'OrchestratorError';
    this.code = code;
  }

  toJSON(): ErrorPayload {
    return { error: this.message, code: this.code };
  }
}

/** Bad selection, duplicate ids, or a non-positive concurrency limit. */
export class InvalidConfigurationError extends OrchestratorError {
  readonly details?: string;

  constructor(message: string, details?: string, code = 'INVALID_CONFIGURATION') {
    super(message, code);
    this.name = 'InvalidConfigurationError';
    this.details = details;
  }

  toJSON(): ErrorPayload {
    return {
      error: this.message,
      code: this.code,
      ...(this.details ? { details: this.details } : {}),
    };
  }
}

export class UnknownJobTypeError extends InvalidConfigurationError {
  readonly jobId: string;

  constructor(jobId: string, knownIds: readonly string[] = []) {
    super(
      `Unknown job type "${jobId}"`,
      knownIds.length > 0 ? `Known job types: ${knownIds.join(', ')}` : undefined,
      'UNKNOWN_JOB_TYPE',
    );
    this.name = 'UnknownJobTypeError';
    this.jobId = jobId;
  }
}

/** Input directory is missing, not a directory, or empty. */
export class InvalidInputDirectoryError extends OrchestratorError {
  readonly path: string;

  constructor(path: string, reason: string) {
    super(`Input directory '${path}' ${reason}`, 'INVALID_INPUT_DIRECTORY');
    this.name = 'InvalidInputDirectoryError';
    this.path = path;
  }
}

/**
 * Capture any thrown value as a job error description.
 */
export function describeError(err: unknown): JobError {
  if (err instanceof Error) {
    return err.stack ? { message: err.message, stack: err.stack } : { message: err.message };
  }
  return { message: String(err) };
}
