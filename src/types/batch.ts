/**
 * Batch Orchestration Type Definitions
 */

export type JobStatus = 'succeeded' | 'failed';

/**
 * Unit of work behind a job type. Resolves `true` on success; `false` or a
 * thrown error marks the job as failed.
 */
export type JobExecutor = (inputDir: string, outputDir: string) => boolean | Promise<boolean>;

/**
 * Immutable descriptor of one kind of analysis job
 */
export interface JobType {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly executor: JobExecutor;
  /** Output namespace relative to the batch output directory. */
  readonly outputSubpath: string;
  /** Directories created beneath `outputSubpath` before the job starts. */
  readonly outputLayout: readonly string[];
}

export interface BatchRequest {
  selectedJobIds: string[];
  inputDir: string;
  outputDir: string;
  /** @default 2 */
  concurrencyLimit?: number;
}

export interface JobError {
  message: string;
  stack?: string;
}

/**
 * Terminal record of one job's execution
 */
export interface JobOutcome {
  readonly jobId: string;
  readonly name: string;
  readonly status: JobStatus;
  readonly startedAt: Date;
  readonly finishedAt: Date;
  readonly durationMs: number;
  readonly error?: JobError;
}

export interface BatchResult {
  /** Launch order, not completion order. */
  readonly outcomes: readonly JobOutcome[];
  readonly startedAt: Date;
  readonly finishedAt: Date;
  readonly overallDurationMs: number;
  readonly total: number;
  readonly succeededCount: number;
  readonly failedCount: number;
}
