import path from 'path';
import logger from '../config/logger';
import { JobError, JobOutcome, JobStatus, JobType } from '../types/batch';
import { describeError } from '../utils/errors';
import { ConcurrencyGate } from './concurrency-gate';

export const JOB_RETURNED_FAILURE = 'job returned failure';

interface Attempt {
  startedAt: Date;
  status: JobStatus;
  error?: JobError;
}

export interface JobRunnerOptions {
  /** Clock used for outcome timestamps. */
  now?: () => Date;
}

/**
 * JobRunner
 *
 * Runs one job under the shared gate and turns whatever the executor does
 * (true, false, throw, reject) into exactly one JobOutcome. Never throws.
 */
export class JobRunner {
  private readonly now: () => Date;

  constructor(
    private readonly gate: ConcurrencyGate,
    options: JobRunnerOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async run(jobType: JobType, inputDir: string, outputDir: string): Promise<JobOutcome> {
    const jobOutputDir = path.join(outputDir, jobType.outputSubpath);

    const { startedAt, status, error } = await this.gate.withPermit(
      async (): Promise<Attempt> => {
        const startedAt = this.now();
        try {
          logger.info(`Starting ${jobType.name}`, { job_id: jobType.id, output_dir: jobOutputDir });
          const success = await jobType.executor(inputDir, jobOutputDir);
          if (success === true) {
            return { startedAt, status: 'succeeded' };
          }
          return { startedAt, status: 'failed', error: { message: JOB_RETURNED_FAILURE } };
        } catch (err) {
          return { startedAt, status: 'failed', error: describeError(err) };
        }
      },
    );

    const finishedAt = this.now();
    const durationMs = finishedAt.getTime() - startedAt.getTime();

    if (error) {
      logger.error(`Error in ${jobType.id} analysis: ${error.message}`, {
        job_id: jobType.id,
        duration_ms: durationMs,
      });
    } else {
      logger.info(`Finished ${jobType.name}`, { job_id: jobType.id, duration_ms: durationMs });
    }

    return Object.freeze({
      jobId: jobType.id,
      name: jobType.name,
      status,
      startedAt,
      finishedAt,
      durationMs,
      ...(error ? { error } : {}),
    });
  }
}
