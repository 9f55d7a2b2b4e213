import { mkdir, readdir, stat } from 'fs/promises';
import path from 'path';
import logger from '../config/logger';
import { BatchRequest, BatchResult, JobOutcome, JobType } from '../types/batch';
import { InvalidInputDirectoryError } from '../utils/errors';
import { parseBatchRequest } from '../utils/validation';
import { ConcurrencyGate } from './concurrency-gate';
import { JobRegistry } from './job-registry';
import { JobRunner, JobRunnerOptions } from './job-runner';

export interface BatchCoordinatorOptions extends JobRunnerOptions {
  /** Called once per job as it reaches a terminal outcome. */
  onOutcome?: (outcome: JobOutcome) => void;
}

/**
 * BatchCoordinator
 *
 * Validates a batch request, prepares the output layout and runs every
 * selected job under one shared concurrency gate. Configuration and input
 * errors reject before any job launches; job failures only show up in the
 * returned BatchResult.
 */
export class BatchCoordinator {
  constructor(
    private readonly registry: JobRegistry,
    private readonly options: BatchCoordinatorOptions = {},
  ) {}

  async execute(request: BatchRequest): Promise<BatchResult> {
    const { selectedJobIds, inputDir, outputDir, concurrencyLimit } = parseBatchRequest(request);

    // Resolve everything up front so an unknown id launches nothing
    const jobTypes = selectedJobIds.map((id) => this.registry.resolve(id));

    await this.validateInputDirectory(inputDir);
    await this.prepareOutputDirectories(outputDir, jobTypes);

    logger.info('Batch execution starting', {
      total_jobs: jobTypes.length,
      input_dir: inputDir,
      output_dir: outputDir,
      concurrency: concurrencyLimit,
    });

    const gate = new ConcurrencyGate(concurrencyLimit);
    const runner = new JobRunner(gate, { now: this.options.now });

    const outcomes = await Promise.all(
      jobTypes.map(async (jobType) => {
        const outcome = await runner.run(jobType, inputDir, outputDir);
        this.notify(outcome);
        return outcome;
      }),
    );

    const result = this.aggregate(outcomes);

    logger.info('Batch execution completed', {
      total_jobs: result.total,
      succeeded: result.succeededCount,
      failed: result.failedCount,
      duration_ms: result.overallDurationMs,
      peak_concurrency: gate.peak,
    });

    return result;
  }

  private async validateInputDirectory(inputDir: string): Promise<void> {
    let isDirectory: boolean;
    try {
      isDirectory = (await stat(inputDir)).isDirectory();
    } catch (err) {
      const code = errnoCode(err);
      throw new InvalidInputDirectoryError(
        inputDir,
        code === 'ENOENT' ? 'does not exist' : `cannot be read (${code})`,
      );
    }

    if (!isDirectory) {
      throw new InvalidInputDirectoryError(inputDir, 'is not a directory');
    }

    let entries: string[];
    try {
      entries = await readdir(inputDir);
    } catch (err) {
      throw new InvalidInputDirectoryError(inputDir, `cannot be read (${errnoCode(err)})`);
    }
    if (entries.length === 0) {
      throw new InvalidInputDirectoryError(inputDir, 'is empty');
    }
  }

  private async prepareOutputDirectories(outputDir: string, jobTypes: JobType[]): Promise<void> {
    await mkdir(outputDir, { recursive: true });
    for (const jobType of jobTypes) {
      const jobDir = path.join(outputDir, jobType.outputSubpath);
      await mkdir(jobDir, { recursive: true });
      for (const subdir of jobType.outputLayout) {
        await mkdir(path.join(jobDir, subdir), { recursive: true });
      }
    }
    logger.debug('Output directories ready', { output_dir: outputDir });
  }

  private notify(outcome: JobOutcome): void {
    if (!this.options.onOutcome) return;
    try {
      this.options.onOutcome(outcome);
    } catch (error) {
      logger.warn('onOutcome callback threw', {
        job_id: outcome.jobId,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private aggregate(outcomes: JobOutcome[]): BatchResult {
    const startedAt = new Date(Math.min(...outcomes.map((o) => o.startedAt.getTime())));
    const finishedAt = new Date(Math.max(...outcomes.map((o) => o.finishedAt.getTime())));
    const succeededCount = outcomes.filter((o) => o.status === 'succeeded').length;
    const failedCount = outcomes.length - succeededCount;

    return Object.freeze({
      outcomes: Object.freeze([...outcomes]),
      startedAt,
      finishedAt,
      overallDurationMs: finishedAt.getTime() - startedAt.getTime(),
      total: outcomes.length,
      succeededCount,
      failedCount,
    });
  }
}

// fs errors may come from another realm (e.g. a test sandbox), so no instanceof
function errnoCode(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return 'UNKNOWN';
}
