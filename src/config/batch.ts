import { InvalidConfigurationError } from '../utils/errors';

export interface BatchConfig {
  inputDir: string;
  outputDir: string;
  /**
   * Maximum number of jobs running at once.
   * @default 2
   */
  concurrency: number;
}

export const DEFAULT_BATCH_CONFIG: BatchConfig = {
  inputDir: 'input',
  outputDir: 'output',
  concurrency: 2,
};

export const MIN_CONCURRENCY = 1;

/**
 * Load batch defaults from environment variables.
 * Re-reads on each call so env changes take effect on the next run.
 */
export function loadBatchConfig(): BatchConfig {
  return {
    inputDir: parseEnvString(process.env.BATCH_INPUT_DIR) ?? DEFAULT_BATCH_CONFIG.inputDir,
    outputDir: parseEnvString(process.env.BATCH_OUTPUT_DIR) ?? DEFAULT_BATCH_CONFIG.outputDir,
    concurrency: parseEnvInt(process.env.BATCH_CONCURRENCY) ?? DEFAULT_BATCH_CONFIG.concurrency,
  };
}

export function validateConcurrency(concurrency: number): number {
  if (!Number.isInteger(concurrency) || concurrency < MIN_CONCURRENCY) {
    throw new InvalidConfigurationError(
      `Invalid concurrency value "${concurrency}". Must be an integer of at least ${MIN_CONCURRENCY}.`,
    );
  }
  return concurrency;
}

export function jobCommandEnvVar(jobId: string): string {
  return `ANALYSIS_${jobId.toUpperCase()}_COMMAND`;
}

/**
 * Command configured for a job type, e.g. ANALYSIS_MATRIX_COMMAND.
 */
export function getJobCommand(jobId: string): string | null {
  return parseEnvString(process.env[jobCommandEnvVar(jobId)]);
}

function parseEnvString(value: string | undefined): string | null {
  if (value === undefined || value.trim() === '') return null;
  return value.trim();
}

function parseEnvInt(value: string | undefined): number | null {
  if (value === undefined || value === '') return null;
  const num = Number(value);
  if (!Number.isInteger(num) || num < MIN_CONCURRENCY) return null;
  return num;
}
