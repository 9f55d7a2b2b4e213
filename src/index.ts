export type { BatchRequest, BatchResult, JobError, JobExecutor, JobOutcome, JobStatus, JobType } from './types/batch';
export * from './utils/errors';
export { BatchRequestSchema, parseBatchRequest } from './utils/validation';
export type { ValidatedBatchRequest } from './utils/validation';
export { DEFAULT_BATCH_CONFIG, loadBatchConfig, validateConcurrency } from './config/batch';
export type { BatchConfig } from './config/batch';
export { ANALYSIS_JOBS, ANALYSIS_JOB_IDS, DEFAULT_OUTPUT_LAYOUT, createAnalysisRegistry } from './config/analysis-jobs';
export type { AnalysisJobId } from './config/analysis-jobs';
export { JobRegistry } from './services/job-registry';
export { ConcurrencyGate } from './services/concurrency-gate';
export { JobRunner, JOB_RETURNED_FAILURE } from './services/job-runner';
export type { JobRunnerOptions } from './services/job-runner';
export { BatchCoordinator } from './services/batch-coordinator';
export type { BatchCoordinatorOptions } from './services/batch-coordinator';
export { renderBatchResult, renderJobCatalogue, formatSeconds } from './services/result-reporter';
export { createCommandExecutor } from './services/command-executor';
export type { CommandExecutorOptions } from './services/command-executor';
