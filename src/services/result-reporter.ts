import { BatchResult, JobOutcome, JobType } from '../types/batch';

const RULE = '='.repeat(80);

export function formatSeconds(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`;
}

function renderOutcome(outcome: JobOutcome): string {
  const status = outcome.status === 'succeeded' ? '[OK]    ' : '[FAILED]';
  const errorInfo = outcome.error ? ` - Error: ${outcome.error.message}` : '';
  return `${status} ${outcome.name} (${outcome.jobId}) ${formatSeconds(outcome.durationMs)}${errorInfo}`;
}

/**
 * Render a batch result as plain text, one line per job in launch order.
 */
export function renderBatchResult(result: BatchResult): string {
  const lines = [
    RULE,
    'ANALYSIS RESULTS SUMMARY',
    RULE,
    ...result.outcomes.map(renderOutcome),
    '',
    'SUMMARY:',
    `  Successful: ${result.succeededCount}`,
    `  Failed: ${result.failedCount}`,
    `  Total: ${result.total}`,
    `  Duration: ${formatSeconds(result.overallDurationMs)}`,
    '',
    result.failedCount === 0
      ? 'All analyses completed successfully!'
      : `${result.failedCount} analysis type(s) failed.`,
  ];
  return lines.join('\n');
}

export function renderJobCatalogue(jobTypes: readonly JobType[]): string {
  const width = Math.max(0, ...jobTypes.map((jobType) => jobType.id.length));
  return jobTypes
    .map((jobType) => `  ${jobType.id.padEnd(width)}  ${jobType.name}: ${jobType.description}`)
    .join('\n');
}
