#!/usr/bin/env node
import 'dotenv/config';
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import logger from './config/logger';
import { ANALYSIS_JOB_IDS, AnalysisJobId, createAnalysisRegistry } from './config/analysis-jobs';
import { getJobCommand, jobCommandEnvVar, loadBatchConfig } from './config/batch';
import { BatchCoordinator } from './services/batch-coordinator';
import { createCommandExecutor, createMissingCommandExecutor } from './services/command-executor';
import { JobRegistry } from './services/job-registry';
import { renderBatchResult, renderJobCatalogue } from './services/result-reporter';
import { JobExecutor } from './types/batch';
import { OrchestratorError, describeError } from './utils/errors';

export const EXIT_SUCCESS = 0;
export const EXIT_JOB_FAILURE = 1;
export const EXIT_INVALID_INPUT = 2;

export type CliOptions = {
  all?: boolean;
  matrix?: boolean;
  network?: boolean;
  nodal?: boolean;
  pairwise?: boolean;
  globalMetrics?: boolean;
  list?: boolean;
  input: string;
  output: string;
  concurrent: number;
};

export interface CliDeps {
  registry?: JobRegistry;
  write?: (text: string) => void;
}

const FLAG_FOR_JOB: Record<AnalysisJobId, keyof CliOptions> = {
  matrix: 'matrix',
  network: 'network',
  nodal: 'nodal',
  pairwise: 'pairwise',
  global: 'globalMetrics',
};

function commandExecutorFor(jobId: AnalysisJobId): JobExecutor {
  const command = getJobCommand(jobId);
  return command
    ? createCommandExecutor(command, { label: jobId })
    : createMissingCommandExecutor(jobId, jobCommandEnvVar(jobId));
}

/**
 * Registry bound to the commands configured in the environment
 */
export function createRegistryFromEnv(): JobRegistry {
  return createAnalysisRegistry({
    matrix: commandExecutorFor('matrix'),
    network: commandExecutorFor('network'),
    nodal: commandExecutorFor('nodal'),
    pairwise: commandExecutorFor('pairwise'),
    global: commandExecutorFor('global'),
  });
}

export function selectJobIds(options: CliOptions, registry: JobRegistry): string[] {
  if (options.all) return registry.allIds();
  return ANALYSIS_JOB_IDS.filter((id) => options[FLAG_FOR_JOB[id]] === true);
}

function parseConcurrent(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

export function buildProgram(write: (text: string) => void): Command {
  const defaults = loadBatchConfig();

  return new Command()
    .name('connectivity-batch')
    .description('Run connectivity analysis jobs with bounded concurrency')
    .option('--all', 'run all analysis types')
    .option('--matrix', 'run matrix visualizations')
    .option('--network', 'run network visualizations')
    .option('--nodal', 'run nodal visualizations')
    .option('--pairwise', 'run pairwise visualizations')
    .option('--global-metrics', 'run global metrics visualizations')
    .option('--list', 'list the available analysis types and exit')
    .option('--input <dir>', 'input directory containing the data files', defaults.inputDir)
    .option('--output <dir>', 'output directory for results', defaults.outputDir)
    .option('--concurrent <n>', 'maximum concurrent jobs', parseConcurrent, defaults.concurrency)
    .exitOverride()
    .configureOutput({ writeOut: write, writeErr: write });
}

/**
 * Parse argv, run the selected jobs and print the report. Resolves to the
 * process exit code.
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const write = deps.write ?? ((text: string) => process.stdout.write(text));
  const program = buildProgram(write);

  try {
    program.parse(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_SUCCESS : EXIT_INVALID_INPUT;
    }
    throw error;
  }

  const options = program.opts<CliOptions>();
  const registry = deps.registry ?? createRegistryFromEnv();

  if (options.list) {
    write(`${renderJobCatalogue(registry.list())}\n`);
    return EXIT_SUCCESS;
  }

  const selectedJobIds = selectJobIds(options, registry);
  if (selectedJobIds.length === 0) {
    write('No analysis types selected! Use --all or pick one or more job flags (see --help).\n');
    return EXIT_JOB_FAILURE;
  }

  try {
    write('Selected analysis types:\n');
    write(`${renderJobCatalogue(selectedJobIds.map((id) => registry.resolve(id)))}\n`);

    const result = await new BatchCoordinator(registry).execute({
      selectedJobIds,
      inputDir: options.input,
      outputDir: options.output,
      concurrencyLimit: options.concurrent,
    });
    write(`${renderBatchResult(result)}\n`);
    return result.failedCount > 0 ? EXIT_JOB_FAILURE : EXIT_SUCCESS;
  } catch (error) {
    if (error instanceof OrchestratorError) {
      logger.error(error.message, error.toJSON());
      return EXIT_INVALID_INPUT;
    }
    throw error;
  }
}

/** Log an error that escaped runCli and return the exit code to use. */
export function reportUnexpectedError(error: unknown): number {
  logger.error('Unexpected error', { error: describeError(error) });
  return EXIT_JOB_FAILURE;
}

if (require.main === module) {
  runCli(process.argv)
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      process.exitCode = reportUnexpectedError(error);
    });
}
