import { JobExecutor, JobType } from '../types/batch';
import { JobRegistry } from '../services/job-registry';

export type AnalysisJobId = 'matrix' | 'network' | 'nodal' | 'pairwise' | 'global';

/**
 * Sub-directories every analysis job writes beneath its own output namespace
 */
export const DEFAULT_OUTPUT_LAYOUT: readonly string[] = [
  'individual',
  'by_condition',
  'by_timepoint',
  'reports',
];

type AnalysisJobDefinition = Omit<JobType, 'id' | 'executor'>;

export const ANALYSIS_JOBS: Readonly<Record<AnalysisJobId, AnalysisJobDefinition>> = {
  matrix: {
    name: 'Matrix Visualizations',
    description: 'Connectivity matrix heatmaps with consistent scaling',
    outputSubpath: 'matrices',
    outputLayout: DEFAULT_OUTPUT_LAYOUT,
  },
  network: {
    name: 'Network Visualizations',
    description: 'Network graph visualizations with consistent scaling',
    outputSubpath: 'networks',
    outputLayout: DEFAULT_OUTPUT_LAYOUT,
  },
  nodal: {
    name: 'Nodal Visualizations',
    description: 'Nodal metric bar charts with consistent scaling',
    outputSubpath: 'nodals',
    outputLayout: DEFAULT_OUTPUT_LAYOUT,
  },
  pairwise: {
    name: 'Pairwise Visualizations',
    description: 'Pairwise connection strength plots with consistent scaling',
    outputSubpath: 'pairwise',
    outputLayout: DEFAULT_OUTPUT_LAYOUT,
  },
  global: {
    name: 'Global Metrics Visualizations',
    description: 'Global metric bar charts with consistent scaling',
    outputSubpath: 'global',
    outputLayout: DEFAULT_OUTPUT_LAYOUT,
  },
};

export const ANALYSIS_JOB_IDS: readonly AnalysisJobId[] = ['matrix', 'network', 'nodal', 'pairwise', 'global'];

/**
 * Build the registry of analysis jobs. Every job type must be given an
 * executor.
 */
export function createAnalysisRegistry(executors: Record<AnalysisJobId, JobExecutor>): JobRegistry {
  return new JobRegistry(
    ANALYSIS_JOB_IDS.map((id) => ({ id, ...ANALYSIS_JOBS[id], executor: executors[id] })),
  );
}
