import { JobRegistry } from '../src/services/job-registry';
import {
  ANALYSIS_JOB_IDS,
  DEFAULT_OUTPUT_LAYOUT,
  createAnalysisRegistry,
} from '../src/config/analysis-jobs';
import { JobType } from '../src/types/batch';
import { InvalidConfigurationError, UnknownJobTypeError } from '../src/utils/errors';

const makeJobType = (id: string, outputSubpath = id): JobType => ({
  id,
  name: `${id} job`,
  description: `runs ${id}`,
  executor: jest.fn().mockResolvedValue(true),
  outputSubpath,
  outputLayout: [],
});

describe('JobRegistry', () => {
  it('resolves a registered job type by id', () => {
    const registry = new JobRegistry([makeJobType('matrix', 'matrices'), makeJobType('network')]);
    const jobType = registry.resolve('matrix');

    expect(jobType.id).toBe('matrix');
    expect(jobType.outputSubpath).toBe('matrices');
  });

  it('throws UnknownJobTypeError for an unregistered id', () => {
    const registry = new JobRegistry([makeJobType('matrix'), makeJobType('network')]);

    expect(() => registry.resolve('spectral')).toThrow(UnknownJobTypeError);
    try {
      registry.resolve('spectral');
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidConfigurationError);
      expect((err as UnknownJobTypeError).jobId).toBe('spectral');
      expect((err as UnknownJobTypeError).details).toBe('Known job types: matrix, network');
    }
  });

  it('rejects duplicate ids', () => {
    expect(() => new JobRegistry([makeJobType('matrix'), makeJobType('matrix')])).toThrow(
      'Job type "matrix" is registered more than once',
    );
  });

  it('lists ids in registration order', () => {
    const registry = new JobRegistry([makeJobType('nodal'), makeJobType('matrix'), makeJobType('global')]);
    expect(registry.allIds()).toEqual(['nodal', 'matrix', 'global']);
    expect(registry.list().map((j) => j.id)).toEqual(['nodal', 'matrix', 'global']);
  });

  it('reports membership with has()', () => {
    const registry = new JobRegistry([makeJobType('matrix')]);
    expect(registry.has('matrix')).toBe(true);
    expect(registry.has('network')).toBe(false);
  });

  it('stores frozen descriptors', () => {
    const registry = new JobRegistry([makeJobType('matrix')]);
    const jobType = registry.resolve('matrix');
    expect(Object.isFrozen(jobType)).toBe(true);
    expect(Object.isFrozen(jobType.outputLayout)).toBe(true);
  });
});

describe('createAnalysisRegistry', () => {
  const executors = {
    matrix: jest.fn().mockResolvedValue(true),
    network: jest.fn().mockResolvedValue(true),
    nodal: jest.fn().mockResolvedValue(true),
    pairwise: jest.fn().mockResolvedValue(true),
    global: jest.fn().mockResolvedValue(true),
  };

  it('registers the five analysis job types in order', () => {
    const registry = createAnalysisRegistry(executors);
    expect(registry.allIds()).toEqual(['matrix', 'network', 'nodal', 'pairwise', 'global']);
    expect(registry.allIds()).toEqual([...ANALYSIS_JOB_IDS]);
  });

  it('binds each executor to its job type', () => {
    const registry = createAnalysisRegistry(executors);
    expect(registry.resolve('pairwise').executor).toBe(executors.pairwise);
    expect(registry.resolve('global').executor).toBe(executors.global);
  });

  it('uses the per-type output namespaces', () => {
    const registry = createAnalysisRegistry(executors);
    expect(registry.list().map((j) => j.outputSubpath)).toEqual([
      'matrices',
      'networks',
      'nodals',
      'pairwise',
      'global',
    ]);
    expect(registry.resolve('nodal').outputLayout).toEqual(DEFAULT_OUTPUT_LAYOUT);
  });

  it('carries display names and descriptions', () => {
    const registry = createAnalysisRegistry(executors);
    const network = registry.resolve('network');
    expect(network.name).toBe('Network Visualizations');
    expect(network.description).toBe('Network graph visualizations with consistent scaling');
  });
});
