import { JobType } from '../types/batch';
import { InvalidConfigurationError, UnknownJobTypeError } from '../utils/errors';

/**
 * Read-only lookup of job types by id, in registration order.
 */
export class JobRegistry {
  private readonly jobTypes: ReadonlyMap<string, JobType>;

  constructor(jobTypes: readonly JobType[]) {
    const byId = new Map<string, JobType>();
    for (const jobType of jobTypes) {
      if (byId.has(jobType.id)) {
        throw new InvalidConfigurationError(`Job type "${jobType.id}" is registered more than once`);
      }
      byId.set(jobType.id, Object.freeze({ ...jobType, outputLayout: Object.freeze([...jobType.outputLayout]) }));
    }
    this.jobTypes = byId;
  }

  resolve(id: string): JobType {
    const jobType = this.jobTypes.get(id);
    if (!jobType) {
      throw new UnknownJobTypeError(id, this.allIds());
    }
    return jobType;
  }

  has(id: string): boolean {
    return this.jobTypes.has(id);
  }

  /**
   * Every registered id, for "run everything" selection
   */
  allIds(): string[] {
    return Array.from(this.jobTypes.keys());
  }

  list(): JobType[] {
    return Array.from(this.jobTypes.values());
  }
}
