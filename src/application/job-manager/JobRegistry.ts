import type { Job } from "../../core/jobs/Job";

export type JobFactory = (args: { id: string; payload: Record<string, unknown> }) => Job;

export class UnknownJobTypeError extends Error {
  readonly jobType: string;

  constructor(jobType: string) {
    super(`No job factory registered for type "${jobType}"`);
    this.name = "UnknownJobTypeError";
    this.jobType = jobType;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Rebuilds jobs from persisted snapshots, keyed by `Job.type`.
 */
export class JobRegistry {
  private readonly factories = new Map<string, JobFactory>();

  register(type: string, factory: JobFactory): this {
    if (this.factories.has(type)) {
      throw new Error(`Job type already registered: ${type}`);
    }
    this.factories.set(type, factory);
    return this;
  }

  has(type: string): boolean {
    return this.factories.has(type);
  }

  create(type: string, args: { id: string; payload: Record<string, unknown> }): Job {
    const factory = this.factories.get(type);
    if (!factory) {
      throw new UnknownJobTypeError(type);
    }
    return factory(args);
  }
}
