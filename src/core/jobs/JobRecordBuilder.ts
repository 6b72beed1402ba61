import type { Job } from "./Job";
import { JobRecord, NOT_DELAYED_JOB_DELAY } from "./JobRecord";

export type JobRecordValidationCode =
  | "missing_job"
  | "missing_priority"
  | "missing_session_id"
  | "missing_created_ns"
  | "invalid_priority"
  | "invalid_run_count";

export class JobRecordValidationError extends Error {
  readonly code: JobRecordValidationCode;

  constructor(code: JobRecordValidationCode, message: string) {
    super(message);
    this.name = "JobRecordValidationError";
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

const FLAG_SESSION_ID = 1;
const FLAG_PRIORITY = 1 << 1;
const FLAG_CREATED_NS = 1 << 2;

/**
 * Builds a JobRecord. `job`, `priority`, `runningSessionId` and `createdNs` must be given
 * explicitly; zero counts as given.
 */
export class JobRecordBuilder {
  private job?: Job;
  private priorityValue = 0;
  private groupIdValue?: string;
  private runCountValue = 0;
  private createdNsValue = 0n;
  private delayUntilNsValue = NOT_DELAYED_JOB_DELAY;
  private insertionOrderValue: number | null = null;
  private runningSessionIdValue = 0;
  private providedFlags = 0;

  withJob(job: Job): this {
    this.job = job;
    return this;
  }

  priority(priority: number): this {
    this.priorityValue = priority;
    this.providedFlags |= FLAG_PRIORITY;
    return this;
  }

  groupId(groupId: string | undefined): this {
    this.groupIdValue = groupId;
    return this;
  }

  runCount(runCount: number): this {
    this.runCountValue = runCount;
    return this;
  }

  createdNs(createdNs: bigint): this {
    this.createdNsValue = createdNs;
    this.providedFlags |= FLAG_CREATED_NS;
    return this;
  }

  delayUntilNs(delayUntilNs: bigint): this {
    this.delayUntilNsValue = delayUntilNs;
    return this;
  }

  insertionOrder(insertionOrder: number): this {
    this.insertionOrderValue = insertionOrder;
    return this;
  }

  runningSessionId(runningSessionId: number): this {
    this.runningSessionIdValue = runningSessionId;
    this.providedFlags |= FLAG_SESSION_ID;
    return this;
  }

  build(): JobRecord {
    const job = this.job;
    if (!job) {
      throw new JobRecordValidationError("missing_job", "must provide a job");
    }
    if ((this.providedFlags & FLAG_PRIORITY) === 0) {
      throw new JobRecordValidationError("missing_priority", "must provide a priority");
    }
    if ((this.providedFlags & FLAG_SESSION_ID) === 0) {
      throw new JobRecordValidationError("missing_session_id", "must provide a session id");
    }
    if ((this.providedFlags & FLAG_CREATED_NS) === 0) {
      throw new JobRecordValidationError("missing_created_ns", "must provide a created timestamp");
    }
    if (!Number.isInteger(this.priorityValue)) {
      throw new JobRecordValidationError(
        "invalid_priority",
        `priority must be an integer. Received: ${String(this.priorityValue)}`
      );
    }
    if (!Number.isInteger(this.runCountValue) || this.runCountValue < 0) {
      throw new JobRecordValidationError(
        "invalid_run_count",
        `runCount must be an integer >= 0. Received: ${String(this.runCountValue)}`
      );
    }

    const record = new JobRecord({
      job,
      priority: this.priorityValue,
      groupId: this.groupIdValue,
      runCount: this.runCountValue,
      createdNs: this.createdNsValue,
      delayUntilNs: this.delayUntilNsValue,
      runningSessionId: this.runningSessionIdValue
    });
    if (this.insertionOrderValue !== null) {
      record.setInsertionOrder(this.insertionOrderValue);
    }
    return record;
  }
}
