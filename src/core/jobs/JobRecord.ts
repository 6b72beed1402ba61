import type { Job, JobRuntimeContext } from "./Job";
import { hashJobId } from "./jobRecord.ordering";
import type { RetryConstraint } from "./RetryConstraint";
import type { RunResult } from "./RunResult";

/** `delayUntilNs` value of a record that may run immediately. */
export const NOT_DELAYED_JOB_DELAY = -(2n ** 63n);

/** `runningSessionId` value of a record that is not claimed by any session. */
export const NOT_RUNNING_SESSION_ID = Number.MIN_SAFE_INTEGER;

export type JobRecordStateErrorCode = "insertion_order_already_set" | "invalid_priority" | "invalid_job_id";

export class JobRecordStateError extends Error {
  readonly code: JobRecordStateErrorCode;
  readonly recordId?: string;

  constructor(args: { code: JobRecordStateErrorCode; message: string; recordId?: string }) {
    super(args.message);
    this.name = "JobRecordStateError";
    this.code = args.code;
    this.recordId = args.recordId;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type JobRecordInit = {
  job: Job;
  priority: number;
  groupId?: string;
  runCount: number;
  createdNs: bigint;
  delayUntilNs: bigint;
  runningSessionId: number;
};

/**
 * Plain view of a record, used for persistence and log payloads.
 */
export type JobRecordSnapshot = {
  id: string;
  type: string;
  priority: number;
  groupId: string | null;
  runCount: number;
  createdNs: bigint;
  delayUntilNs: bigint;
  runningSessionId: number;
  insertionOrder: number | null;
  requiresNetwork: boolean;
  tags: string[];
  cancelled: boolean;
  successful: boolean;
  payload: Record<string, unknown>;
};

const FLAG_CANCELLED = 1;
const FLAG_SUCCESSFUL = 1 << 1;
const FLAG_CANCEL_NOTIFIED = 1 << 2;

/**
 * Flag word backed by shared memory so it can be handed to worker threads.
 */
class RecordFlags {
  private readonly word = new Int32Array(new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT));

  /** Sets `flag` and reports whether this call was the one that set it. */
  raise(flag: number): boolean {
    const previous = Atomics.or(this.word, 0, flag);
    return (previous & flag) === 0;
  }

  has(flag: number): boolean {
    return (Atomics.load(this.word, 0) & flag) !== 0;
  }
}

const assertValidJobId = (id: string): string => {
  if (typeof id !== "string" || id.trim() === "") {
    throw new JobRecordStateError({ code: "invalid_job_id", message: "Job id must be a non-empty string" });
  }
  return id;
};

/**
 * Addresses a job inside the job manager: ordering keys, delay and retry state, run flags.
 * Equality and hashing use the id only.
 */
export class JobRecord {
  private id: string;
  private priority: number;
  private groupId?: string;
  private runCount: number;
  private createdNs: bigint;
  private delayUntilNs: bigint;
  private runningSessionId: number;
  private insertionOrder: number | null = null;
  private job: Job;
  private readonly networkRequired: boolean;
  private readonly tags: ReadonlySet<string> | null;
  private readonly flags = new RecordFlags();

  /** @internal Use JobRecordBuilder. */
  constructor(init: JobRecordInit) {
    this.id = assertValidJobId(init.job.getId());
    this.priority = init.priority;
    this.groupId = init.groupId;
    this.runCount = init.runCount;
    this.createdNs = init.createdNs;
    this.delayUntilNs = init.delayUntilNs;
    this.runningSessionId = init.runningSessionId;
    this.job = init.job;
    this.job.setPriority(init.priority);
    this.networkRequired = init.job.requiresNetwork();
    const tags = init.job.getTags();
    this.tags = tags == null ? null : new Set(tags);
  }

  /**
   * Runs the wrapped job. Resolves with whatever RunResult the job reports.
   */
  safeRun(currentRunCount: number): Promise<RunResult> {
    return this.job.safeRun(this, currentRunCount);
  }

  getId(): string {
    return this.id;
  }

  requiresNetwork(): boolean {
    return this.networkRequired;
  }

  getPriority(): number {
    return this.priority;
  }

  setPriority(priority: number): void {
    if (!Number.isInteger(priority)) {
      throw new JobRecordStateError({
        code: "invalid_priority",
        message: `priority must be an integer. Received: ${String(priority)}`,
        recordId: this.id
      });
    }
    this.priority = priority;
    this.job.setPriority(priority);
  }

  getInsertionOrder(): number | null {
    return this.insertionOrder;
  }

  /** Assigned once by the owning queue. */
  setInsertionOrder(insertionOrder: number): void {
    if (this.insertionOrder !== null) {
      throw new JobRecordStateError({
        code: "insertion_order_already_set",
        message: `Insertion order of record ${this.id} is already ${this.insertionOrder}`,
        recordId: this.id
      });
    }
    this.insertionOrder = insertionOrder;
  }

  getDelayUntilNs(): bigint {
    return this.delayUntilNs;
  }

  setDelayUntilNs(delayUntilNs: bigint): void {
    this.delayUntilNs = delayUntilNs;
  }

  isDelayed(nowNs: bigint): boolean {
    return this.delayUntilNs !== NOT_DELAYED_JOB_DELAY && this.delayUntilNs > nowNs;
  }

  getRunCount(): number {
    return this.runCount;
  }

  setRunCount(runCount: number): void {
    this.runCount = runCount;
  }

  getCreatedNs(): bigint {
    return this.createdNs;
  }

  setCreatedNs(createdNs: bigint): void {
    this.createdNs = createdNs;
  }

  getRunningSessionId(): number {
    return this.runningSessionId;
  }

  setRunningSessionId(runningSessionId: number): void {
    this.runningSessionId = runningSessionId;
  }

  getJob(): Job {
    return this.job;
  }

  /** Swaps the wrapped job; only the id is re-derived. The new job takes the record's priority. */
  setJob(job: Job): void {
    this.id = assertValidJobId(job.getId());
    job.setPriority(this.priority);
    this.job = job;
  }

  getGroupId(): string | undefined {
    return this.groupId;
  }

  setGroupId(groupId: string | undefined): void {
    this.groupId = groupId;
  }

  getTags(): ReadonlySet<string> | null {
    return this.tags;
  }

  hasTags(): boolean {
    return this.tags != null && this.tags.size > 0;
  }

  markAsCancelled(): void {
    if (this.flags.raise(FLAG_CANCELLED)) {
      this.job.markCancelled();
    }
  }

  isCancelled(): boolean {
    return this.flags.has(FLAG_CANCELLED);
  }

  /**
   * Forwards the cancellation to the job. Does nothing unless the record was cancelled,
   * and notifies the job at most once. Returns whether this call notified it.
   */
  onCancel(): boolean {
    if (!this.isCancelled()) return false;
    if (!this.flags.raise(FLAG_CANCEL_NOTIFIED)) return false;
    this.job.onCancel();
    return true;
  }

  markAsSuccessful(): void {
    this.flags.raise(FLAG_SUCCESSFUL);
  }

  isSuccessful(): boolean {
    return this.flags.has(FLAG_SUCCESSFUL);
  }

  setRuntimeContext(context: JobRuntimeContext): void {
    this.job.setRuntimeContext(context);
  }

  getRetryConstraint(): RetryConstraint | null {
    return this.job.getRetryConstraint();
  }

  equals(other: unknown): boolean {
    if (!(other instanceof JobRecord)) return false;
    return this.id === other.id;
  }

  hashCode(): number {
    return hashJobId(this.id);
  }

  toSnapshot(): JobRecordSnapshot {
    return {
      id: this.id,
      type: this.job.type,
      priority: this.priority,
      groupId: this.groupId ?? null,
      runCount: this.runCount,
      createdNs: this.createdNs,
      delayUntilNs: this.delayUntilNs,
      runningSessionId: this.runningSessionId,
      insertionOrder: this.insertionOrder,
      requiresNetwork: this.networkRequired,
      tags: this.tags ? Array.from(this.tags) : [],
      cancelled: this.isCancelled(),
      successful: this.isSuccessful(),
      payload: this.job.serialize()
    };
  }
}
