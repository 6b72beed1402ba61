import { randomUUID } from "crypto";
import type { NetworkMonitor } from "../../ports/NetworkMonitor";
import type { JobRecord } from "./JobRecord";
import { RETRY, type RetryConstraint } from "./RetryConstraint";
import { RunResult } from "./RunResult";

/**
 * Host handles injected into a job once, before its first run.
 */
export type JobRuntimeContext = {
  sessionId: number;
  network: NetworkMonitor;
};

/**
 * Contract between a job record and the unit of work it wraps.
 * `safeRun` must never reject: failures are reported as a RunResult.
 */
export interface Job {
  readonly type: string;
  getId(): string;
  getGroupId(): string | undefined;
  getDelayMs(): number;
  requiresNetwork(): boolean;
  getTags(): ReadonlySet<string> | null;
  safeRun(record: JobRecord, runCount: number): Promise<RunResult>;
  getPriority(): number;
  setPriority(priority: number): void;
  isCancelled(): boolean;
  markCancelled(): void;
  onAdded(): void;
  onCancel(): void;
  getRetryConstraint(): RetryConstraint | null;
  setRuntimeContext(context: JobRuntimeContext): void;
  serialize(): Record<string, unknown>;
}

export type BaseJobParams = {
  id?: string;
  priority?: number;
  requiresNetwork?: boolean;
  groupId?: string;
  tags?: Iterable<string>;
  retryLimit?: number;
  delayMs?: number;
};

export const DEFAULT_RETRY_LIMIT = 20;

const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};

/**
 * Base class for jobs. Subclasses implement `onRun` and may override the hooks.
 */
export abstract class BaseJob implements Job {
  abstract readonly type: string;

  private readonly id: string;
  private priority: number;
  private cancelled = false;
  private readonly networkRequired: boolean;
  private readonly groupId?: string;
  private readonly tags: Set<string> | null;
  private readonly delayMs: number;
  private retryConstraint: RetryConstraint | null = null;
  private runtimeContext?: JobRuntimeContext;
  readonly retryLimit: number;

  protected constructor(params: BaseJobParams = {}) {
    this.id = params.id ?? randomUUID();
    this.priority = params.priority ?? 0;
    this.networkRequired = params.requiresNetwork ?? false;
    this.groupId = params.groupId;
    this.tags = params.tags ? new Set(params.tags) : null;
    this.retryLimit = params.retryLimit ?? DEFAULT_RETRY_LIMIT;
    this.delayMs = params.delayMs ?? 0;
  }

  protected abstract onRun(): Promise<void>;

  /** Called once the job has been accepted by the manager, before it is queued. */
  onAdded(): void {}

  onCancel(): void {}

  /**
   * Decides what happens after a failed run that still has retries left.
   */
  protected shouldReRun(_error: unknown, _runCount: number, _retryLimit: number): RetryConstraint {
    return RETRY;
  }

  /**
   * Checked after `onRun` resolves. Returning false sends the job back to the queue.
   */
  protected isComplete(_runCount: number): boolean {
    return true;
  }

  async safeRun(record: JobRecord, runCount: number): Promise<RunResult> {
    this.retryConstraint = null;
    try {
      await this.onRun();
      return this.isComplete(runCount) ? RunResult.SUCCESS : RunResult.FAIL_SHOULD_RE_RUN;
    } catch (err) {
      // eslint-disable-next-line no-console
      console.warn(
        JSON.stringify({
          event: "job.run_failed",
          id: record.getId(),
          type: this.type,
          runCount,
          retryLimit: this.retryLimit,
          reason: toErrorMessage(err)
        })
      );
      return this.resolveFailure(err, runCount);
    }
  }

  private resolveFailure(err: unknown, runCount: number): RunResult {
    if (this.cancelled) return RunResult.FAIL_FOR_CANCEL;
    if (runCount >= this.retryLimit) return RunResult.FAIL_RUN_LIMIT;

    try {
      this.retryConstraint = this.shouldReRun(err, runCount, this.retryLimit);
    } catch (hookError) {
      // eslint-disable-next-line no-console
      console.error(
        JSON.stringify({ event: "job.should_re_run_failed", id: this.id, reason: toErrorMessage(hookError) })
      );
      return RunResult.FAIL_RUN_LIMIT;
    }
    return this.retryConstraint.shouldRetry ? RunResult.TRY_AGAIN : RunResult.FAIL_RUN_LIMIT;
  }

  getId(): string {
    return this.id;
  }

  getGroupId(): string | undefined {
    return this.groupId;
  }

  getDelayMs(): number {
    return this.delayMs;
  }

  requiresNetwork(): boolean {
    return this.networkRequired;
  }

  getTags(): ReadonlySet<string> | null {
    return this.tags;
  }

  getPriority(): number {
    return this.priority;
  }

  setPriority(priority: number): void {
    this.priority = priority;
  }

  isCancelled(): boolean {
    return this.cancelled;
  }

  markCancelled(): void {
    this.cancelled = true;
  }

  getRetryConstraint(): RetryConstraint | null {
    return this.retryConstraint;
  }

  setRuntimeContext(context: JobRuntimeContext): void {
    if (this.runtimeContext) {
      throw new Error(`Runtime context already set for job ${this.id}`);
    }
    this.runtimeContext = context;
  }

  protected getRuntimeContext(): JobRuntimeContext {
    if (!this.runtimeContext) {
      throw new Error(`Runtime context not set for job ${this.id}`);
    }
    return this.runtimeContext;
  }

  serialize(): Record<string, unknown> {
    return {};
  }
}
