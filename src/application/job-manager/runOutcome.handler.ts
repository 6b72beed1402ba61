import type { RetryConstraint } from "../../core/jobs/RetryConstraint";
import { describeRunResult, RunResult } from "../../core/jobs/RunResult";

export type JobManagerErrorCode =
  | "duplicate_job_id"
  | "job_already_added"
  | "repository_failed"
  | "registry_missing";

export type JobManagerErrorContext = {
  jobId?: string;
  operation?: string;
};

export const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};

export class JobManagerError extends Error {
  readonly code: JobManagerErrorCode;
  readonly context: JobManagerErrorContext;
  readonly cause?: unknown;

  constructor(args: { code: JobManagerErrorCode; message: string; context: JobManagerErrorContext; cause?: unknown }) {
    super(args.message);
    this.name = "JobManagerError";
    this.code = args.code;
    this.context = args.context;
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const wrapRepositoryFailure = (reason: unknown, context: Required<JobManagerErrorContext>) => {
  const message = `Repository ${context.operation} failed for job=${context.jobId}: ${toErrorMessage(reason)}`;
  const cause = reason instanceof Error && "cause" in reason ? reason.cause ?? reason : reason;
  return new JobManagerError({ code: "repository_failed", message, context, cause });
};

export type RunOutcomeDecision =
  | { action: "complete" }
  | { action: "fail"; reason: "run_limit" | "retry_declined" }
  | { action: "cancel" }
  | {
      action: "requeue";
      delayMs: number;
      newPriority?: number;
      /** `undefined` keeps the group, `null` clears it. */
      newGroupId?: string | null;
    };

/**
 * Maps what a run reported onto what the manager does with the record next.
 * A cancellation requested while the run was in flight wins over a retry.
 */
export const interpretRunResult = (args: {
  result: RunResult;
  cancelRequested: boolean;
  constraint: RetryConstraint | null;
}): RunOutcomeDecision => {
  const { result, cancelRequested, constraint } = args;

  if (result === RunResult.SUCCESS) return { action: "complete" };
  if (result === RunResult.FAIL_FOR_CANCEL || cancelRequested) return { action: "cancel" };
  if (result === RunResult.FAIL_RUN_LIMIT) return { action: "fail", reason: "run_limit" };

  if (constraint && !constraint.shouldRetry) {
    return { action: "fail", reason: "retry_declined" };
  }

  const decision: RunOutcomeDecision = { action: "requeue", delayMs: 0 };
  if (constraint?.newDelayMs != null && Number.isFinite(constraint.newDelayMs) && constraint.newDelayMs > 0) {
    decision.delayMs = constraint.newDelayMs;
  }
  if (constraint?.newPriority !== undefined) decision.newPriority = constraint.newPriority;
  if (constraint?.newGroupId !== undefined) decision.newGroupId = constraint.newGroupId;
  return decision;
};

export type RunSummary = {
  runs: number;
  succeeded: number;
  failed: number;
  cancelled: number;
  retried: number;
  byResult: Partial<Record<string, number>>;
};

export const createRunSummaryTracker = () => {
  let runs = 0;
  let succeeded = 0;
  let failed = 0;
  let cancelled = 0;
  let retried = 0;
  const byResult: Partial<Record<string, number>> = {};

  return {
    addRun: (result: RunResult) => {
      runs += 1;
      const label = describeRunResult(result);
      byResult[label] = (byResult[label] ?? 0) + 1;
    },
    addDecision: (decision: RunOutcomeDecision) => {
      if (decision.action === "complete") succeeded += 1;
      if (decision.action === "fail") failed += 1;
      if (decision.action === "cancel") cancelled += 1;
      if (decision.action === "requeue") retried += 1;
    },
    summary: (): RunSummary => ({
      runs,
      succeeded,
      failed,
      cancelled,
      retried,
      byResult: { ...byResult }
    })
  };
};
