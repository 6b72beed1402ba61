/**
 * Signals returned by a job record's execution entry point.
 * SUCCESS, FAIL_RUN_LIMIT and FAIL_FOR_CANCEL are terminal; the other two ask the manager to requeue.
 */
export const RunResult = {
  /** onRun completed without an error. */
  SUCCESS: 1,
  /** onRun failed and the job either declined a retry or exhausted its retry limit. */
  FAIL_RUN_LIMIT: 2,
  /** onRun failed after the job had been cancelled. */
  FAIL_FOR_CANCEL: 3,
  /** onRun failed with a recoverable error and wants another attempt. */
  TRY_AGAIN: 4,
  /** onRun returned but the job's completion check vetoed it. */
  FAIL_SHOULD_RE_RUN: 5
} as const;

export type RunResult = (typeof RunResult)[keyof typeof RunResult];

const labels: Record<RunResult, string> = {
  [RunResult.SUCCESS]: "success",
  [RunResult.FAIL_RUN_LIMIT]: "fail_run_limit",
  [RunResult.FAIL_FOR_CANCEL]: "fail_for_cancel",
  [RunResult.TRY_AGAIN]: "try_again",
  [RunResult.FAIL_SHOULD_RE_RUN]: "fail_should_re_run"
};

export const isRetryableRunResult = (result: RunResult): boolean =>
  result === RunResult.TRY_AGAIN || result === RunResult.FAIL_SHOULD_RE_RUN;

export const isTerminalRunResult = (result: RunResult): boolean => !isRetryableRunResult(result);

export const describeRunResult = (result: RunResult): string => labels[result];
