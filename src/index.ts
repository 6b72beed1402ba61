export { RunResult, describeRunResult, isRetryableRunResult, isTerminalRunResult } from "./core/jobs/RunResult";
export { CANCEL, RETRY, createExponentialBackoff, type RetryConstraint } from "./core/jobs/RetryConstraint";
export { BaseJob, DEFAULT_RETRY_LIMIT, type BaseJobParams, type Job, type JobRuntimeContext } from "./core/jobs/Job";
export {
  JobRecord,
  JobRecordStateError,
  NOT_DELAYED_JOB_DELAY,
  NOT_RUNNING_SESSION_ID,
  type JobRecordSnapshot
} from "./core/jobs/JobRecord";
export { JobRecordBuilder, JobRecordValidationError } from "./core/jobs/JobRecordBuilder";
export {
  JobRecordOrderingError,
  compareJobRecords,
  compareJobRecordsLenient,
  hashJobId
} from "./core/jobs/jobRecord.ordering";
export type { JobRecordQueue, PollOptions } from "./ports/JobRecordQueue";
export type { JobRecordRepository } from "./ports/JobRecordRepository";
export { alwaysOnlineNetworkMonitor, type NetworkMonitor } from "./ports/NetworkMonitor";
export { InMemoryJobRecordQueue } from "./infrastructure/memory/InMemoryJobRecordQueue";
export { MongoJobRecordRepository } from "./infrastructure/mongo/MongoJobRecordRepository";
export { JobManager, type CancelResult, type JobRunReport, type JobStatus } from "./application/job-manager/JobManager";
export { JobRegistry, UnknownJobTypeError, type JobFactory } from "./application/job-manager/JobRegistry";
export { JobManagerError, type RunSummary } from "./application/job-manager/runOutcome.handler";
export { startJobQueue, type JobQueueRuntime } from "./composition/root";
