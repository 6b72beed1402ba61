import {
  defaultJobManagerConfig,
  jobManagerCaps,
  type JobManagerConfig,
  validateJobManagerConfig
} from "../../application/job-manager/jobManager.config";

export type RuntimeConfig = {
  jobManagerConfig: JobManagerConfig;
};

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const jobManagerConfig: JobManagerConfig = {
    concurrency:
      parseOptionalIntInRange(env, "JOBQUEUE_CONCURRENCY", jobManagerCaps.concurrency) ??
      defaultJobManagerConfig.concurrency,
    completedHistory:
      parseOptionalIntInRange(env, "JOBQUEUE_COMPLETED_HISTORY", jobManagerCaps.completedHistory) ??
      defaultJobManagerConfig.completedHistory
  };

  const sessionId = parseOptionalIntInRange(env, "JOBQUEUE_SESSION_ID", jobManagerCaps.sessionId);
  if (sessionId !== undefined) jobManagerConfig.sessionId = sessionId;

  return { jobManagerConfig: validateJobManagerConfig(jobManagerConfig) };
};
