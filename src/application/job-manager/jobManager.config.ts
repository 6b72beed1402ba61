export type JobManagerConfig = {
  concurrency: number;
  completedHistory: number;
  sessionId?: number;
};

export type JobManagerConfigInput = Partial<JobManagerConfig>;

export const defaultJobManagerConfig: JobManagerConfig = {
  concurrency: 4,
  completedHistory: 1000
};

export const jobManagerCaps = {
  concurrency: { min: 1, max: 64 },
  completedHistory: { min: 0, max: 100000 },
  sessionId: { min: 0, max: Number.MAX_SAFE_INTEGER }
} as const;

const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${min}..${max}]`);
  }
};

export const validateJobManagerConfig = (config: JobManagerConfig): JobManagerConfig => {
  assertIntegerInRange(
    "concurrency",
    config.concurrency,
    jobManagerCaps.concurrency.min,
    jobManagerCaps.concurrency.max
  );
  assertIntegerInRange(
    "completedHistory",
    config.completedHistory,
    jobManagerCaps.completedHistory.min,
    jobManagerCaps.completedHistory.max
  );
  if (config.sessionId !== undefined) {
    assertIntegerInRange("sessionId", config.sessionId, jobManagerCaps.sessionId.min, jobManagerCaps.sessionId.max);
  }
  return config;
};

export const resolveJobManagerConfig = (input: JobManagerConfigInput = {}): JobManagerConfig => {
  const config: JobManagerConfig = {
    concurrency: input.concurrency ?? defaultJobManagerConfig.concurrency,
    completedHistory: input.completedHistory ?? defaultJobManagerConfig.completedHistory
  };
  if (input.sessionId !== undefined) config.sessionId = input.sessionId;
  return validateJobManagerConfig(config);
};
