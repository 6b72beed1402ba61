import { loadRuntimeConfigFromEnv } from "../../src/shared/config/runtime.config";

describe("runtime config caps", () => {
  it("uses defaults when nothing is set", () => {
    expect(loadRuntimeConfigFromEnv({})).toEqual({
      jobManagerConfig: { concurrency: 4, completedHistory: 1000 }
    });
  });

  it("accepts boundary values within allowed caps", () => {
    const runtime = loadRuntimeConfigFromEnv({
      JOBQUEUE_CONCURRENCY: "64",
      JOBQUEUE_COMPLETED_HISTORY: "0",
      JOBQUEUE_SESSION_ID: "1700000000000"
    });

    expect(runtime).toEqual({
      jobManagerConfig: {
        concurrency: 64,
        completedHistory: 0,
        sessionId: 1700000000000
      }
    });
  });

  it("ignores blank values", () => {
    const runtime = loadRuntimeConfigFromEnv({ JOBQUEUE_CONCURRENCY: "  ", JOBQUEUE_SESSION_ID: "" });
    expect(runtime.jobManagerConfig).toEqual({ concurrency: 4, completedHistory: 1000 });
  });

  it.each([
    {
      env: { JOBQUEUE_CONCURRENCY: "65" },
      message: "JOBQUEUE_CONCURRENCY=65 is out of allowed range [1..64]"
    },
    {
      env: { JOBQUEUE_CONCURRENCY: "two" },
      message: "JOBQUEUE_CONCURRENCY=two is out of allowed range [1..64]"
    },
    {
      env: { JOBQUEUE_COMPLETED_HISTORY: "-1" },
      message: "JOBQUEUE_COMPLETED_HISTORY=-1 is out of allowed range [0..100000]"
    },
    {
      env: { JOBQUEUE_SESSION_ID: "1.5" },
      message: `JOBQUEUE_SESSION_ID=1.5 is out of allowed range [0..${Number.MAX_SAFE_INTEGER}]`
    }
  ])("rejects out-of-range config: $message", ({ env, message }) => {
    expect(() => loadRuntimeConfigFromEnv(env)).toThrow(message);
  });
});
