import { JobManager } from "../../src/application/job-manager/JobManager";
import { JobRegistry } from "../../src/application/job-manager/JobRegistry";
import { createExponentialBackoff } from "../../src/core/jobs/RetryConstraint";
import { InMemoryJobRecordQueue } from "../../src/infrastructure/memory/InMemoryJobRecordQueue";
import { createDeferred, flushAsync, TestJob } from "../helpers/jobs";
import { InMemoryJobRecordRepository, muteLogs, parseLogEvents } from "../helpers/fakes";

describe("job manager (in-process e2e)", () => {
  let logs: ReturnType<typeof muteLogs>;

  beforeEach(() => {
    logs = muteLogs();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("a new session picks up work a crashed session left behind", async () => {
    const repository = new InMemoryJobRecordRepository();
    const ran: string[] = [];
    const registry = new JobRegistry().register(
      "test",
      ({ id, payload }) =>
        new TestJob({
          id,
          label: typeof payload.label === "string" ? payload.label : "",
          script: () => void ran.push(id)
        })
    );

    const crashed = new JobManager({
      queue: new InMemoryJobRecordQueue(),
      repository,
      registry,
      config: { sessionId: 1, concurrency: 1 }
    });
    const hang = createDeferred();
    await crashed.addJob(new TestJob({ id: "stuck", priority: 5, label: "s", script: () => hang.promise }));
    await crashed.addJob(new TestJob({ id: "pending", label: "p" }));
    const abandoned = crashed.runNext();
    await flushAsync();

    expect(repository.docs.get("stuck")).toEqual(expect.objectContaining({ runningSessionId: 1, runCount: 1 }));

    const restarted = new JobManager({
      queue: new InMemoryJobRecordQueue(),
      repository,
      registry,
      config: { sessionId: 2, concurrency: 1 }
    });
    await expect(restarted.recover()).resolves.toBe(2);

    const summary = await restarted.drain();

    expect(ran).toEqual(["stuck", "pending"]);
    expect(summary).toEqual(expect.objectContaining({ runs: 2, succeeded: 2, failed: 0 }));
    expect(repository.docs.size).toBe(0);
    expect(restarted.isSuccessful("stuck")).toBe(true);
    expect(parseLogEvents(logs.log)).toContainEqual({
      event: "jobqueue.recovered",
      sessionId: 2,
      recovered: 2,
      abandonedInFlight: 1,
      skipped: 0
    });

    hang.resolve();
    await abandoned;
  });

  it("waits out backoff delays until a flaky job succeeds", async () => {
    const manager = new JobManager({
      queue: new InMemoryJobRecordQueue(),
      repository: new InMemoryJobRecordRepository(),
      config: { sessionId: 3 }
    });
    const job = new TestJob({
      id: "flaky",
      script: (run) => {
        if (run < 3) throw new Error(`attempt ${run} failed`);
      },
      onShouldReRun: (_error, runCount) => createExponentialBackoff(runCount, 5)
    });
    await manager.addJob(job);

    const summary = await manager.drain({ waitForDelayed: true });

    expect(job.runs).toBe(3);
    expect(summary).toEqual({
      runs: 3,
      succeeded: 1,
      failed: 0,
      cancelled: 0,
      retried: 2,
      byResult: { try_again: 2, success: 1 }
    });
    const delays = parseLogEvents(logs.log)
      .filter((event) => event.event === "job.retry_scheduled")
      .map((event) => event.delayMs);
    expect(delays).toEqual([5, 10]);
  });

  it("gives up on a job that keeps failing and forgets its document", async () => {
    const repository = new InMemoryJobRecordRepository();
    const manager = new JobManager({ queue: new InMemoryJobRecordQueue(), repository, config: { sessionId: 4 } });
    const job = new TestJob({ id: "broken", retryLimit: 3, script: () => Promise.reject(new Error("always")) });
    await manager.addJob(job);

    const summary = await manager.drain();

    expect(job.runs).toBe(3);
    expect(summary.failed).toBe(1);
    expect(manager.isSuccessful("broken")).toBe(false);
    expect(repository.docs.has("broken")).toBe(false);
  });
});
