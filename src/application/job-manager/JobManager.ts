import type { Job, JobRuntimeContext } from "../../core/jobs/Job";
import {
  JobRecord,
  type JobRecordSnapshot,
  NOT_DELAYED_JOB_DELAY,
  NOT_RUNNING_SESSION_ID
} from "../../core/jobs/JobRecord";
import { JobRecordBuilder } from "../../core/jobs/JobRecordBuilder";
import { describeRunResult, RunResult } from "../../core/jobs/RunResult";
import type { JobRecordQueue, PollOptions } from "../../ports/JobRecordQueue";
import type { JobRecordRepository } from "../../ports/JobRecordRepository";
import { alwaysOnlineNetworkMonitor, type NetworkMonitor } from "../../ports/NetworkMonitor";
import { msToNs, nsToMs, systemClock, type Clock } from "../../shared/clock/clock";
import { createLimiter, type Limiter } from "../../shared/concurrency/limiter";
import type { JobManagerConfig, JobManagerConfigInput } from "./jobManager.config";
import { resolveJobManagerConfig } from "./jobManager.config";
import type { JobRegistry } from "./JobRegistry";
import {
  createRunSummaryTracker,
  interpretRunResult,
  JobManagerError,
  type RunOutcomeDecision,
  type RunSummary,
  toErrorMessage,
  wrapRepositoryFailure
} from "./runOutcome.handler";

export { NOT_DELAYED_JOB_DELAY, NOT_RUNNING_SESSION_ID };

export type JobStatus = "queued" | "running" | "completed" | "unknown";

export type CancelResult = "cancelled" | "cancelling" | "not_found";

export type JobRunReport = {
  id: string;
  result: RunResult;
  decision: RunOutcomeDecision;
};

export type JobManagerDeps = {
  queue: JobRecordQueue;
  repository?: JobRecordRepository;
  network?: NetworkMonitor;
  registry?: JobRegistry;
  config?: JobManagerConfigInput;
  clock?: Clock;
};

const sleep = (ms: number) => new Promise((r) => setTimeout(r, ms));

/**
 * Owns the queue, runs records under a concurrency limit and applies the run-outcome table.
 */
export class JobManager {
  readonly sessionId: number;
  private readonly config: JobManagerConfig;
  private readonly queue: JobRecordQueue;
  private readonly repository?: JobRecordRepository;
  private readonly network: NetworkMonitor;
  private readonly registry?: JobRegistry;
  private readonly clock: Clock;
  private readonly limit: Limiter;
  private readonly running = new Map<string, JobRecord>();
  private readonly completed = new Map<string, boolean>();
  // ids whose first save is still in flight
  private readonly adding = new Set<string>();
  private readonly addedJobs = new WeakSet<Job>();
  private readonly summaryTracker = createRunSummaryTracker();

  constructor(deps: JobManagerDeps) {
    this.config = resolveJobManagerConfig(deps.config);
    this.sessionId = this.config.sessionId ?? Date.now();
    this.queue = deps.queue;
    this.repository = deps.repository;
    this.network = deps.network ?? alwaysOnlineNetworkMonitor;
    this.registry = deps.registry;
    this.clock = deps.clock ?? systemClock;
    this.limit = createLimiter(this.config.concurrency);
  }

  /**
   * Persists the record before queueing it, so a failed save never leaves a runnable record behind.
   * A job instance can be added once; re-running an id needs a new instance.
   */
  async addJob(job: Job): Promise<string> {
    const id = job.getId();
    if (this.addedJobs.has(job)) {
      throw new JobManagerError({
        code: "job_already_added",
        message: `Job ${id} was already added; create a new instance to run it again`,
        context: { jobId: id, operation: "add" }
      });
    }
    if (this.queue.findById(id) || this.running.has(id) || this.adding.has(id)) {
      throw new JobManagerError({
        code: "duplicate_job_id",
        message: `Job ${id} is already queued or running`,
        context: { jobId: id, operation: "add" }
      });
    }

    const nowNs = this.clock.nowNs();
    const delayMs = job.getDelayMs();
    const record = new JobRecordBuilder()
      .withJob(job)
      .priority(job.getPriority())
      .groupId(job.getGroupId())
      .createdNs(nowNs)
      .delayUntilNs(delayMs > 0 ? nowNs + msToNs(delayMs) : NOT_DELAYED_JOB_DELAY)
      .runningSessionId(NOT_RUNNING_SESSION_ID)
      .build();

    this.adding.add(id);
    try {
      await this.persist(record, "save");
    } finally {
      this.adding.delete(id);
    }

    this.addedJobs.add(job);
    record.setRuntimeContext(this.runtimeContext());
    job.onAdded();
    this.queue.insert(record);
    this.completed.delete(id);

    console.log(
      JSON.stringify({
        event: "job.added",
        id,
        type: job.type,
        priority: record.getPriority(),
        groupId: record.getGroupId() ?? null,
        insertionOrder: record.getInsertionOrder(),
        delayMs
      })
    );
    return id;
  }

  /**
   * Runs the next eligible record, or resolves with null when none can run now.
   */
  async runNext(): Promise<JobRunReport | null> {
    const record = this.pollEligible();
    if (!record) return null;
    return this.execute(record);
  }

  /**
   * Keeps up to `concurrency` records running until nothing eligible is left.
   * With `waitForDelayed`, sleeps until delayed records become eligible instead of stopping.
   */
  async drain(options: { waitForDelayed?: boolean } = {}): Promise<RunSummary> {
    const inFlight = new Set<Promise<void>>();
    const failures: unknown[] = [];

    while (true) {
      // stop claiming once a run failed; the failed record is back in the queue
      while (failures.length === 0 && this.limit.activeCount() + this.limit.pendingCount() < this.config.concurrency) {
        const record = this.pollEligible();
        if (!record) break;
        const task: Promise<void> = this.execute(record)
          .then(
            () => undefined,
            (err: unknown) => {
              failures.push(err);
            }
          )
          .finally(() => {
            inFlight.delete(task);
          });
        inFlight.add(task);
      }

      if (inFlight.size > 0) {
        await Promise.race(inFlight);
        continue;
      }
      if (failures.length > 0 || !options.waitForDelayed) break;

      const nowNs = this.clock.nowNs();
      const nextDelayUntilNs = this.queue.nextDelayUntilNs(nowNs, this.pollOptions());
      if (nextDelayUntilNs === null) break;
      await sleep(nsToMs(nextDelayUntilNs - nowNs));
    }

    if (failures.length > 0) {
      throw failures[0];
    }

    const summary = this.summaryTracker.summary();
    console.log(
      JSON.stringify({ event: "jobqueue.drained", sessionId: this.sessionId, remaining: this.queue.size(), ...summary })
    );
    return summary;
  }

  /**
   * Queued records are cancelled right away. Running ones are flagged and settle when their run returns.
   */
  async cancel(id: string): Promise<CancelResult> {
    const queued = this.queue.remove(id);
    if (queued) {
      await this.finishQueuedCancel(queued);
      return "cancelled";
    }

    const running = this.running.get(id);
    if (running) {
      running.markAsCancelled();
      console.log(JSON.stringify({ event: "job.cancel_requested", id }));
      return "cancelling";
    }

    return "not_found";
  }

  async cancelByTag(tag: string): Promise<{ cancelled: string[]; cancelling: string[] }> {
    const cancelled: string[] = [];
    for (const id of this.queue.findByTag(tag).map((record) => record.getId())) {
      // may have been claimed by a run while an earlier removal was awaited
      const queued = this.queue.remove(id);
      if (!queued) continue;
      await this.finishQueuedCancel(queued);
      cancelled.push(id);
    }

    const cancelling: string[] = [];
    for (const record of this.running.values()) {
      if (!record.getTags()?.has(tag)) continue;
      record.markAsCancelled();
      cancelling.push(record.getId());
    }

    console.log(JSON.stringify({ event: "job.cancel_by_tag", tag, cancelled, cancelling }));
    return { cancelled, cancelling };
  }

  /**
   * Re-queues persisted records this session does not own: work left in flight by a crashed
   * session and records that were still waiting when the previous session stopped.
   */
  async recover(): Promise<number> {
    const repository = this.repository;
    if (!repository) return 0;

    const registry = this.registry;
    if (!registry) {
      throw new JobManagerError({
        code: "registry_missing",
        message: "A JobRegistry is required to recover persisted records",
        context: { operation: "recover" }
      });
    }

    let snapshots: JobRecordSnapshot[];
    try {
      snapshots = await repository.findRecoverable(this.sessionId);
    } catch (err) {
      throw wrapRepositoryFailure(err, { jobId: "*", operation: "findRecoverable" });
    }

    let recovered = 0;
    let abandonedInFlight = 0;
    let skipped = 0;
    for (const snapshot of snapshots) {
      const known = this.queue.findById(snapshot.id) || this.running.has(snapshot.id) || this.adding.has(snapshot.id);
      if (known) continue;

      let job: Job;
      try {
        job = registry.create(snapshot.type, { id: snapshot.id, payload: snapshot.payload });
      } catch (err) {
        skipped += 1;
        console.warn(
          JSON.stringify({
            event: "jobqueue.recover_skipped",
            sessionId: this.sessionId,
            id: snapshot.id,
            type: snapshot.type,
            reason: toErrorMessage(err)
          })
        );
        continue;
      }
      if (snapshot.runningSessionId !== NOT_RUNNING_SESSION_ID) abandonedInFlight += 1;
      this.addedJobs.add(job);

      const builder = new JobRecordBuilder()
        .withJob(job)
        .priority(snapshot.priority)
        .groupId(snapshot.groupId ?? undefined)
        .runCount(snapshot.runCount)
        .createdNs(snapshot.createdNs)
        .delayUntilNs(snapshot.delayUntilNs)
        .runningSessionId(NOT_RUNNING_SESSION_ID);
      if (snapshot.insertionOrder !== null) {
        builder.insertionOrder(snapshot.insertionOrder);
      }
      const record = builder.build();
      record.setRuntimeContext(this.runtimeContext());

      this.queue.insert(record);
      await this.persist(record, "save");
      recovered += 1;
    }

    console.log(
      JSON.stringify({
        event: "jobqueue.recovered",
        sessionId: this.sessionId,
        recovered,
        abandonedInFlight,
        skipped
      })
    );
    return recovered;
  }

  getStatus(id: string): JobStatus {
    if (this.running.has(id)) return "running";
    if (this.queue.findById(id)) return "queued";
    if (this.completed.has(id)) return "completed";
    return "unknown";
  }

  /** `null` when the id is neither known nor in the completion history. */
  isSuccessful(id: string): boolean | null {
    const live = this.running.get(id) ?? this.queue.findById(id);
    if (live) return live.isSuccessful();
    return this.completed.get(id) ?? null;
  }

  getRunningCount(): number {
    return this.running.size;
  }

  getQueuedCount(): number {
    return this.queue.size();
  }

  getSummary(): RunSummary {
    return this.summaryTracker.summary();
  }

  private runtimeContext(): JobRuntimeContext {
    return { sessionId: this.sessionId, network: this.network };
  }

  private pollOptions(): PollOptions {
    const excludeGroups = new Set<string>();
    for (const record of this.running.values()) {
      const groupId = record.getGroupId();
      if (groupId != null) excludeGroups.add(groupId);
    }
    return { networkAvailable: this.network.isConnected(), excludeGroups };
  }

  private pollEligible(): JobRecord | null {
    return this.queue.pollNext(this.clock.nowNs(), this.pollOptions());
  }

  private execute(record: JobRecord): Promise<JobRunReport> {
    const id = record.getId();
    this.running.set(id, record);
    return this.limit(() => this.runClaimed(record)).finally(() => {
      if (this.running.get(id) === record) this.running.delete(id);
    });
  }

  private async runClaimed(record: JobRecord): Promise<JobRunReport> {
    const id = record.getId();
    const previousRunCount = record.getRunCount();
    record.setRunningSessionId(this.sessionId);
    record.setRunCount(previousRunCount + 1);

    try {
      await this.persist(record, "save");
    } catch (err) {
      record.setRunningSessionId(NOT_RUNNING_SESSION_ID);
      record.setRunCount(previousRunCount);
      this.running.delete(id);
      this.queue.insert(record);
      throw err;
    }

    // cancelled while waiting for a free slot
    const result = record.isCancelled() ? RunResult.FAIL_FOR_CANCEL : await record.safeRun(record.getRunCount());
    this.summaryTracker.addRun(result);

    const decision = interpretRunResult({
      result,
      cancelRequested: record.isCancelled(),
      constraint: record.getRetryConstraint()
    });
    this.summaryTracker.addDecision(decision);
    await this.applyDecision(record, result, decision);
    return { id, result, decision };
  }

  private async applyDecision(record: JobRecord, result: RunResult, decision: RunOutcomeDecision): Promise<void> {
    const id = record.getId();
    const base = { id, runCount: record.getRunCount(), result: describeRunResult(result) };

    switch (decision.action) {
      case "complete":
        record.markAsSuccessful();
        this.remember(id, true);
        await this.persist(record, "remove");
        console.log(JSON.stringify({ event: "job.completed", ...base }));
        return;
      case "fail":
        this.remember(id, false);
        await this.persist(record, "remove");
        console.warn(JSON.stringify({ event: "job.failed", ...base, reason: decision.reason }));
        return;
      case "cancel":
        record.markAsCancelled();
        record.onCancel();
        this.remember(id, false);
        await this.persist(record, "remove");
        console.log(JSON.stringify({ event: "job.cancelled", ...base, whileRunning: true }));
        return;
      case "requeue": {
        const next = this.rebuildForRetry(record, decision);
        this.running.delete(id);
        this.queue.insert(next);
        await this.persist(next, "save");
        console.log(
          JSON.stringify({
            event: "job.retry_scheduled",
            ...base,
            delayMs: decision.delayMs,
            priority: next.getPriority(),
            groupId: next.getGroupId() ?? null,
            insertionOrder: next.getInsertionOrder()
          })
        );
        return;
      }
    }
  }

  private rebuildForRetry(
    record: JobRecord,
    decision: Extract<RunOutcomeDecision, { action: "requeue" }>
  ): JobRecord {
    const nowNs = this.clock.nowNs();
    const groupId = decision.newGroupId === undefined ? record.getGroupId() : decision.newGroupId ?? undefined;
    return new JobRecordBuilder()
      .withJob(record.getJob())
      .priority(decision.newPriority ?? record.getPriority())
      .groupId(groupId)
      .runCount(record.getRunCount())
      .createdNs(record.getCreatedNs())
      .delayUntilNs(decision.delayMs > 0 ? nowNs + msToNs(decision.delayMs) : NOT_DELAYED_JOB_DELAY)
      .runningSessionId(NOT_RUNNING_SESSION_ID)
      .build();
  }

  private async finishQueuedCancel(record: JobRecord): Promise<void> {
    const id = record.getId();
    record.markAsCancelled();
    record.onCancel();
    this.summaryTracker.addDecision({ action: "cancel" });
    this.remember(id, false);
    await this.persist(record, "remove");
    console.log(JSON.stringify({ event: "job.cancelled", id, runCount: record.getRunCount(), whileRunning: false }));
  }

  private remember(id: string, successful: boolean): void {
    if (this.config.completedHistory === 0) return;
    this.completed.delete(id);
    this.completed.set(id, successful);
    while (this.completed.size > this.config.completedHistory) {
      const oldest = this.completed.keys().next();
      if (oldest.done) break;
      this.completed.delete(oldest.value);
    }
  }

  private async persist(record: JobRecord, operation: "save" | "remove"): Promise<void> {
    if (!this.repository) return;
    try {
      if (operation === "save") {
        await this.repository.save(record.toSnapshot());
      } else {
        await this.repository.remove(record.getId());
      }
    } catch (err) {
      throw wrapRepositoryFailure(err, { jobId: record.getId(), operation });
    }
  }
}
