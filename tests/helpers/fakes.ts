import type { JobRecordSnapshot } from "../../src/core/jobs/JobRecord";
import type { JobRecordRepository } from "../../src/ports/JobRecordRepository";
import type { NetworkMonitor } from "../../src/ports/NetworkMonitor";
import type { Clock } from "../../src/shared/clock/clock";

export class InMemoryJobRecordRepository implements JobRecordRepository {
  readonly docs = new Map<string, JobRecordSnapshot>();
  readonly operations: string[] = [];
  failNextWith?: Error;
  private readonly holds = new Map<string, Promise<void>>();

  /** Makes the next `operation` on `id` wait for `until` before it runs. */
  hold(operation: "save" | "remove", id: string, until: Promise<void>): void {
    this.holds.set(`${operation}:${id}`, until);
  }

  async save(snapshot: JobRecordSnapshot): Promise<void> {
    await this.release(`save:${snapshot.id}`);
    this.throwIfFailing();
    this.operations.push(`save:${snapshot.id}`);
    this.docs.set(snapshot.id, { ...snapshot, tags: [...snapshot.tags], payload: { ...snapshot.payload } });
  }

  async remove(id: string): Promise<void> {
    await this.release(`remove:${id}`);
    this.throwIfFailing();
    this.operations.push(`remove:${id}`);
    this.docs.delete(id);
  }

  async findRecoverable(currentSessionId: number): Promise<JobRecordSnapshot[]> {
    this.throwIfFailing();
    return Array.from(this.docs.values()).filter((doc) => doc.runningSessionId !== currentSessionId);
  }

  private async release(key: string): Promise<void> {
    const until = this.holds.get(key);
    if (!until) return;
    this.holds.delete(key);
    await until;
  }

  private throwIfFailing(): void {
    const err = this.failNextWith;
    if (err) {
      this.failNextWith = undefined;
      throw err;
    }
  }
}

export class FakeClock implements Clock {
  constructor(private now: bigint = 1_000_000_000n) {}

  nowNs(): bigint {
    return this.now;
  }

  advanceMs(ms: number): void {
    this.now += BigInt(ms) * 1_000_000n;
  }
}

export class ToggleNetworkMonitor implements NetworkMonitor {
  constructor(public connected = true) {}

  isConnected(): boolean {
    return this.connected;
  }
}

/** Silences the JSON log lines and returns the spies for assertions. */
export const muteLogs = () => ({
  log: jest.spyOn(console, "log").mockImplementation(() => undefined),
  warn: jest.spyOn(console, "warn").mockImplementation(() => undefined),
  error: jest.spyOn(console, "error").mockImplementation(() => undefined)
});

export const parseLogEvents = (spy: jest.SpyInstance): Array<Record<string, unknown>> =>
  spy.mock.calls.map((call: unknown[]) => JSON.parse(String(call[0])));
