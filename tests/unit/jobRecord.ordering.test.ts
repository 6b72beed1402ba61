import type { JobRecord } from "../../src/core/jobs/JobRecord";
import { JobRecordBuilder } from "../../src/core/jobs/JobRecordBuilder";
import {
  compareJobRecords,
  compareJobRecordsLenient,
  hashJobId,
  JobRecordOrderingError
} from "../../src/core/jobs/jobRecord.ordering";
import { ScriptedJob } from "../helpers/jobs";

const record = (id: string, priority: number, createdNs: bigint, insertionOrder?: number): JobRecord => {
  const builder = new JobRecordBuilder()
    .withJob(new ScriptedJob(id))
    .priority(priority)
    .runningSessionId(1)
    .createdNs(createdNs);
  if (insertionOrder !== undefined) builder.insertionOrder(insertionOrder);
  return builder.build();
};

describe("compareJobRecords", () => {
  it("orders by priority desc, then createdNs asc, then insertion order asc", () => {
    const low = record("low", 3, 10n, 1);
    const lateHigh = record("late-high", 5, 20n, 2);
    const earlyHigh = record("early-high", 5, 10n, 3);
    const tieHigh = record("tie-high", 5, 10n, 4);

    const sorted = [low, tieHigh, lateHigh, earlyHigh].sort(compareJobRecords).map((r) => r.getId());

    expect(sorted).toEqual(["early-high", "tie-high", "late-high", "low"]);
  });

  it("uses insertion order only when priority and createdNs tie", () => {
    const first = record("first", 5, 10n, 9);
    const second = record("second", 5, 10n, 2);

    expect(compareJobRecords(first, second)).toBeGreaterThan(0);
    expect(compareJobRecords(second, first)).toBeLessThan(0);
  });

  it("does not need insertion order when earlier keys differ", () => {
    expect(compareJobRecords(record("a", 5, 10n), record("b", 3, 10n))).toBeLessThan(0);
    expect(compareJobRecords(record("a", 5, 10n), record("b", 5, 11n))).toBeLessThan(0);
  });

  it("throws when the tie-break needs a missing insertion order", () => {
    const ordered = record("ordered", 5, 10n, 1);
    const unordered = record("unordered", 5, 10n);

    expect(() => compareJobRecords(ordered, unordered)).toThrow(JobRecordOrderingError);
    expect(() => compareJobRecords(ordered, unordered)).toThrow(
      "Cannot order records ordered and unordered: insertion order is not assigned"
    );
  });

  it("lenient comparator treats missing insertion orders as a tie", () => {
    expect(compareJobRecordsLenient(record("a", 5, 10n, 1), record("b", 5, 10n))).toBe(0);
    expect(compareJobRecordsLenient(record("a", 5, 10n, 1), record("b", 5, 10n, 4))).toBe(-3);
  });

  it("compares creation timestamps beyond the safe integer range", () => {
    const big = 2n ** 62n;
    expect(compareJobRecords(record("a", 1, big, 1), record("b", 1, big + 1n, 2))).toBe(-1);
  });
});

describe("hashJobId", () => {
  it("computes the 31-multiplier string hash", () => {
    expect(hashJobId("")).toBe(0);
    expect(hashJobId("a")).toBe(97);
    expect(hashJobId("abc")).toBe(96354);
  });

  it("wraps to a signed 32-bit integer", () => {
    const hash = hashJobId("a-rather-long-job-identifier-0001");
    expect(Number.isInteger(hash)).toBe(true);
    expect(hash).toBeGreaterThanOrEqual(-(2 ** 31));
    expect(hash).toBeLessThan(2 ** 31);
  });
});
