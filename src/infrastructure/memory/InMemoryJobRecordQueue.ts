import type { JobRecord } from "../../core/jobs/JobRecord";
import { compareJobRecords } from "../../core/jobs/jobRecord.ordering";
import type { JobRecordQueue, PollOptions } from "../../ports/JobRecordQueue";

const isBlockedByPolicy = (record: JobRecord, options: PollOptions): boolean => {
  if (record.requiresNetwork() && options.networkAvailable === false) return true;
  const groupId = record.getGroupId();
  return groupId != null && (options.excludeGroups?.has(groupId) ?? false);
};

/**
 * Sorted-array queue. Records restored with an insertion order keep it and move the counter past it.
 */
export class InMemoryJobRecordQueue implements JobRecordQueue {
  private readonly records: JobRecord[] = [];
  private nextInsertionOrder = 1;

  insert(record: JobRecord): number {
    if (this.findById(record.getId())) {
      throw new Error(`Record ${record.getId()} is already queued`);
    }

    const existing = record.getInsertionOrder();
    if (existing === null) {
      record.setInsertionOrder(this.nextInsertionOrder);
      this.nextInsertionOrder += 1;
    } else {
      this.nextInsertionOrder = Math.max(this.nextInsertionOrder, existing + 1);
    }

    // first index whose record sorts after the new one
    let low = 0;
    let high = this.records.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      if (compareJobRecords(this.records[mid], record) <= 0) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    this.records.splice(low, 0, record);

    const order = record.getInsertionOrder();
    if (order === null) {
      throw new Error(`Record ${record.getId()} has no insertion order after insert`);
    }
    return order;
  }

  peekNext(nowNs: bigint, options: PollOptions = {}): JobRecord | null {
    const index = this.findEligibleIndex(nowNs, options);
    return index === -1 ? null : this.records[index];
  }

  pollNext(nowNs: bigint, options: PollOptions = {}): JobRecord | null {
    const index = this.findEligibleIndex(nowNs, options);
    if (index === -1) return null;
    const [record] = this.records.splice(index, 1);
    return record;
  }

  remove(id: string): JobRecord | null {
    const index = this.records.findIndex((record) => record.getId() === id);
    if (index === -1) return null;
    const [record] = this.records.splice(index, 1);
    return record;
  }

  findById(id: string): JobRecord | null {
    return this.records.find((record) => record.getId() === id) ?? null;
  }

  findByTag(tag: string): JobRecord[] {
    return this.records.filter((record) => record.getTags()?.has(tag) ?? false);
  }

  nextDelayUntilNs(nowNs: bigint, options: PollOptions = {}): bigint | null {
    let earliest: bigint | null = null;
    for (const record of this.records) {
      if (!record.isDelayed(nowNs) || isBlockedByPolicy(record, options)) continue;
      const delayUntilNs = record.getDelayUntilNs();
      if (earliest === null || delayUntilNs < earliest) earliest = delayUntilNs;
    }
    return earliest;
  }

  size(): number {
    return this.records.length;
  }

  private findEligibleIndex(nowNs: bigint, options: PollOptions): number {
    return this.records.findIndex((record) => !record.isDelayed(nowNs) && !isBlockedByPolicy(record, options));
  }
}
