import type { JobRecord } from "../core/jobs/JobRecord";

export type PollOptions = {
  networkAvailable?: boolean;
  /** Groups with a record already running; their other members are skipped. */
  excludeGroups?: ReadonlySet<string>;
};

/**
 * Priority structure holding records that wait to run.
 * Implementations order by `compareJobRecords` and assign the insertion order on insert.
 */
export interface JobRecordQueue {
  insert(record: JobRecord): number;
  peekNext(nowNs: bigint, options?: PollOptions): JobRecord | null;
  pollNext(nowNs: bigint, options?: PollOptions): JobRecord | null;
  remove(id: string): JobRecord | null;
  findById(id: string): JobRecord | null;
  findByTag(tag: string): JobRecord[];
  /** Earliest delay among records that only wait for their delay to pass. */
  nextDelayUntilNs(nowNs: bigint, options?: PollOptions): bigint | null;
  size(): number;
}
