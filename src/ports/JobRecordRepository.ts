import type { JobRecordSnapshot } from "../core/jobs/JobRecord";

/**
 * Durable copy of queued and running records.
 */
export interface JobRecordRepository {
  save(snapshot: JobRecordSnapshot): Promise<void>;
  remove(id: string): Promise<void>;
  /**
   * Records not claimed by `currentSessionId`: unclaimed ones plus those left in flight by
   * another session.
   */
  findRecoverable(currentSessionId: number): Promise<JobRecordSnapshot[]>;
}
