import { MongoClient, MongoNetworkError, MongoServerSelectionError, type Collection } from "mongodb";
import type { JobRecordSnapshot } from "../../core/jobs/JobRecord";
import type { JobRecordRepository } from "../../ports/JobRecordRepository";
import { retry, type RetryOptions } from "../../shared/retry/retry";
import { mongoIndexes } from "./mongo.indexes";

export type JobRecordDoc = {
  _id: string;
  type: string;
  priority: number;
  groupId: string | null;
  runCount: number;
  createdNs: bigint;
  delayUntilNs: bigint;
  runningSessionId: number;
  insertionOrder: number | null;
  requiresNetwork: boolean;
  tags: string[];
  payload: Record<string, unknown>;
  updatedAt: Date;
};

export const isTransientMongoError = (err: unknown): boolean =>
  err instanceof MongoNetworkError || err instanceof MongoServerSelectionError;

export const toJobRecordDoc = (snapshot: JobRecordSnapshot, now: Date = new Date()): JobRecordDoc => ({
  _id: snapshot.id,
  type: snapshot.type,
  priority: snapshot.priority,
  groupId: snapshot.groupId,
  runCount: snapshot.runCount,
  createdNs: snapshot.createdNs,
  delayUntilNs: snapshot.delayUntilNs,
  runningSessionId: snapshot.runningSessionId,
  insertionOrder: snapshot.insertionOrder,
  requiresNetwork: snapshot.requiresNetwork,
  tags: snapshot.tags,
  payload: snapshot.payload,
  updatedAt: now
});

// Stored documents only hold records that have not reached a terminal outcome.
export const fromJobRecordDoc = (doc: JobRecordDoc): JobRecordSnapshot => ({
  id: doc._id,
  type: doc.type,
  priority: doc.priority,
  groupId: doc.groupId,
  runCount: doc.runCount,
  createdNs: doc.createdNs,
  delayUntilNs: doc.delayUntilNs,
  runningSessionId: doc.runningSessionId,
  insertionOrder: doc.insertionOrder,
  requiresNetwork: doc.requiresNetwork,
  tags: doc.tags,
  cancelled: false,
  successful: false,
  payload: doc.payload
});

const defaultWriteRetry: Omit<RetryOptions, "onRetry"> = {
  retries: 3,
  minDelayMs: 100,
  maxDelayMs: 2000,
  shouldRetry: isTransientMongoError
};

/**
 * One document per live record, keyed by record id. Timestamps are stored as 64-bit integers.
 */
export class MongoJobRecordRepository implements JobRecordRepository {
  private client?: MongoClient;
  private collection?: Collection<JobRecordDoc>;

  constructor(
    private readonly mongoUri: string,
    private readonly dbName = "jobqueue",
    private readonly collectionName = "job_records",
    private readonly writeRetry: Omit<RetryOptions, "onRetry"> = defaultWriteRetry
  ) {}

  private async getCollection(): Promise<Collection<JobRecordDoc>> {
    if (this.collection) return this.collection;

    this.client = new MongoClient(this.mongoUri, { useBigInt64: true });
    await this.client.connect();

    const db = this.client.db(this.dbName);
    const col = db.collection<JobRecordDoc>(this.collectionName);

    for (const idx of mongoIndexes.jobRecordCollection) {
      await col.createIndex(idx.keys, idx.options);
    }

    this.collection = col;
    return col;
  }

  private withRetry<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return retry(fn, {
      ...this.writeRetry,
      onRetry: ({ attempt, maxAttempts, delayMs, error }) => {
        // eslint-disable-next-line no-console
        console.warn(
          JSON.stringify({
            event: "jobqueue.repository_retry",
            operation,
            attempt,
            maxAttempts,
            delayMs,
            reason: error instanceof Error ? error.message : String(error)
          })
        );
      }
    });
  }

  async save(snapshot: JobRecordSnapshot): Promise<void> {
    const doc = toJobRecordDoc(snapshot);
    await this.withRetry("save", async () => {
      const col = await this.getCollection();
      await col.replaceOne({ _id: doc._id }, doc, { upsert: true });
    });
  }

  async remove(id: string): Promise<void> {
    await this.withRetry("remove", async () => {
      const col = await this.getCollection();
      await col.deleteOne({ _id: id });
    });
  }

  async findRecoverable(currentSessionId: number): Promise<JobRecordSnapshot[]> {
    const col = await this.getCollection();
    const docs = await col
      .find({ runningSessionId: { $ne: currentSessionId } })
      .sort({ priority: -1, createdNs: 1, insertionOrder: 1 })
      .toArray();
    return docs.map(fromJobRecordDoc);
  }

  async close(): Promise<void> {
    await this.client?.close();
    this.client = undefined;
    this.collection = undefined;
  }
}
