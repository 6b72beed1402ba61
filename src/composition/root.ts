import { JobManager } from "../application/job-manager/JobManager";
import type { JobRegistry } from "../application/job-manager/JobRegistry";
import { InMemoryJobRecordQueue } from "../infrastructure/memory/InMemoryJobRecordQueue";
import { MongoJobRecordRepository } from "../infrastructure/mongo/MongoJobRecordRepository";
import type { NetworkMonitor } from "../ports/NetworkMonitor";
import { loadEnv } from "../shared/config/env";
import { loadRuntimeConfigFromEnv } from "../shared/config/runtime.config";

export type JobQueueRuntime = {
  manager: JobManager;
  close: () => Promise<void>;
};

/**
 * Wires a JobManager to MongoDB from environment settings and re-queues records left by
 * earlier sessions.
 */
export const startJobQueue = async (deps: { registry: JobRegistry; network?: NetworkMonitor }): Promise<JobQueueRuntime> => {
  const env = loadEnv();
  const { jobManagerConfig } = loadRuntimeConfigFromEnv();

  const repository = new MongoJobRecordRepository(env.MONGO_URI, env.JOBQUEUE_DB_NAME);
  const manager = new JobManager({
    queue: new InMemoryJobRecordQueue(),
    repository,
    registry: deps.registry,
    network: deps.network,
    config: jobManagerConfig
  });

  try {
    await manager.recover();
  } catch (err) {
    await repository.close();
    throw err;
  }

  return {
    manager,
    close: () => repository.close()
  };
};
