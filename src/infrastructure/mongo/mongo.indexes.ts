/**
 * Index plan for the job record collection:
 * - { runningSessionId: 1 } serves recovery lookups by session claim
 * - { priority: -1, createdNs: 1, insertionOrder: 1 } mirrors queue order for recovery reads
 */
export const mongoIndexes = {
  jobRecordCollection: [
    { keys: { runningSessionId: 1 }, options: { name: "running_session" } },
    {
      keys: { priority: -1, createdNs: 1, insertionOrder: 1 },
      options: { name: "queue_order" }
    }
  ]
} as const;
