import type { JobRecord } from "./JobRecord";

export class JobRecordOrderingError extends Error {
  readonly ids: [string, string];

  constructor(a: string, b: string) {
    super(`Cannot order records ${a} and ${b}: insertion order is not assigned`);
    this.name = "JobRecordOrderingError";
    this.ids = [a, b];
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

const compareBigInt = (a: bigint, b: bigint): number => (a < b ? -1 : a > b ? 1 : 0);

const compareHead = (a: JobRecord, b: JobRecord): number => {
  // higher priority first
  if (a.getPriority() !== b.getPriority()) {
    return b.getPriority() - a.getPriority();
  }
  return compareBigInt(a.getCreatedNs(), b.getCreatedNs());
};

/**
 * Queue order: priority descending, then createdNs ascending, then insertion order ascending.
 * Throws when the insertion order is needed to break a tie but is missing on either side.
 */
export const compareJobRecords = (a: JobRecord, b: JobRecord): number => {
  const head = compareHead(a, b);
  if (head !== 0) return head;

  const left = a.getInsertionOrder();
  const right = b.getInsertionOrder();
  if (left === null || right === null) {
    throw new JobRecordOrderingError(a.getId(), b.getId());
  }
  return left - right;
};

/**
 * Same as `compareJobRecords`, but records without an insertion order tie instead of throwing.
 */
export const compareJobRecordsLenient = (a: JobRecord, b: JobRecord): number => {
  const head = compareHead(a, b);
  if (head !== 0) return head;

  const left = a.getInsertionOrder();
  const right = b.getInsertionOrder();
  if (left === null || right === null) return 0;
  return left - right;
};

/** 32-bit string hash (s[0]*31^(n-1) + ... + s[n-1]), computed over UTF-16 code units. */
export const hashJobId = (id: string): number => {
  let hash = 0;
  for (let i = 0; i < id.length; i += 1) {
    hash = (Math.imul(31, hash) + id.charCodeAt(i)) | 0;
  }
  return hash;
};
