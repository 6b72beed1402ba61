export type Clock = {
  /** Monotonic nanoseconds, anchored to the wall clock at process start. */
  nowNs(): bigint;
};

const NS_PER_MS = 1_000_000n;

const origin = BigInt(Date.now()) * NS_PER_MS - process.hrtime.bigint();

export const systemClock: Clock = {
  nowNs: () => origin + process.hrtime.bigint()
};

export const msToNs = (ms: number): bigint => BigInt(Math.max(0, Math.round(ms))) * NS_PER_MS;

/** Rounds up so a wait computed from it never ends before the deadline. */
export const nsToMs = (ns: bigint): number => {
  if (ns <= 0n) return 0;
  return Number((ns + NS_PER_MS - 1n) / NS_PER_MS);
};
