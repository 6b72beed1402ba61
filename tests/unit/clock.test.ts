import { msToNs, nsToMs, systemClock } from "../../src/shared/clock/clock";

describe("clock", () => {
  it("never goes backwards", () => {
    const first = systemClock.nowNs();
    const second = systemClock.nowNs();
    expect(second >= first).toBe(true);
  });

  it("is anchored near the wall clock", () => {
    const wallNs = BigInt(Date.now()) * 1_000_000n;
    const drift = systemClock.nowNs() - wallNs;
    expect(drift < 1_000_000_000n && drift > -1_000_000_000n).toBe(true);
  });

  it("converts between milliseconds and nanoseconds", () => {
    expect(msToNs(250)).toBe(250_000_000n);
    expect(msToNs(-5)).toBe(0n);
    expect(nsToMs(1n)).toBe(1);
    expect(nsToMs(2_000_000n)).toBe(2);
    expect(nsToMs(0n)).toBe(0);
    expect(nsToMs(-10n)).toBe(0);
  });
});
