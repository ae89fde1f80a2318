import { describe, it, expect } from "vitest";
import { ConfigError } from "../errors.js";
import { GcraBucket, validateQuota } from "./gcra.js";

describe("GcraBucket", () => {
  it("lets a full burst through, then spaces requests by the emission interval", () => {
    const bucket = new GcraBucket({ capacity: 3, periodMs: 3000 }, 0);

    expect(bucket.tryAcquire(0)).toBe(0);
    expect(bucket.tryAcquire(0)).toBe(0);
    expect(bucket.tryAcquire(0)).toBe(0);
    expect(bucket.tryAcquire(0)).toBe(1000);
    expect(bucket.tryAcquire(1000)).toBe(0);
    expect(bucket.tryAcquire(1000)).toBe(1000);
  });

  it("takes nothing from the bucket when it refuses", () => {
    const bucket = new GcraBucket({ capacity: 1, periodMs: 1000 }, 0);

    expect(bucket.tryAcquire(0)).toBe(0);
    expect(bucket.tryAcquire(500)).toBe(500);
    expect(bucket.tryAcquire(700)).toBe(300);
    expect(bucket.tryAcquire(1000)).toBe(0);
  });

  it("refills completely after a quiet period", () => {
    const bucket = new GcraBucket({ capacity: 2, periodMs: 1000 }, 0);
    bucket.tryAcquire(0);
    bucket.tryAcquire(0);

    expect(bucket.tryAcquire(10_000)).toBe(0);
    expect(bucket.tryAcquire(10_000)).toBe(0);
    expect(bucket.tryAcquire(10_000)).toBe(500);
  });

  it("admits the burst, then one request per interval", () => {
    const bucket = new GcraBucket({ capacity: 5, periodMs: 1000 }, 0);
    let accepted = 0;
    for (let t = 0; t < 1000; t += 10) {
      if (bucket.tryAcquire(t) === 0) accepted++;
    }

    // 5 in the initial burst, then one every 200ms from t=200 to t=800
    expect(accepted).toBe(9);
  });
});

describe("validateQuota", () => {
  it("rejects a capacity below one", () => {
    expect(() => validateQuota({ capacity: 0, periodMs: 1000 })).toThrow(ConfigError);
    expect(() => validateQuota({ capacity: 0, periodMs: 1000 })).toThrow(
      "Quota capacity must be a positive integer, got 0"
    );
  });

  it("rejects a fractional capacity", () => {
    expect(() => validateQuota({ capacity: 1.5, periodMs: 1000 })).toThrow(ConfigError);
  });

  it("rejects a non-positive period", () => {
    expect(() => validateQuota({ capacity: 1, periodMs: 0 })).toThrow(
      "Quota period must be a positive number of ms, got 0"
    );
  });
});
