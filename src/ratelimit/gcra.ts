/**
 * Generic cell rate algorithm
 *
 * A bucket keeps one number, the theoretical arrival time (TAT) of the next
 * request. With an emission interval T = period / capacity and a burst
 * tolerance τ = T · (capacity - 1), a request at `now` conforms when
 * now >= TAT - τ, and accepting it moves TAT to max(TAT, now) + T.
 */

import { ConfigError } from "../errors.js";

export interface Quota {
  /** Burst size: how many requests may pass back to back */
  capacity: number;
  /** Time (ms) in which a full bucket refills */
  periodMs: number;
}

export function validateQuota(quota: Quota): Quota {
  if (!Number.isInteger(quota.capacity) || quota.capacity < 1) {
    throw new ConfigError(`Quota capacity must be a positive integer, got ${quota.capacity}`);
  }
  if (!Number.isFinite(quota.periodMs) || quota.periodMs <= 0) {
    throw new ConfigError(`Quota period must be a positive number of ms, got ${quota.periodMs}`);
  }
  return quota;
}

export class GcraBucket {
  private readonly interval: number;
  private readonly tolerance: number;
  private tat: number;

  constructor(quota: Quota, now: number) {
    validateQuota(quota);
    this.interval = quota.periodMs / quota.capacity;
    this.tolerance = this.interval * (quota.capacity - 1);
    this.tat = now;
  }

  /**
   * Take one token if available.
   * Returns 0 on success, otherwise the ms until a token frees up (nothing is taken).
   */
  tryAcquire(now: number): number {
    const tat = Math.max(this.tat, now);
    const allowAt = tat - this.tolerance;
    if (now < allowAt) {
      return allowAt - now;
    }
    this.tat = tat + this.interval;
    return 0;
  }
}
