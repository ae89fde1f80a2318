/**
 * Direct rate limiting: one bucket shared by every update that reaches the predicate
 */

import { unit } from "../core/extractor.js";
import type { Guard } from "../core/predicate.js";
import type { PredicateResult } from "../core/result.js";
import type { Logger } from "../logger.js";
import { GcraBucket, validateQuota, type Quota } from "./gcra.js";
import {
  admit,
  resolveClock,
  resolveLogger,
  type Jitter,
  type RateLimitClock,
  type RateLimitMethod,
  type RateLimitOptions,
} from "./policy.js";

export class DirectRateLimitPredicate implements Guard<null> {
  readonly name: string;
  readonly extractor = unit;
  private readonly bucket: GcraBucket;
  private readonly clock: RateLimitClock;
  private readonly logger: Logger;

  private constructor(
    readonly quota: Quota,
    readonly method: RateLimitMethod,
    options: RateLimitOptions
  ) {
    validateQuota(quota);
    this.clock = resolveClock(options);
    this.logger = resolveLogger(options);
    this.bucket = new GcraBucket(quota, this.clock.now());
    this.name = `rate limit ${quota.capacity}/${quota.periodMs}ms (${method.kind})`;
  }

  /** Drop updates once the bucket is empty */
  static discard(quota: Quota, options: RateLimitOptions = {}): DirectRateLimitPredicate {
    return new DirectRateLimitPredicate(quota, { kind: "discard" }, options);
  }

  /** Hold updates until a token frees up */
  static wait(quota: Quota, options: RateLimitOptions = {}): DirectRateLimitPredicate {
    return new DirectRateLimitPredicate(quota, { kind: "wait" }, options);
  }

  static waitWithJitter(quota: Quota, jitter: Jitter, options: RateLimitOptions = {}): DirectRateLimitPredicate {
    return new DirectRateLimitPredicate(quota, { kind: "wait-with-jitter", jitter }, options);
  }

  handle(): Promise<PredicateResult> {
    return admit(this.bucket, this.method, this.clock, this.logger, "global");
  }
}
