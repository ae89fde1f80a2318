/**
 * Keyed rate limiting: one bucket per key (chat, user, chat+user...)
 *
 * Buckets are created on first sight of a key and never evicted.
 * Reading and updating a bucket happens within one synchronous step,
 * so concurrent dispatches for the same key cannot both take the last token.
 */

import type { Extractor } from "../core/extractor.js";
import type { Guard } from "../core/predicate.js";
import { Allow, type PredicateResult } from "../core/result.js";
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

export class KeyedRateLimitPredicate implements Guard<string> {
  readonly name: string;
  private readonly buckets = new Map<string, GcraBucket>();
  private readonly allowList = new Set<string>();
  private readonly clock: RateLimitClock;
  private readonly logger: Logger;

  private constructor(
    readonly quota: Quota,
    readonly extractor: Extractor<string>,
    readonly method: RateLimitMethod,
    options: RateLimitOptions
  ) {
    validateQuota(quota);
    this.clock = resolveClock(options);
    this.logger = resolveLogger(options);
    this.name = `keyed rate limit ${quota.capacity}/${quota.periodMs}ms (${method.kind})`;
  }

  static discard(quota: Quota, key: Extractor<string>, options: RateLimitOptions = {}): KeyedRateLimitPredicate {
    return new KeyedRateLimitPredicate(quota, key, { kind: "discard" }, options);
  }

  static wait(quota: Quota, key: Extractor<string>, options: RateLimitOptions = {}): KeyedRateLimitPredicate {
    return new KeyedRateLimitPredicate(quota, key, { kind: "wait" }, options);
  }

  static waitWithJitter(
    quota: Quota,
    key: Extractor<string>,
    jitter: Jitter,
    options: RateLimitOptions = {}
  ): KeyedRateLimitPredicate {
    return new KeyedRateLimitPredicate(quota, key, { kind: "wait-with-jitter", jitter }, options);
  }

  /**
   * Only throttle the given key. Once any key is listed, unlisted keys always pass.
   */
  withKey(key: string): this {
    this.allowList.add(key);
    return this;
  }

  /** Number of keys holding a bucket */
  get size(): number {
    return this.buckets.size;
  }

  handle(key: string): Promise<PredicateResult> {
    if (this.allowList.size > 0 && !this.allowList.has(key)) {
      return Promise.resolve(Allow);
    }
    return admit(this.bucketFor(key), this.method, this.clock, this.logger, key);
  }

  private bucketFor(key: string): GcraBucket {
    let bucket = this.buckets.get(key);
    if (bucket === undefined) {
      bucket = new GcraBucket(this.quota, this.clock.now());
      this.buckets.set(key, bucket);
    }
    return bucket;
  }
}
