/**
 * What a rate-limit predicate does with an update that finds its bucket empty
 */

import { Allow, Stop, deny, type PredicateResult } from "../core/result.js";
import { ConsoleLogger, type Logger } from "../logger.js";
import type { GcraBucket } from "./gcra.js";

export interface Jitter {
  minMs: number;
  maxMs: number;
}

export type RateLimitMethod =
  | { readonly kind: "discard" }
  | { readonly kind: "wait" }
  | { readonly kind: "wait-with-jitter"; readonly jitter: Jitter };

export interface RateLimitOptions {
  logger?: Logger;
  /** Clock in ms (default: Date.now) */
  now?: () => number;
  /** Default: setTimeout */
  sleep?: (ms: number) => Promise<void>;
  /** Uniform [0, 1) source for jitter (default: Math.random) */
  random?: () => number;
}

export interface RateLimitClock {
  now: () => number;
  sleep: (ms: number) => Promise<void>;
  random: () => number;
}

const sleepFor = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export function resolveClock(options: RateLimitOptions): RateLimitClock {
  return {
    now: options.now ?? (() => Date.now()),
    sleep: options.sleep ?? sleepFor,
    random: options.random ?? Math.random,
  };
}

export function resolveLogger(options: RateLimitOptions): Logger {
  return options.logger ?? new ConsoleLogger();
}

export function jitterDelay(jitter: Jitter, sample: number): number {
  return jitter.minMs + sample * (jitter.maxMs - jitter.minMs);
}

/**
 * Admit one update through `bucket` according to `method`.
 * Discard answers False(Stop) straight away; the wait policies sleep until a token frees up.
 */
export async function admit(
  bucket: GcraBucket,
  method: RateLimitMethod,
  clock: RateLimitClock,
  logger: Logger,
  label: string
): Promise<PredicateResult> {
  let waitMs = bucket.tryAcquire(clock.now());
  if (waitMs === 0) return Allow;

  if (method.kind === "discard") {
    logger.log(`[RateLimit] update discarded (${label})`);
    return deny(Stop);
  }

  while (waitMs > 0) {
    const extra = method.kind === "wait-with-jitter" ? jitterDelay(method.jitter, clock.random()) : 0;
    logger.debug(`[RateLimit] ${label}: waiting ${Math.ceil(waitMs + extra)}ms`);
    await clock.sleep(waitMs + extra);
    waitMs = bucket.tryAcquire(clock.now());
  }
  return Allow;
}
