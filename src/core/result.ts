/**
 * Result types threaded through the pipeline
 */

/**
 * Outcome of a handler as seen by the Dispatcher
 */
export type HandlerResult =
  | { readonly type: "continue" }
  | { readonly type: "stop" }
  | { readonly type: "error"; readonly error: Error };

export const Continue: HandlerResult = Object.freeze({ type: "continue" });
export const Stop: HandlerResult = Object.freeze({ type: "stop" });

export function failed(error: Error): HandlerResult {
  return { type: "error", error };
}

/**
 * Values a handler body may produce; see toHandlerResult
 */
export type HandlerOutput = HandlerResult | boolean | void;

export function isHandlerResult(value: unknown): value is HandlerResult {
  if (typeof value !== "object" || value === null || !("type" in value)) return false;
  if (value.type === "continue" || value.type === "stop") return true;
  return value.type === "error" && "error" in value && value.error instanceof Error;
}

/**
 * Fold a handler output into a HandlerResult:
 * nothing → Stop, true → Continue, false → Stop, a HandlerResult → itself
 */
export function toHandlerResult(output: HandlerOutput): HandlerResult {
  if (isHandlerResult(output)) return output;
  return output === true ? Continue : Stop;
}

/**
 * Outcome of a type-erased handler: distinguishes "ran", "failed before running" and "did not match"
 */
export type ChainResult =
  | { readonly type: "done"; readonly result: HandlerResult }
  | { readonly type: "error"; readonly error: Error }
  | { readonly type: "skipped" };

export const Skipped: ChainResult = Object.freeze({ type: "skipped" });

export function done(result: HandlerResult): ChainResult {
  return { type: "done", result };
}

export function chainError(error: Error): ChainResult {
  return { type: "error", error };
}

export function chainResultToHandlerResult(result: ChainResult): HandlerResult {
  switch (result.type) {
    case "done":
      return result.result;
    case "error":
      return failed(result.error);
    case "skipped":
      return Continue;
  }
}

/**
 * Verdict of a guard. False carries the result the pipeline sees instead of the guarded handler's.
 */
export type PredicateResult =
  | { readonly type: "true" }
  | { readonly type: "false"; readonly result: HandlerResult };

export const Allow: PredicateResult = Object.freeze({ type: "true" });

export function deny(result: HandlerResult = Continue): PredicateResult {
  return { type: "false", result };
}

export type PredicateOutput = PredicateResult | boolean;

/**
 * true → True, false → False(Continue), a PredicateResult → itself
 */
export function toPredicateResult(output: PredicateOutput): PredicateResult {
  if (typeof output === "boolean") return output ? Allow : deny(Continue);
  return output;
}
