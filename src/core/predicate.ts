/**
 * Predicate decorator
 *
 * Gates a wrapped handler behind a guard. Guard and handler extract their inputs
 * independently from the same update. When the guard declines, the wrapped handler
 * never runs and the guard-supplied result is what the pipeline sees.
 */

import { HandlerError, toError } from "../errors.js";
import { extract, type Extractor, type HandlerInput } from "./extractor.js";
import { invoke, type Handler, type UpdateHandler } from "./handler.js";
import {
  Skipped,
  chainError,
  chainResultToHandlerResult,
  deny,
  done,
  failed,
  toPredicateResult,
  type ChainResult,
  type HandlerResult,
  type PredicateOutput,
  type PredicateResult,
} from "./result.js";

/**
 * A guard handler that knows where its input comes from
 */
export interface Guard<I> extends Handler<I, PredicateOutput> {
  readonly extractor: Extractor<I>;
}

/**
 * Build a guard from an extractor and a plain function
 */
export function guard<I>(
  extractor: Extractor<I>,
  name: string,
  fn: (input: I) => PredicateOutput | Promise<PredicateOutput>
): Guard<I> {
  return { name, extractor, handle: fn };
}

export class Predicate<PI, HI> implements UpdateHandler, Handler<HandlerInput, HandlerResult> {
  readonly name: string;

  constructor(
    private readonly guard: Guard<PI>,
    private readonly extractor: Extractor<HI>,
    private readonly handler: Handler<HI>
  ) {
    this.name = `${handler.name} (if ${guard.name})`;
  }

  async run(input: HandlerInput): Promise<ChainResult> {
    let guardInput: PI | undefined;
    let handlerInput: HI | undefined;
    try {
      guardInput = await extract(this.guard.extractor, input);
      if (guardInput === undefined) return Skipped;
      handlerInput = await extract(this.extractor, input);
      if (handlerInput === undefined) return Skipped;
    } catch (err) {
      return chainError(toError(err));
    }

    const verdict = await this.check(guardInput);
    if (verdict.type === "false") {
      return done(verdict.result);
    }
    return done(await invoke(this.handler, handlerInput));
  }

  async handle(input: HandlerInput): Promise<HandlerResult> {
    return chainResultToHandlerResult(await this.run(input));
  }

  private async check(value: PI): Promise<PredicateResult> {
    try {
      return toPredicateResult(await this.guard.handle(value));
    } catch (err) {
      return deny(failed(new HandlerError(this.guard.name, err)));
    }
  }
}

/**
 * Shortcut for `new Predicate(guard, extractor, handler)`
 */
export function guarded<PI, HI>(
  guard: Guard<PI>,
  extractor: Extractor<HI>,
  handler: Handler<HI>
): Predicate<PI, HI> {
  return new Predicate(guard, extractor, handler);
}
