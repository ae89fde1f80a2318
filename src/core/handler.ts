/**
 * Handler abstraction
 *
 * A Handler is a named async unit of work over one extracted input. The Dispatcher
 * and Chain store handlers type-erased, as UpdateHandlers: an extractor bound to a
 * handler behind the uniform `run(HandlerInput) → ChainResult` interface.
 */

import { HandlerError, toError } from "../errors.js";
import { extract, type Extractor, type HandlerInput } from "./extractor.js";
import {
  Skipped,
  chainError,
  done,
  failed,
  toHandlerResult,
  type ChainResult,
  type HandlerOutput,
  type HandlerResult,
} from "./result.js";

export interface Handler<I, O = HandlerOutput> {
  /** Unique name for logging */
  readonly name: string;

  /** Process the extracted input */
  handle(input: I): O | Promise<O>;
}

/**
 * Wrap a plain function as a Handler
 */
export function fromFunction<I>(name: string, fn: (input: I) => HandlerOutput | Promise<HandlerOutput>): Handler<I> {
  return { name, handle: fn };
}

/**
 * Type-erased handler stored by the Dispatcher and by chains
 */
export interface UpdateHandler {
  readonly name: string;
  run(input: HandlerInput): Promise<ChainResult>;
}

/**
 * Extract, then hand over; `undefined` from the extractor means skipped
 */
class Route<I> implements UpdateHandler {
  readonly name: string;

  constructor(
    private readonly extractor: Extractor<I>,
    private readonly handler: Handler<I>
  ) {
    this.name = handler.name;
  }

  async run(input: HandlerInput): Promise<ChainResult> {
    let value: I | undefined;
    try {
      value = await extract(this.extractor, input);
    } catch (err) {
      return chainError(toError(err));
    }
    if (value === undefined) return Skipped;
    return done(await invoke(this.handler, value));
  }
}

/**
 * Run a handler body, folding its output (or failure) into a HandlerResult
 */
export async function invoke<I>(handler: Handler<I>, value: I): Promise<HandlerResult> {
  try {
    return toHandlerResult(await handler.handle(value));
  } catch (err) {
    return failed(err instanceof HandlerError ? err : new HandlerError(handler.name, err));
  }
}

export function route<I>(extractor: Extractor<I>, handler: Handler<I>): UpdateHandler {
  return new Route(extractor, handler);
}

/**
 * Shortcut for route(extractor, fromFunction(name, fn))
 */
export function on<I>(
  extractor: Extractor<I>,
  name: string,
  fn: (input: I) => HandlerOutput | Promise<HandlerOutput>
): UpdateHandler {
  return new Route(extractor, fromFunction(name, fn));
}
