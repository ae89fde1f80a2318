/**
 * Error handling around the pipeline
 *
 * An ErrorHandler receives every error that ends the dispatch of an update.
 * onError() gives a single handler its own recovery instead.
 */

import { toError } from "../errors.js";
import { ConsoleLogger, type Logger } from "../logger.js";
import type { HandlerInput } from "./extractor.js";
import type { UpdateHandler } from "./handler.js";
import { done, failed, toHandlerResult, type ChainResult, type HandlerOutput } from "./result.js";

export interface ErrorHandler {
  handle(error: Error): void | Promise<void>;
}

/**
 * Default ErrorHandler: log and drop
 */
export class LoggingErrorHandler implements ErrorHandler {
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? new ConsoleLogger();
  }

  handle(error: Error): void {
    this.logger.error(`[Dispatcher] An error has occurred: ${error.message}`);
  }
}

export type Recover = (error: Error, input: HandlerInput) => HandlerOutput | Promise<HandlerOutput>;

export class ErrorDecorator implements UpdateHandler {
  readonly name: string;

  constructor(
    private readonly inner: UpdateHandler,
    private readonly recover: Recover
  ) {
    this.name = inner.name;
  }

  async run(input: HandlerInput): Promise<ChainResult> {
    const result = await this.inner.run(input);
    switch (result.type) {
      case "skipped":
        return result;
      case "error":
        return this.recoverFrom(result.error, input);
      case "done":
        if (result.result.type === "error") {
          return this.recoverFrom(result.result.error, input);
        }
        return result;
    }
  }

  private async recoverFrom(error: Error, input: HandlerInput): Promise<ChainResult> {
    try {
      return done(toHandlerResult(await this.recover(error, input)));
    } catch (err) {
      return done(failed(toError(err)));
    }
  }
}

/**
 * Wrap a handler so its errors go to `recover` rather than to the dispatcher's ErrorHandler
 */
export function onError(handler: UpdateHandler, recover: Recover): ErrorDecorator {
  return new ErrorDecorator(handler, recover);
}
