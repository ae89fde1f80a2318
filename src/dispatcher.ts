/**
 * Dispatcher: runs every incoming update through the registered handlers
 *
 * Handlers run one at a time in registration order:
 * - skipped or Continue moves on to the next handler
 * - Stop ends the dispatch of this update
 * - Error ends it too, after the ErrorHandler has seen the error
 *
 * dispatch() never rejects, so a transport can feed updates without guarding each call.
 */

import type { Update } from "grammy/types";
import { ContextBuilder, type Context } from "./context.js";
import { LoggingErrorHandler, type ErrorHandler } from "./core/error.js";
import type { Extractor, HandlerInput } from "./core/extractor.js";
import { route, type Handler, type UpdateHandler } from "./core/handler.js";
import { chainResultToHandlerResult, failed, type HandlerResult } from "./core/result.js";
import { HandlerError, describeError } from "./errors.js";
import { ConsoleLogger, type Logger } from "./logger.js";

/**
 * Anything a transport can hand updates to
 */
export interface UpdateSink {
  dispatch(update: Update): Promise<void>;
}

export interface DispatcherOptions {
  errorHandler?: ErrorHandler;
  logger?: Logger;
}

export class Dispatcher implements UpdateSink {
  private readonly handlers: UpdateHandler[] = [];
  private readonly errorHandler: ErrorHandler;
  private readonly logger: Logger;

  constructor(
    readonly context: Context = new ContextBuilder().build(),
    options: DispatcherOptions = {}
  ) {
    this.logger = options.logger ?? new ConsoleLogger();
    this.errorHandler = options.errorHandler ?? new LoggingErrorHandler(this.logger);
  }

  /**
   * Register an update handler; order of registration is order of execution
   */
  add(handler: UpdateHandler): this {
    this.handlers.push(handler);
    return this;
  }

  /**
   * Register a handler over an extractor
   */
  on<I>(extractor: Extractor<I>, handler: Handler<I>): this {
    return this.add(route(extractor, handler));
  }

  get size(): number {
    return this.handlers.length;
  }

  async dispatch(update: Update): Promise<void> {
    const input: HandlerInput = { update, context: this.context };

    for (const handler of this.handlers) {
      const result = await this.runHandler(handler, input);

      if (result.type === "continue") continue;

      if (result.type === "stop") {
        this.logger.debug(`[Dispatcher] Update ${update.update_id} stopped by '${handler.name}'`);
        return;
      }

      await this.report(result.error);
      return;
    }
  }

  private async runHandler(handler: UpdateHandler, input: HandlerInput): Promise<HandlerResult> {
    try {
      return chainResultToHandlerResult(await handler.run(input));
    } catch (err) {
      // UpdateHandlers written outside of route()/Chain may still throw
      return failed(err instanceof HandlerError ? err : new HandlerError(handler.name, err));
    }
  }

  private async report(error: Error): Promise<void> {
    try {
      await this.errorHandler.handle(error);
    } catch (err) {
      this.logger.error(`[Dispatcher] Error handler failed: ${describeError(err)}`);
    }
  }
}
