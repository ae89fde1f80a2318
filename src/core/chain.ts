/**
 * Chain: a group of update handlers that acts as one handler
 *
 * Two strategies:
 * - once(): first found. The first member that is not skipped decides the result.
 * - all(): every matching member runs, until the first error.
 */

import { ConsoleLogger, type Logger } from "../logger.js";
import type { Extractor, HandlerInput } from "./extractor.js";
import { route, type Handler, type UpdateHandler } from "./handler.js";
import { Continue, Stop, done, failed, type ChainResult, type HandlerResult } from "./result.js";

export type ChainStrategy = "first-found" | "all";

export interface ChainOptions {
  /** Name used in logs and error messages (default: "chain") */
  name?: string;
  logger?: Logger;
}

export class Chain implements UpdateHandler, Handler<HandlerInput, HandlerResult> {
  readonly name: string;
  private readonly handlers: UpdateHandler[] = [];
  private readonly logger: Logger;

  private constructor(
    readonly strategy: ChainStrategy,
    options: ChainOptions
  ) {
    this.name = options.name ?? "chain";
    this.logger = options.logger ?? new ConsoleLogger();
  }

  static once(options: ChainOptions = {}): Chain {
    return new Chain("first-found", options);
  }

  static all(options: ChainOptions = {}): Chain {
    return new Chain("all", options);
  }

  /**
   * Append a member. Accepts an already-erased UpdateHandler, or an extractor and a handler.
   */
  with(handler: UpdateHandler): this;
  with<I>(extractor: Extractor<I>, handler: Handler<I>): this;
  with<I>(first: UpdateHandler | Extractor<I>, handler?: Handler<I>): this {
    if (typeof first === "function") {
      if (handler === undefined) {
        throw new Error(`Chain "${this.name}": a handler is required with an extractor`);
      }
      this.handlers.push(route(first, handler));
    } else {
      this.handlers.push(first);
    }
    return this;
  }

  get size(): number {
    return this.handlers.length;
  }

  async handle(input: HandlerInput): Promise<HandlerResult> {
    let stopped = false;

    for (const handler of this.handlers) {
      const result = await handler.run(input);

      switch (result.type) {
        case "skipped":
          this.logger.debug(`[Chain] ${this.name}: skipped '${handler.name}'`);
          continue;
        case "error":
          this.logger.debug(`[Chain] ${this.name}: '${handler.name}' failed to extract its input`);
          return failed(result.error);
        case "done":
          this.logger.debug(`[Chain] ${this.name}: ran '${handler.name}' → ${result.result.type}`);
          if (this.strategy === "first-found" || result.result.type === "error") {
            return result.result;
          }
          if (result.result.type === "stop") {
            stopped = true;
          }
      }
    }

    return stopped ? Stop : Continue;
  }

  async run(input: HandlerInput): Promise<ChainResult> {
    return done(await this.handle(input));
  }
}
