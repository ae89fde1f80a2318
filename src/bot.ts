/**
 * Drives a Dispatcher from the configured transport
 */

import type { Api } from "grammy";
import type { Dispatcher } from "./dispatcher.js";
import { ConsoleLogger, type Logger } from "./logger.js";
import { LongPoll, type UpdatesSource } from "./transport/long-poll.js";
import { WebhookServer } from "./transport/webhook.js";
import type { Config, TransportKind } from "./types.js";

/**
 * getUpdates through grammy's Api client
 */
export function createUpdatesSource(api: Api): UpdatesSource {
  return {
    getUpdates: (params) => api.getUpdates(params),
  };
}

export interface BotRunnerOptions {
  logger?: Logger;
}

export class BotRunner {
  private longPoll: LongPoll | null = null;
  private webhook: WebhookServer | null = null;
  private readonly logger: Logger;

  constructor(
    private readonly dispatcher: Dispatcher,
    private readonly config: Config,
    private readonly source: UpdatesSource,
    options: BotRunnerOptions = {}
  ) {
    this.logger = options.logger ?? new ConsoleLogger();
  }

  get isRunning(): boolean {
    return this.longPoll !== null || this.webhook !== null;
  }

  /**
   * Start receiving updates.
   * Long polling resolves once stop() has ended the loop; the webhook resolves as soon as it listens.
   */
  async start(transport: TransportKind = this.config.transport): Promise<void> {
    if (this.isRunning) {
      throw new Error("Bot is already running");
    }

    if (transport === "webhook") {
      const { host, port, path } = this.config.webhook;
      this.webhook = new WebhookServer(path, this.dispatcher, { logger: this.logger });
      await this.webhook.listen({ host, port });
      return;
    }

    const { limit, pollTimeoutSeconds, errorTimeoutSeconds, allowedUpdates } = this.config.longPoll;
    const longPoll = new LongPoll(this.source, {
      limit,
      pollTimeoutSeconds,
      errorTimeoutMs: errorTimeoutSeconds * 1000,
      allowedUpdates,
      logger: this.logger,
    });
    this.longPoll = longPoll;
    try {
      await longPoll.run(this.dispatcher);
    } finally {
      this.longPoll = null;
    }
  }

  async stop(): Promise<void> {
    if (this.longPoll) {
      this.logger.log("[Bot] Stopping long polling...");
      this.longPoll.stop();
    }
    if (this.webhook) {
      const webhook = this.webhook;
      this.webhook = null;
      await webhook.close();
    }
  }
}
