/**
 * WebhookServer: receives updates pushed by the Bot API
 *
 * POST <path> with one JSON Update → dispatched, then an empty 200
 * any other method, on any path    → 405, Allow: POST
 * POST to any other path           → 404
 * unparseable body                 → 400 "Failed to parse update: <reason>"
 * dispatch failure                 → 500
 *
 * The server answers only after dispatch completes. Requests are not serialized:
 * concurrent deliveries are dispatched concurrently.
 */

import Fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest } from "fastify";
import type { Update } from "grammy/types";
import type { UpdateSink } from "../dispatcher.js";
import { describeError } from "../errors.js";
import { ConsoleLogger, type Logger } from "../logger.js";
import { isUpdate } from "../update.js";

export interface WebhookOptions {
  logger?: Logger;
  /** Maximum accepted body size in bytes (default: fastify's 1 MiB) */
  bodyLimit?: number;
}

export interface ListenOptions {
  host: string;
  port: number;
}

function parseUpdate(body: unknown): Update {
  const raw = typeof body === "string" ? body : "";
  const value: unknown = JSON.parse(raw);
  if (!isUpdate(value)) {
    throw new Error("expected an object with a numeric update_id");
  }
  return value;
}

export class WebhookServer {
  readonly app: FastifyInstance;
  private readonly logger: Logger;

  constructor(
    readonly path: string,
    private readonly sink: UpdateSink,
    options: WebhookOptions = {}
  ) {
    this.logger = options.logger ?? new ConsoleLogger();
    this.app = Fastify(
      options.bodyLimit === undefined ? { logger: false } : { logger: false, bodyLimit: options.bodyLimit }
    );

    // Bodies are parsed here, so a bad one maps to our 400 instead of fastify's
    this.app.removeAllContentTypeParsers();
    this.app.addContentTypeParser("*", { parseAs: "string" }, (_request, body, done) => {
      done(null, body);
    });

    this.app.post(path, (request, reply) => this.receive(request, reply));
    // The method is checked before the path
    this.app.setNotFoundHandler(async (request, reply) => {
      if (request.method !== "POST") {
        return reply.code(405).header("Allow", "POST").send();
      }
      return reply.code(404).send();
    });

    this.app.setErrorHandler(async (error, _request, reply) => {
      this.logger.error(`[Webhook] Request failed: ${error.message}`);
      return reply.code(error.statusCode ?? 500).send();
    });
  }

  private async receive(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
    let update: Update;
    try {
      update = parseUpdate(request.body);
    } catch (err) {
      this.logger.warn(`[Webhook] Rejected update: ${describeError(err)}`);
      return reply
        .code(400)
        .header("Content-Type", "text/plain; charset=utf-8")
        .send(`Failed to parse update: ${describeError(err)}\n`);
    }

    try {
      await this.sink.dispatch(update);
    } catch (err) {
      this.logger.error(`[Webhook] Failed to handle update ${update.update_id}: ${describeError(err)}`);
      return reply.code(500).send();
    }
    return reply.code(200).send();
  }

  /**
   * Bind and start accepting requests; resolves with the listening address
   */
  async listen(options: ListenOptions): Promise<string> {
    const address = await this.app.listen({ host: options.host, port: options.port });
    this.logger.log(`[Webhook] Listening on ${address}${this.path}`);
    return address;
  }

  async close(): Promise<void> {
    await this.app.close();
    this.logger.log("[Webhook] Stopped");
  }
}
