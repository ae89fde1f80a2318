#!/usr/bin/env node

/**
 * Switchyard - CLI
 */

import { Api } from "grammy";
import { Command } from "commander";
import { BotRunner, createUpdatesSource } from "./bot.js";
import {
  findConfigDir,
  getConfigPath,
  getProjectRoot,
  initializeConfig,
  loadBotToken,
  loadConfig,
  maskToken,
  resolveDatabasePath,
  TOKEN_ENV_VAR,
} from "./config.js";
import { buildExampleDispatcher, createMessenger } from "./example-bot.js";
import { describeError } from "./errors.js";
import { ConsoleLogger } from "./logger.js";
import { SessionCollector } from "./session/collector.js";
import { SessionManager } from "./session/session.js";
import { SqliteSessionBackend } from "./session/sqlite-backend.js";
import type { TransportKind } from "./types.js";
import { getVersionString } from "./version.js";

const program = new Command();

program
  .name("switchyard")
  .description("Switchyard - Telegram bot update dispatcher")
  .version(getVersionString());

program
  .command("init")
  .description("Create .switchyard/config.yaml in the current directory")
  .action(() => {
    if (findConfigDir() !== null) {
      console.log("Switchyard is already initialized.");
      console.log(`  Config: ${getConfigPath()}`);
      return;
    }

    initializeConfig();
    console.log("Initialized Switchyard\n");
    console.log(`  Config: ${getConfigPath()}`);
    console.log("");
    console.log("Next steps:");
    console.log(`  1. Put your bot token in .switchyard/.env as ${TOKEN_ENV_VAR}=...`);
    console.log("  2. Start the bot:  switchyard start");
  });

program
  .command("config")
  .description("Show the resolved configuration")
  .action(() => {
    const config = loadConfig();
    const token = loadBotToken(findConfigDir());

    console.log("Configuration:\n");
    console.log(`  Config file: ${getConfigPath()}`);
    console.log(`  Token: ${token ? maskToken(token) : "(not set)"}`);
    console.log(`  Transport: ${config.transport}`);
    console.log(`  Log level: ${config.logLevel}`);
    console.log(
      `  Long polling: limit ${config.longPoll.limit}, timeout ${config.longPoll.pollTimeoutSeconds}s, ` +
        `retry after ${config.longPoll.errorTimeoutSeconds}s`
    );
    console.log(`  Webhook: http://${config.webhook.host}:${config.webhook.port}${config.webhook.path}`);
    if (config.rateLimit) {
      const { capacity, periodMs, method, key } = config.rateLimit;
      console.log(`  Rate limit: ${capacity} per ${periodMs}ms, ${method}, key ${key}`);
    } else {
      console.log("  Rate limit: off");
    }
    console.log(`  Sessions: ${config.session ? config.session.database : "off"}`);
  });

program
  .command("start")
  .description("Run the bot until interrupted")
  .option("--webhook", "Receive updates through the webhook server")
  .option("--longpoll", "Receive updates by long polling")
  .action(async (options: { webhook?: boolean; longpoll?: boolean }) => {
    const configDir = findConfigDir();
    if (configDir === null) {
      console.error("Error: Switchyard is not initialized.");
      console.error("Run `switchyard init` first.");
      process.exit(1);
    }

    const config = loadConfig();
    const token = loadBotToken(configDir);
    if (!token) {
      console.error(`Error: no bot token. Set ${TOKEN_ENV_VAR} or add it to .switchyard/.env`);
      process.exit(1);
    }

    const logger = new ConsoleLogger({ debug: config.logLevel === "debug" });
    const api = new Api(token);

    let backend: SqliteSessionBackend | null = null;
    let collector: SessionCollector | null = null;
    if (config.session) {
      backend = new SqliteSessionBackend(resolveDatabasePath(config.session, getProjectRoot()), {
        lifetimeSeconds: config.session.lifetimeSeconds,
      });
      collector = new SessionCollector(backend, { intervalMs: config.session.gcIntervalSeconds * 1000, logger });
      collector.start();
    }

    const dispatcher = buildExampleDispatcher({
      messenger: createMessenger(api),
      sessions: backend ? new SessionManager(backend) : undefined,
      rateLimit: config.rateLimit,
      logger,
    });
    const runner = new BotRunner(dispatcher, config, createUpdatesSource(api), { logger });

    const transport: TransportKind = options.webhook ? "webhook" : options.longpoll ? "longpoll" : config.transport;

    const handleShutdown = async () => {
      try {
        await runner.stop();
      } catch (err) {
        logger.error(`[Bot] Failed to stop cleanly: ${describeError(err)}`);
      }
      collector?.stop();
      backend?.close();
      process.exit(0);
    };

    process.on("SIGINT", () => void handleShutdown()); // Ctrl+C
    process.on("SIGTERM", () => void handleShutdown()); // kill (default signal)

    logger.log(`[Bot] Starting (${transport})`);
    await runner.start(transport);
  });

program.parseAsync().catch((err: unknown) => {
  console.error(`Error: ${describeError(err)}`);
  process.exit(1);
});
