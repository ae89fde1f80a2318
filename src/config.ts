/**
 * Config management for Switchyard
 *
 * Config lives in .switchyard/config.yaml within the bot project.
 * Commands look for it in the current directory or parents.
 * The bot token is kept out of the YAML file: it comes from the environment
 * or from .switchyard/.env.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { dirname, isAbsolute, join, resolve } from "path";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import { ConfigError, describeError } from "./errors.js";
import type {
  Config,
  LogLevel,
  LongPollConfig,
  RateLimitConfig,
  RateLimitKey,
  RateLimitMethodName,
  SessionConfig,
  TransportKind,
  WebhookConfig,
} from "./types.js";
import { isKnownUpdateKind, type UpdateKind } from "./update.js";

const CONFIG_FOLDER = ".switchyard";
const CONFIG_FILE = "config.yaml";
const ENV_FILE = ".env";

export const TOKEN_ENV_VAR = "SWITCHYARD_BOT_TOKEN";

/**
 * Default config written by `switchyard init`
 */
export function createDefaultConfig(): Config {
  return {
    transport: "longpoll",
    logLevel: "info",
    longPoll: {
      limit: 100,
      pollTimeoutSeconds: 10,
      errorTimeoutSeconds: 5,
      allowedUpdates: [],
    },
    webhook: {
      host: "127.0.0.1",
      port: 8080,
      path: "/",
    },
  };
}

/**
 * Finds the .switchyard/ directory by walking up from startDir.
 * Returns null if no config exists in the tree.
 */
export function findConfigDir(startDir: string = process.cwd()): string | null {
  let dir = resolve(startDir);

  for (;;) {
    const configDir = join(dir, CONFIG_FOLDER);
    if (existsSync(join(configDir, CONFIG_FILE))) {
      return configDir;
    }
    const parent = dirname(dir);
    if (parent === dir) return null; // Reached root
    dir = parent;
  }
}

/**
 * Gets the .switchyard/ directory.
 * Throws if none is found.
 */
export function getConfigDir(startDir?: string): string {
  const dir = findConfigDir(startDir);
  if (!dir) {
    throw new ConfigError("No Switchyard config found. Run 'switchyard init' in the bot project directory.");
  }
  return dir;
}

export function getConfigPath(startDir?: string): string {
  return join(getConfigDir(startDir), CONFIG_FILE);
}

/**
 * The project root is the parent of .switchyard/
 */
export function getProjectRoot(startDir?: string): string {
  return dirname(getConfigDir(startDir));
}

/**
 * Loads and validates .switchyard/config.yaml
 */
export function loadConfig(startDir?: string): Config {
  const configPath = getConfigPath(startDir);

  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(configPath, "utf-8"));
  } catch (err) {
    throw new ConfigError(`Failed to load config from ${configPath}: ${describeError(err)}`, { cause: err });
  }
  return validateConfig(parsed ?? {});
}

export function saveConfig(config: Config, startDir?: string): void {
  const configPath = getConfigPath(startDir);
  writeFileSync(configPath, stringifyYaml(config), "utf-8");
}

/**
 * Creates .switchyard/config.yaml with defaults in `dir`.
 * Throws if a config already exists there.
 */
export function initializeConfig(dir: string = process.cwd()): Config {
  const configDir = join(resolve(dir), CONFIG_FOLDER);
  const configPath = join(configDir, CONFIG_FILE);

  if (existsSync(configPath)) {
    throw new ConfigError(`Switchyard is already initialized. Config exists at ${configPath}`);
  }
  if (!existsSync(configDir)) {
    mkdirSync(configDir, { recursive: true });
  }

  const config = createDefaultConfig();
  writeFileSync(configPath, stringifyYaml(config), "utf-8");
  return config;
}

/**
 * Resolves the session database path against the project root
 */
export function resolveDatabasePath(session: SessionConfig, projectRoot: string): string {
  if (session.database === ":memory:" || isAbsolute(session.database)) {
    return session.database;
  }
  return join(projectRoot, session.database);
}

// === Validation ===

type Section = Record<string, unknown>;

function isSection(value: unknown): value is Section {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(parent: Section, key: string): Section {
  const value = parent[key];
  if (value === undefined || value === null) return {};
  if (!isSection(value)) {
    throw new ConfigError(`Invalid config: "${key}" must be a mapping`);
  }
  return value;
}

interface NumberRule {
  min?: number;
  max?: number;
  integer?: boolean;
}

function readNumber(parent: Section, path: string, key: string, fallback: number, rule: NumberRule = {}): number {
  const value = parent[key];
  if (value === undefined) return fallback;
  const name = `${path}.${key}`;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ConfigError(`Invalid config: "${name}" must be a number`);
  }
  if (rule.integer && !Number.isInteger(value)) {
    throw new ConfigError(`Invalid config: "${name}" must be an integer`);
  }
  if (rule.min !== undefined && value < rule.min) {
    throw new ConfigError(`Invalid config: "${name}" must be at least ${rule.min}`);
  }
  if (rule.max !== undefined && value > rule.max) {
    throw new ConfigError(`Invalid config: "${name}" must be at most ${rule.max}`);
  }
  return value;
}

function readString(parent: Section, path: string, key: string, fallback: string): string {
  const value = parent[key];
  if (value === undefined) return fallback;
  if (typeof value !== "string") {
    throw new ConfigError(`Invalid config: "${path}.${key}" must be a string`);
  }
  return value;
}

function readChoice<T extends string>(
  parent: Section,
  path: string,
  key: string,
  choices: readonly T[],
  fallback: T
): T {
  const value = parent[key];
  if (value === undefined) return fallback;
  const match = choices.find((choice) => choice === value);
  if (match === undefined) {
    throw new ConfigError(`Invalid config: "${path}.${key}" must be one of ${choices.join(", ")}`);
  }
  return match;
}

const TRANSPORTS: readonly TransportKind[] = ["longpoll", "webhook"];
const LOG_LEVELS: readonly LogLevel[] = ["info", "debug"];
const RATE_LIMIT_METHODS: readonly RateLimitMethodName[] = ["discard", "wait", "wait-with-jitter"];
const RATE_LIMIT_KEYS: readonly RateLimitKey[] = ["global", "chat", "user", "chat-user"];

function validateAllowedUpdates(value: unknown): UpdateKind[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw new ConfigError(`Invalid config: "longPoll.allowedUpdates" must be a list`);
  }
  return value.map((item: unknown) => {
    if (typeof item !== "string" || !isKnownUpdateKind(item)) {
      throw new ConfigError(`Invalid config: unknown update kind ${JSON.stringify(item)} in "longPoll.allowedUpdates"`);
    }
    return item;
  });
}

function validateLongPoll(raw: Section, defaults: LongPollConfig): LongPollConfig {
  return {
    limit: readNumber(raw, "longPoll", "limit", defaults.limit, { min: 1, max: 100, integer: true }),
    pollTimeoutSeconds: readNumber(raw, "longPoll", "pollTimeoutSeconds", defaults.pollTimeoutSeconds, {
      min: 0,
      integer: true,
    }),
    errorTimeoutSeconds: readNumber(raw, "longPoll", "errorTimeoutSeconds", defaults.errorTimeoutSeconds, {
      min: 0,
    }),
    allowedUpdates: validateAllowedUpdates(raw.allowedUpdates),
  };
}

function validateWebhook(raw: Section, defaults: WebhookConfig): WebhookConfig {
  const path = readString(raw, "webhook", "path", defaults.path);
  if (!path.startsWith("/")) {
    throw new ConfigError(`Invalid config: "webhook.path" must start with "/"`);
  }
  return {
    host: readString(raw, "webhook", "host", defaults.host),
    port: readNumber(raw, "webhook", "port", defaults.port, { min: 0, max: 65535, integer: true }),
    path,
  };
}

function validateRateLimit(raw: Section): RateLimitConfig {
  return {
    capacity: readNumber(raw, "rateLimit", "capacity", 1, { min: 1, integer: true }),
    periodMs: readNumber(raw, "rateLimit", "periodMs", 1000, { min: 1 }),
    method: readChoice(raw, "rateLimit", "method", RATE_LIMIT_METHODS, "discard"),
    key: readChoice(raw, "rateLimit", "key", RATE_LIMIT_KEYS, "global"),
    jitterMs: readNumber(raw, "rateLimit", "jitterMs", 0, { min: 0 }),
  };
}

function validateSession(raw: Section): SessionConfig {
  const session: SessionConfig = {
    database: readString(raw, "session", "database", join(CONFIG_FOLDER, "sessions.db")),
    gcIntervalSeconds: readNumber(raw, "session", "gcIntervalSeconds", 60, { min: 1 }),
  };
  if (raw.lifetimeSeconds !== undefined) {
    session.lifetimeSeconds = readNumber(raw, "session", "lifetimeSeconds", 0, { min: 1 });
  }
  return session;
}

/**
 * Validates and normalizes a parsed config document, filling in defaults
 */
export function validateConfig(parsed: unknown): Config {
  if (!isSection(parsed)) {
    throw new ConfigError("Invalid config: expected a mapping at the top level");
  }
  const defaults = createDefaultConfig();

  const config: Config = {
    transport: readChoice(parsed, "config", "transport", TRANSPORTS, defaults.transport),
    logLevel: readChoice(parsed, "config", "logLevel", LOG_LEVELS, defaults.logLevel),
    longPoll: validateLongPoll(section(parsed, "longPoll"), defaults.longPoll),
    webhook: validateWebhook(section(parsed, "webhook"), defaults.webhook),
  };

  if (parsed.rateLimit !== undefined && parsed.rateLimit !== null) {
    config.rateLimit = validateRateLimit(section(parsed, "rateLimit"));
  }
  if (parsed.session !== undefined && parsed.session !== null) {
    config.session = validateSession(section(parsed, "session"));
  }

  return config;
}

// === Bot token ===

/**
 * Parses simple KEY=value lines; blank lines and # comments are skipped
 */
export function parseEnvFile(content: string): Record<string, string> {
  const vars: Record<string, string> = {};
  for (const line of content.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const eqIndex = trimmed.indexOf("=");
    if (eqIndex <= 0) continue;

    const key = trimmed.slice(0, eqIndex).trim();
    let value = trimmed.slice(eqIndex + 1).trim();
    if (
      value.length >= 2 &&
      ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'")))
    ) {
      value = value.slice(1, -1);
    }
    vars[key] = value;
  }
  return vars;
}

/**
 * Bot token from SWITCHYARD_BOT_TOKEN, falling back to .switchyard/.env
 */
export function loadBotToken(
  configDir: string | null,
  env: Record<string, string | undefined> = process.env
): string | undefined {
  const fromEnv = env[TOKEN_ENV_VAR]?.trim();
  if (fromEnv) return fromEnv;

  if (!configDir) return undefined;
  const envPath = join(configDir, ENV_FILE);
  if (!existsSync(envPath)) return undefined;

  const token = parseEnvFile(readFileSync(envPath, "utf-8"))[TOKEN_ENV_VAR];
  return token ? token : undefined;
}

/**
 * "123456:ABC...xyz" → "123456:***"
 */
export function maskToken(token: string): string {
  const colon = token.indexOf(":");
  return colon === -1 ? "***" : `${token.slice(0, colon)}:***`;
}
