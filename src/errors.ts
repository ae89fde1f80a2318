/**
 * Error taxonomy for Switchyard
 *
 * - ExtractionError: an extractor failed to decode its value (a missing service, a malformed command)
 * - HandlerError: a handler body threw or rejected
 * - TransportError: the Bot API request failed; may carry a retry_after hint
 * - ConfigError: the project configuration could not be loaded
 *
 * Rate limit exhaustion is not an error; it is a normal predicate outcome.
 */

export class SwitchyardError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ExtractionError extends SwitchyardError {
  readonly extractor: string;

  constructor(extractor: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.extractor = extractor;
  }
}

/**
 * Raised by the service extractor when the requested key was never registered
 */
export class MissingServiceError extends ExtractionError {
  readonly service: string;

  constructor(service: string) {
    super("service", `Service "${service}" is not registered in the context`);
    this.service = service;
  }
}

export type CommandErrorKind = "invalid-utf16" | "mismatched-quotes" | "entity-out-of-range";

export class CommandError extends ExtractionError {
  readonly kind: CommandErrorKind;

  constructor(kind: CommandErrorKind, message: string) {
    super("command", `Failed to parse command: ${message}`);
    this.kind = kind;
  }
}

export class HandlerError extends SwitchyardError {
  readonly handler: string;

  constructor(handler: string, cause: unknown) {
    super(`Handler "${handler}" failed: ${describeError(cause)}`, { cause });
    this.handler = handler;
  }
}

export class TransportError extends SwitchyardError {
  /** Backoff requested by the remote API, if any */
  readonly retryAfterMs: number | null;

  constructor(message: string, options: { cause?: unknown; retryAfterMs?: number } = {}) {
    super(message, { cause: options.cause });
    this.retryAfterMs = options.retryAfterMs ?? null;
  }
}

export class ConfigError extends SwitchyardError {}

/**
 * Normalize any thrown value into an Error
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  return new Error(String(value));
}

export function describeError(value: unknown): string {
  return value instanceof Error ? value.message : String(value);
}
