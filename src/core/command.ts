/**
 * Bot commands
 *
 * The command extractor reads the first bot_command entity of a text message.
 * Entity offsets are UTF-16 code units, which is also how JavaScript strings index,
 * so slicing the text by offset lands exactly where the Bot API says.
 */

import type { Message, MessageEntity } from "grammy/types";
import { CommandError } from "../errors.js";
import { getMessage } from "../update.js";
import type { Extractor } from "./extractor.js";
import type { Handler } from "./handler.js";
import { Predicate, type Guard } from "./predicate.js";
import { Allow, Continue, deny, type PredicateResult } from "./result.js";
import { MismatchedQuotesError, splitWords } from "./shellwords.js";

export interface Command {
  /** Command name with the leading slash, without the @botname suffix */
  name: string;
  /** Bot username from `/cmd@botname`, if present */
  botName: string | null;
  /** Shell-word tokenized arguments following the command */
  args: string[];
  /** The message carrying the command */
  message: Message;
}

function isWellFormedUtf16(value: string): boolean {
  for (let i = 0; i < value.length; i++) {
    const unit = value.charCodeAt(i);
    if (unit >= 0xd800 && unit <= 0xdbff) {
      const next = value.charCodeAt(i + 1);
      if (!(next >= 0xdc00 && next <= 0xdfff)) return false;
      i++;
    } else if (unit >= 0xdc00 && unit <= 0xdfff) {
      return false;
    }
  }
  return true;
}

function findCommandEntity(entities: MessageEntity[] | undefined): MessageEntity | undefined {
  return entities?.find((entity) => entity.type === "bot_command");
}

/**
 * Parse a command from a message.
 * Returns undefined when the message has no text or no bot_command entity.
 */
export function parseCommand(message: Message): Command | undefined {
  const text = message.text;
  const entity = findCommandEntity(message.entities);
  if (text === undefined || entity === undefined) return undefined;

  const end = entity.offset + entity.length;
  if (entity.offset < 0 || entity.length <= 0 || end > text.length) {
    throw new CommandError(
      "entity-out-of-range",
      `entity [${entity.offset}, ${end}) is outside of text with length ${text.length}`
    );
  }

  const raw = text.slice(entity.offset, end);
  const rest = text.slice(end);
  if (!isWellFormedUtf16(raw) || !isWellFormedUtf16(rest)) {
    throw new CommandError("invalid-utf16", "text contains an unpaired UTF-16 surrogate");
  }

  const at = raw.indexOf("@");
  const name = at === -1 ? raw : raw.slice(0, at);
  const botName = at === -1 ? null : raw.slice(at + 1);

  let args: string[];
  try {
    args = splitWords(rest);
  } catch (err) {
    if (err instanceof MismatchedQuotesError) {
      throw new CommandError("mismatched-quotes", err.message);
    }
    throw err;
  }

  return { name, botName, args, message };
}

export const command: Extractor<Command> = ({ update }) => {
  const message = getMessage(update);
  return message === undefined ? undefined : parseCommand(message);
};

/**
 * Guard that lets a handler run only for one command name (with leading slash)
 */
export class CommandPredicate implements Guard<Command> {
  readonly name: string;
  readonly extractor = command;

  constructor(private readonly command: string) {
    this.name = `command ${command}`;
  }

  handle(input: Command): PredicateResult {
    return input.name === this.command ? Allow : deny(Continue);
  }
}

/**
 * Run `handler` only for `/name` commands
 */
export function commandHandler<I>(name: string, extractor: Extractor<I>, handler: Handler<I>): Predicate<Command, I> {
  return new Predicate(new CommandPredicate(name), extractor, handler);
}
