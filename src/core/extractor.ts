/**
 * Extractors convert the update envelope into the typed value a handler asks for.
 *
 * An extractor returns `undefined` when the update does not carry such a value
 * ("not applicable", the handler is skipped) and throws when decoding itself fails.
 */

import type {
  CallbackQuery,
  Chat,
  ChatJoinRequest,
  ChatMemberUpdated,
  ChosenInlineResult,
  InlineQuery,
  Message,
  Poll,
  PollAnswer,
  PreCheckoutQuery,
  ShippingQuery,
  Update,
  User,
} from "grammy/types";
import type { Context, ServiceKey } from "../context.js";
import { ExtractionError, MissingServiceError, describeError } from "../errors.js";
import {
  getChat,
  getChatId,
  getChatUsername,
  getMessage,
  getText,
  getUser,
  getUserId,
  getUsername,
} from "../update.js";

/**
 * The pair threaded through every pipeline stage
 */
export interface HandlerInput {
  readonly update: Update;
  readonly context: Context;
}

export type Extractor<T> = (input: HandlerInput) => T | undefined | Promise<T | undefined>;

/**
 * Run an extractor, wrapping foreign failures into ExtractionError
 */
export async function extract<T>(extractor: Extractor<T>, input: HandlerInput): Promise<T | undefined> {
  try {
    return await extractor(input);
  } catch (err) {
    if (err instanceof ExtractionError) throw err;
    throw new ExtractionError(extractor.name || "anonymous", describeError(err), { cause: err });
  }
}

// === Tuple extraction ===

const empty: Extractor<unknown[]> = () => [];

/**
 * Extend a tuple extractor with one more member; the member only runs when the head matched
 */
export function append<T extends unknown[], U>(head: Extractor<T>, next: Extractor<U>): Extractor<[...T, U]> {
  return async (input) => {
    const values = await extract(head, input);
    if (values === undefined) return undefined;
    const value = await extract(next, input);
    if (value === undefined) return undefined;
    return [...values, value];
  };
}

/**
 * Combine extractors into one producing a tuple.
 * Members run in order; the first `undefined` or failure short-circuits the rest.
 */
export function all<A>(a: Extractor<A>): Extractor<[A]>;
export function all<A, B>(a: Extractor<A>, b: Extractor<B>): Extractor<[A, B]>;
export function all<A, B, C>(a: Extractor<A>, b: Extractor<B>, c: Extractor<C>): Extractor<[A, B, C]>;
export function all<A, B, C, D>(
  a: Extractor<A>,
  b: Extractor<B>,
  c: Extractor<C>,
  d: Extractor<D>
): Extractor<[A, B, C, D]>;
export function all<A, B, C, D, E>(
  a: Extractor<A>,
  b: Extractor<B>,
  c: Extractor<C>,
  d: Extractor<D>,
  e: Extractor<E>
): Extractor<[A, B, C, D, E]>;
export function all<A, B, C, D, E, F>(
  a: Extractor<A>,
  b: Extractor<B>,
  c: Extractor<C>,
  d: Extractor<D>,
  e: Extractor<E>,
  f: Extractor<F>
): Extractor<[A, B, C, D, E, F]>;
export function all(...extractors: Extractor<unknown>[]): Extractor<unknown[]> {
  return extractors.reduce<Extractor<unknown[]>>((acc, next) => append(acc, next), empty);
}

// === Built-in extractors ===

export const input: Extractor<HandlerInput> = (value) => value;

export const update: Extractor<Update> = (value) => value.update;

/** Always present; for handlers that need nothing from the update */
export const unit: Extractor<null> = () => null;

export const chatId: Extractor<number> = ({ update }) => getChatId(update);
export const chatUsername: Extractor<string> = ({ update }) => getChatUsername(update);
export const chat: Extractor<Chat> = ({ update }) => getChat(update);

export const userId: Extractor<number> = ({ update }) => getUserId(update);
export const username: Extractor<string> = ({ update }) => getUsername(update);
export const user: Extractor<User> = ({ update }) => getUser(update);

export const message: Extractor<Message> = ({ update }) => getMessage(update);
export const text: Extractor<string> = ({ update }) => getText(update);

export const callbackQuery: Extractor<CallbackQuery> = ({ update }) => update.callback_query;
export const inlineQuery: Extractor<InlineQuery> = ({ update }) => update.inline_query;
export const chosenInlineResult: Extractor<ChosenInlineResult> = ({ update }) => update.chosen_inline_result;
export const shippingQuery: Extractor<ShippingQuery> = ({ update }) => update.shipping_query;
export const preCheckoutQuery: Extractor<PreCheckoutQuery> = ({ update }) => update.pre_checkout_query;
export const poll: Extractor<Poll> = ({ update }) => update.poll;
export const pollAnswer: Extractor<PollAnswer> = ({ update }) => update.poll_answer;
export const myChatMember: Extractor<ChatMemberUpdated> = ({ update }) => update.my_chat_member;
export const chatMember: Extractor<ChatMemberUpdated> = ({ update }) => update.chat_member;
export const chatJoinRequest: Extractor<ChatJoinRequest> = ({ update }) => update.chat_join_request;

/**
 * Fetch a registered service; fails (rather than skipping) when the key was never registered
 */
export function service<T>(key: ServiceKey<T>): Extractor<T> {
  return ({ context }) => {
    if (!context.has(key)) {
      throw new MissingServiceError(key.name);
    }
    return context.get(key);
  };
}
