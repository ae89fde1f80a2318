export * from "./result.js";
export * from "./extractor.js";
export { fromFunction, invoke, on, route, type Handler, type UpdateHandler } from "./handler.js";
export { Chain, type ChainOptions, type ChainStrategy } from "./chain.js";
export { Predicate, guard, guarded, type Guard } from "./predicate.js";
export { ErrorDecorator, LoggingErrorHandler, onError, type ErrorHandler, type Recover } from "./error.js";
export { CommandPredicate, command, commandHandler, parseCommand, type Command } from "./command.js";
export { MismatchedQuotesError, splitWords } from "./shellwords.js";
