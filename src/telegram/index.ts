export { TelegramBot } from "./bot";
export type { TelegramBotOptions } from "./bot";
export { TelegramApiError, TelegramClient } from "./client";
export type { TelegramClientOptions, UpdateBatch } from "./client";
export { BotCommandHandler, describeOutcome } from "./commandHandler";
export type { CommandHandlerDeps, Reply } from "./commandHandler";
export { isTelegramEnvelope, isTelegramMessage, isTelegramUpdate, rawUpdateId } from "./messages";
export type { TelegramChat, TelegramEnvelope, TelegramMessage, TelegramUpdate } from "./messages";
