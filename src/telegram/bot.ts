import { sleep } from "../core/fetch";
import type { Logger } from "../observability";
import { errorMessage } from "../observability";
import type { TelegramClient } from "./client";
import type { BotCommandHandler } from "./commandHandler";
import type { TelegramUpdate } from "./messages";

export interface TelegramBotOptions {
  client: Pick<TelegramClient, "getUpdates" | "sendMessage">;
  handler: BotCommandHandler;
  logger: Logger;
  pollTimeoutSeconds: number;
  errorBackoffMs?: number;
}

export class TelegramBot {
  private readonly options: TelegramBotOptions;
  private offset?: number;
  private controller?: AbortController;
  private loop?: Promise<void>;

  constructor(options: TelegramBotOptions) {
    this.options = options;
  }

  start(): void {
    if (this.loop) {
      return;
    }
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.pollLoop(controller.signal);
    this.options.logger.info("bot_polling_started");
  }

  async stop(): Promise<void> {
    this.controller?.abort();
    await this.loop;
    this.loop = undefined;
    this.controller = undefined;
    this.options.logger.info("bot_polling_stopped");
  }

  async processUpdate(update: TelegramUpdate): Promise<void> {
    this.offset = Math.max(this.offset ?? 0, update.update_id + 1);
    const message = update.message;
    if (!message || message.text === undefined) {
      return;
    }

    const chatId = message.chat.id;
    const reply = (text: string) => this.options.client.sendMessage(chatId, text);
    try {
      await this.options.handler.handle(chatId, message.text, reply);
    } catch (error) {
      this.options.logger.error("bot_command_failed", { userId: chatId, error: errorMessage(error) });
      try {
        await reply("Something went wrong while handling your request. Please try again later.");
      } catch (replyError) {
        this.options.logger.warn("bot_reply_failed", { userId: chatId, error: errorMessage(replyError) });
      }
    }
  }

  private async pollLoop(signal: AbortSignal): Promise<void> {
    const backoffMs = this.options.errorBackoffMs ?? 5_000;

    while (!signal.aborted) {
      try {
        const batch = await this.options.client.getUpdates(this.offset, this.options.pollTimeoutSeconds, signal);
        for (const update of batch.updates) {
          await this.processUpdate(update);
        }
        if (batch.nextOffset !== undefined) {
          this.offset = Math.max(this.offset ?? 0, batch.nextOffset);
        }
      } catch (error) {
        if (signal.aborted) {
          break;
        }
        this.options.logger.warn("bot_poll_failed", { error: errorMessage(error) });
        await sleep(backoffMs);
      }
    }
  }
}
