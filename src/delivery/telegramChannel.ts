import type { TelegramClient } from "../telegram/client";
import type { DeliveryResult, LabDocument } from "../types";
import { BaseDeliveryChannel } from "./baseChannel";

export const DELIVERY_CAPTION =
  "Lab results ready! Your report is attached.\n" +
  "Monitoring for this account has stopped. Use /add to monitor new results.";

/** Sends the report to the user's Telegram chat; the user id is the chat id. */
export class TelegramDeliveryChannel extends BaseDeliveryChannel {
  readonly name = "telegram";
  private readonly client?: TelegramClient;

  constructor(client?: TelegramClient) {
    super();
    this.client = client;
  }

  async sendDocument(userId: number, document: LabDocument): Promise<DeliveryResult> {
    try {
      this.ensureConfigured(this.client !== undefined);
      await this.client?.sendDocument(userId, document, DELIVERY_CAPTION);
      return { ok: true };
    } catch (error) {
      return this.failure(error);
    }
  }

  async notify(userId: number, text: string): Promise<DeliveryResult> {
    try {
      this.ensureConfigured(this.client !== undefined);
      await this.client?.sendMessage(userId, text);
      return { ok: true };
    } catch (error) {
      return this.failure(error);
    }
  }
}
