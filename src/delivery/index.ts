import type { AppConfig } from "../config";
import type { FetchLike } from "../core/fetch";
import type { TelegramClient } from "../telegram/client";
import { HttpDeliveryChannel } from "./httpChannel";
import { TelegramDeliveryChannel } from "./telegramChannel";
import type { DeliveryChannel } from "./types";

export function createDeliveryChannel(config: AppConfig, fetchFn: FetchLike, telegram?: TelegramClient): DeliveryChannel {
  switch (config.deliveryMode) {
    case "telegram":
      return new TelegramDeliveryChannel(telegram);
    case "http":
      return new HttpDeliveryChannel({
        endpoint: config.httpDeliveryEndpoint,
        token: config.httpDeliveryToken,
        fetchFn,
        timeoutMs: config.requestTimeoutMs,
      });
    default:
      throw new Error(`Unsupported delivery mode: ${String(config.deliveryMode)}`);
  }
}

export { BaseDeliveryChannel } from "./baseChannel";
export { HttpDeliveryChannel } from "./httpChannel";
export type { HttpDeliveryOptions } from "./httpChannel";
export { DELIVERY_CAPTION, TelegramDeliveryChannel } from "./telegramChannel";
export * from "./types";
