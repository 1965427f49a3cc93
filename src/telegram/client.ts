import { Blob } from "node:buffer";
import { FormData } from "../core/fetch";
import type { FetchLike } from "../core/fetch";
import type { LabDocument } from "../types";
import { isTelegramEnvelope, isTelegramUpdate, rawUpdateId } from "./messages";
import type { TelegramUpdate } from "./messages";

export interface TelegramClientOptions {
  token: string;
  apiBaseUrl: string;
  fetchFn: FetchLike;
  requestTimeoutMs: number;
}

export class TelegramApiError extends Error {}

export interface UpdateBatch {
  updates: TelegramUpdate[];
  /** Offset that acknowledges every returned entry, including ones that failed validation. */
  nextOffset?: number;
}

export class TelegramClient {
  private readonly options: TelegramClientOptions;

  constructor(options: TelegramClientOptions) {
    this.options = options;
  }

  async getUpdates(offset: number | undefined, timeoutSeconds: number, signal?: AbortSignal): Promise<UpdateBatch> {
    const body = JSON.stringify({ offset, timeout: timeoutSeconds, allowed_updates: ["message"] });
    const result = await this.call("getUpdates", body, (timeoutSeconds + 10) * 1000, signal);
    if (!Array.isArray(result)) {
      throw new TelegramApiError("getUpdates returned a non-array result");
    }

    let nextOffset: number | undefined;
    for (const entry of result) {
      const id = rawUpdateId(entry);
      if (id !== undefined) {
        nextOffset = Math.max(nextOffset ?? 0, id + 1);
      }
    }
    return { updates: result.filter(isTelegramUpdate), nextOffset };
  }

  async sendMessage(chatId: number, text: string): Promise<void> {
    await this.call("sendMessage", JSON.stringify({ chat_id: chatId, text }), this.options.requestTimeoutMs);
  }

  async sendDocument(chatId: number, document: LabDocument, caption?: string): Promise<void> {
    const form = new FormData();
    form.append("chat_id", String(chatId));
    form.append("document", new Blob([document.content], { type: document.contentType }), document.filename);
    if (caption) {
      form.append("caption", caption);
    }
    await this.call("sendDocument", form, this.options.requestTimeoutMs);
  }

  private async call(method: string, body: string | FormData, timeoutMs: number, signal?: AbortSignal): Promise<unknown> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    const forwardAbort = () => controller.abort();
    signal?.addEventListener("abort", forwardAbort, { once: true });

    const headers: Record<string, string> = {};
    if (typeof body === "string") {
      headers["Content-Type"] = "application/json";
    }

    try {
      const url = `${this.options.apiBaseUrl.replace(/\/+$/, "")}/bot${this.options.token}/${method}`;
      const response = await this.options.fetchFn(url, { method: "POST", headers, body, signal: controller.signal });
      const text = await response.text();

      let parsed: unknown;
      try {
        parsed = JSON.parse(text);
      } catch {
        throw new TelegramApiError(`${method} returned HTTP ${response.status} with a non-JSON body`);
      }
      if (!isTelegramEnvelope(parsed)) {
        throw new TelegramApiError(`${method} returned an unexpected payload`);
      }
      if (!parsed.ok) {
        throw new TelegramApiError(`${method} failed: ${parsed.description ?? `HTTP ${response.status}`}`);
      }
      return parsed.result;
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener("abort", forwardAbort);
    }
  }
}
