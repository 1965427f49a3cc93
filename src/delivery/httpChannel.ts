import crypto from "node:crypto";
import { sleep } from "../core/fetch";
import type { FetchLike } from "../core/fetch";
import type { DeliveryResult, LabDocument } from "../types";
import { BaseDeliveryChannel } from "./baseChannel";

export interface HttpDeliveryOptions {
  endpoint?: string;
  token?: string;
  fetchFn: FetchLike;
  timeoutMs?: number;
  maxRetries?: number;
  retryDelayMs?: number;
}

function isRetriableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

class PermanentHttpDeliveryError extends Error {}

/**
 * Posts the report as JSON to a webhook. The idempotency key is derived from
 * the user and the document hash, so a retried POST can be de-duplicated by
 * the receiver.
 */
export class HttpDeliveryChannel extends BaseDeliveryChannel {
  readonly name = "http";
  private readonly endpoint?: string;
  private readonly token?: string;
  private readonly fetchFn: FetchLike;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;

  constructor(options: HttpDeliveryOptions) {
    super();
    this.endpoint = options.endpoint;
    this.token = options.token;
    this.fetchFn = options.fetchFn;
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 250;
  }

  async sendDocument(userId: number, document: LabDocument): Promise<DeliveryResult> {
    try {
      this.ensureConfigured(Boolean(this.endpoint));
      const sha256 = crypto.createHash("sha256").update(document.content).digest("hex");
      const body = JSON.stringify({
        kind: "document",
        userId,
        filename: document.filename,
        contentType: document.contentType,
        contentBase64: document.content.toString("base64"),
        sha256,
        sentAt: new Date().toISOString(),
      });
      await this.post(this.endpoint ?? "", body, `${userId}:${sha256}`);
      return { ok: true };
    } catch (error) {
      return this.failure(error);
    }
  }

  async notify(userId: number, text: string): Promise<DeliveryResult> {
    try {
      this.ensureConfigured(Boolean(this.endpoint));
      const sentAt = new Date().toISOString();
      const body = JSON.stringify({ kind: "notice", userId, text, sentAt });
      await this.post(this.endpoint ?? "", body, `${userId}:notice:${sentAt}`);
      return { ok: true };
    } catch (error) {
      return this.failure(error);
    }
  }

  private async post(endpoint: string, body: string, idempotencyKey: string): Promise<void> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      "Idempotency-Key": idempotencyKey,
    };
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`;
    }

    let attempt = 0;
    while (true) {
      attempt += 1;
      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
      try {
        const response = await this.fetchFn(endpoint, {
          method: "POST",
          headers,
          body,
          signal: controller.signal,
        });

        if (response.status >= 200 && response.status < 300) {
          return;
        }

        const responseText = await response.text();
        if (!isRetriableStatus(response.status)) {
          throw new PermanentHttpDeliveryError(`HTTP delivery permanent error ${response.status}: ${responseText}`);
        }

        if (attempt > this.maxRetries) {
          throw new Error(`HTTP delivery exhausted retries on status ${response.status}: ${responseText}`);
        }
      } catch (error) {
        if (error instanceof PermanentHttpDeliveryError) {
          throw error;
        }
        if (attempt > this.maxRetries) {
          throw error;
        }
      } finally {
        clearTimeout(timeout);
      }

      await sleep(this.retryDelayMs * attempt);
    }
  }
}
