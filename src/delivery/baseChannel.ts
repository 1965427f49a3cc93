import type { DeliveryResult, LabDocument } from "../types";
import type { DeliveryChannel } from "./types";

export abstract class BaseDeliveryChannel implements DeliveryChannel {
  abstract readonly name: string;

  abstract sendDocument(userId: number, document: LabDocument): Promise<DeliveryResult>;

  abstract notify(userId: number, text: string): Promise<DeliveryResult>;

  protected ensureConfigured(ready: boolean): void {
    if (!ready) {
      throw new Error(`${this.name} delivery channel is not configured`);
    }
  }

  protected failure(error: unknown): DeliveryResult {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
}
