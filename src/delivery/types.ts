import type { DeliveryResult, LabDocument } from "../types";

export interface DeliveryChannel {
  readonly name: string;
  sendDocument(userId: number, document: LabDocument): Promise<DeliveryResult>;
  /** Short text notice to the user, such as a login failure on a scheduled check. */
  notify(userId: number, text: string): Promise<DeliveryResult>;
}
