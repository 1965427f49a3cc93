export interface TelegramChat {
  id: number;
}

export interface TelegramMessage {
  message_id: number;
  chat: TelegramChat;
  text?: string;
}

export interface TelegramUpdate {
  update_id: number;
  message?: TelegramMessage;
}

export interface TelegramEnvelope {
  ok: boolean;
  result?: unknown;
  description?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isTelegramEnvelope(value: unknown): value is TelegramEnvelope {
  if (!isRecord(value)) {
    return false;
  }
  const description = value.description;
  return typeof value.ok === "boolean" && (description === undefined || typeof description === "string");
}

export function isTelegramMessage(value: unknown): value is TelegramMessage {
  if (!isRecord(value)) {
    return false;
  }
  const chat = value.chat;
  const text = value.text;
  return (
    Number.isInteger(value.message_id) &&
    isRecord(chat) &&
    Number.isInteger(chat.id) &&
    (text === undefined || typeof text === "string")
  );
}

export function isTelegramUpdate(value: unknown): value is TelegramUpdate {
  if (!isRecord(value)) {
    return false;
  }
  const message = value.message;
  return Number.isInteger(value.update_id) && (message === undefined || isTelegramMessage(message));
}

/** The update id of any entry Telegram returned, well-formed or not. */
export function rawUpdateId(value: unknown): number | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const id = value.update_id;
  return typeof id === "number" && Number.isInteger(id) ? id : undefined;
}
