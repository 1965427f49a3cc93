export type MonitorStage = "authenticate" | "fetch" | "parse" | "extract" | "deliver";

export abstract class MonitorError extends Error {
  abstract readonly stage: MonitorStage;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type AuthFailureReason = "invalid_credentials" | "unreachable" | "unexpected_page";

export class AuthError extends MonitorError {
  readonly stage = "authenticate";
  readonly reason: AuthFailureReason;

  constructor(reason: AuthFailureReason, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.reason = reason;
  }
}

export type FetchFailureReason = "network" | "timeout" | "http_status" | "session_expired";

export class FetchError extends MonitorError {
  readonly stage = "fetch";
  readonly reason: FetchFailureReason;
  readonly statusCode?: number;

  constructor(reason: FetchFailureReason, message: string, options?: { cause?: unknown; statusCode?: number }) {
    super(message, options);
    this.reason = reason;
    this.statusCode = options?.statusCode;
  }

  get transient(): boolean {
    if (this.reason === "network" || this.reason === "timeout") {
      return true;
    }
    if (this.reason === "http_status" && this.statusCode !== undefined) {
      return this.statusCode === 408 || this.statusCode === 429 || this.statusCode >= 500;
    }
    return false;
  }
}

export class ParseError extends MonitorError {
  readonly stage = "parse";
}

export class ExtractError extends MonitorError {
  readonly stage = "extract";
}

export class DeliveryError extends MonitorError {
  readonly stage = "deliver";
}
