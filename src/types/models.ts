export interface MonitoredUser {
  userId: number;
  username: string;
  secret: string;
  active: boolean;
  createdAt: string;
  lastCheckAt?: string;
  lastStatus?: string;
}

export interface ResultItem {
  label: string;
  ready: boolean;
}

export interface ResultSet {
  items: ResultItem[];
  allReady: boolean;
}

export interface LabDocument {
  content: Buffer;
  filename: string;
  contentType: string;
}

export type DeliveryResult = { ok: true } | { ok: false; error: string };

export type CycleState =
  | "START"
  | "AUTHENTICATED"
  | "FETCHED"
  | "PARSED"
  | "NOT_READY"
  | "READY"
  | "EXTRACTED"
  | "DELIVERED"
  | "DEREGISTERED"
  | "FAILED"
  | "SKIPPED";

export type TerminalCycleState = Extract<CycleState, "NOT_READY" | "DEREGISTERED" | "FAILED" | "SKIPPED">;

/** Scheduled cycles may notify the user on their own; manual ones answer the caller. */
export type CycleTrigger = "scheduled" | "manual";

export interface CycleOutcome {
  userId: number;
  state: TerminalCycleState;
  status: string;
  /** The step that was being attempted when the cycle failed. */
  failedAt?: CycleState;
  /** Reason carried by an auth or fetch failure, e.g. "invalid_credentials" or "unreachable". */
  reason?: string;
  error?: string;
  resultSet?: ResultSet;
}

export interface BatchSummary {
  processed: number;
  delivered: number;
  notReady: number;
  failed: number;
  skipped: number;
  abandoned: number;
}
