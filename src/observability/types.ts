export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  userId?: number;
  url?: string;
  state?: string;
  attempt?: number;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "cycles_started"
  | "results_pending"
  | "documents_delivered"
  | "cycles_failed"
  | "users_skipped";

export type MetricTimerName = "cycle_ms" | "page_fetch_ms";
