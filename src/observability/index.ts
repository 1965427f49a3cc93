export { errorMessage, Logger } from "./logger";
export type { LogWriter, LoggerContext } from "./logger";
export { MetricsRegistry } from "./metrics";
export { createRunId } from "./runId";
export type { LogFields, LogLevel, MetricCounterName, MetricTimerName } from "./types";
