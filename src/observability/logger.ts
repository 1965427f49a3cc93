import type { LogFields, LogLevel } from "./types";

export interface LoggerContext {
  component: string;
  runId: string;
  bindings?: LogFields;
}

export type LogWriter = (level: LogLevel, line: string) => void;

const REDACTED_KEYS = new Set(["secret", "password", "token", "authorization"]);

function defaultWriter(level: LogLevel, line: string): void {
  if (level === "error") {
    console.error(line);
    return;
  }
  console.log(line);
}

function redact(fields: LogFields): LogFields {
  const output: LogFields = {};
  for (const [key, value] of Object.entries(fields)) {
    output[key] = REDACTED_KEYS.has(key.toLowerCase()) ? "[redacted]" : value;
  }
  return output;
}

export class Logger {
  private readonly context: LoggerContext;
  private readonly writer: LogWriter;

  constructor(context: LoggerContext, writer: LogWriter = defaultWriter) {
    this.context = context;
    this.writer = writer;
  }

  child(component: string, bindings?: LogFields): Logger {
    return new Logger(
      {
        component,
        runId: this.context.runId,
        bindings: { ...(this.context.bindings ?? {}), ...(bindings ?? {}) },
      },
      this.writer,
    );
  }

  debug(msg: string, fields?: LogFields): void {
    this.write("debug", msg, fields);
  }

  info(msg: string, fields?: LogFields): void {
    this.write("info", msg, fields);
  }

  warn(msg: string, fields?: LogFields): void {
    this.write("warn", msg, fields);
  }

  error(msg: string, fields?: LogFields): void {
    this.write("error", msg, fields);
  }

  private write(level: LogLevel, msg: string, fields?: LogFields): void {
    const payload = {
      ts: new Date().toISOString(),
      level,
      msg,
      component: this.context.component,
      runId: this.context.runId,
      ...redact({ ...(this.context.bindings ?? {}), ...(fields ?? {}) }),
    };

    this.writer(level, JSON.stringify(payload));
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
