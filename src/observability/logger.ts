import { LogFields, LogLevel } from "./types";

export interface LoggerContext {
  component: string;
  runId: string;
  workflow?: string;
}

const SEVERITY: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in SEVERITY;
}

function levelFromEnv(): LogLevel {
  const raw = process.env.LOG_LEVEL?.trim().toLowerCase();
  return isLogLevel(raw) ? raw : "info";
}

/**
 * One JSON object per line. Errors go to stderr so that `status` and `show`
 * output on stdout stays parseable.
 */
export class Logger {
  constructor(
    private readonly context: LoggerContext,
    private readonly minLevel: LogLevel = levelFromEnv(),
  ) {}

  child(component: string, workflow = this.context.workflow): Logger {
    return new Logger({ component, runId: this.context.runId, workflow }, this.minLevel);
  }

  get runId(): string {
    return this.context.runId;
  }

  debug(event: string, fields?: LogFields): void {
    this.emit("debug", event, fields);
  }

  info(event: string, fields?: LogFields): void {
    this.emit("info", event, fields);
  }

  warn(event: string, fields?: LogFields): void {
    this.emit("warn", event, fields);
  }

  error(event: string, fields?: LogFields): void {
    this.emit("error", event, fields);
  }

  private emit(level: LogLevel, event: string, fields: LogFields = {}): void {
    if (SEVERITY[level] < SEVERITY[this.minLevel]) {
      return;
    }
    const entry = JSON.stringify({
      ts: new Date().toISOString(),
      level,
      msg: event,
      ...this.context,
      ...fields,
    });
    (level === "error" ? process.stderr : process.stdout).write(`${entry}\n`);
  }
}
