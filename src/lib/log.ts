export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function parseLevel(raw: string | undefined): LogLevel {
  const normalized = (raw ?? "").trim().toLowerCase();
  if (normalized === "debug" || normalized === "info" || normalized === "warn" || normalized === "error") {
    return normalized;
  }
  if (normalized === "warning") return "warn";
  return "info";
}

export interface LogSink {
  write(level: LogLevel, line: string): void;
}

const consoleSink: LogSink = {
  write(level, line) {
    if (level === "error") console.error(line);
    else if (level === "warn") console.warn(line);
    else console.log(line);
  },
};

let minLevel: LogLevel = parseLevel(process.env.LOG_LEVEL);
let pretty = (process.env.LOG_FORMAT ?? "").trim().toLowerCase() === "pretty";
let sink: LogSink = consoleSink;

export function configureLogging(opts: { level?: string; format?: string; sink?: LogSink }): void {
  if (opts.level !== undefined) minLevel = parseLevel(opts.level);
  if (opts.format !== undefined) pretty = opts.format.trim().toLowerCase() === "pretty";
  if (opts.sink !== undefined) sink = opts.sink;
}

function jsonSafe(_key: string, value: unknown): unknown {
  if (typeof value === "bigint") return value.toString();
  if (value instanceof Error) return { name: value.name, message: value.message };
  return value;
}

function formatPretty(level: LogLevel, scope: string, event: string, fields: LogFields): string {
  const ts = new Date().toISOString().replace("T", " ").slice(0, 19);
  const pairs = Object.entries(fields)
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => `${k}=${typeof v === "string" ? v : JSON.stringify(v, jsonSafe)}`)
    .join(" ");
  return `${ts} [${level.toUpperCase()}] ${scope}: ${event}${pairs ? ` ${pairs}` : ""}`;
}

export class Logger {
  constructor(
    readonly scope: string,
    private readonly bound: LogFields = {},
  ) {}

  child(fields: LogFields): Logger {
    return new Logger(this.scope, { ...this.bound, ...fields });
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
  }

  log(level: LogLevel, event: string, fields: LogFields = {}): void {
    if (!this.isEnabled(level)) return;
    const merged = { ...this.bound, ...fields };
    const line = pretty
      ? formatPretty(level, this.scope, event, merged)
      : JSON.stringify(
          { ts: new Date().toISOString(), level, scope: this.scope, event, ...merged },
          jsonSafe,
        );
    sink.write(level, line);
  }

  debug(event: string, fields?: LogFields): void {
    this.log("debug", event, fields);
  }

  info(event: string, fields?: LogFields): void {
    this.log("info", event, fields);
  }

  warn(event: string, fields?: LogFields): void {
    this.log("warn", event, fields);
  }

  error(event: string, fields?: LogFields): void {
    this.log("error", event, fields);
  }
}

export function createLogger(scope: string, fields?: LogFields): Logger {
  return new Logger(scope, fields);
}
