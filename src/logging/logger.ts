// =============================================================================
// Logger — Structured, level-filtered log entries handed to a pluggable sink
// =============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogLevelSetting = LogLevel | "silent";

export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  event: string;
  component: string;
  sessionId?: string;
  data?: Record<string, unknown>;
}

export type LogSink = (entry: LogEntry) => void;

export interface LoggerOptions {
  /** Minimum level written (default: "info"). "silent" drops everything. */
  level?: LogLevelSetting;
  /** Custom sink (defaults to a one-line writer on stderr) */
  sink?: LogSink;
  /** Component name stamped on every entry (default: "gsp") */
  component?: string;
}

export interface Logger {
  debug(event: string, data?: Record<string, unknown>): void;
  info(event: string, data?: Record<string, unknown>): void;
  warn(event: string, data?: Record<string, unknown>): void;
  error(event: string, data?: Record<string, unknown>): void;
  /** Logger sharing sink and level, stamping `sessionId` on its entries. */
  withSession(sessionId: string | undefined): Logger;
}

const LEVEL_VALUES: Record<LogLevelSetting, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const satisfies readonly LogLevelSetting[];

export function formatLogEntry(entry: LogEntry): string {
  const prefix = `[${new Date(entry.timestamp).toISOString()}] [${entry.level}] [${entry.component}]`;
  const session = entry.sessionId ? ` session=${entry.sessionId}` : "";
  const data = entry.data && Object.keys(entry.data).length > 0 ? ` ${JSON.stringify(entry.data)}` : "";
  return `${prefix} ${entry.event}${session}${data}`;
}

export const consoleSink: LogSink = (entry) => {
  // eslint-disable-next-line no-console
  console.error(formatLogEntry(entry));
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const minLevel = LEVEL_VALUES[options.level ?? "info"];
  const sink = options.sink ?? consoleSink;
  const component = options.component ?? "gsp";

  function build(sessionId: string | undefined): Logger {
    function emit(level: LogLevel, event: string, data?: Record<string, unknown>): void {
      if (LEVEL_VALUES[level] < minLevel) return;
      const entry: LogEntry = { timestamp: Date.now(), level, event, component };
      if (sessionId !== undefined) entry.sessionId = sessionId;
      if (data !== undefined) entry.data = data;
      sink(entry);
    }

    return {
      debug: (event, data) => emit("debug", event, data),
      info: (event, data) => emit("info", event, data),
      warn: (event, data) => emit("warn", event, data),
      error: (event, data) => emit("error", event, data),
      withSession: (id) => build(id),
    };
  }

  return build(undefined);
}

/** Logger that writes nothing. */
export const silentLogger: Logger = createLogger({ level: "silent" });
