export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

type EmitLevel = Exclude<LogLevel, "silent">;

const ORDER: Record<EmitLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export type LogEvent = {
  time: string;
  level: EmitLevel;
  msg: string;
  [k: string]: unknown;
};

export type Logger = {
  child(fields: Record<string, unknown>): Logger;
  debug(msg: string, fields?: Record<string, unknown>): void;
  info(msg: string, fields?: Record<string, unknown>): void;
  warn(msg: string, fields?: Record<string, unknown>): void;
  error(msg: string, fields?: Record<string, unknown>): void;
};

// Receives one formatted line per event. Errors go to `stderr`, the rest to `stdout`.
export type LogSink = (line: string, level: EmitLevel) => void;

export type LoggerOptions = {
  level?: LogLevel;
  base?: Record<string, unknown>;
  json?: boolean;
  sink?: LogSink;
  now?: () => Date;
};

const consoleSink: LogSink = (line, level) => {
  if (level === "error") console.error(line);
  else console.log(line);
};

export function parseLogLevel(s: string | undefined): LogLevel {
  const v = String(s ?? "").trim().toLowerCase();
  if (v === "debug" || v === "info" || v === "warn" || v === "error" || v === "silent") return v;
  return "info";
}

export function formatLogEvent(ev: LogEvent, json: boolean): string {
  if (json) return JSON.stringify(ev);
  const parts: string[] = [ev.time, ev.level.toUpperCase()];
  if (ev.component) parts.push(`[${String(ev.component)}]`);
  parts.push(ev.msg);
  const { time: _time, level: _level, msg: _msg, component: _component, ...rest } = ev;
  const tail = Object.keys(rest).length ? ` ${JSON.stringify(rest)}` : "";
  return parts.join(" ") + tail;
}

export function createLogger(opts: LoggerOptions = {}): Logger {
  const level: LogLevel = opts.level ?? parseLogLevel(process.env.CYTOEVT_LOG_LEVEL);
  const base: Record<string, unknown> = { ...(opts.base ?? {}) };
  const json = opts.json ?? String(process.env.CYTOEVT_LOG_FORMAT ?? "").toLowerCase() === "json";
  const sink = opts.sink ?? consoleSink;
  const now = opts.now ?? (() => new Date());

  function shouldLog(lvl: EmitLevel): boolean {
    if (level === "silent") return false;
    return ORDER[lvl] >= ORDER[level];
  }

  function emit(lvl: EmitLevel, msg: string, fields?: Record<string, unknown>) {
    if (!shouldLog(lvl)) return;
    const ev: LogEvent = { time: now().toISOString(), level: lvl, msg, ...base, ...(fields ?? {}) };
    sink(formatLogEvent(ev, json), lvl);
  }

  return {
    child: (fields) => createLogger({ level, base: { ...base, ...fields }, json, sink, now }),
    debug: (msg, fields) => emit("debug", msg, fields),
    info: (msg, fields) => emit("info", msg, fields),
    warn: (msg, fields) => emit("warn", msg, fields),
    error: (msg, fields) => emit("error", msg, fields)
  };
}

// Library default: callers opt in to output by passing their own logger.
export function silentLogger(): Logger {
  return createLogger({ level: "silent" });
}
