import { config, type LogLevel } from "./config.js";

const order: Record<LogLevel, number> = { error: 0, warn: 1, info: 2, debug: 3 };

function preview(s: string, limit = 160): string {
  return s.length > limit ? s.slice(0, limit) + "…" : s;
}

export type LogContext = Record<string, unknown>;

export interface Logger {
  info(msg: string, ctx?: LogContext): void;
  warn(msg: string, ctx?: LogContext): void;
  error(msg: string, ctx?: LogContext): void;
  debug(msg: string, ctx?: LogContext): void;
  /** Logger whose lines all carry `base`. */
  child(base: LogContext): Logger;
  preview(s: string, limit?: number): string;
}

function write(level: LogLevel, msg: string, base: LogContext, ctx?: LogContext) {
  if (order[level] > order[config.logLevel]) return;
  const payload = { time: new Date().toISOString(), level, msg, ...base, ...ctx };
  // stdout carries the probe output; logs go to stderr
  process.stderr.write(JSON.stringify(payload) + "\n");
}

function makeLogger(base: LogContext): Logger {
  return {
    info: (msg, ctx) => write("info", msg, base, ctx),
    warn: (msg, ctx) => write("warn", msg, base, ctx),
    error: (msg, ctx) => write("error", msg, base, ctx),
    debug: (msg, ctx) => write("debug", msg, base, ctx),
    child: (extra) => makeLogger({ ...base, ...extra }),
    preview,
  };
}

export const logger = makeLogger({});
