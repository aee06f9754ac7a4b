import * as dotenv from "dotenv"

dotenv.config()

export type LogLevel = "error" | "warn" | "info" | "debug"

export interface AppConfig {
  host: string
  port: number
  readBytes: number // upper bound of a single socket read
  logLevel: LogLevel
}

function parseNumber(val: string | undefined, fallback: number): number {
  if (!val) return fallback
  const n = Number(val)
  return Number.isInteger(n) && n > 0 ? n : fallback
}

function parsePort(val: string | undefined, fallback: number): number {
  const n = parseNumber(val, fallback)
  return n <= 65535 ? n : fallback
}

function parseLogLevel(val: string | undefined, fallback: LogLevel): LogLevel {
  const v = (val || "").toLowerCase()
  switch (v) {
    case "error":
    case "warn":
    case "info":
    case "debug":
      return v
    default:
      return fallback
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    host: env.PROBE_HOST?.trim() || "127.0.0.1",
    port: parsePort(env.PROBE_PORT, 8080),
    readBytes: parseNumber(env.PROBE_READ_BYTES, 4096),
    logLevel: parseLogLevel(env.LOG_LEVEL, "info"),
  }
}

export const config: AppConfig = loadConfig()
