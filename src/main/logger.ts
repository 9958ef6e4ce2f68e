export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR'

export type LogData = Record<string, unknown>

export interface LogEntry extends LogData {
  timestamp: string
  level: LogLevel
  pid: number
  message: string
  scope?: string
}

export type LogSink = (entry: LogEntry) => void

const LEVEL_RANK: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_RANK
}

function levelFromEnv(): LogLevel {
  const raw = (process.env.SWEEPWISE_LOG_LEVEL ?? '').toUpperCase()
  return isLogLevel(raw) ? raw : 'INFO'
}

// Errors do not survive JSON.stringify, flatten them first
function normalize(data?: LogData): LogData {
  if (!data) return {}
  const out: LogData = {}
  for (const [key, value] of Object.entries(data)) {
    out[key] = value instanceof Error ? { name: value.name, message: value.message } : value
  }
  return out
}

const consoleSink: LogSink = (entry) => {
  const line = JSON.stringify(entry)
  // stdout is reserved for reports
  console.error(line)
}

let sink: LogSink = consoleSink
let minLevel: LogLevel = levelFromEnv()

export function setLogSink(next: LogSink | null): void {
  sink = next ?? consoleSink
}

export function setLogLevel(level: LogLevel): void {
  minLevel = level
}

export function log(level: LogLevel, message: string, data?: LogData, scope?: string): void {
  if (LEVEL_RANK[level] < LEVEL_RANK[minLevel]) return

  const entry: LogEntry = {
    ...normalize(data),
    timestamp: new Date().toISOString(),
    level,
    pid: process.pid,
    message
  }
  if (scope) entry.scope = scope

  sink(entry)
}

export interface Logger {
  info(msg: string, data?: LogData): void
  warn(msg: string, data?: LogData): void
  error(msg: string, data?: LogData): void
  debug(msg: string, data?: LogData): void
  child(scope: string): Logger
}

function createLogger(scope?: string): Logger {
  return {
    info: (msg, data) => log('INFO', msg, data, scope),
    warn: (msg, data) => log('WARN', msg, data, scope),
    error: (msg, data) => log('ERROR', msg, data, scope),
    debug: (msg, data) => log('DEBUG', msg, data, scope),
    child: (child) => createLogger(scope ? `${scope}.${child}` : child)
  }
}

export const logger = createLogger()
