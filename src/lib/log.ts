// One JSON object per line: { msg, ...fields, ts }

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent"

const ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 }

function isLogLevel(v: string): v is LogLevel {
  return Object.prototype.hasOwnProperty.call(ORDER, v)
}

function currentLevel(): LogLevel {
  const raw = (process.env.LOG_LEVEL || "info").toLowerCase()
  return isLogLevel(raw) ? raw : "info"
}

function emit(level: Exclude<LogLevel, "silent">, msg: string, fields: Record<string, unknown>) {
  if (ORDER[level] < ORDER[currentLevel()]) return
  const line = JSON.stringify({ level, msg, ...fields, ts: new Date().toISOString() })
  if (level === "error" || level === "warn") console.error(line)
  else console.log(line)
}

export function logDebug(msg: string, fields: Record<string, unknown> = {}) {
  emit("debug", msg, fields)
}

export function logInfo(msg: string, fields: Record<string, unknown> = {}) {
  emit("info", msg, fields)
}

export function logWarn(msg: string, fields: Record<string, unknown> = {}) {
  emit("warn", msg, fields)
}

export function logError(msg: string, fields: Record<string, unknown> = {}) {
  emit("error", msg, fields)
}
