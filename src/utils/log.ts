const LEVEL = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3
} as const

export type LogLevelName = keyof typeof LEVEL
type LevelValue = (typeof LEVEL)[LogLevelName]

export interface Logger {
  debug(msg: string, ...args: unknown[]): void
  info(msg: string, ...args: unknown[]): void
  warn(msg: string, ...args: unknown[]): void
  error(msg: string, ...args: unknown[]): void
}

type SinkFn = (msg: string, ...args: unknown[]) => void

interface Sink {
  debug: SinkFn
  info: SinkFn
  warn: SinkFn
  error: SinkFn
}

function isTruthyEnv(v: string | undefined): boolean {
  if (v == null || v === "") return false
  const s = String(v).trim().toLowerCase()
  if (!s) return false
  return !["0", "false", "no", "n", "off"].includes(s)
}

export function isColorEnabled(): boolean {
  // https://no-color.org/
  if (process.env.NO_COLOR != null) return false
  if (process.env.TERM && String(process.env.TERM).toLowerCase() === "dumb") return false
  if (process.env.FORCE_COLOR != null) return isTruthyEnv(process.env.FORCE_COLOR)
  return Boolean(process.stdout?.isTTY)
}

const ANSI = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  magenta: "\x1b[35m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m"
}

function colorWrap(ansiCode: string) {
  return (input: unknown): string => {
    const s = String(input)
    if (!isColorEnabled()) return s
    return `${ansiCode}${s}${ANSI.reset}`
  }
}

export const c = {
  bold: colorWrap(ANSI.bold),
  dim: colorWrap(ANSI.dim),
  gray: colorWrap(ANSI.gray),
  red: colorWrap(ANSI.red),
  green: colorWrap(ANSI.green),
  yellow: colorWrap(ANSI.yellow),
  blue: colorWrap(ANSI.blue),
  magenta: colorWrap(ANSI.magenta),
  cyan: colorWrap(ANSI.cyan)
}

export function normalizeLevel(v: unknown, fallback: LevelValue = LEVEL.info): LevelValue {
  const s = String(v ?? "").trim().toLowerCase()
  if (!s) return fallback
  if (s === "error" || s === "err") return LEVEL.error
  if (s === "warn" || s === "warning") return LEVEL.warn
  if (s === "info") return LEVEL.info
  if (s === "debug" || s === "dbg" || s === "trace") return LEVEL.debug
  const n = Number(s)
  if (Number.isFinite(n)) {
    const i = Math.trunc(n)
    if (i <= 0) return LEVEL.error
    if (i === 1) return LEVEL.warn
    if (i === 2) return LEVEL.info
    return LEVEL.debug
  }
  return fallback
}

function envLogLevel(): LevelValue {
  const raw = process.env.LOG_LEVEL || process.env.LOGLEVEL || ""
  if (raw) return normalizeLevel(raw, LEVEL.info)
  const debug = String(process.env.DEBUG || "").trim()
  if (debug && debug !== "0" && debug.toLowerCase() !== "false") return LEVEL.debug
  return LEVEL.info
}

function getSink(): Sink {
  const consoleDebug = console.debug ? console.debug.bind(console) : console.log.bind(console)
  return {
    debug: consoleDebug,
    info: console.log.bind(console),
    warn: console.warn.bind(console),
    error: console.error.bind(console)
  }
}

export function setupUtf8(): void {
  for (const stream of [process.stdout, process.stderr]) {
    if (stream && !stream.destroyed) stream.setDefaultEncoding("utf8")
  }
}

export function fmtKv(obj: Record<string, unknown> | null | undefined): string {
  if (!obj || typeof obj !== "object") return ""
  const parts: string[] = []
  for (const [k, v] of Object.entries(obj)) {
    if (v == null || v === "") continue
    parts.push(`${k}=${String(v)}`)
  }
  return parts.join(" ")
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message || e.name
  return String(e)
}

export function createLogger(tag = "", { level }: { level?: LogLevelName } = {}): Logger {
  const sink = getSink()
  const cur = normalizeLevel(level, envLogLevel())
  const prefix = tag ? `[${String(tag)}] ` : ""
  const should = (lvl: LevelValue) => lvl <= cur

  return {
    debug(msg, ...args) {
      if (!should(LEVEL.debug)) return
      sink.debug(prefix + String(msg), ...args)
    },
    info(msg, ...args) {
      if (!should(LEVEL.info)) return
      sink.info(prefix + String(msg), ...args)
    },
    warn(msg, ...args) {
      if (!should(LEVEL.warn)) return
      sink.warn(prefix + String(msg), ...args)
    },
    error(msg, ...args) {
      if (!should(LEVEL.error)) return
      sink.error(prefix + String(msg), ...args)
    }
  }
}
