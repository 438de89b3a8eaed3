export type LogLevelName = "error" | "warn" | "info" | "debug"

type LogFn = (msg: unknown, ...args: unknown[]) => void

export interface Logger {
  debug: LogFn
  info: LogFn
  warn: LogFn
  error: LogFn
}

type ColorName = "bold" | "dim" | "gray" | "red" | "green" | "yellow" | "blue" | "magenta" | "cyan"

// A host process may install its own logger (with colour helpers) on globalThis.
type HostLogger = Partial<Logger> & Partial<Record<ColorName, (s: string) => string>>

declare global {
  // eslint-disable-next-line no-var
  var logger: HostLogger | undefined
}

const LEVEL = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3
} as const

type LevelValue = (typeof LEVEL)[LogLevelName]

function isTruthyEnv(v: string | undefined) {
  if (v == null || v === "") return false
  const s = String(v).trim().toLowerCase()
  if (!s) return false
  return !["0", "false", "no", "n", "off"].includes(s)
}

export function isColorEnabled() {
  // https://no-color.org/
  if (process.env.NO_COLOR != null) return false
  if (process.env.TERM && String(process.env.TERM).toLowerCase() === "dumb") return false
  if (process.env.FORCE_COLOR != null) return isTruthyEnv(process.env.FORCE_COLOR)
  return Boolean(process.stdout?.isTTY)
}

const ANSI: Record<ColorName | "reset", string> = {
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

function colorWrap(name: ColorName) {
  return (input: unknown) => {
    const s = String(input)
    if (!isColorEnabled()) return s
    const fn = globalThis.logger?.[name]
    if (typeof fn === "function") {
      try {
        return fn(s)
      } catch {
        // host helper failed; fall through to plain ANSI
      }
    }
    return `${ANSI[name]}${s}${ANSI.reset}`
  }
}

export const c = {
  bold: colorWrap("bold"),
  dim: colorWrap("dim"),
  gray: colorWrap("gray"),
  red: colorWrap("red"),
  green: colorWrap("green"),
  yellow: colorWrap("yellow"),
  blue: colorWrap("blue"),
  magenta: colorWrap("magenta"),
  cyan: colorWrap("cyan")
}

export function normalizeLevel(v: unknown, fallback: LevelValue = LEVEL.info): LevelValue {
  const s = String(v ?? "").trim().toLowerCase()
  if (!s) return fallback
  if (s === "error" || s === "err") return LEVEL.error
  if (s === "warn" || s === "warning") return LEVEL.warn
  if (s === "info") return LEVEL.info
  if (s === "debug" || s === "dbg") return LEVEL.debug
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

// Resolved on every call so that a host logger installed later (or a swapped console) still wins.
function getSink(): Logger {
  const g = globalThis.logger
  return {
    debug: g?.debug ? g.debug.bind(g) : (console.debug ? console.debug.bind(console) : console.log.bind(console)),
    info: g?.info ? g.info.bind(g) : console.log.bind(console),
    warn: g?.warn ? g.warn.bind(g) : console.warn.bind(console),
    error: g?.error ? g.error.bind(g) : console.error.bind(console)
  }
}

export function setupUtf8() {
  try {
    process.stdout?.setDefaultEncoding?.("utf8")
  } catch {
    // not a writable stream in some hosts
  }
  try {
    process.stderr?.setDefaultEncoding?.("utf8")
  } catch {
    // same as above
  }
}

export function fmtKv(obj: Record<string, unknown> | null | undefined) {
  if (!obj || typeof obj !== "object") return ""
  const parts: string[] = []
  for (const [k, v] of Object.entries(obj)) {
    if (v == null || v === "") continue
    parts.push(`${k}=${v}`)
  }
  return parts.join(" ")
}

export function safeUrlForLog(url: unknown) {
  try {
    const u = new URL(String(url))
    u.username = ""
    u.password = ""
    return u.toString()
  } catch {
    return String(url || "")
  }
}

export function createLogger(tag = "", { level }: { level?: LogLevelName | number } = {}): Logger {
  const cur = normalizeLevel(level, envLogLevel())
  const prefix = tag ? `[${String(tag)}] ` : ""
  const should = (lvl: LevelValue) => lvl <= cur

  return {
    debug(msg, ...args) {
      if (!should(LEVEL.debug)) return
      getSink().debug(prefix + String(msg), ...args)
    },
    info(msg, ...args) {
      if (!should(LEVEL.info)) return
      getSink().info(prefix + String(msg), ...args)
    },
    warn(msg, ...args) {
      if (!should(LEVEL.warn)) return
      getSink().warn(prefix + String(msg), ...args)
    },
    error(msg, ...args) {
      if (!should(LEVEL.error)) return
      getSink().error(prefix + String(msg), ...args)
    }
  }
}
