import { safeBase64Decode } from "../utils/base64.js"

export const PROTOCOLS = ["vmess", "vless", "trojan", "ss", "ssr"] as const

export type KnownProtocol = (typeof PROTOCOLS)[number]
export type Protocol = KnownProtocol | "unknown"

export const UNNAMED = "Unnamed"
export const UNKNOWN_ADDRESS = "unknown"
export const DEFAULT_PORT = 443

export interface ParsedDescriptor {
  protocol: Protocol
  name: string
  address: string
  port: number
}

/** Persisted shape of one endpoint inside a subscription file. */
export interface EndpointRecordData {
  config_string: string
  protocol: string
  name: string
  address: string
  port: number
  last_test_time: number
  last_latency: number
  success_count: number
  failure_count: number
  tags: string[]
}

export interface TestOutcome {
  success: boolean
  latencyMs: number
}

export function isKnownProtocol(v: string): v is KnownProtocol {
  return (PROTOCOLS as readonly string[]).includes(v)
}

export function detectProtocol(raw: string): Protocol {
  const lower = String(raw || "").trim().toLowerCase()
  for (const p of PROTOCOLS) {
    if (lower.startsWith(`${p}://`)) return p
  }
  return "unknown"
}

export function hasKnownScheme(line: string) {
  return detectProtocol(line) !== "unknown"
}

function percentDecode(s: string) {
  try {
    return decodeURIComponent(s)
  } catch {
    return s
  }
}

function splitFragment(raw: string) {
  const i = raw.indexOf("#")
  if (i < 0) return { base: raw, fragment: "" }
  return { base: raw.slice(0, i), fragment: raw.slice(i + 1) }
}

function stripScheme(s: string) {
  return s.replace(/^[a-z][a-z0-9+.-]*:\/\//i, "")
}

function queryOf(base: string) {
  const i = base.indexOf("?")
  return i < 0 ? "" : base.slice(i + 1)
}

function hasControlChars(s: string) {
  return /[\u0000-\u001f\u007f]/.test(s)
}

// `remark`/`remarks` query value, base64 when it decodes cleanly, else taken as-is.
function remarkFromQuery(query: string) {
  if (!query) return ""
  for (const pair of query.split("&")) {
    const eq = pair.indexOf("=")
    if (eq <= 0) continue
    const key = pair.slice(0, eq).trim().toLowerCase()
    if (key !== "remark" && key !== "remarks") continue
    const value = percentDecode(pair.slice(eq + 1).replace(/\+/g, "%2B")).trim()
    if (!value) continue
    const decoded = safeBase64Decode(value)
    if (decoded && !hasControlChars(decoded)) return decoded.trim()
    return value
  }
  return ""
}

interface VmessPayload {
  ps: string
  add: string
  port: number
}

function readVmessPayload(base: string): VmessPayload | null {
  const payload = stripScheme(base).trim()
  if (!payload || payload.includes("@")) return null
  const decoded = safeBase64Decode(payload)
  if (!decoded) return null
  let obj: unknown
  try {
    obj = JSON.parse(decoded)
  } catch {
    return null
  }
  if (!obj || typeof obj !== "object" || Array.isArray(obj)) return null
  const ps = "ps" in obj ? String(obj.ps ?? "").trim() : ""
  const add = "add" in obj ? String(obj.add ?? "").trim() : ""
  const port = "port" in obj ? Number(obj.port) : NaN
  return { ps, add, port }
}

// ssr://base64(host:port:protocol:method:obfs:base64pass/?remarks=...)
function readSsrPayload(base: string) {
  const decoded = safeBase64Decode(stripScheme(base).trim())
  if (!decoded) return null
  const [head = "", query = ""] = decoded.split("/?")
  const fields = head.split(":")
  if (fields.length < 6) return null
  return {
    host: fields.slice(0, fields.length - 5).join(":"),
    port: fields[fields.length - 5] ?? "",
    remark: remarkFromQuery(query)
  }
}

function normalizePort(v: unknown) {
  const s = String(v ?? "").trim()
  if (!/^\d{1,5}$/.test(s)) return DEFAULT_PORT
  const n = Number(s)
  return n >= 1 && n <= 65535 ? n : DEFAULT_PORT
}

function normalizeHost(v: string) {
  const h = String(v || "").trim()
  if (!h) return UNKNOWN_ADDRESS
  if (/^[A-Za-z0-9._-]+$/.test(h)) return h
  if (/^[0-9A-Fa-f:.]+$/.test(h) && h.includes(":")) return h
  return UNKNOWN_ADDRESS
}

function splitAtLast(s: string, ch: string): [string, string] {
  const i = s.lastIndexOf(ch)
  if (i < 0) return [s, ""]
  return [s.slice(0, i), s.slice(i + 1)]
}

function splitHostPort(hp: string) {
  const s = hp.trim()
  if (s.startsWith("[")) {
    const close = s.indexOf("]")
    if (close > 0) {
      return { address: normalizeHost(s.slice(1, close)), port: normalizePort(s.slice(close + 1).replace(/^:/, "")) }
    }
    return { address: UNKNOWN_ADDRESS, port: DEFAULT_PORT }
  }
  const colons = s.split(":").length - 1
  // Bare IPv6 without brackets carries no port.
  if (colons > 1) return { address: normalizeHost(s), port: DEFAULT_PORT }
  const [host, port] = colons === 1 ? splitAtLast(s, ":") : [s, ""]
  return { address: normalizeHost(host), port: normalizePort(port) }
}

function hostPortFromBase(base: string, protocol: Protocol) {
  let rest = stripScheme(base)
  // ss://<base64(method:pass@host:port)>
  if (protocol === "ss" && !rest.includes("@")) {
    const body = rest.split(/[/?]/)[0] ?? ""
    const decoded = safeBase64Decode(body)
    if (decoded && decoded.includes("@")) rest = decoded
  }
  return splitHostPort(hostOfAuthority(rest))
}

// Path and query may carry "@" of their own; userinfo may carry "/" (base64).
function hostOfAuthority(rest: string) {
  const beforeQuery = rest.split("?")[0] ?? ""
  const slash = beforeQuery.indexOf("/", beforeQuery.indexOf("@") + 1)
  const authority = slash >= 0 ? beforeQuery.slice(0, slash) : beforeQuery
  return authority.slice(authority.lastIndexOf("@") + 1)
}

/**
 * Total parser for one endpoint descriptor: never throws, degrades to
 * `unknown` / placeholder values on anything it cannot read.
 */
export function parseDescriptor(raw: string): ParsedDescriptor {
  const text = String(raw ?? "").trim()
  const protocol = detectProtocol(text)
  const { base, fragment } = splitFragment(text)

  let name = fragment ? percentDecode(fragment).trim() : ""
  if (!name) name = remarkFromQuery(queryOf(base))

  let address = UNKNOWN_ADDRESS
  let port = DEFAULT_PORT

  const vmess = protocol === "vmess" ? readVmessPayload(base) : null
  const ssr = protocol === "ssr" ? readSsrPayload(base) : null
  if (vmess) {
    if (!name) name = vmess.ps
    address = normalizeHost(vmess.add)
    port = normalizePort(vmess.port)
  } else if (ssr) {
    if (!name) name = ssr.remark
    address = normalizeHost(ssr.host)
    port = normalizePort(ssr.port)
  } else {
    ;({ address, port } = hostPortFromBase(base, protocol))
  }

  return { protocol, name: name || UNNAMED, address, port }
}

export class EndpointRecord {
  readonly descriptor: string
  readonly protocol: Protocol
  readonly name: string
  readonly address: string
  readonly port: number

  /** Epoch seconds, 0 = never tested. */
  lastTestTime = 0
  /** Milliseconds, -1 = untested or last test failed. */
  lastLatency = -1
  successCount = 0
  failureCount = 0
  tags: string[] = []

  constructor(descriptor: string) {
    this.descriptor = String(descriptor ?? "").trim()
    const parsed = parseDescriptor(this.descriptor)
    this.protocol = parsed.protocol
    this.name = parsed.name
    this.address = parsed.address
    this.port = parsed.port
  }

  get testCount() {
    return this.successCount + this.failureCount
  }

  get tested() {
    return this.testCount > 0
  }

  get successRate(): number | null {
    const total = this.testCount
    return total > 0 ? this.successCount / total : null
  }

  /** protocol|address|port, used when merging by address instead of by exact descriptor. */
  get addressKey() {
    return `${this.protocol}|${this.address}|${this.port}`
  }

  recordTest(outcome: TestOutcome, nowSec: number) {
    this.lastTestTime = nowSec
    if (outcome.success && outcome.latencyMs >= 0) {
      this.successCount++
      this.lastLatency = Math.round(outcome.latencyMs)
    } else {
      this.failureCount++
      this.lastLatency = -1
    }
  }

  carryStatsFrom(prev: EndpointRecord) {
    this.lastTestTime = prev.lastTestTime
    this.lastLatency = prev.lastLatency
    this.successCount = prev.successCount
    this.failureCount = prev.failureCount
    this.tags = prev.tags.slice()
  }

  clone() {
    const copy = new EndpointRecord(this.descriptor)
    copy.carryStatsFrom(this)
    return copy
  }

  toRecord(): EndpointRecordData {
    return {
      config_string: this.descriptor,
      protocol: this.protocol,
      name: this.name,
      address: this.address,
      port: this.port,
      last_test_time: this.lastTestTime,
      last_latency: this.lastLatency,
      success_count: this.successCount,
      failure_count: this.failureCount,
      tags: this.tags.slice()
    }
  }

  // Derived fields are re-parsed from the descriptor; only statistics come from the record.
  static fromRecord(data: EndpointRecordData) {
    const rec = new EndpointRecord(data.config_string)
    rec.lastTestTime = Math.max(0, Number(data.last_test_time) || 0)
    rec.lastLatency = Number.isFinite(data.last_latency) ? data.last_latency : -1
    rec.successCount = Math.max(0, Math.trunc(data.success_count) || 0)
    rec.failureCount = Math.max(0, Math.trunc(data.failure_count) || 0)
    rec.tags = data.tags.map(String)
    return rec
  }
}
