import { performance } from "node:perf_hooks"
import type { TestOutcome } from "../proxy/endpoint.js"
import { describeError } from "../proxy/errors.js"
import { clamp, toInt } from "../utils/coerce.js"
import { c, createLogger } from "../utils/log.js"

const log = createLogger("测速")

export const DEFAULT_PROBE_TIMEOUT_MS = 5_000
export const DEFAULT_PROBE_ATTEMPTS = 3
export const DEFAULT_PROBE_CONCURRENCY = 10
export const MAX_PROBE_CONCURRENCY = 32

export type ProbeTier = "full" | "quick" | "raw"

export const PROBE_ERROR_TYPES = [
  "timeout",
  "aborted",
  "dns",
  "refused",
  "reset",
  "unreachable",
  "bad_response",
  "http_status",
  "unavailable",
  "error"
] as const
export type ProbeErrorType = (typeof PROBE_ERROR_TYPES)[number]

export interface ProbeContext {
  /** Budget for one attempt of this tier. */
  timeoutMs: number
  /** Aborted when the tier's budget runs out. */
  signal: AbortSignal
}

export interface QuickProbeResult {
  success: boolean
  totalMs: number
  dnsMs?: number
  tcpMs?: number
  errorType?: string
}

export interface FullProbeResult extends QuickProbeResult {
  ttfbMs?: number
  /** Fraction of attempts that succeeded. */
  score?: number
}

export type ProbeResult = FullProbeResult

/** Every method is optional; a missing tier counts as failed and the next one runs. */
export interface Prober {
  fullProbe?(descriptor: string, attempts: number, ctx: ProbeContext): Promise<FullProbeResult>
  quickProbe?(descriptor: string, ctx: ProbeContext): Promise<QuickProbeResult>
  /** Latency in ms, or `null` when the endpoint could not be reached. */
  rawConnectivityTest?(descriptor: string, timeoutMs: number, ctx: ProbeContext): Promise<number | null>
}

export interface TierAttempt {
  tier: ProbeTier
  success: boolean
  elapsedMs: number
  errorType?: ProbeErrorType
}

export interface ProbeVerdict extends TestOutcome {
  descriptor: string
  /** Position in the candidate list the verdict came from. */
  index: number
  /** Tier that succeeded, `null` when all failed. */
  tier: ProbeTier | null
  result: ProbeResult
  attempts: TierAttempt[]
  errorType?: ProbeErrorType
}

export interface EvaluateOptions {
  timeoutMs?: number
  attempts?: number
}

export interface BatchOptions extends EvaluateOptions {
  parallel?: boolean
  concurrency?: number
  onProgress?: (done: number, total: number, verdict: ProbeVerdict) => void
}

function isProbeErrorType(v: string): v is ProbeErrorType {
  return (PROBE_ERROR_TYPES as readonly string[]).includes(v)
}

function errorCode(e: unknown): string {
  if (e && typeof e === "object" && "code" in e && typeof e.code === "string") return e.code
  return ""
}

/** Maps whatever a prober or the network stack produced onto a stable class. */
export function classifyProbeError(raw: unknown): ProbeErrorType {
  if (raw == null || raw === "") return "error"
  if (typeof raw === "string" && isProbeErrorType(raw)) return raw

  const code = errorCode(raw) || errorCode(raw instanceof Error ? raw.cause : null)
  switch (code) {
    case "ENOTFOUND":
    case "EAI_AGAIN":
    case "EAI_NODATA":
    case "EAI_FAIL":
      return "dns"
    case "ECONNREFUSED":
      return "refused"
    case "ECONNRESET":
    case "EPIPE":
    case "UND_ERR_SOCKET":
      return "reset"
    case "EHOSTUNREACH":
    case "ENETUNREACH":
    case "EADDRNOTAVAIL":
      return "unreachable"
    case "ETIMEDOUT":
    case "UND_ERR_CONNECT_TIMEOUT":
    case "UND_ERR_HEADERS_TIMEOUT":
      return "timeout"
  }

  if (raw instanceof Error && raw.name === "TimeoutError") return "timeout"
  if (raw instanceof Error && raw.name === "AbortError") return "aborted"

  const s = (raw instanceof Error ? raw.message : String(raw)).replace(/\s+/g, " ").trim().toLowerCase()
  if (s === "timeout" || s.includes("timed out") || s.startsWith("timeout after")) return "timeout"
  if (s.includes("aborterror") || s === "aborted") return "aborted"
  if (s.startsWith("bad_response")) return "bad_response"
  if (/^status=\d+$/.test(s) || s.startsWith("http ")) return "http_status"
  if (s.includes("not available") || s.includes("unavailable")) return "unavailable"
  if (s.includes("getaddrinfo")) return "dns"
  return "error"
}

const ERROR_LABELS: Record<ProbeErrorType, string> = {
  timeout: "请求超时(timeout)",
  aborted: "请求已中止(aborted)",
  dns: "域名解析失败(dns)",
  refused: "连接被拒绝(refused)",
  reset: "连接被重置(reset)",
  unreachable: "网络不可达(unreachable)",
  bad_response: "响应异常(bad_response)",
  http_status: "HTTP状态异常(http_status)",
  unavailable: "测速方式不可用(unavailable)",
  error: "未知错误(error)"
}

export function probeErrorLabel(t: ProbeErrorType) {
  return ERROR_LABELS[t]
}

/**
 * Picks `k` items; `spread` strides across the whole list so a bad prefix
 * (e.g. a run of dead endpoints from one provider) does not take every slot.
 */
export function pickCandidates<T>(list: readonly T[], k: number, { strategy = "spread", offset = 0 }: { strategy?: "first" | "spread"; offset?: number } = {}): T[] {
  const n = list.length
  const want = Math.max(0, Math.min(n, toInt(k, 0)))
  if (want <= 0) return []
  if (strategy === "first") return list.slice(0, want)

  // n=404, k=20 => indices 0,20,40,...,380
  const step = Math.max(1, Math.floor(n / want))
  const start = ((toInt(offset, 0) % n) + n) % n
  const out: T[] = []
  const used = new Set<number>()
  for (let i = 0; i < n && out.length < want; i++) {
    const idx = (start + i * step) % n
    if (used.has(idx)) continue
    used.add(idx)
    out.push(list[idx])
  }
  // Modulo wrap-around can repeat indices; fill from the head.
  for (let i = 0; i < n && out.length < want; i++) {
    if (used.has(i)) continue
    used.add(i)
    out.push(list[i])
  }
  return out
}

type TierRun<T> = { ok: true; value: T; elapsedMs: number } | { ok: false; errorType: ProbeErrorType; elapsedMs: number }

/**
 * Runs one tier under its own budget. A hung call is left to settle on its own;
 * its late result is discarded.
 */
async function runTier<T>(budgetMs: number, call: (ctx: ProbeContext) => Promise<T>, perAttemptMs: number): Promise<TierRun<T>> {
  const controller = new AbortController()
  const start = performance.now()
  let tid: NodeJS.Timeout | undefined
  const timedOut = new Promise<{ kind: "timeout" }>((resolve) => {
    tid = setTimeout(() => {
      controller.abort()
      resolve({ kind: "timeout" })
    }, Math.max(1, budgetMs))
  })
  let work: Promise<{ kind: "value"; value: T } | { kind: "error"; error: unknown }>
  try {
    work = call({ timeoutMs: perAttemptMs, signal: controller.signal }).then(
      (value) => ({ kind: "value" as const, value }),
      (error: unknown) => ({ kind: "error" as const, error })
    )
  } catch (error) {
    // Synchronous throw from the prober.
    work = Promise.resolve({ kind: "error" as const, error })
  }

  try {
    const out = await Promise.race([work, timedOut])
    const elapsedMs = performance.now() - start
    if (out.kind === "timeout") return { ok: false, errorType: "timeout", elapsedMs }
    if (out.kind === "error") return { ok: false, errorType: classifyProbeError(out.error), elapsedMs }
    return { ok: true, value: out.value, elapsedMs }
  } finally {
    clearTimeout(tid)
  }
}

function positiveMs(v: number | undefined) {
  return v != null && Number.isFinite(v) && v > 0 ? v : undefined
}

// A success is always reported with a latency of at least 1 ms: 0 and below mean "not measured".
// A prober that reports no usable figure gets the time its tier took.
function latencyOf(reported: number | undefined, elapsedMs: number) {
  const ms = reported != null && Number.isFinite(reported) && reported >= 0 ? reported : elapsedMs
  return Math.max(1, Math.round(Number.isFinite(ms) ? ms : 0))
}

function failedVerdict(descriptor: string, index: number, attempts: TierAttempt[]): ProbeVerdict {
  // Last tier that actually ran; missing tiers only count when none ran.
  const ran = attempts.filter((a) => a.errorType !== "unavailable")
  const errorType = (ran.at(-1) ?? attempts.at(-1))?.errorType ?? "unavailable"
  return {
    descriptor,
    index,
    success: false,
    latencyMs: -1,
    tier: null,
    result: { success: false, totalMs: -1, errorType },
    attempts,
    errorType
  }
}

/**
 * Tiered reachability and latency measurement: full (through the endpoint) → quick
 * (DNS + TCP) → raw (TCP only), stopping at the first tier that succeeds.
 */
export class ProbeOrchestrator {
  readonly prober: Prober
  private readonly timeoutMs: number
  private readonly attempts: number
  private readonly concurrency: number

  constructor(
    prober: Prober,
    { timeoutMs = DEFAULT_PROBE_TIMEOUT_MS, attempts = DEFAULT_PROBE_ATTEMPTS, concurrency = DEFAULT_PROBE_CONCURRENCY }: EvaluateOptions & { concurrency?: number } = {}
  ) {
    this.prober = prober
    this.timeoutMs = Math.max(1, timeoutMs)
    this.attempts = Math.max(1, Math.trunc(attempts))
    this.concurrency = clamp(Math.trunc(concurrency), 1, MAX_PROBE_CONCURRENCY)
  }

  async evaluate(descriptor: string, opts: EvaluateOptions = {}, index = 0): Promise<ProbeVerdict> {
    const timeoutMs = Math.max(1, opts.timeoutMs ?? this.timeoutMs)
    const attemptsN = Math.max(1, Math.trunc(opts.attempts ?? this.attempts))
    const { prober } = this
    const trail: TierAttempt[] = []
    const fail = (tier: ProbeTier, errorType: ProbeErrorType, elapsedMs = 0) => {
      trail.push({ tier, success: false, elapsedMs: Math.round(elapsedMs), errorType })
    }

    const full = prober.fullProbe
    if (full) {
      const run = await runTier(timeoutMs * attemptsN, (ctx) => full.call(prober, descriptor, attemptsN, ctx), timeoutMs)
      if (run.ok && run.value.success) {
        const r = run.value
        const ttfb = positiveMs(r.ttfbMs)
        const latencyMs = latencyOf(ttfb ?? r.totalMs, run.elapsedMs)
        trail.push({ tier: "full", success: true, elapsedMs: Math.round(run.elapsedMs) })
        return { descriptor, index, success: true, latencyMs, tier: "full", result: { ...r, success: true }, attempts: trail }
      }
      fail("full", run.ok ? classifyProbeError(run.value.errorType) : run.errorType, run.elapsedMs)
    } else {
      fail("full", "unavailable")
    }

    const quick = prober.quickProbe
    if (quick) {
      const run = await runTier(timeoutMs, (ctx) => quick.call(prober, descriptor, ctx), timeoutMs)
      if (run.ok && run.value.success) {
        const r = run.value
        trail.push({ tier: "quick", success: true, elapsedMs: Math.round(run.elapsedMs) })
        return {
          descriptor,
          index,
          success: true,
          latencyMs: latencyOf(r.totalMs, run.elapsedMs),
          tier: "quick",
          result: { ...r, success: true },
          attempts: trail
        }
      }
      fail("quick", run.ok ? classifyProbeError(run.value.errorType) : run.errorType, run.elapsedMs)
    } else {
      fail("quick", "unavailable")
    }

    const raw = prober.rawConnectivityTest
    if (raw) {
      const run = await runTier(timeoutMs, (ctx) => raw.call(prober, descriptor, timeoutMs, ctx), timeoutMs)
      if (run.ok && run.value != null && Number.isFinite(run.value) && run.value >= 0) {
        const latencyMs = latencyOf(run.value, run.elapsedMs)
        trail.push({ tier: "raw", success: true, elapsedMs: Math.round(run.elapsedMs) })
        return { descriptor, index, success: true, latencyMs, tier: "raw", result: { success: true, totalMs: latencyMs }, attempts: trail }
      }
      fail("raw", run.ok ? "unreachable" : run.errorType, run.elapsedMs)
    } else {
      fail("raw", "unavailable")
    }

    return failedVerdict(descriptor, index, trail)
  }

  /** One verdict per candidate, in input order. */
  async evaluateMany(candidates: readonly string[], opts: BatchOptions = {}): Promise<ProbeVerdict[]> {
    const { parallel = true, onProgress } = opts
    const size = parallel ? clamp(Math.trunc(opts.concurrency ?? this.concurrency), 1, MAX_PROBE_CONCURRENCY) : 1
    const total = candidates.length
    const verdicts = new Array<ProbeVerdict | undefined>(total)
    let next = 0
    let done = 0
    let ok = 0

    const worker = async () => {
      while (true) {
        const cur = next++
        if (cur >= total) return
        const descriptor = candidates[cur]
        let v: ProbeVerdict
        try {
          v = await this.evaluate(descriptor, opts, cur)
        } catch (e) {
          // evaluate() does not throw for prober failures; this only guards the batch.
          log.warn(`测速异常：${c.red(describeError(e))}`)
          v = failedVerdict(descriptor, cur, [{ tier: "raw", success: false, elapsedMs: 0, errorType: classifyProbeError(e) }])
        }
        verdicts[cur] = v
        done++
        if (v.success) ok++
        onProgress?.(done, total, v)
      }
    }

    log.info(`开始测速：${total} 个节点（${parallel ? `并发 ${size}` : "顺序"}）`)
    await Promise.all(Array.from({ length: Math.min(size, total) }, () => worker()))
    log.info(`测速完成：${c.green(`可用 ${ok}`)} / ${total}${total - ok ? ` ${c.gray(`失败 ${total - ok}`)}` : ""}`)

    return verdicts.map((v, i) => v ?? failedVerdict(candidates[i], i, []))
  }

  /** Successful verdicts only, lowest latency first; equal latencies keep input order. */
  async batch(candidates: readonly string[], opts: BatchOptions = {}) {
    const all = await this.evaluateMany(candidates, opts)
    return rankVerdicts(all)
  }

  async best(candidates: readonly string[], n: number, opts: BatchOptions = {}) {
    const ranked = await this.batch(candidates, opts)
    return ranked.slice(0, Math.max(0, Math.trunc(n)))
  }
}

export function rankVerdicts(verdicts: readonly ProbeVerdict[]) {
  return verdicts.filter((v) => v.success).sort((a, b) => a.latencyMs - b.latencyMs || a.index - b.index)
}
