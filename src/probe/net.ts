import dns from "node:dns/promises"
import net from "node:net"
import { performance } from "node:perf_hooks"
import { fetch, ProxyAgent } from "undici"
import { classifyProbeError, type FullProbeResult, type ProbeContext, type Prober, type QuickProbeResult } from "./orchestrator.js"
import { parseDescriptor, UNKNOWN_ADDRESS } from "../proxy/endpoint.js"
import { describeError } from "../proxy/errors.js"
import { createLogger, safeUrlForLog } from "../utils/log.js"

const log = createLogger("测速")

export const DEFAULT_TEST_URL = "https://www.gstatic.com/generate_204"

/** A local HTTP proxy that forwards through one endpoint. Provided by the proxy engine, not by this package. */
export interface Tunnel {
  proxyUrl: string
  close(): Promise<void>
}

export type TunnelFactory = (descriptor: string, signal: AbortSignal) => Promise<Tunnel>

export type HostLookup = (host: string) => Promise<string>

export interface NetProberOptions {
  testUrl?: string
  tunnel?: TunnelFactory
  /** Defaults to `dns.lookup`. */
  lookup?: HostLookup
  headers?: Record<string, string>
}

const defaultLookup: HostLookup = async (host) => (await dns.lookup(host)).address

function abortError(message: string) {
  const e = new Error(message)
  e.name = "AbortError"
  return e
}

/** Resolves with the connect time in ms. */
export function tcpConnect(host: string, port: number, { timeoutMs, signal }: { timeoutMs: number; signal?: AbortSignal }) {
  return new Promise<number>((resolve, reject) => {
    if (signal?.aborted) return reject(abortError("aborted"))
    const start = performance.now()
    const socket = net.connect({ host, port })
    let settled = false
    const finish = (err: Error | null) => {
      if (settled) return
      settled = true
      clearTimeout(tid)
      signal?.removeEventListener("abort", onAbort)
      socket.destroy()
      if (err) reject(err)
      else resolve(performance.now() - start)
    }
    const onAbort = () => finish(abortError("aborted"))
    const tid = setTimeout(() => finish(new Error(`timeout after ${timeoutMs}ms`)), Math.max(1, timeoutMs))
    signal?.addEventListener("abort", onAbort, { once: true })
    socket.once("connect", () => finish(null))
    socket.once("error", (e) => finish(e))
  })
}

function looksLikeHtml(text: string, contentType = "") {
  const t = text.trimStart()
  if (!t) return false
  if (/text\/html/i.test(contentType)) return true
  return t.startsWith("<") || /<html/i.test(t.slice(0, 200))
}

function mean(values: number[]) {
  return values.length ? values.reduce((a, b) => a + b, 0) / values.length : -1
}

/**
 * Measures endpoints from this host: DNS + TCP for the cheap tiers, and real
 * requests through a tunnel for the full tier when a tunnel factory is given.
 */
export class NetProber implements Prober {
  private readonly testUrl: string
  private readonly tunnel: TunnelFactory | undefined
  private readonly lookup: HostLookup
  private readonly headers: Record<string, string>

  constructor({ testUrl = DEFAULT_TEST_URL, tunnel, lookup = defaultLookup, headers = {} }: NetProberOptions = {}) {
    this.testUrl = testUrl
    this.tunnel = tunnel
    this.lookup = lookup
    this.headers = headers
  }

  private target(descriptor: string) {
    const { address, port } = parseDescriptor(descriptor)
    if (!address || address === UNKNOWN_ADDRESS) return null
    return { address, port }
  }

  async fullProbe(descriptor: string, attempts: number, ctx: ProbeContext): Promise<FullProbeResult> {
    if (!this.tunnel) return { success: false, totalMs: -1, errorType: "unavailable" }

    let tunnel: Tunnel
    try {
      tunnel = await this.tunnel(descriptor, ctx.signal)
    } catch (e) {
      log.debug(`隧道建立失败：${describeError(e)}`)
      return { success: false, totalMs: -1, errorType: classifyProbeError(e) }
    }

    const agent = new ProxyAgent(tunnel.proxyUrl)
    const ttfbs: number[] = []
    const totals: number[] = []
    let lastError = ""
    try {
      for (let i = 0; i < Math.max(1, attempts) && !ctx.signal.aborted; i++) {
        const controller = new AbortController()
        const onAbort = () => controller.abort()
        ctx.signal.addEventListener("abort", onAbort, { once: true })
        const tid = setTimeout(() => controller.abort(), Math.max(1, ctx.timeoutMs))
        const start = performance.now()
        try {
          const res = await fetch(this.testUrl, {
            redirect: "follow",
            signal: controller.signal,
            dispatcher: agent,
            headers: { accept: "*/*", ...this.headers }
          })
          const ttfb = performance.now() - start
          const text = await res.text()
          const total = performance.now() - start
          const html = looksLikeHtml(text, res.headers.get("content-type") ?? "")
          // 403/404 without an HTML block page still proves the path works.
          const ok = (res.status >= 200 && res.status < 400) || ([400, 403, 404, 424].includes(res.status) && !html)
          if (ok) {
            ttfbs.push(ttfb)
            totals.push(total)
          } else {
            lastError = html ? `bad_response status=${res.status} html=1` : `status=${res.status}`
          }
        } catch (e) {
          lastError = controller.signal.aborted ? "timeout" : describeError(e)
          log.debug(`完整测速失败：${safeUrlForLog(this.testUrl)} (${lastError})`)
        } finally {
          clearTimeout(tid)
          ctx.signal.removeEventListener("abort", onAbort)
        }
      }
    } finally {
      await agent.close()
      await tunnel.close()
    }

    const okCount = ttfbs.length
    return {
      success: okCount > 0,
      totalMs: okCount ? mean(totals) : -1,
      ...(okCount ? { ttfbMs: mean(ttfbs) } : {}),
      score: okCount / Math.max(1, attempts),
      ...(okCount ? {} : { errorType: classifyProbeError(lastError) })
    }
  }

  async quickProbe(descriptor: string, ctx: ProbeContext): Promise<QuickProbeResult> {
    const target = this.target(descriptor)
    if (!target) return { success: false, totalMs: -1, errorType: "unreachable" }

    const start = performance.now()
    let ip = target.address
    let dnsMs = 0
    try {
      if (!net.isIP(ip)) {
        ip = await this.lookup(target.address)
        dnsMs = performance.now() - start
      }
      const tcpMs = await tcpConnect(ip, target.port, ctx)
      return { success: true, totalMs: performance.now() - start, dnsMs, tcpMs }
    } catch (e) {
      return { success: false, totalMs: -1, errorType: classifyProbeError(e) }
    }
  }

  async rawConnectivityTest(descriptor: string, timeoutMs: number, ctx: ProbeContext): Promise<number | null> {
    const target = this.target(descriptor)
    if (!target) return null
    try {
      return await tcpConnect(target.address, target.port, { timeoutMs, signal: ctx.signal })
    } catch (e) {
      log.debug(`TCP 连接失败：${target.address}:${target.port} (${describeError(e)})`)
      return null
    }
  }
}
