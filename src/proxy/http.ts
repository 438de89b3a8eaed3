import { fetch, ProxyAgent, type Dispatcher } from "undici"
import { decodePayload } from "./decode.js"
import { describeError, FetchError } from "./errors.js"
import { createLogger, safeUrlForLog } from "../utils/log.js"

const log = createLogger("订阅")

// Some subscription sites reset connections for unknown/empty UA.
export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36"

export interface FetchRequestOptions {
  timeoutMs: number
  signal?: AbortSignal
}

/** Downloads one subscription body. Rejects with `FetchError` on transport failure or non-2xx status. */
export type SubscriptionFetcher = (url: string, opts: FetchRequestOptions) => Promise<Uint8Array>

export interface HttpFetcherOptions {
  httpProxy?: string
  userAgent?: string
  /** Overrides the proxy agent, e.g. an undici MockAgent. */
  dispatcher?: Dispatcher
}

export function normalizeHttpProxyUrl(raw: unknown) {
  const s = String(raw || "").trim()
  if (!s) return ""
  if (s.includes("://")) return s
  return `http://${s}`
}

export function createHttpProxyAgent(httpProxy: unknown) {
  const normalized = normalizeHttpProxyUrl(httpProxy)
  if (!normalized) return null
  try {
    return new ProxyAgent(normalized)
  } catch (e) {
    log.warn(`HTTP 代理地址无效，忽略：${safeUrlForLog(normalized)} (${describeError(e)})`)
    return null
  }
}

export function normalizeHttpUrl(raw: string) {
  const s = String(raw || "").trim()
  if (!s) return s
  try {
    // Ensure the URL is properly percent-encoded (some providers reject non-ASCII paths).
    return new URL(s).toString()
  } catch {
    return s
  }
}

export function createHttpFetcher({ httpProxy, userAgent = DEFAULT_USER_AGENT, dispatcher }: HttpFetcherOptions = {}): SubscriptionFetcher {
  const agent = dispatcher ?? createHttpProxyAgent(httpProxy)
  if (agent && !dispatcher) log.debug(`订阅拉取使用 HTTP 代理：${safeUrlForLog(httpProxy)}`)

  return async (url, { timeoutMs, signal }) => {
    const controller = new AbortController()
    const onAbort = () => controller.abort()
    if (signal?.aborted) controller.abort()
    else signal?.addEventListener("abort", onAbort, { once: true })
    let timedOut = false
    const tid = setTimeout(() => {
      timedOut = true
      controller.abort()
    }, Math.max(1, timeoutMs))

    try {
      const res = await fetch(normalizeHttpUrl(url), {
        redirect: "follow",
        signal: controller.signal,
        ...(agent ? { dispatcher: agent } : {}),
        headers: {
          "user-agent": userAgent,
          accept: "text/plain, text/html, */*"
        }
      })
      const body = new Uint8Array(await res.arrayBuffer())
      if (!res.ok) {
        const bodyShort = decodePayload(body).text.slice(0, 300)
        throw new FetchError(`Subscription HTTP ${res.status}: ${bodyShort}`)
      }
      return body
    } catch (e) {
      if (e instanceof FetchError) throw e
      if (timedOut) throw new FetchError(`timeout after ${timeoutMs}ms`, { cause: e })
      if (signal?.aborted) throw new FetchError("aborted", { cause: e })
      throw new FetchError(describeError(e), { cause: e })
    } finally {
      clearTimeout(tid)
      signal?.removeEventListener("abort", onAbort)
    }
  }
}
