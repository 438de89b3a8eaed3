import crypto from "node:crypto"
import { decodePayload, parseSubscriptionContent } from "./decode.js"
import { EndpointRecord, type TestOutcome } from "./endpoint.js"
import { describeError, FetchError, ParseError, ValidationError } from "./errors.js"
import { createHttpFetcher, type SubscriptionFetcher } from "./http.js"
import { formatZodIssues, subscriptionRecordSchema, type SubscriptionRecord } from "./record.js"
import { getSharedScheduler, systemClock, type Clock, type Refreshable, type RefreshScheduler } from "../runtime/refresher.js"
import { createLogger, safeUrlForLog } from "../utils/log.js"

const log = createLogger("订阅")

export const DEFAULT_UPDATE_INTERVAL_SEC = 86_400
export const DEFAULT_FETCH_TIMEOUT_MS = 30_000

/**
 * How test history is carried over when a feed is re-fetched:
 * `descriptor` matches the exact descriptor string, `address` matches protocol + address + port.
 */
export type MergeMode = "descriptor" | "address"

export interface SubscriptionInit {
  name?: string
  enabled?: boolean
  priority?: number
  tags?: string[]
  autoUpdate?: boolean
  /** Seconds. */
  updateInterval?: number
}

export interface SubscriptionDeps {
  fetcher?: SubscriptionFetcher
  scheduler?: RefreshScheduler
  clock?: Clock
  mergeBy?: MergeMode
  fetchTimeoutMs?: number
}

export interface SubscriptionSummary {
  id: string
  name: string
  url: string
  enabled: boolean
  priority: number
  tags: string[]
  autoUpdate: boolean
  autoUpdating: boolean
  updateInterval: number
  lastUpdateTime: number
  lastFetchSuccess: boolean
  lastErrorMessage: string
  totalUpdates: number
  successfulUpdates: number
  failedUpdates: number
  configCount: number
  testedCount: number
}

export function subscriptionIdFor(url: string) {
  return crypto.createHash("sha1").update(String(url)).digest("hex")
}

export function validateSubscriptionUrl(url: unknown): URL {
  const raw = String(url ?? "").trim()
  let parsed: URL
  try {
    parsed = new URL(raw)
  } catch (e) {
    throw new ValidationError(`Invalid subscription URL: ${raw || "(empty)"}`, { cause: e })
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new ValidationError(`Invalid subscription URL. Must start with http:// or https:// (got ${parsed.protocol})`)
  }
  return parsed
}

function validateInterval(v: unknown) {
  const n = Number(v)
  if (!Number.isFinite(n) || n < 1) throw new ValidationError(`updateInterval must be >= 1 second (got ${String(v)})`)
  return n
}

function cleanTags(tags: unknown) {
  if (!Array.isArray(tags)) return []
  return [...new Set(tags.map((t) => String(t).trim()).filter(Boolean))]
}

export class Subscription implements Refreshable {
  readonly id: string
  readonly url: string
  name: string
  enabled: boolean
  priority: number
  tags: string[]
  autoUpdate: boolean
  updateInterval: number

  /** Epoch seconds, 0 = never. */
  lastUpdateTime = 0
  lastFetchSuccess = false
  lastErrorMessage = ""
  totalUpdates = 0
  successfulUpdates = 0
  failedUpdates = 0

  private _endpoints: readonly EndpointRecord[] = []
  private readonly fetcher: SubscriptionFetcher
  private readonly scheduler: RefreshScheduler
  private readonly clock: Clock
  private readonly mergeBy: MergeMode
  private readonly defaultTimeoutMs: number

  constructor(url: string, init: SubscriptionInit = {}, deps: SubscriptionDeps = {}) {
    const parsed = validateSubscriptionUrl(url)
    this.url = String(url).trim()
    this.id = subscriptionIdFor(this.url)
    this.name = String(init.name ?? "").trim() || parsed.host
    this.enabled = init.enabled ?? true
    this.priority = Math.trunc(Number(init.priority ?? 0)) || 0
    this.tags = cleanTags(init.tags)
    this.autoUpdate = Boolean(init.autoUpdate)
    this.updateInterval = validateInterval(init.updateInterval ?? DEFAULT_UPDATE_INTERVAL_SEC)

    this.fetcher = deps.fetcher ?? createHttpFetcher()
    this.scheduler = deps.scheduler ?? getSharedScheduler()
    this.clock = deps.clock ?? deps.scheduler?.clock ?? systemClock
    this.mergeBy = deps.mergeBy ?? "descriptor"
    this.defaultTimeoutMs = deps.fetchTimeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS
  }

  /** Current list; replaced as a whole on every successful fetch. */
  get endpoints(): readonly EndpointRecord[] {
    return this._endpoints
  }

  get isAutoUpdating() {
    return this.scheduler.isRunning(this.id)
  }

  private nowSec() {
    return this.clock.now() / 1000
  }

  private markFailure(err: Error) {
    this.lastFetchSuccess = false
    this.lastErrorMessage = err.message
    this.failedUpdates++
  }

  private mergeKey(rec: EndpointRecord) {
    return this.mergeBy === "address" ? rec.addressKey : rec.descriptor
  }

  private mergeEndpoints(lines: string[]) {
    const prev = new Map<string, EndpointRecord>()
    for (const old of this._endpoints) {
      const k = this.mergeKey(old)
      if (!prev.has(k)) prev.set(k, old)
    }
    return lines.map((line) => {
      const rec = new EndpointRecord(line)
      const old = prev.get(this.mergeKey(rec))
      if (old) rec.carryStatsFrom(old)
      return rec
    })
  }

  /**
   * Download, decode and parse the feed, then replace the endpoint list.
   * Rejects with `FetchError` (transport) or `ParseError` (no usable descriptor).
   */
  async fetch({ timeoutMs, signal }: { timeoutMs?: number; signal?: AbortSignal } = {}) {
    this.totalUpdates++
    log.info(`拉取订阅：${this.name}`)

    let bytes: Uint8Array
    try {
      bytes = await this.fetcher(this.url, { timeoutMs: timeoutMs ?? this.defaultTimeoutMs, ...(signal ? { signal } : {}) })
    } catch (e) {
      const err = new FetchError(`Failed to fetch subscription ${this.name}: ${describeError(e)}`, { cause: e })
      this.markFailure(err)
      log.error(`订阅拉取失败：${safeUrlForLog(this.url)} (${describeError(e)})`)
      throw err
    }

    const { text, encoding } = decodePayload(bytes)
    if (encoding !== "utf-8") log.debug(`订阅内容编码：${encoding} (${this.name})`)
    const outcome = parseSubscriptionContent(text)
    if (!outcome.ok) {
      const err = new ParseError(`No valid configurations found in subscription ${this.name}: ${outcome.reason}`)
      this.markFailure(err)
      log.error(`订阅解析失败：${this.name} (${outcome.reason})`)
      throw err
    }

    const next = this.mergeEndpoints(outcome.lines)
    this._endpoints = next
    this.lastUpdateTime = this.nowSec()
    this.lastFetchSuccess = true
    this.lastErrorMessage = ""
    this.successfulUpdates++
    log.info(
      `订阅解析完成：${this.name} 节点 ${next.length}` +
        `${outcome.dropped ? `（忽略 ${outcome.dropped} 行）` : ""} encoding=${outcome.encoding}`
    )
    return next
  }

  update(opts: { timeoutMs?: number; signal?: AbortSignal } = {}) {
    return this.fetch(opts)
  }

  /** Idempotent; returns false when the worker was already running. */
  startAutoUpdate() {
    this.autoUpdate = true
    return this.scheduler.start(this)
  }

  async stopAutoUpdate() {
    this.autoUpdate = false
    await this.scheduler.stop(this.id)
  }

  rename(name: string) {
    const next = String(name ?? "").trim()
    if (!next) throw new ValidationError("Subscription name cannot be empty")
    this.name = next
  }

  setUpdateInterval(seconds: number) {
    this.updateInterval = validateInterval(seconds)
  }

  setTags(tags: string[]) {
    this.tags = cleanTags(tags)
  }

  setEnabled(flag: boolean) {
    this.enabled = Boolean(flag)
  }

  setPriority(priority: number) {
    this.priority = Math.trunc(Number(priority)) || 0
  }

  /** Sets the interval first so a freshly started worker already uses it. */
  async setAutoUpdate(flag: boolean, intervalSec?: number) {
    if (intervalSec != null) this.setUpdateInterval(intervalSec)
    if (flag) this.startAutoUpdate()
    else await this.stopAutoUpdate()
  }

  /** Applies a probe outcome to every endpoint carrying this descriptor; returns how many matched. */
  recordTest(descriptor: string, outcome: TestOutcome, nowSec = this.nowSec()) {
    let n = 0
    for (const rec of this._endpoints) {
      if (rec.descriptor !== descriptor) continue
      rec.recordTest(outcome, nowSec)
      n++
    }
    return n
  }

  tagEndpoint(descriptor: string, tags: string[]) {
    let n = 0
    for (const rec of this._endpoints) {
      if (rec.descriptor !== descriptor) continue
      rec.tags = cleanTags([...rec.tags, ...tags])
      n++
    }
    return n
  }

  summary(): SubscriptionSummary {
    return {
      id: this.id,
      name: this.name,
      url: this.url,
      enabled: this.enabled,
      priority: this.priority,
      tags: this.tags.slice(),
      autoUpdate: this.autoUpdate,
      autoUpdating: this.isAutoUpdating,
      updateInterval: this.updateInterval,
      lastUpdateTime: this.lastUpdateTime,
      lastFetchSuccess: this.lastFetchSuccess,
      lastErrorMessage: this.lastErrorMessage,
      totalUpdates: this.totalUpdates,
      successfulUpdates: this.successfulUpdates,
      failedUpdates: this.failedUpdates,
      configCount: this._endpoints.length,
      testedCount: this._endpoints.filter((e) => e.tested).length
    }
  }

  toRecord(): SubscriptionRecord {
    return {
      id: this.id,
      name: this.name,
      url: this.url,
      enabled: this.enabled,
      priority: this.priority,
      tags: this.tags.slice(),
      auto_update: this.autoUpdate,
      update_interval: this.updateInterval,
      last_update_time: this.lastUpdateTime,
      last_fetch_success: this.lastFetchSuccess,
      last_error_message: this.lastErrorMessage,
      total_updates: this.totalUpdates,
      successful_updates: this.successfulUpdates,
      failed_updates: this.failedUpdates,
      configs: this._endpoints.map((e) => e.toRecord())
    }
  }

  /** Rebuilds a subscription from its persisted record; throws `ValidationError` on a corrupt one. */
  static fromRecord(raw: unknown, deps: SubscriptionDeps = {}) {
    const parsed = subscriptionRecordSchema.safeParse(raw)
    if (!parsed.success) throw new ValidationError(`Invalid subscription record: ${formatZodIssues(parsed.error)}`)
    const data = parsed.data
    const sub = new Subscription(
      data.url,
      {
        name: data.name,
        enabled: data.enabled,
        priority: data.priority,
        tags: data.tags,
        autoUpdate: data.auto_update,
        updateInterval: data.update_interval
      },
      deps
    )
    if (sub.id !== data.id) throw new ValidationError(`Subscription record id does not match its URL: ${data.id}`)
    sub.lastUpdateTime = data.last_update_time
    sub.lastFetchSuccess = data.last_fetch_success
    sub.lastErrorMessage = data.last_error_message
    sub.totalUpdates = data.total_updates
    sub.successfulUpdates = data.successful_updates
    sub.failedUpdates = data.failed_updates
    sub._endpoints = data.configs.map((c) => (typeof c === "string" ? new EndpointRecord(c) : EndpointRecord.fromRecord(c)))
    return sub
  }
}
