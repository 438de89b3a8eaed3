import path from "node:path"
import { isKnownProtocol, type EndpointRecord, type TestOutcome } from "./endpoint.js"
import { describeError, ValidationError } from "./errors.js"
import type { SubscriptionFetcher } from "./http.js"
import {
  DEFAULT_FETCH_TIMEOUT_MS,
  Subscription,
  type MergeMode,
  type SubscriptionDeps,
  type SubscriptionInit,
  type SubscriptionSummary
} from "./subscription.js"
import { RefreshScheduler, type Clock } from "../runtime/refresher.js"
import { ensureDir, listFiles, readJson, removeFile, writeJson } from "../utils/fs.js"
import { createLogger, safeUrlForLog } from "../utils/log.js"

const log = createLogger("订阅库")

export interface StoreOptions {
  storageDir: string
  fetcher?: SubscriptionFetcher
  clock?: Clock
  scheduler?: RefreshScheduler
  mergeBy?: MergeMode
  fetchTimeoutMs?: number
  /** Restart auto refresh for subscriptions flagged for it while loading. */
  resumeAutoUpdate?: boolean
}

export interface AddOptions extends SubscriptionInit {
  fetchNow?: boolean
  timeoutMs?: number
}

export interface FilterOptions {
  protocols?: string[]
  /** 0..1 */
  minSuccessRate?: number
  /** Milliseconds. */
  maxLatency?: number
  subscriptionTags?: string[]
  configTags?: string[]
  nameContainsRegex?: string
  /** Country codes matched case-insensitively anywhere in the display name. */
  countries?: string[]
}

export type FilterReason = "ok" | "no_matches" | "untested"

export interface FilterReport {
  endpoints: EndpointRecord[]
  reason: FilterReason
}

export type SortKey = "latency" | "success_rate" | "name" | "last_test"

export interface EditPatch {
  name?: string
  enabled?: boolean
  priority?: number
  tags?: string[]
  autoUpdate?: boolean
  updateInterval?: number
}

/** A probe verdict as far as the store cares: which descriptor, and how it went. */
export interface ResultEntry extends TestOutcome {
  descriptor: string
}

function lowerList(v: string[] | undefined) {
  return (v ?? []).map((s) => String(s).trim().toLowerCase()).filter(Boolean)
}

function hasAnyTag(tags: string[], wanted: string[]) {
  if (!wanted.length) return true
  const own = new Set(tags.map((t) => t.toLowerCase()))
  return wanted.some((t) => own.has(t))
}

function validateFilter(opts: FilterOptions) {
  const { minSuccessRate, maxLatency, nameContainsRegex } = opts
  if (minSuccessRate != null && !(Number.isFinite(minSuccessRate) && minSuccessRate >= 0 && minSuccessRate <= 1)) {
    throw new ValidationError(`minSuccessRate must be between 0 and 1 (got ${minSuccessRate})`)
  }
  if (maxLatency != null && !(Number.isFinite(maxLatency) && maxLatency >= 0)) {
    throw new ValidationError(`maxLatency must be a non-negative number (got ${maxLatency})`)
  }
  let nameRe: RegExp | null = null
  if (nameContainsRegex != null && nameContainsRegex !== "") {
    try {
      nameRe = new RegExp(nameContainsRegex, "i")
    } catch (e) {
      throw new ValidationError(`Invalid name pattern: ${nameContainsRegex}`, { cause: e })
    }
  }
  const protocols = lowerList(opts.protocols)
  const unknown = protocols.filter((p) => !isKnownProtocol(p) && p !== "unknown")
  if (unknown.length) throw new ValidationError(`Unknown protocol(s): ${unknown.join(", ")}`)
  return { nameRe, protocols }
}

/**
 * Ascending for latency (untested and failed last), descending for success rate,
 * most recent first for last_test; `order` flips the natural direction.
 */
export function sortEndpoints(list: readonly EndpointRecord[], by: SortKey = "latency", order: "natural" | "reverse" = "natural") {
  const indexed = list.map((rec, i) => ({ rec, i }))
  const cmp = (a: EndpointRecord, b: EndpointRecord): number => {
    if (by === "name") return a.name.localeCompare(b.name)
    if (by === "last_test") return b.lastTestTime - a.lastTestTime
    if (by === "success_rate") {
      const ra = a.successRate
      const rb = b.successRate
      if (ra == null || rb == null) return (ra == null ? 1 : 0) - (rb == null ? 1 : 0)
      return rb - ra
    }
    const la = a.lastLatency > 0 ? a.lastLatency : Number.POSITIVE_INFINITY
    const lb = b.lastLatency > 0 ? b.lastLatency : Number.POSITIVE_INFINITY
    if (la === lb) return 0
    return la < lb ? -1 : 1
  }
  const sign = order === "reverse" ? -1 : 1
  indexed.sort((x, y) => sign * cmp(x.rec, y.rec) || x.i - y.i)
  return indexed.map((x) => x.rec)
}

export class SubscriptionStore {
  readonly storageDir: string
  private readonly scheduler: RefreshScheduler
  private readonly deps: SubscriptionDeps
  private subscriptions = new Map<string, Subscription>()
  // URLs of adds whose initial fetch is still in flight.
  private pendingUrls = new Set<string>()
  // Per-id write chain; a removal queues behind saves already in flight.
  private writes = new Map<string, Promise<void>>()
  private readonly fetchTimeoutMs: number

  private constructor(opts: StoreOptions) {
    this.storageDir = path.resolve(opts.storageDir)
    this.fetchTimeoutMs = opts.fetchTimeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS
    this.scheduler =
      opts.scheduler ??
      new RefreshScheduler({ ...(opts.clock ? { clock: opts.clock } : {}), fetchTimeoutMs: this.fetchTimeoutMs })
    this.scheduler.setRefreshHook(async (sub) => {
      const own = this.subscriptions.get(sub.id)
      if (own) await this.save(own)
    })
    this.deps = {
      scheduler: this.scheduler,
      clock: opts.clock ?? this.scheduler.clock,
      fetchTimeoutMs: this.fetchTimeoutMs,
      ...(opts.fetcher ? { fetcher: opts.fetcher } : {}),
      ...(opts.mergeBy ? { mergeBy: opts.mergeBy } : {})
    }
  }

  /** Opens the store and loads every persisted subscription. */
  static async open(opts: StoreOptions) {
    const store = new SubscriptionStore(opts)
    await store.load({ resumeAutoUpdate: opts.resumeAutoUpdate ?? true })
    return store
  }

  private fileFor(id: string) {
    return path.join(this.storageDir, `${id}.json`)
  }

  private async load({ resumeAutoUpdate }: { resumeAutoUpdate: boolean }) {
    await ensureDir(this.storageDir)
    const files = await listFiles(this.storageDir, ".json")
    for (const file of files) {
      try {
        const sub = Subscription.fromRecord(await readJson(file), this.deps)
        if (this.subscriptions.has(sub.id)) {
          log.warn(`重复的订阅记录，跳过：${file}`)
          continue
        }
        this.subscriptions.set(sub.id, sub)
      } catch (e) {
        log.error(`读取订阅记录失败，已跳过：${file} (${describeError(e)})`)
      }
    }
    log.info(`已加载订阅：${this.subscriptions.size}`)
    if (!resumeAutoUpdate) return
    for (const sub of this.subscriptions.values()) {
      if (sub.autoUpdate) sub.startAutoUpdate()
    }
  }

  private serialize<T>(id: string, task: () => Promise<T>) {
    const run = (this.writes.get(id) ?? Promise.resolve()).then(task)
    // The caller gets `run` and its failure; the chain only needs the ordering.
    this.writes.set(
      id,
      run.then(
        () => undefined,
        () => undefined
      )
    )
    return run
  }

  /** Persists `sub` unless it has been removed from the store in the meantime. */
  async save(sub: Subscription) {
    await this.serialize(sub.id, async () => {
      if (this.subscriptions.get(sub.id) !== sub) return
      try {
        await writeJson(this.fileFor(sub.id), sub.toRecord())
      } catch (e) {
        log.error(`保存订阅失败：${sub.name} (${describeError(e)})`)
        throw e
      }
    })
  }

  get size() {
    return this.subscriptions.size
  }

  get(id: string) {
    return this.subscriptions.get(id) ?? null
  }

  findByUrl(url: string) {
    const u = String(url).trim()
    for (const sub of this.subscriptions.values()) {
      if (sub.url === u) return sub
    }
    return null
  }

  /** Snapshot of every subscription, highest priority first. */
  list(): SubscriptionSummary[] {
    return [...this.subscriptions.values()]
      .map((s) => s.summary())
      .sort((a, b) => b.priority - a.priority || a.name.localeCompare(b.name))
  }

  async add(url: string, { fetchNow = true, timeoutMs, ...init }: AddOptions = {}) {
    const normalized = String(url ?? "").trim()
    if (this.findByUrl(normalized) || this.pendingUrls.has(normalized)) {
      throw new ValidationError(`Subscription URL already exists: ${normalized}`)
    }
    const sub = new Subscription(normalized, init, this.deps)

    this.pendingUrls.add(normalized)
    try {
      if (fetchNow) {
        try {
          await sub.fetch({ timeoutMs: timeoutMs ?? this.fetchTimeoutMs })
        } catch (e) {
          // Kept anyway so the caller can retry later.
          log.warn(`添加时拉取订阅失败：${safeUrlForLog(normalized)} (${describeError(e)})`)
        }
      }
      this.subscriptions.set(sub.id, sub)
    } finally {
      this.pendingUrls.delete(normalized)
    }

    if (init.autoUpdate) sub.startAutoUpdate()
    await this.save(sub)
    log.info(`已添加订阅：${sub.name} (${safeUrlForLog(normalized)})`)
    return sub
  }

  async removeById(id: string) {
    const sub = this.subscriptions.get(id)
    if (!sub) {
      log.warn(`订阅不存在：${id}`)
      return false
    }
    this.subscriptions.delete(id)
    if (this.scheduler.isRunning(id)) await this.scheduler.stop(id)
    await this.serialize(id, () => removeFile(this.fileFor(id)))
    this.writes.delete(id)
    log.info(`已删除订阅：${sub.name}`)
    return true
  }

  /** `null` when the id is unknown; fetch/parse failures propagate after the record is persisted. */
  async update(id: string, { timeoutMs }: { timeoutMs?: number } = {}) {
    const sub = this.subscriptions.get(id)
    if (!sub) return null
    try {
      return await sub.update({ timeoutMs: timeoutMs ?? this.fetchTimeoutMs })
    } finally {
      await this.save(sub)
    }
  }

  async updateAll({ timeoutMs }: { timeoutMs?: number } = {}) {
    const results = new Map<string, readonly EndpointRecord[] | Error>()
    const subs = [...this.subscriptions.values()]
    await Promise.all(
      subs.map(async (sub) => {
        try {
          results.set(sub.id, await sub.update({ timeoutMs: timeoutMs ?? this.fetchTimeoutMs }))
        } catch (e) {
          results.set(sub.id, e instanceof Error ? e : new Error(String(e)))
          log.error(`更新订阅失败：${sub.name} (${describeError(e)})`)
        }
        await this.save(sub).catch((e: unknown) => results.set(sub.id, e instanceof Error ? e : new Error(String(e))))
      })
    )
    return results
  }

  async edit(id: string, patch: EditPatch) {
    const sub = this.subscriptions.get(id)
    if (!sub) return null
    if (patch.name != null) sub.rename(patch.name)
    if (patch.enabled != null) sub.setEnabled(patch.enabled)
    if (patch.priority != null) sub.setPriority(patch.priority)
    if (patch.tags != null) sub.setTags(patch.tags)
    if (patch.autoUpdate != null) await sub.setAutoUpdate(patch.autoUpdate, patch.updateInterval)
    else if (patch.updateInterval != null) sub.setUpdateInterval(patch.updateInterval)
    await this.save(sub)
    return sub.summary()
  }

  /** Every endpoint of every enabled subscription, in subscription priority order. */
  allEndpoints({ includeDisabled = false }: { includeDisabled?: boolean } = {}) {
    return this.enabledSubscriptions(includeDisabled).flatMap((s) => [...s.endpoints])
  }

  private enabledSubscriptions(includeDisabled = false) {
    return [...this.subscriptions.values()]
      .filter((s) => includeDisabled || s.enabled)
      .sort((a, b) => b.priority - a.priority)
  }

  filter(opts: FilterOptions = {}) {
    return this.filterWithReport(opts).endpoints
  }

  /**
   * Intersection of every given criterion, applied as: subscription tags, protocol, success rate,
   * latency, endpoint tags, name pattern, countries. Latency and success-rate criteria only admit tested endpoints.
   */
  filterWithReport(opts: FilterOptions = {}): FilterReport {
    const { nameRe, protocols } = validateFilter(opts)
    const { minSuccessRate, maxLatency } = opts
    const subTags = lowerList(opts.subscriptionTags)
    const cfgTags = lowerList(opts.configTags)
    const countries = lowerList(opts.countries)
    const needsHistory = minSuccessRate != null || maxLatency != null

    if (needsHistory && ![...this.subscriptions.values()].some((s) => s.endpoints.some((e) => e.tested))) {
      log.warn("尚无任何节点的测试记录：延迟/成功率筛选结果必然为空，请先执行测速")
      return { endpoints: [], reason: "untested" }
    }

    let list = this.enabledSubscriptions().filter((s) => hasAnyTag(s.tags, subTags)).flatMap((s) => [...s.endpoints])
    if (protocols.length) list = list.filter((e) => protocols.includes(e.protocol))
    if (minSuccessRate != null) {
      list = list.filter((e) => {
        const rate = e.successRate
        return rate != null && rate >= minSuccessRate
      })
    }
    if (maxLatency != null) list = list.filter((e) => e.lastLatency > 0 && e.lastLatency <= maxLatency)
    if (cfgTags.length) list = list.filter((e) => hasAnyTag(e.tags, cfgTags))
    if (nameRe) list = list.filter((e) => nameRe.test(e.name))
    if (countries.length) list = list.filter((e) => countries.some((code) => e.name.toLowerCase().includes(code)))

    if (!list.length) log.info("筛选完成：没有符合条件的节点")
    return { endpoints: list, reason: list.length ? "ok" : "no_matches" }
  }

  /** Writes probe outcomes onto matching endpoints and persists the touched subscriptions. */
  async recordResults(results: readonly ResultEntry[]) {
    const nowSec = this.scheduler.clock.now() / 1000
    const touched = new Set<Subscription>()
    let updated = 0
    for (const r of results) {
      for (const sub of this.subscriptions.values()) {
        const n = sub.recordTest(r.descriptor, r, nowSec)
        if (n) {
          updated += n
          touched.add(sub)
        }
      }
    }
    for (const sub of touched) await this.save(sub)
    return updated
  }

  async tagEndpoint(descriptor: string, tags: string[]) {
    let n = 0
    for (const sub of this.subscriptions.values()) {
      const hit = sub.tagEndpoint(descriptor, tags)
      if (hit) {
        n += hit
        await this.save(sub)
      }
    }
    return n
  }

  /** Stops every refresh worker; persisted flags are left as they are. */
  async close() {
    await this.scheduler.stopAll()
  }
}
