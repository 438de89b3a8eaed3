import type { Prober } from "../probe/orchestrator.js"
import type { EndpointRecord } from "../proxy/endpoint.js"
import { createHttpFetcher, type SubscriptionFetcher } from "../proxy/http.js"
import { SubscriptionStore, type FilterOptions, type SortKey } from "../proxy/store.js"
import { paths } from "../config.js"
import { loadAppConfig, resolveStorageDir, withEnvOverrides, type AppConfig } from "../user-config.js"
import { envStr, toList, toNum } from "../utils/coerce.js"

/** Seams for tests and embedding hosts. */
export interface CommandOptions {
  fetcher?: SubscriptionFetcher
  prober?: Prober
  configPath?: string
  /** Receives result lines; defaults to console.log. */
  print?: (line: string) => void
}

export function printer(options: CommandOptions) {
  return options.print ?? ((line: string) => console.log(line))
}

export function loadConfig(options: CommandOptions): AppConfig {
  const userPath = options.configPath ?? envStr("SUBRANK_CONFIG", paths.userConfig)
  return withEnvOverrides(loadAppConfig({ userPath }).data)
}

export async function openStore(cfg: AppConfig, options: CommandOptions, { resumeAutoUpdate = false } = {}) {
  const { subscription } = cfg
  const fetcher =
    options.fetcher ??
    createHttpFetcher({
      httpProxy: subscription.httpProxy,
      ...(subscription.userAgent ? { userAgent: subscription.userAgent } : {})
    })
  return await SubscriptionStore.open({
    storageDir: resolveStorageDir(cfg),
    fetcher,
    mergeBy: subscription.mergeBy,
    fetchTimeoutMs: subscription.timeoutMs,
    resumeAutoUpdate
  })
}

const SORT_KEYS: readonly SortKey[] = ["latency", "success_rate", "name", "last_test"]

export function toSortKey(v: unknown, fallback: SortKey = "latency"): SortKey {
  const s = String(v ?? "").trim().toLowerCase()
  return SORT_KEYS.find((k) => k === s) ?? fallback
}

/** Consumes one filter flag; returns false when `flag` is not a filter flag. */
export function parseFilterFlag(filter: FilterOptions, flag: string, take: () => string | undefined) {
  switch (flag) {
    case "--protocols":
      filter.protocols = toList(take())
      return true
    case "--minSuccessRate":
      filter.minSuccessRate = toNum(take(), Number.NaN)
      return true
    case "--maxLatency":
      filter.maxLatency = toNum(take(), Number.NaN)
      return true
    case "--subTags":
      filter.subscriptionTags = toList(take())
      return true
    case "--tags":
      filter.configTags = toList(take())
      return true
    case "--name":
      filter.nameContainsRegex = String(take() ?? "")
      return true
    case "--countries":
      filter.countries = toList(take())
      return true
    default:
      return false
  }
}

export function formatLatency(ms: number) {
  return ms > 0 ? `${Math.round(ms)}ms` : "-"
}

export function formatEndpoint(e: EndpointRecord) {
  const rate = e.successRate
  return [
    e.name,
    e.protocol,
    `${e.address}:${e.port}`,
    formatLatency(e.lastLatency),
    rate == null ? "untested" : `${Math.round(rate * 100)}% (${e.successCount}/${e.testCount})`
  ].join("  ")
}
