import { ValidationError } from "../proxy/errors.js"
import { sortEndpoints, type EditPatch, type FilterOptions } from "../proxy/store.js"
import type { SubscriptionSummary } from "../proxy/subscription.js"
import { toInt, toList, toNum } from "../utils/coerce.js"
import { c, createLogger } from "../utils/log.js"
import { formatEndpoint, loadConfig, openStore, parseFilterFlag, printer, toSortKey, type CommandOptions } from "./context.js"

const log = createLogger("订阅")

function formatTime(sec: number) {
  return sec > 0 ? new Date(sec * 1000).toISOString() : "never"
}

function formatSummary(s: SubscriptionSummary) {
  const state = s.lastFetchSuccess ? c.green("ok") : s.totalUpdates ? c.red("failed") : c.gray("pending")
  return (
    `${s.id.slice(0, 12)}  ${s.name}  ${state}  configs=${s.configCount} tested=${s.testedCount}` +
    `  updated=${formatTime(s.lastUpdateTime)}  updates=${s.successfulUpdates}/${s.totalUpdates}` +
    `${s.enabled ? "" : "  disabled"}${s.autoUpdate ? `  auto=${s.updateInterval}s` : ""}` +
    `${s.tags.length ? `  tags=${s.tags.join(",")}` : ""}` +
    `${s.lastErrorMessage ? `\n    ${c.gray(s.lastErrorMessage)}` : ""}`
  )
}

/** Accepts a full id or a unique prefix of at least 6 characters. */
function resolveId(ids: string[], raw: string) {
  const want = raw.trim().toLowerCase()
  if (!want) throw new ValidationError("Missing --id")
  if (ids.includes(want)) return want
  const hits = want.length >= 6 ? ids.filter((id) => id.startsWith(want)) : []
  if (hits.length === 1) return hits[0]
  throw new ValidationError(hits.length ? `Ambiguous subscription id: ${raw}` : `Subscription not found: ${raw}`)
}

interface AddArgs {
  url: string
  name: string
  auto: boolean
  interval: number
  tags: string[]
  priority: number
  fetch: boolean
}

export async function cmdSubAdd(argv: string[], options: CommandOptions = {}) {
  const args: AddArgs = {
    url: "",
    name: "",
    auto: false,
    interval: Number.NaN,
    tags: [],
    priority: 0,
    fetch: true
  }
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i]
    if (a === "--url") args.url = String(argv[++i] ?? "")
    else if (a === "--name") args.name = String(argv[++i] ?? "")
    else if (a === "--auto") args.auto = true
    else if (a === "--interval") args.interval = toNum(argv[++i], Number.NaN)
    else if (a === "--tags") args.tags = toList(argv[++i])
    else if (a === "--priority") args.priority = toInt(argv[++i], 0)
    else if (a === "--no-fetch") args.fetch = false
  }
  if (!args.url) throw new ValidationError("Missing --url")

  const cfg = loadConfig(options)
  const store = await openStore(cfg, options)
  try {
    const sub = await store.add(args.url, {
      name: args.name,
      autoUpdate: args.auto,
      updateInterval: Number.isNaN(args.interval) ? cfg.subscription.updateInterval : args.interval,
      tags: args.tags,
      priority: args.priority,
      fetchNow: args.fetch
    })
    printer(options)(formatSummary(sub.summary()))
    return sub.summary()
  } finally {
    await store.close()
  }
}

export async function cmdSubList(argv: string[], options: CommandOptions = {}) {
  const json = argv.includes("--json")
  const store = await openStore(loadConfig(options), options)
  try {
    const list = store.list()
    const print = printer(options)
    if (json) print(JSON.stringify(list, null, 2))
    else if (!list.length) print("(no subscriptions)")
    else for (const s of list) print(formatSummary(s))
    return list
  } finally {
    await store.close()
  }
}

export async function cmdSubUpdate(argv: string[], options: CommandOptions = {}) {
  let id = ""
  for (let i = 0; i < argv.length; i++) {
    if (argv[i] === "--id") id = String(argv[++i] ?? "")
  }
  const store = await openStore(loadConfig(options), options)
  const print = printer(options)
  try {
    if (id) {
      const full = resolveId(store.list().map((s) => s.id), id)
      const list = await store.update(full)
      if (list == null) throw new ValidationError(`Subscription not found: ${id}`)
      const sub = store.get(full)
      if (sub) print(formatSummary(sub.summary()))
      return
    }
    const results = await store.updateAll()
    let failed = 0
    for (const [subId, res] of results) {
      const sub = store.get(subId)
      if (res instanceof Error) failed++
      if (sub) print(formatSummary(sub.summary()))
    }
    log.info(`更新完成：${results.size - failed}/${results.size}`)
    if (failed) process.exitCode = 1
  } finally {
    await store.close()
  }
}

export async function cmdSubRemove(argv: string[], options: CommandOptions = {}) {
  let id = ""
  for (let i = 0; i < argv.length; i++) {
    if (argv[i] === "--id") id = String(argv[++i] ?? "")
  }
  const store = await openStore(loadConfig(options), options)
  try {
    const removed = await store.removeById(resolveId(store.list().map((s) => s.id), id))
    printer(options)(removed ? "removed" : "not found")
    return removed
  } finally {
    await store.close()
  }
}

export async function cmdSubEdit(argv: string[], options: CommandOptions = {}) {
  let id = ""
  const patch: EditPatch = {}
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i]
    if (a === "--id") id = String(argv[++i] ?? "")
    else if (a === "--name") patch.name = String(argv[++i] ?? "")
    else if (a === "--enable") patch.enabled = true
    else if (a === "--disable") patch.enabled = false
    else if (a === "--priority") patch.priority = toInt(argv[++i], 0)
    else if (a === "--tags") patch.tags = toList(argv[++i])
    else if (a === "--auto") patch.autoUpdate = true
    else if (a === "--no-auto") patch.autoUpdate = false
    else if (a === "--interval") patch.updateInterval = toNum(argv[++i], Number.NaN)
  }
  const store = await openStore(loadConfig(options), options)
  try {
    const summary = await store.edit(resolveId(store.list().map((s) => s.id), id), patch)
    if (summary) printer(options)(formatSummary(summary))
    return summary
  } finally {
    await store.close()
  }
}

export async function cmdSubFilter(argv: string[], options: CommandOptions = {}) {
  const filter: FilterOptions = {}
  let sort = toSortKey("latency")
  let reverse = false
  let limit = 0
  let json = false
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i]
    if (parseFilterFlag(filter, a, () => argv[++i])) continue
    if (a === "--sort") sort = toSortKey(argv[++i])
    else if (a === "--reverse") reverse = true
    else if (a === "--limit") limit = Math.max(0, toInt(argv[++i], 0))
    else if (a === "--json") json = true
  }

  const store = await openStore(loadConfig(options), options)
  try {
    const { endpoints, reason } = store.filterWithReport(filter)
    let list = sortEndpoints(endpoints, sort, reverse ? "reverse" : "natural")
    if (limit) list = list.slice(0, limit)
    const print = printer(options)
    if (json) print(JSON.stringify(list.map((e) => e.toRecord()), null, 2))
    else if (reason === "untested") print("no endpoint has been tested yet; run probe:best first")
    else if (!list.length) print("(no matches)")
    else for (const e of list) print(formatEndpoint(e))
    return { endpoints: list, reason }
  } finally {
    await store.close()
  }
}

/** Keeps auto refresh running in the foreground until SIGINT/SIGTERM. */
export async function cmdSubWatch(_argv: string[], options: CommandOptions = {}) {
  const store = await openStore(loadConfig(options), options, { resumeAutoUpdate: true })
  const running = store.list().filter((s) => s.autoUpdating).length
  if (!running) {
    log.warn("没有开启自动更新的订阅（sub:add --auto 或 sub:edit --auto）")
    await store.close()
    return
  }
  log.info(`自动更新运行中：${running} 个订阅，Ctrl+C 退出`)
  await new Promise<void>((resolve) => {
    process.once("SIGINT", resolve)
    process.once("SIGTERM", resolve)
  })
  await store.close()
}
