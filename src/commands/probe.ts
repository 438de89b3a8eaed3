import { NetProber } from "../probe/net.js"
import { pickCandidates, ProbeOrchestrator, rankVerdicts, probeErrorLabel } from "../probe/orchestrator.js"
import type { FilterOptions } from "../proxy/store.js"
import { toInt } from "../utils/coerce.js"
import { c, createLogger } from "../utils/log.js"
import { formatLatency, loadConfig, openStore, parseFilterFlag, printer, type CommandOptions } from "./context.js"

const log = createLogger("测速")

interface ProbeArgs {
  top: number
  parallel: boolean
  timeoutMs: number
  attempts: number
  concurrency: number
  sample: number
  json: boolean
  filter: FilterOptions
}

function parseArgs(argv: string[]): ProbeArgs {
  const args: ProbeArgs = { top: 0, parallel: true, timeoutMs: 0, attempts: 0, concurrency: 0, sample: 0, json: false, filter: {} }
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i]
    if (parseFilterFlag(args.filter, a, () => argv[++i])) continue
    if (a === "--top") args.top = Math.max(0, toInt(argv[++i], 0))
    else if (a === "--sequential") args.parallel = false
    else if (a === "--timeoutMs") args.timeoutMs = Math.max(0, toInt(argv[++i], 0))
    else if (a === "--attempts") args.attempts = Math.max(0, toInt(argv[++i], 0))
    else if (a === "--concurrency") args.concurrency = Math.max(0, toInt(argv[++i], 0))
    else if (a === "--sample") args.sample = Math.max(0, toInt(argv[++i], 0))
    else if (a === "--json") args.json = true
  }
  return args
}

/** Probes the filtered endpoints, records every outcome and prints the fastest ones. */
export async function cmdProbeBest(argv: string[], options: CommandOptions = {}) {
  const args = parseArgs(argv)
  const cfg = loadConfig(options)
  const store = await openStore(cfg, options)
  try {
    const { endpoints } = store.filterWithReport(args.filter)
    // Several subscriptions often carry the same descriptor; probe it once.
    let candidates = [...new Set(endpoints.map((e) => e.descriptor))]
    if (args.sample) candidates = pickCandidates(candidates, args.sample)
    const print = printer(options)
    if (!candidates.length) {
      print("(no endpoints to probe)")
      return []
    }

    const orchestrator = new ProbeOrchestrator(options.prober ?? new NetProber({ testUrl: cfg.probe.testUrl }), {
      timeoutMs: args.timeoutMs || cfg.probe.timeoutMs,
      attempts: args.attempts || cfg.probe.attempts,
      concurrency: args.concurrency || cfg.probe.concurrency
    })
    const verdicts = await orchestrator.evaluateMany(candidates, {
      parallel: args.parallel,
      onProgress: (done, total, v) => {
        if (!v.success) log.debug(`[${done}/${total}] ${c.gray(probeErrorLabel(v.errorType ?? "error"))}`)
      }
    })
    await store.recordResults(verdicts)

    const top = rankVerdicts(verdicts).slice(0, args.top || cfg.probe.topN)
    const byDescriptor = new Map(endpoints.map((e) => [e.descriptor, e]))
    if (args.json) {
      print(JSON.stringify(top.map((v) => ({ descriptor: v.descriptor, latencyMs: v.latencyMs, tier: v.tier })), null, 2))
    } else if (!top.length) {
      print("(no reachable endpoints)")
    } else {
      top.forEach((v, i) => {
        const e = byDescriptor.get(v.descriptor)
        print(`${i + 1}. ${e?.name ?? v.descriptor}  ${e?.protocol ?? ""}  ${formatLatency(v.latencyMs)}  tier=${v.tier}`)
      })
    }
    return top
  } finally {
    await store.close()
  }
}
