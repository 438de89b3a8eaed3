import { setTimeout as delay } from "node:timers/promises"
import { describe, expect, it } from "vitest"
import { classifyProbeError, pickCandidates, ProbeOrchestrator, type Prober, type ProbeContext } from "../src/probe/orchestrator.js"

function errno(code: string) {
  return Object.assign(new Error(`connect ${code}`), { code })
}

/** Raw-tier-only prober answering from a latency table; missing entries are unreachable. */
function tableProber(latency: Record<string, number | "hang">) {
  const stats = { inFlight: 0, maxInFlight: 0 }
  const prober: Prober = {
    async rawConnectivityTest(descriptor: string, _timeoutMs: number, ctx: ProbeContext) {
      stats.inFlight++
      stats.maxInFlight = Math.max(stats.maxInFlight, stats.inFlight)
      try {
        const v = latency[descriptor]
        if (v === "hang") {
          await new Promise<void>((resolve) => ctx.signal.addEventListener("abort", () => resolve(), { once: true }))
          return null
        }
        await delay(5)
        return v ?? null
      } finally {
        stats.inFlight--
      }
    }
  }
  return { prober, stats }
}

describe("ProbeOrchestrator.evaluate", () => {
  it("stops at the first tier that succeeds", async () => {
    const calls: string[] = []
    const orchestrator = new ProbeOrchestrator({
      async fullProbe() {
        calls.push("full")
        return { success: false, totalMs: -1, errorType: "timeout" }
      },
      async quickProbe() {
        calls.push("quick")
        return { success: true, totalMs: 30, dnsMs: 5, tcpMs: 25 }
      },
      async rawConnectivityTest() {
        calls.push("raw")
        return 1
      }
    })
    const v = await orchestrator.evaluate("vless://u@h:1#x")
    expect(calls).toEqual(["full", "quick"])
    expect(v).toMatchObject({ success: true, latencyMs: 30, tier: "quick", result: { success: true, totalMs: 30, dnsMs: 5, tcpMs: 25 } })
    expect(v.attempts.map((a) => [a.tier, a.success, a.errorType])).toEqual([
      ["full", false, "timeout"],
      ["quick", true, undefined]
    ])
  })

  it("uses TTFB as the latency of a full probe, total time when TTFB is missing", async () => {
    const withTtfb = new ProbeOrchestrator({ fullProbe: async () => ({ success: true, totalMs: 300, ttfbMs: 120, score: 1 }) })
    expect(await withTtfb.evaluate("x")).toMatchObject({ success: true, latencyMs: 120, tier: "full", result: { score: 1 } })
    const withoutTtfb = new ProbeOrchestrator({ fullProbe: async () => ({ success: true, totalMs: 300 }) })
    expect((await withoutTtfb.evaluate("x")).latencyMs).toBe(300)
  })

  it("passes the attempt count to the full tier", async () => {
    let seen = 0
    const orchestrator = new ProbeOrchestrator(
      {
        fullProbe: async (_d, attempts) => {
          seen = attempts
          return { success: true, totalMs: 10 }
        }
      },
      { attempts: 5 }
    )
    await orchestrator.evaluate("x")
    await orchestrator.evaluate("x", { attempts: 2 })
    expect(seen).toBe(2)
  })

  it("reports -1 and the last tier's error type when every tier fails", async () => {
    const orchestrator = new ProbeOrchestrator({
      fullProbe: async () => {
        throw new Error("tunnel failed")
      },
      quickProbe: async () => {
        throw errno("ENOTFOUND")
      },
      rawConnectivityTest: async () => null
    })
    const v = await orchestrator.evaluate("x")
    expect(v).toMatchObject({ success: false, latencyMs: -1, tier: null, errorType: "unreachable" })
    expect(v.attempts.map((a) => a.errorType)).toEqual(["error", "dns", "unreachable"])
  })

  it("reports the last tier that ran when later ones are missing", async () => {
    const v = await new ProbeOrchestrator({ quickProbe: async () => Promise.reject(errno("ECONNREFUSED")) }).evaluate("x")
    expect(v.errorType).toBe("refused")
    expect(v.attempts.map((a) => [a.tier, a.errorType])).toEqual([
      ["full", "unavailable"],
      ["quick", "refused"],
      ["raw", "unavailable"]
    ])
    expect((await new ProbeOrchestrator({}).evaluate("x")).errorType).toBe("unavailable")
  })

  it("treats a synchronous throw as a failed tier", async () => {
    const orchestrator = new ProbeOrchestrator({
      quickProbe: () => {
        throw new Error("bad descriptor")
      },
      rawConnectivityTest: async () => 7
    })
    expect(await orchestrator.evaluate("x")).toMatchObject({ success: true, tier: "raw", latencyMs: 7 })
  })

  it("times out a hung tier, aborts its signal and moves on", async () => {
    let aborted = false
    const orchestrator = new ProbeOrchestrator(
      {
        quickProbe: (_d, ctx) =>
          new Promise(() => {
            ctx.signal.addEventListener("abort", () => {
              aborted = true
            })
          }),
        rawConnectivityTest: async () => 12
      },
      { timeoutMs: 30 }
    )
    const v = await orchestrator.evaluate("x")
    expect(aborted).toBe(true)
    expect(v).toMatchObject({ success: true, tier: "raw", latencyMs: 12 })
    expect(v.attempts[1]).toMatchObject({ tier: "quick", success: false, errorType: "timeout" })
  })

  it("falls back to the tier's own time when a success reports no usable latency", async () => {
    const orchestrator = new ProbeOrchestrator({
      fullProbe: async (descriptor) => {
        if (descriptor === "b") return { success: true, totalMs: 50 }
        await delay(15)
        return { success: true, totalMs: Number.NaN }
      }
    })
    const ranked = await orchestrator.batch(["a", "b"])
    const a = ranked.find((v) => v.descriptor === "a")
    expect(a?.success).toBe(true)
    expect(Number.isFinite(a?.latencyMs)).toBe(true)
    expect(a?.latencyMs).toBeGreaterThanOrEqual(1)
    const latencies = ranked.map((v) => v.latencyMs)
    expect(latencies).toEqual([...latencies].sort((x, y) => x - y))
  })

  it("reports at least 1 ms for a success measured at 0", async () => {
    const v = await new ProbeOrchestrator({ rawConnectivityTest: async () => 0 }).evaluate("x")
    expect(v).toMatchObject({ success: true, latencyMs: 1 })
  })
})

describe("ProbeOrchestrator batches", () => {
  it("batch orders by latency and keeps input order on ties", async () => {
    const { prober } = tableProber({ a: 30, b: 10, c: 30, e: 10 })
    const ranked = await new ProbeOrchestrator(prober).batch(["a", "b", "c", "d", "e"])
    expect(ranked.map((v) => v.descriptor)).toEqual(["b", "e", "a", "c"])
    const latencies = ranked.map((v) => v.latencyMs)
    expect(latencies).toEqual([...latencies].sort((x, y) => x - y))
  })

  it("evaluateMany returns every verdict in input order", async () => {
    const { prober } = tableProber({ a: 30, c: 5 })
    const verdicts = await new ProbeOrchestrator(prober).evaluateMany(["a", "b", "c"])
    expect(verdicts.map((v) => [v.descriptor, v.index, v.success, v.latencyMs])).toEqual([
      ["a", 0, true, 30],
      ["b", 1, false, -1],
      ["c", 2, true, 5]
    ])
  })

  it("bounds parallelism by the pool size", async () => {
    const latency = Object.fromEntries(Array.from({ length: 12 }, (_, i) => [`n${i}`, i + 1]))
    const { prober, stats } = tableProber(latency)
    const orchestrator = new ProbeOrchestrator(prober, { concurrency: 3 })
    const ranked = await orchestrator.batch(Object.keys(latency))
    expect(ranked).toHaveLength(12)
    expect(stats.maxInFlight).toBeLessThanOrEqual(3)
    expect(stats.maxInFlight).toBeGreaterThan(1)
  })

  it("runs one candidate at a time in sequential mode", async () => {
    const { prober, stats } = tableProber({ a: 3, b: 2, c: 1 })
    const ranked = await new ProbeOrchestrator(prober).batch(["a", "b", "c"], { parallel: false })
    expect(stats.maxInFlight).toBe(1)
    expect(ranked.map((v) => v.descriptor)).toEqual(["c", "b", "a"])
  })

  it("a hung candidate does not hold back the others", async () => {
    const { prober } = tableProber({ a: 20, stuck: "hang", b: 10 })
    const progress: string[] = []
    const ranked = await new ProbeOrchestrator(prober, { timeoutMs: 50 }).batch(["a", "stuck", "b"], {
      onProgress: (_done, _total, v) => progress.push(v.descriptor)
    })
    expect(ranked.map((v) => v.descriptor)).toEqual(["b", "a"])
    expect(progress.at(-1)).toBe("stuck")
  })

  it("best returns the top-N slice", async () => {
    const { prober } = tableProber({ a: 30, b: 10, c: 20 })
    const top = await new ProbeOrchestrator(prober).best(["a", "b", "c"], 2)
    expect(top.map((v) => [v.descriptor, v.latencyMs])).toEqual([
      ["b", 10],
      ["c", 20]
    ])
  })
})

describe("classifyProbeError", () => {
  it("maps errno codes and messages onto stable classes", () => {
    expect(classifyProbeError(errno("ENOTFOUND"))).toBe("dns")
    expect(classifyProbeError(errno("ECONNREFUSED"))).toBe("refused")
    expect(classifyProbeError(errno("ECONNRESET"))).toBe("reset")
    expect(classifyProbeError(errno("EHOSTUNREACH"))).toBe("unreachable")
    expect(classifyProbeError(new Error("fetch failed", { cause: errno("ECONNREFUSED") }))).toBe("refused")
    expect(classifyProbeError("timeout after 50ms")).toBe("timeout")
    expect(classifyProbeError("bad_response status=502 html=1")).toBe("bad_response")
    expect(classifyProbeError("status=403")).toBe("http_status")
    expect(classifyProbeError("dns")).toBe("dns")
    expect(classifyProbeError(Object.assign(new Error("x"), { name: "AbortError" }))).toBe("aborted")
    expect(classifyProbeError("something odd")).toBe("error")
    expect(classifyProbeError(undefined)).toBe("error")
  })
})

describe("pickCandidates", () => {
  const list = Array.from({ length: 10 }, (_, i) => i)

  it("spreads picks across the list", () => {
    expect(pickCandidates(list, 3)).toEqual([0, 3, 6])
    expect(pickCandidates(list, 3, { offset: 1 })).toEqual([1, 4, 7])
    expect(pickCandidates([0, 1, 2, 3, 4], 2, { offset: 4 })).toEqual([4, 1])
  })

  it("takes the head with the first strategy and clamps k", () => {
    expect(pickCandidates(list, 3, { strategy: "first" })).toEqual([0, 1, 2])
    expect(pickCandidates(list, 50)).toHaveLength(10)
    expect(pickCandidates(list, 0)).toEqual([])
  })
})
