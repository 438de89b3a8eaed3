import fsp from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest"
import type { CommandOptions } from "../src/commands/context.js"
import { run, USAGE } from "../src/main.js"
import type { Prober } from "../src/probe/orchestrator.js"
import { subscriptionIdFor } from "../src/proxy/subscription.js"
import { base64, fakeFetcher } from "./helpers/feed.js"

const URL_A = "https://example.com/sub"
const FEED_A = "vless://user@host:443#NodeA\nvmess://abc@host2:8443#NodeB\ngarbage-line"

const baseEnv = { ...process.env }
let dir = ""
let lines: string[] = []
let options: CommandOptions

const prober: Prober = {
  rawConnectivityTest: async (descriptor) => (descriptor.endsWith("#NodeA") ? 10 : null)
}

beforeEach(async () => {
  dir = await fsp.mkdtemp(path.join(os.tmpdir(), "subrank-cli-"))
  process.env.SUBRANK_STORAGE_DIR = path.join(dir, "subs")
  process.env.NO_COLOR = "1"
  lines = []
  options = {
    fetcher: fakeFetcher({ [URL_A]: base64(FEED_A) }).fetcher,
    prober,
    configPath: path.join(dir, "config.yaml"),
    print: (line) => lines.push(line)
  }
  for (const m of ["log", "warn", "error", "debug"] as const) vi.spyOn(console, m).mockImplementation(() => {})
})

afterEach(async () => {
  process.env = { ...baseEnv }
  vi.restoreAllMocks()
  await fsp.rm(dir, { recursive: true, force: true })
})

describe("cli", () => {
  it("prints usage for an unknown command", async () => {
    await run(["nope"], options)
    expect(lines).toEqual([USAGE])
  })

  it("adds, filters, probes and removes", async () => {
    await run(["sub:add", "--url", URL_A, "--name", "Main", "--tags", "a,b"], options)
    const id = subscriptionIdFor(URL_A)
    expect(lines[0].startsWith(`${id.slice(0, 12)}  Main  ok  configs=2 tested=0`)).toBe(true)

    lines = []
    await run(["sub:filter", "--minSuccessRate", "0.5"], options)
    expect(lines).toEqual(["no endpoint has been tested yet; run probe:best first"])

    lines = []
    await run(["sub:filter", "--protocols", "vless"], options)
    expect(lines).toEqual(["NodeA  vless  host:443  -  untested"])

    lines = []
    await run(["sub:filter", "--countries", "nodeb"], options)
    expect(lines).toEqual(["NodeB  vmess  host2:8443  -  untested"])

    lines = []
    await run(["probe:best", "--top", "5"], options)
    expect(lines).toEqual(["1. NodeA  vless  10ms  tier=raw"])

    lines = []
    await run(["sub:filter", "--maxLatency", "100"], options)
    expect(lines).toEqual(["NodeA  vless  host:443  10ms  100% (1/1)"])

    lines = []
    await run(["sub:filter", "--sort", "name", "--reverse"], options)
    expect(lines).toEqual(["NodeB  vmess  host2:8443  -  0% (0/1)", "NodeA  vless  host:443  10ms  100% (1/1)"])

    lines = []
    await run(["sub:remove", "--id", id.slice(0, 8)], options)
    expect(lines).toEqual(["removed"])

    lines = []
    await run(["sub:list"], options)
    expect(lines).toEqual(["(no subscriptions)"])
  })

  it("rejects bad input with ValidationError", async () => {
    await expect(run(["sub:add"], options)).rejects.toThrow("Missing --url")
    await expect(run(["sub:remove", "--id", "deadbeef00"], options)).rejects.toThrow("Subscription not found: deadbeef00")
    await expect(run(["sub:filter", "--minSuccessRate", "abc"], options)).rejects.toThrow("minSuccessRate must be between 0 and 1")
  })

  it("edits a subscription", async () => {
    await run(["sub:add", "--url", URL_A, "--no-fetch"], options)
    lines = []
    await run(["sub:edit", "--id", subscriptionIdFor(URL_A), "--name", "Renamed", "--disable", "--priority", "2"], options)
    expect(lines[0]).toContain("  Renamed  pending  configs=0")
    expect(lines[0]).toContain("  disabled")
  })
})
