import fs from "node:fs"
import fsp from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest"
import { paths } from "../src/config.js"
import { ValidationError } from "../src/proxy/errors.js"
import { deepMerge, loadAppConfig, withEnvOverrides } from "../src/user-config.js"

let dir = ""
const baseEnv = { ...process.env }

beforeEach(async () => {
  dir = await fsp.mkdtemp(path.join(os.tmpdir(), "subrank-config-"))
  vi.spyOn(console, "log").mockImplementation(() => {})
})

afterEach(async () => {
  process.env = { ...baseEnv }
  vi.restoreAllMocks()
  await fsp.rm(dir, { recursive: true, force: true })
})

describe("loadAppConfig", () => {
  it("ships defaults that validate", () => {
    const { data } = loadAppConfig({ ensureUser: false, userPath: path.join(dir, "none.yaml"), defaultPath: paths.defaultConfig })
    expect(data).toEqual({
      storage: { dir: "./data/subscriptions" },
      subscription: { timeoutMs: 30_000, updateInterval: 86_400, httpProxy: "", userAgent: "", mergeBy: "descriptor" },
      probe: { timeoutMs: 5_000, concurrency: 10, attempts: 3, testUrl: "https://www.gstatic.com/generate_204", topN: 10 }
    })
  })

  it("creates the user file from the defaults on first use", () => {
    const defaultPath = path.join(dir, "default.yaml")
    const userPath = path.join(dir, "nested", "config.yaml")
    fs.writeFileSync(defaultPath, "probe:\n  topN: 3\n", "utf8")
    const { data } = loadAppConfig({ userPath, defaultPath })
    expect(fs.readFileSync(userPath, "utf8")).toBe("probe:\n  topN: 3\n")
    expect(data.probe.topN).toBe(3)
  })

  it("merges the user file over the defaults", () => {
    const defaultPath = path.join(dir, "default.yaml")
    const userPath = path.join(dir, "config.yaml")
    fs.writeFileSync(defaultPath, "subscription:\n  timeoutMs: 30000\n  mergeBy: descriptor\n", "utf8")
    fs.writeFileSync(userPath, "subscription:\n  mergeBy: address\n  httpProxy:\n", "utf8")
    const { data } = loadAppConfig({ userPath, defaultPath })
    expect(data.subscription).toEqual({ timeoutMs: 30_000, updateInterval: 86_400, httpProxy: "", userAgent: "", mergeBy: "address" })
  })

  it("rejects broken YAML and out-of-range values", () => {
    const defaultPath = path.join(dir, "default.yaml")
    const userPath = path.join(dir, "config.yaml")
    fs.writeFileSync(defaultPath, "{}\n", "utf8")

    fs.writeFileSync(userPath, "probe: [unclosed\n", "utf8")
    expect(() => loadAppConfig({ userPath, defaultPath })).toThrow(ValidationError)
    expect(() => loadAppConfig({ userPath, defaultPath })).toThrow(`Invalid YAML in ${userPath}`)

    fs.writeFileSync(userPath, "probe:\n  concurrency: 99\n", "utf8")
    expect(() => loadAppConfig({ userPath, defaultPath })).toThrow(/probe\.concurrency/)
  })
})

describe("withEnvOverrides", () => {
  it("applies SUBRANK_* variables with bounds", () => {
    const { data } = loadAppConfig({ ensureUser: false, userPath: path.join(dir, "none.yaml"), defaultPath: paths.defaultConfig })
    process.env.SUBRANK_STORAGE_DIR = "/tmp/subs"
    process.env.SUBRANK_PROBE_CONCURRENCY = "64"
    process.env.SUBRANK_FETCH_TIMEOUT_MS = "10"
    process.env.SUBRANK_HTTP_PROXY = "127.0.0.1:7890"
    const cfg = withEnvOverrides(data)
    expect(cfg.storage.dir).toBe("/tmp/subs")
    expect(cfg.probe.concurrency).toBe(32)
    expect(cfg.subscription.timeoutMs).toBe(1000)
    expect(cfg.subscription.httpProxy).toBe("127.0.0.1:7890")
    expect(cfg.probe.testUrl).toBe(data.probe.testUrl)
  })
})

describe("deepMerge", () => {
  it("merges objects and replaces arrays and scalars", () => {
    expect(deepMerge({ a: { b: 1, c: [1, 2] }, d: 1 }, { a: { c: [3] }, d: 2 })).toEqual({ a: { b: 1, c: [3] }, d: 2 })
    expect(deepMerge({ a: 1 }, undefined)).toEqual({ a: 1 })
  })
})
