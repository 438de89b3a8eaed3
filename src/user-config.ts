import fs from "node:fs"
import path from "node:path"
import yaml from "js-yaml"
import { z } from "zod"
import { paths, projectRoot } from "./config.js"
import { describeError, ValidationError } from "./proxy/errors.js"
import { formatZodIssues } from "./proxy/record.js"
import { envNum, envStr } from "./utils/coerce.js"
import { createLogger } from "./utils/log.js"

const log = createLogger("配置")

// Empty YAML keys (`httpProxy:`) load as null.
const optionalText = z.string().nullish().transform((v) => v ?? "")

export const appConfigSchema = z.object({
  storage: z
    .object({
      dir: z.string().min(1).default("./data/subscriptions")
    })
    .default({}),
  subscription: z
    .object({
      timeoutMs: z.number().int().positive().default(30_000),
      updateInterval: z.number().positive().default(86_400),
      httpProxy: optionalText,
      userAgent: optionalText,
      mergeBy: z.enum(["descriptor", "address"]).default("descriptor")
    })
    .default({}),
  probe: z
    .object({
      timeoutMs: z.number().int().positive().default(5_000),
      concurrency: z.number().int().min(1).max(32).default(10),
      attempts: z.number().int().min(1).default(3),
      testUrl: z.string().url().default("https://www.gstatic.com/generate_204"),
      topN: z.number().int().min(1).default(10)
    })
    .default({})
})

export type AppConfig = z.output<typeof appConfigSchema>

export interface LoadedConfig {
  data: AppConfig
  userPath: string
  defaultPath: string
}

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return v != null && typeof v === "object" && !Array.isArray(v)
}

/** Objects merge key by key; arrays and scalars in `override` replace. */
export function deepMerge(base: unknown, override: unknown): unknown {
  if (!isPlainObject(base) || !isPlainObject(override)) return override === undefined ? base : override
  const out: Record<string, unknown> = { ...base }
  for (const [k, v] of Object.entries(override)) out[k] = deepMerge(base[k], v)
  return out
}

function readYaml(file: string): unknown {
  if (!fs.existsSync(file)) return {}
  const text = fs.readFileSync(file, "utf8")
  try {
    return yaml.load(text) ?? {}
  } catch (e) {
    throw new ValidationError(`Invalid YAML in ${file}: ${describeError(e)}`, { cause: e })
  }
}

export function loadAppConfig({
  ensureUser = true,
  userPath = paths.userConfig,
  defaultPath = paths.defaultConfig
}: { ensureUser?: boolean; userPath?: string; defaultPath?: string } = {}): LoadedConfig {
  if (ensureUser && !fs.existsSync(userPath)) {
    fs.mkdirSync(path.dirname(userPath), { recursive: true })
    if (fs.existsSync(defaultPath)) fs.copyFileSync(defaultPath, userPath)
    else fs.writeFileSync(userPath, "{}\n", "utf8")
    log.info(`已生成用户配置：${userPath}`)
  }

  const merged = deepMerge(readYaml(defaultPath), readYaml(userPath))
  const parsed = appConfigSchema.safeParse(merged)
  if (!parsed.success) {
    throw new ValidationError(`Invalid config (${userPath}): ${formatZodIssues(parsed.error)}`)
  }
  return { data: parsed.data, userPath, defaultPath }
}

/** Applies `SUBRANK_*` environment overrides on top of a loaded config. */
export function withEnvOverrides(cfg: AppConfig): AppConfig {
  return {
    storage: { dir: envStr("SUBRANK_STORAGE_DIR", cfg.storage.dir) },
    subscription: {
      ...cfg.subscription,
      timeoutMs: Math.max(1000, envNum("SUBRANK_FETCH_TIMEOUT_MS", cfg.subscription.timeoutMs)),
      httpProxy: envStr("SUBRANK_HTTP_PROXY", cfg.subscription.httpProxy)
    },
    probe: {
      ...cfg.probe,
      timeoutMs: Math.max(1, envNum("SUBRANK_PROBE_TIMEOUT_MS", cfg.probe.timeoutMs)),
      concurrency: Math.min(32, Math.max(1, Math.trunc(envNum("SUBRANK_PROBE_CONCURRENCY", cfg.probe.concurrency)))),
      testUrl: envStr("SUBRANK_TEST_URL", cfg.probe.testUrl)
    }
  }
}

export function resolveStorageDir(cfg: AppConfig) {
  return path.resolve(projectRoot, cfg.storage.dir)
}
