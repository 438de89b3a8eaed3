import { loadConfig, openStore } from "../commands/context.js"
import { describeError } from "../proxy/errors.js"
import { resolveStorageDir } from "../user-config.js"
import { fmtKv } from "../utils/log.js"

async function main() {
  const cfg = loadConfig({})
  console.log(`[prefetch] ${fmtKv({ storage: resolveStorageDir(cfg), timeoutMs: cfg.subscription.timeoutMs, proxy: cfg.subscription.httpProxy })}`)

  const store = await openStore(cfg, {})
  try {
    if (!store.size) throw new Error(`No subscriptions stored in ${store.storageDir} (add one with sub:add)`)
    const results = await store.updateAll()
    let ok = 0
    for (const [id, res] of results) {
      const name = store.get(id)?.name ?? id
      if (res instanceof Error) {
        console.log(`[prefetch] ${name}: ${describeError(res)}`)
        continue
      }
      ok++
      console.log(`[prefetch] ${name}: ${res.length} configs`)
    }
    console.log(`[prefetch] refreshed ${ok}/${results.size}`)
    if (ok < results.size) process.exitCode = 1
  } finally {
    await store.close()
  }
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? (err.stack ?? err.message) : err)
  process.exitCode = 1
})
