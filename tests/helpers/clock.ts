import type { Clock } from "../../src/runtime/refresher.js"

interface Waiter {
  at: number
  resolve: () => void
}

/** Virtual time: sleeps only resolve when a test calls `advance`. */
export class ManualClock implements Clock {
  private current: number
  private waiters: Waiter[] = []

  constructor(startMs = 1_700_000_000_000) {
    this.current = startMs
  }

  now() {
    return this.current
  }

  get pending() {
    return this.waiters.length
  }

  sleep(ms: number, signal?: AbortSignal) {
    return new Promise<void>((resolve) => {
      if (signal?.aborted) return resolve()
      const waiter: Waiter = {
        at: this.current + Math.max(0, ms),
        resolve: () => {
          signal?.removeEventListener("abort", onAbort)
          resolve()
        }
      }
      const onAbort = () => {
        this.waiters = this.waiters.filter((w) => w !== waiter)
        resolve()
      }
      signal?.addEventListener("abort", onAbort, { once: true })
      this.waiters.push(waiter)
    })
  }

  /** Moves time forward, waking due sleepers in order and letting each continuation run. */
  async advance(ms: number) {
    const target = this.current + ms
    for (;;) {
      const due = this.waiters.filter((w) => w.at <= target).sort((a, b) => a.at - b.at)[0]
      if (!due) break
      this.waiters = this.waiters.filter((w) => w !== due)
      this.current = Math.max(this.current, due.at)
      due.resolve()
      await flush()
    }
    this.current = target
    await flush()
  }
}

export function flush() {
  return new Promise<void>((resolve) => setImmediate(resolve))
}
