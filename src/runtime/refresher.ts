import { describeError } from "../proxy/errors.js"
import { createLogger } from "../utils/log.js"

const log = createLogger("订阅刷新")

export interface Clock {
  /** Epoch milliseconds. */
  now(): number
  /** Resolves after `ms`, or as soon as `signal` aborts. Never rejects. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms, signal) =>
    new Promise<void>((resolve) => {
      if (signal?.aborted) return resolve()
      const onAbort = () => {
        clearTimeout(tid)
        resolve()
      }
      const tid = setTimeout(() => {
        signal?.removeEventListener("abort", onAbort)
        resolve()
      }, Math.max(0, ms))
      signal?.addEventListener("abort", onAbort, { once: true })
    })
}

/** What the scheduler needs from a subscription. */
export interface Refreshable {
  readonly id: string
  readonly name: string
  /** Seconds. */
  readonly updateInterval: number
  /** Epoch seconds, 0 = never. */
  readonly lastUpdateTime: number
  fetch(opts: { timeoutMs?: number; signal?: AbortSignal }): Promise<unknown>
}

export type RefreshHook = (sub: Refreshable, error: unknown) => void | Promise<void>

export interface RefreshSchedulerOptions {
  clock?: Clock
  /** Stop-flag polling granularity. */
  tickMs?: number
  /** Upper bound on ticks slept between two due-checks. */
  maxSleepTicks?: number
  fetchTimeoutMs?: number
  onRefresh?: RefreshHook
}

export interface RefreshTaskStatus {
  id: string
  name: string
  running: boolean
  startedAt: number
  runs: number
  lastError: string | null
}

interface RefreshTask {
  controller: AbortController
  promise: Promise<void>
  sub: Refreshable
  startedAt: number
  runs: number
  lastError: string | null
}

export class RefreshScheduler {
  readonly clock: Clock
  private readonly tickMs: number
  private readonly maxSleepTicks: number
  private readonly fetchTimeoutMs: number | undefined
  private onRefresh: RefreshHook | undefined
  private tasks = new Map<string, RefreshTask>()

  constructor({ clock = systemClock, tickMs = 1000, maxSleepTicks = 60, fetchTimeoutMs, onRefresh }: RefreshSchedulerOptions = {}) {
    this.clock = clock
    this.tickMs = Math.max(1, tickMs)
    this.maxSleepTicks = Math.max(1, maxSleepTicks)
    this.fetchTimeoutMs = fetchTimeoutMs
    this.onRefresh = onRefresh
  }

  setRefreshHook(hook: RefreshHook | undefined) {
    this.onRefresh = hook
  }

  isRunning(id: string) {
    return this.tasks.has(id)
  }

  get size() {
    return this.tasks.size
  }

  /** Returns false when a worker for this subscription is already live. */
  start(sub: Refreshable) {
    if (this.tasks.has(sub.id)) {
      log.info(`自动更新已在运行：${sub.name}`)
      return false
    }

    const controller = new AbortController()
    const task: RefreshTask = {
      controller,
      promise: Promise.resolve(),
      sub,
      startedAt: this.clock.now(),
      runs: 0,
      lastError: null
    }
    task.promise = this.runLoop(task, controller.signal)
      .catch((e) => {
        log.error(`自动更新异常退出：${sub.name} (${describeError(e)})`)
      })
      .finally(() => {
        if (this.tasks.get(sub.id) === task) this.tasks.delete(sub.id)
      })
    this.tasks.set(sub.id, task)
    log.info(`已启动自动更新：${sub.name}（间隔 ${sub.updateInterval}s）`)
    return true
  }

  /** Signals the worker and waits until it has left its loop. */
  async stop(id: string) {
    const task = this.tasks.get(id)
    if (!task) return false
    task.controller.abort()
    await task.promise
    log.info(`已停止自动更新：${task.sub.name}`)
    return true
  }

  async stopAll() {
    await Promise.all([...this.tasks.keys()].map((id) => this.stop(id)))
  }

  status(): RefreshTaskStatus[] {
    return [...this.tasks.values()].map((t) => ({
      id: t.sub.id,
      name: t.sub.name,
      running: !t.controller.signal.aborted,
      startedAt: t.startedAt,
      runs: t.runs,
      lastError: t.lastError
    }))
  }

  private isDue(sub: Refreshable) {
    const elapsedSec = this.clock.now() / 1000 - sub.lastUpdateTime
    return elapsedSec >= sub.updateInterval
  }

  private async notify(sub: Refreshable, error: unknown) {
    if (!this.onRefresh) return
    try {
      await this.onRefresh(sub, error)
    } catch (e) {
      log.warn(`刷新回调失败：${sub.name} (${describeError(e)})`)
    }
  }

  private async runLoop(task: RefreshTask, signal: AbortSignal) {
    const { sub } = task
    while (!signal.aborted) {
      if (this.isDue(sub)) {
        task.runs++
        try {
          await sub.fetch({ ...(this.fetchTimeoutMs ? { timeoutMs: this.fetchTimeoutMs } : {}), signal })
          task.lastError = null
          await this.notify(sub, null)
        } catch (e) {
          // Auto refresh never propagates: the failure is already on the subscription's stats.
          if (!signal.aborted) {
            task.lastError = describeError(e)
            log.warn(`自动更新失败：${sub.name} (${task.lastError})`)
          }
          await this.notify(sub, e)
        }
      }

      const ticks = Math.max(1, Math.min(Math.ceil(sub.updateInterval), this.maxSleepTicks))
      for (let i = 0; i < ticks; i++) {
        if (signal.aborted) break
        await this.clock.sleep(this.tickMs, signal)
      }
    }
  }
}

let sharedScheduler: RefreshScheduler | null = null

/** Process-wide scheduler for subscriptions created outside a store. */
export function getSharedScheduler() {
  if (!sharedScheduler) sharedScheduler = new RefreshScheduler()
  return sharedScheduler
}
