import { componentLogger, type Logger } from '~/logger'

export type OutboundTask = () => Promise<void>

export type OutboundQueueOptions = {
  name: string
  concurrency: number
  maxPending: number
  logger?: Logger
}

export type OutboundQueue = {
  /** Queues `task` unless one with the same key is queued or running, the queue is full, or closed. */
  submit: (key: string, task: OutboundTask) => boolean
  size: () => { pending: number; running: number }
  drain: () => Promise<void>
  close: () => Promise<void>
}

export const createOutboundQueue = (options: OutboundQueueOptions): OutboundQueue => {
  const log = options.logger ?? componentLogger('outbound-queue')
  const concurrency = Math.max(1, options.concurrency)
  const pending: Array<{ key: string; task: OutboundTask }> = []
  const active = new Set<string>()
  let running = 0
  let closed = false
  let drainWaiters: Array<() => void> = []

  const settle = () => {
    if (running > 0 || pending.length > 0) return
    const waiters = drainWaiters
    drainWaiters = []
    for (const resolve of waiters) resolve()
  }

  const pump = () => {
    while (running < concurrency) {
      const next = pending.shift()
      if (!next) break
      running += 1
      void next
        .task()
        .catch((error: unknown) => {
          log.error({ err: error, queue: options.name, key: next.key }, 'background task failed')
        })
        .finally(() => {
          running -= 1
          active.delete(next.key)
          pump()
          settle()
        })
    }
  }

  return {
    submit: (key, task) => {
      if (closed) return false
      if (active.has(key)) {
        log.debug({ queue: options.name, key }, 'task already queued')
        return false
      }
      if (pending.length >= options.maxPending) {
        log.warn({ queue: options.name, key, maxPending: options.maxPending }, 'queue full; dropping task')
        return false
      }
      active.add(key)
      pending.push({ key, task })
      pump()
      return true
    },
    size: () => ({ pending: pending.length, running }),
    drain: () =>
      new Promise<void>((resolve) => {
        drainWaiters.push(resolve)
        settle()
      }),
    close: async () => {
      closed = true
      const dropped = pending.splice(0)
      for (const entry of dropped) active.delete(entry.key)
      if (dropped.length > 0) {
        log.warn({ queue: options.name, dropped: dropped.length }, 'dropping queued tasks on shutdown')
      }
      await new Promise<void>((resolve) => {
        drainWaiters.push(resolve)
        settle()
      })
    },
  }
}
