import { componentLogger, type Logger } from '~/logger'
import { type CommandRunner, runCommand } from '~/shared/run-command'
import type { Command, CommandQueueName, CommandSink } from './commands'

export const DEFAULT_REQUEUE_DELAY_MS = 5_000
export const DEFAULT_MAX_ATTEMPTS = 5

export type MeshCliResult = {
  ok: boolean
  output: string
}

export type MeshCliExecutor = (args: string[], stdin: string | null) => Promise<MeshCliResult>

export const createMeshCliExecutor = (options: {
  binary: string
  baseArgs?: string[]
  runner?: CommandRunner
}): MeshCliExecutor => {
  const runner = options.runner ?? runCommand
  const baseArgs = options.baseArgs ?? []
  return async (args, stdin) => {
    const result = await runner(options.binary, [...baseArgs, ...args], stdin ?? undefined)
    const output = [result.stdout.trim(), result.stderr.trim()].filter(Boolean).join('\n')
    return { ok: result.exitCode === 0, output }
  }
}

type QueuedCommand = {
  command: Command
  attempt: number
}

type CommandQueue = {
  push: (entry: QueuedCommand) => void
  size: () => number
  whenIdle: () => Promise<void>
  close: () => Promise<void>
}

type QueueOptions = {
  name: CommandQueueName
  execute: MeshCliExecutor
  logger: Logger
  requeueDelayMs: number
  maxAttempts: number
}

const createCommandQueue = (options: QueueOptions): CommandQueue => {
  const { name, execute, logger } = options
  const items: QueuedCommand[] = []
  const timers = new Set<NodeJS.Timeout>()
  let wake: (() => void) | null = null
  let idleWaiters: Array<() => void> = []
  let busy = false
  let closed = false

  const notifyIdle = () => {
    if (busy || items.length > 0) return
    const waiters = idleWaiters
    idleWaiters = []
    for (const resolve of waiters) resolve()
  }

  const push = (entry: QueuedCommand) => {
    if (closed) {
      logger.warn({ queue: name, args: entry.command.args }, 'command queue closed; dropping command')
      return
    }
    items.push(entry)
    wake?.()
  }

  const requeue = (entry: QueuedCommand) => {
    if (entry.attempt >= options.maxAttempts) {
      logger.error({ queue: name, args: entry.command.args, attempts: entry.attempt }, 'giving up on command')
      return
    }
    const timer = setTimeout(() => {
      timers.delete(timer)
      push({ command: entry.command, attempt: entry.attempt + 1 })
    }, options.requeueDelayMs)
    timers.add(timer)
  }

  const runOne = async (entry: QueuedCommand) => {
    const { command } = entry
    let result: MeshCliResult
    try {
      result = await execute(command.args, command.stdin)
    } catch (error) {
      result = { ok: false, output: error instanceof Error ? error.message : String(error) }
    }
    command.log(result.output, result.ok ? null : new Error(result.output || `${command.args[0] ?? 'command'} failed`))
    if (!result.ok && command.requeueOnFailure) {
      requeue(entry)
    }
  }

  const loop = (async () => {
    while (!closed) {
      const next = items.shift()
      if (!next) {
        notifyIdle()
        await new Promise<void>((resolve) => {
          wake = resolve
        })
        wake = null
        continue
      }
      busy = true
      await runOne(next)
      busy = false
    }
    notifyIdle()
  })()

  return {
    push,
    size: () => items.length,
    whenIdle: () =>
      new Promise<void>((resolve) => {
        idleWaiters.push(resolve)
        notifyIdle()
      }),
    close: async () => {
      if (closed) return
      closed = true
      for (const timer of timers) clearTimeout(timer)
      timers.clear()
      wake?.()
      await loop
      if (items.length > 0) {
        logger.warn({ queue: name, dropped: items.length }, 'dropping queued commands on shutdown')
        items.length = 0
      }
      notifyIdle()
    },
  }
}

export type MeshClientOptions = {
  execute: MeshCliExecutor
  logger?: Logger
  requeueDelayMs?: number
  maxAttempts?: number
}

export type MeshClient = CommandSink & {
  pending: () => Record<CommandQueueName, number>
  /** Resolves once both queues are empty and nothing is executing. */
  whenIdle: () => Promise<void>
  close: () => Promise<void>
}

export const createMeshClient = (options: MeshClientOptions): MeshClient => {
  const logger = options.logger ?? componentLogger('mesh-client')
  const shared = {
    execute: options.execute,
    logger,
    requeueDelayMs: options.requeueDelayMs ?? DEFAULT_REQUEUE_DELAY_MS,
    maxAttempts: options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS,
  }
  const queues: Record<CommandQueueName, CommandQueue> = {
    control: createCommandQueue({ ...shared, name: 'control' }),
    catalog: createCommandQueue({ ...shared, name: 'catalog' }),
  }

  return {
    enqueue: (command) => queues[command.queue].push({ command, attempt: 1 }),
    pending: () => ({ control: queues.control.size(), catalog: queues.catalog.size() }),
    whenIdle: async () => {
      await Promise.all([queues.control.whenIdle(), queues.catalog.whenIdle()])
    },
    close: async () => {
      await Promise.all([queues.control.close(), queues.catalog.close()])
    },
  }
}
