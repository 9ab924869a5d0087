import { parseJsonObject } from '~/change-set/content-hash'
import { type ConfigObjectRef, kindKeyField, readField } from '~/change-set/object-refs'
import { componentLogger, type Logger } from '~/logger'
import { CATALOG_KIND } from '~/wellknown'

export type CommandQueueName = 'control' | 'catalog'

export type CommandLog = (output: string, error: Error | null) => void

export type Command = {
  queue: CommandQueueName
  args: string[]
  stdin: string | null
  requeueOnFailure: boolean
  log: CommandLog
}

export type CommandSink = {
  enqueue: (command: Command) => void
}

export const kindFlag = (kind: string) => (kind === CATALOG_KIND ? 'service-id' : `${kind}-key`)

export const queueFor = (kind: string): CommandQueueName | null => {
  if (kind === CATALOG_KIND) return 'catalog'
  return kind ? 'control' : null
}

/** Reads the identity field of a serialized object; an absent field yields '' and is logged. */
export const objectKey = (kind: string, raw: string, logger: Logger) => {
  const value = readField(parseJsonObject(raw), kindKeyField(kind))
  if (value === null) {
    logger.error({ kind, object: raw }, 'object has no identity field')
    return ''
  }
  return value
}

const outcomeLog =
  (logger: Logger, action: 'apply' | 'delete', kind: string, key: string): CommandLog =>
  (output, error) => {
    if (error) {
      logger.error({ err: error, output, kind, key }, `failed ${action}`)
    } else {
      logger.info({ kind, key }, action)
    }
  }

export const makeApplyCommand = (kind: string, raw: string, logger: Logger): Command => {
  const key = objectKey(kind, raw, logger)
  return {
    queue: queueFor(kind) ?? 'control',
    args: ['apply', '--kind', kind, '-f', '-'],
    stdin: raw,
    requeueOnFailure: true,
    log: outcomeLog(logger, 'apply', kind, key),
  }
}

export const makeDeleteCommand = (kind: string, raw: string, logger: Logger): Command => {
  const key = objectKey(kind, raw, logger)
  const args = ['delete', kind, `--${kindFlag(kind)}`, key]
  if (kind === CATALOG_KIND) {
    args.push('--mesh-id', readField(parseJsonObject(raw), 'mesh_id') ?? '')
  }
  return {
    queue: queueFor(kind) ?? 'control',
    args,
    stdin: null,
    requeueOnFailure: false,
    log: outcomeLog(logger, 'delete', kind, key),
  }
}

export const makeDeleteByRefCommand = (ref: ConfigObjectRef, logger: Logger): Command => {
  const args = ['delete', ref.kind, `--${kindFlag(ref.kind)}`, ref.id]
  if (ref.kind === CATALOG_KIND) {
    // the zone of a catalog entry is its mesh id
    args.push('--mesh-id', ref.zone)
  }
  return {
    queue: queueFor(ref.kind) ?? 'control',
    args,
    stdin: null,
    requeueOnFailure: false,
    log: outcomeLog(logger, 'delete', ref.kind, ref.id),
  }
}

export type CommandDispatcher = {
  applyAll: (objects: string[], kinds: string[]) => number
  unapplyAll: (objects: string[], kinds: string[]) => number
  deleteAllByRefs: (refs: ConfigObjectRef[]) => number
}

export const createCommandDispatcher = (options: { sink: CommandSink; logger?: Logger }): CommandDispatcher => {
  const { sink } = options
  const log = options.logger ?? componentLogger('commands')

  const dispatchObjects = (
    objects: string[],
    kinds: string[],
    build: (kind: string, raw: string, logger: Logger) => Command,
  ) => {
    let sent = 0
    objects.forEach((raw, index) => {
      const kind = kinds[index] ?? ''
      if (!queueFor(kind)) {
        log.error({ object: raw }, 'object is not recognizable as mesh configuration; ignoring')
        return
      }
      sink.enqueue(build(kind, raw, log))
      sent += 1
    })
    return sent
  }

  return {
    applyAll: (objects, kinds) => dispatchObjects(objects, kinds, makeApplyCommand),
    unapplyAll: (objects, kinds) => dispatchObjects(objects, kinds, makeDeleteCommand),
    deleteAllByRefs: (refs) => {
      let sent = 0
      for (const ref of refs) {
        if (!queueFor(ref.kind)) {
          log.error({ ref }, 'object reference has no kind; ignoring')
          continue
        }
        sink.enqueue(makeDeleteByRefCommand(ref, log))
        sent += 1
      }
      return sent
    },
  }
}
