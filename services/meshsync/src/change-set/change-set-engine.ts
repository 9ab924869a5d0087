import { componentLogger, type Logger } from '~/logger'
import type { WorkloadManifest } from '~/kube/workloads'
import { errorMessage } from '~/shared/records'
import { sleep } from '~/shared/sleep'
import { createDirtySignal, type DirtySignal } from './dirty-signal'
import {
  type ConfigCandidate,
  type ConfigObjectRef,
  configRefKey,
  createConfigObjectRef,
  createWorkloadObjectRef,
  type WorkloadObjectRef,
  workloadRefKey,
} from './object-refs'
import { decodeConfigSnapshot, decodeWorkloadSnapshot, encodeSnapshot, type SnapshotStore } from './snapshot-store'

export const DEFAULT_STORE_RETRY_MS = 30_000

export type ConfigDelta = {
  changed: string[]
  changedKinds: string[]
  deleted: ConfigObjectRef[]
}

export type WorkloadDelta = {
  changed: WorkloadManifest[]
  deleted: WorkloadObjectRef[]
}

export type SnapshotKeys = {
  config: string
  workload: string
}

export type ChangeSetEngineOptions = {
  store: SnapshotStore
  keys: SnapshotKeys
  logger?: Logger
  storeRetryMs?: number
}

export type ChangeSetEngine = {
  /** Resolves after the first store connection attempt (and snapshot load, when it succeeds). */
  start: () => Promise<void>
  computeConfigDelta: (candidates: ConfigCandidate[]) => ConfigDelta
  computeWorkloadDelta: (manifests: WorkloadManifest[]) => WorkloadDelta
  isConnected: () => boolean
  pendingPersistence: () => { config: number; workload: number }
  close: () => Promise<void>
}

type Universe<TRef> = {
  name: 'config' | 'workload'
  key: string
  snapshot: ReadonlyMap<string, TRef>
  touched: boolean
  signal: DirtySignal
  decode: (raw: string) => Map<string, TRef>
}

const createUniverse = <TRef>(
  name: Universe<TRef>['name'],
  key: string,
  decode: (raw: string) => Map<string, TRef>,
): Universe<TRef> => ({
  name,
  key,
  snapshot: new Map(),
  touched: false,
  signal: createDirtySignal(),
  decode,
})

export const createChangeSetEngine = (options: ChangeSetEngineOptions): ChangeSetEngine => {
  const { store, keys } = options
  const log = options.logger ?? componentLogger('change-set')
  const retryMs = options.storeRetryMs ?? DEFAULT_STORE_RETRY_MS

  const config = createUniverse<ConfigObjectRef>('config', keys.config, decodeConfigSnapshot)
  const workload = createUniverse<WorkloadObjectRef>('workload', keys.workload, decodeWorkloadSnapshot)
  const universes = [config, workload] as const

  const abort = new AbortController()
  let connected = false
  let running: Promise<void> | null = null
  let closing: Promise<void> | null = null

  const diff = <TItem, TRef extends { hash: string }>(
    universe: Universe<TRef>,
    items: TItem[],
    toRef: (item: TItem) => TRef,
    keyOf: (ref: TRef) => string,
  ) => {
    const previous = universe.snapshot
    const fresh = new Map<string, TRef>()
    const changed: Array<{ item: TItem; ref: TRef }> = []
    for (const item of items) {
      const ref = toRef(item)
      const key = keyOf(ref)
      fresh.set(key, ref)
      const prior = previous.get(key)
      if (!prior || prior.hash !== ref.hash) {
        changed.push({ item, ref })
      }
    }
    const deleted: TRef[] = []
    for (const [key, ref] of previous) {
      if (!fresh.has(key)) deleted.push(ref)
    }
    universe.snapshot = fresh
    universe.touched = true
    universe.signal.notify()
    return { changed, deleted }
  }

  const persist = async <TRef>(universe: Universe<TRef>) => {
    try {
      await store.write(universe.key, encodeSnapshot(universe.snapshot))
      log.debug({ universe: universe.name, key: universe.key, size: universe.snapshot.size }, 'persisted snapshot')
    } catch (error) {
      log.error({ err: error, universe: universe.name, key: universe.key }, 'failed to persist snapshot')
    }
  }

  const drain = async <TRef>(universe: Universe<TRef>) => {
    while (await universe.signal.take()) {
      await persist(universe)
    }
  }

  const load = async <TRef>(universe: Universe<TRef>) => {
    let raw: string | null
    try {
      raw = await store.read(universe.key)
    } catch (error) {
      log.error({ err: error, universe: universe.name, key: universe.key }, 'failed to read persisted snapshot')
      return
    }
    if (universe.touched) {
      log.info({ universe: universe.name }, 'keeping in-memory snapshot computed before the store was reachable')
      universe.signal.notify()
      return
    }
    if (raw === null) {
      log.info({ universe: universe.name, key: universe.key }, 'no persisted snapshot; starting empty')
      return
    }
    try {
      universe.snapshot = universe.decode(raw)
      log.info(
        { universe: universe.name, key: universe.key, size: universe.snapshot.size },
        'loaded persisted snapshot',
      )
    } catch (error) {
      log.error(
        { universe: universe.name, key: universe.key, error: errorMessage(error) },
        'persisted snapshot is unreadable; starting empty',
      )
    }
  }

  const connect = async (onFirstFailure: () => void) => {
    while (!abort.signal.aborted) {
      try {
        await store.connect()
        connected = true
        log.info('connected to snapshot store')
        return true
      } catch (error) {
        onFirstFailure()
        log.warn(
          { error: errorMessage(error), retryInMs: retryMs },
          'snapshot store unavailable; retrying after backoff',
        )
        await sleep(retryMs, abort.signal)
      }
    }
    return false
  }

  const start = () => {
    if (running) return Promise.resolve()
    let markReady = () => {}
    const ready = new Promise<void>((resolve) => {
      markReady = resolve
    })
    running = (async () => {
      const ok = await connect(markReady)
      if (!ok) {
        markReady()
        return
      }
      await load(config)
      await load(workload)
      markReady()
      await Promise.all([drain(config), drain(workload)])
    })().catch((error) => {
      markReady()
      log.error({ err: error }, 'snapshot persistence stopped unexpectedly')
    })
    return ready
  }

  return {
    start,
    computeConfigDelta: (candidates) => {
      const { changed, deleted } = diff(
        config,
        candidates,
        (candidate) =>
          createConfigObjectRef(candidate, (field, kind) => {
            log.warn({ field, kind, object: candidate.raw }, 'config object is missing an identity field')
          }),
        configRefKey,
      )
      return {
        changed: changed.map((entry) => entry.item.raw),
        changedKinds: changed.map((entry) => entry.ref.kind),
        deleted,
      }
    },
    computeWorkloadDelta: (manifests) => {
      const { changed, deleted } = diff(workload, manifests, createWorkloadObjectRef, workloadRefKey)
      return { changed: changed.map((entry) => entry.item), deleted }
    },
    isConnected: () => connected,
    pendingPersistence: () => ({ config: config.signal.pending(), workload: workload.signal.pending() }),
    close: () => {
      if (closing) return closing
      closing = (async () => {
        for (const universe of universes) {
          universe.signal.seal()
        }
        abort.abort()
        if (running) {
          await running
        }
        for (const universe of universes) {
          universe.signal.close()
        }
        connected = false
        await store.close()
      })()
      return closing
    },
  }
}
