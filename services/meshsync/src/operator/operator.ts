import { Context, Effect, Layer } from 'effect'

import type { ChangeSetEngine } from '~/change-set/change-set-engine'
import type { OperatorConfig } from '~/config'
import type { ConfigEvaluator } from '~/evaluator/evaluator'
import type { GitRunner } from '~/gitops/git-runner'
import { createRepositorySync } from '~/gitops/repository-sync'
import type { ClusterClient } from '~/kube/kube-client'
import { componentLogger, type Logger, logger as rootLogger } from '~/logger'
import type { MeshClient } from '~/mesh/command-queue'
import { createCommandDispatcher } from '~/mesh/commands'
import { createDesiredState } from '~/reconcile/desired-state'
import { createDispatchLoop, createReconcilerRegistry } from '~/reconcile/dispatch-loop'
import { createOutboundQueue } from '~/reconcile/outbound-queue'
import { sleep } from '~/shared/sleep'
import { createDesiredStateApplier, type ImagePullSecretSource } from './desired-state-applier'
import {
  createOperatorLifecycleActor,
  getOperatorLifecycleStatus,
  markOperatorStarted,
  markOperatorStartFailed,
  markOperatorStopped,
  requestOperatorStart,
  requestOperatorStop,
} from './lifecycle-machine'

export const DEFAULT_BOOTSTRAP_RETRY_MS = 30_000

export type OperatorParts = {
  git: OperatorConfig['git']
  reconcile: OperatorConfig['reconcile']
  mtlsEnabled: boolean
  imagePullSecret: ImagePullSecretSource | null
  engine: ChangeSetEngine
  evaluator: ConfigEvaluator
  client: ClusterClient
  meshClient: MeshClient
  gitRunner?: GitRunner
  bootstrapRetryMs?: number
  logger?: Logger
}

export type OperatorRuntime = ReturnType<typeof createOperatorRuntime>
export type OperatorHealth = ReturnType<OperatorRuntime['health']>

export const createOperatorRuntime = (parts: OperatorParts) => {
  const log = parts.logger ?? rootLogger
  const bootstrapRetryMs = parts.bootstrapRetryMs ?? DEFAULT_BOOTSTRAP_RETRY_MS
  const actor = createOperatorLifecycleActor()
  const abort = new AbortController()

  const desired = createDesiredState()
  const commands = createCommandDispatcher({ sink: parts.meshClient, logger: componentLogger('commands', log) })
  const sidecarConfigQueue = createOutboundQueue({
    name: 'sidecar-config',
    concurrency: parts.reconcile.sidecarConcurrency,
    maxPending: parts.reconcile.sidecarMaxPending,
    logger: componentLogger('sidecar-config', log),
  })
  let lastReconcileAt: Date | null = null
  const loop = createDispatchLoop({
    desired,
    client: parts.client,
    evaluator: parts.evaluator,
    commands,
    registry: createReconcilerRegistry({
      sidecarConfigQueue,
      imagePullSecret: parts.imagePullSecret?.name ?? null,
      mtlsEnabled: parts.mtlsEnabled,
    }),
    intervalMs: parts.reconcile.intervalMs,
    logger: componentLogger('dispatch-loop', log),
    onPass: () => {
      lastReconcileAt = new Date()
    },
  })
  const applier = createDesiredStateApplier({
    evaluator: parts.evaluator,
    desired,
    engine: parts.engine,
    client: parts.client,
    commands,
    imagePullSecret: parts.imagePullSecret,
    logger: componentLogger('desired-state', log),
  })

  const applyDesiredState = async (reason: string) => {
    try {
      await applier.apply()
    } catch (error) {
      log.error({ err: error, reason }, 'failed to apply desired state')
    }
  }

  const sync = createRepositorySync({
    ...parts.git,
    engine: parts.engine,
    runner: parts.gitRunner,
    logger: componentLogger('repository-sync', log),
    onRevisionChanged: (revision) => applyDesiredState(`revision ${revision}`),
  })

  let background: Array<Promise<void>> = []
  let starting: Promise<void> | null = null
  let stopping: Promise<void> | null = null

  const bootstrapWithRetry = async () => {
    while (!abort.signal.aborted) {
      try {
        await sync.bootstrap()
        return true
      } catch (error) {
        log.error({ err: error, retryInMs: bootstrapRetryMs }, 'repository bootstrap failed; retrying')
        await sleep(bootstrapRetryMs, abort.signal)
      }
    }
    return false
  }

  const startInternal = async () => {
    try {
      await parts.engine.start()
      if (!(await bootstrapWithRetry())) return
      await applyDesiredState('startup')
      if (abort.signal.aborted) return
      background = [sync.watch(), loop.run(abort.signal)]
      if (markOperatorStarted(actor)) {
        log.info({ remote: parts.git.remote, localPath: parts.git.localPath }, 'operator running')
      }
    } catch (error) {
      markOperatorStartFailed(actor)
      throw error
    }
  }

  const start = async () => {
    if (stopping) throw new Error('operator runtime cannot be restarted after stop')
    if (!requestOperatorStart(actor)) return
    starting = startInternal()
    await starting
  }

  const stop = () => {
    if (!stopping) {
      stopping = (async () => {
        requestOperatorStop(actor)
        abort.abort()
        if (starting) {
          try {
            await starting
          } catch (error) {
            log.debug({ err: error }, 'start had failed before stop')
          }
        }
        await sync.close()
        await Promise.all(background)
        await sidecarConfigQueue.close()
        await parts.meshClient.close()
        markOperatorStopped(actor)
        log.info('operator stopped')
      })()
    }
    return stopping
  }

  const health = () => {
    const mesh = desired.current()
    return {
      status: getOperatorLifecycleStatus(actor),
      sync: sync.getStatus(),
      revision: sync.getRevision(),
      mesh: mesh?.name ?? null,
      watchNamespaces: mesh?.watchNamespaces ?? [],
      storeConnected: parts.engine.isConnected(),
      lastAppliedAt: applier.lastResult()?.at.toISOString() ?? null,
      lastReconcileAt: lastReconcileAt?.toISOString() ?? null,
      pendingCommands: parts.meshClient.pending(),
      pendingSnapshots: parts.engine.pendingPersistence(),
    }
  }

  return { start, stop, health, runOnce: loop.runOnce, applyDesiredState: applier.apply }
}

export type OperatorService = {
  start: Effect.Effect<void, Error>
  stop: Effect.Effect<void, never>
  getHealth: Effect.Effect<OperatorHealth, never>
}

export class Operator extends Context.Tag('Operator')<Operator, OperatorService>() {}

export const makeOperatorLayer = (buildParts: () => OperatorParts) =>
  Layer.scoped(
    Operator,
    Effect.gen(function* () {
      const runtime = createOperatorRuntime(buildParts())
      yield* Effect.addFinalizer(() => Effect.promise(() => runtime.stop()))
      return {
        start: Effect.tryPromise({
          try: () => runtime.start(),
          catch: (error) => (error instanceof Error ? error : new Error(String(error))),
        }),
        stop: Effect.promise(() => runtime.stop()),
        getHealth: Effect.sync(() => runtime.health()),
      } satisfies OperatorService
    }),
  )

export const startOperatorEffect = Effect.flatMap(Operator, (service) => service.start)
export const stopOperatorEffect = Effect.flatMap(Operator, (service) => service.stop)
export const getOperatorHealthEffect = Effect.flatMap(Operator, (service) => service.getHealth)
