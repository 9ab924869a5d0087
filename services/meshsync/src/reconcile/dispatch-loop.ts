import type { V1Pod } from '@kubernetes/client-node'

import type { ConfigEvaluator } from '~/evaluator/evaluator'
import type { ClusterClient } from '~/kube/kube-client'
import { describeResource } from '~/kube/workloads'
import { componentLogger, type Logger } from '~/logger'
import type { CommandDispatcher } from '~/mesh/commands'
import { sleep } from '~/shared/sleep'
import { createAllowlistReconciler } from './allowlist-reconciler'
import type { DesiredState } from './desired-state'
import { createLabelReconciler } from './label-reconciler'
import type { OutboundQueue } from './outbound-queue'
import { createSidecarReconciler } from './sidecar-reconciler'
import type { ReconcileContext, ReconcilerRegistry, WorkloadReconciler } from './types'

export const DEFAULT_RECONCILE_INTERVAL_MS = 30_000

export type PassSummary = {
  skipped: boolean
  namespaces: number
  pods: number
  deployments: number
  statefulSets: number
  failures: number
}

export const createReconcilerRegistry = (options: {
  sidecarConfigQueue: OutboundQueue
  imagePullSecret: string | null
  mtlsEnabled: boolean
}): ReconcilerRegistry => {
  const labels = createLabelReconciler(options.sidecarConfigQueue)
  const sidecar = createSidecarReconciler(options.imagePullSecret)
  return {
    deployments: [labels, sidecar],
    statefulSets: [labels, sidecar],
    pods: options.mtlsEnabled ? [createAllowlistReconciler()] : [],
  }
}

export type DispatchLoopOptions = {
  desired: DesiredState
  client: ClusterClient
  evaluator: ConfigEvaluator
  commands: CommandDispatcher
  registry: ReconcilerRegistry
  intervalMs?: number
  logger?: Logger
  onPass?: (summary: PassSummary) => void
}

export type DispatchLoop = {
  runOnce: () => Promise<PassSummary>
  run: (signal: AbortSignal) => Promise<void>
}

export const createDispatchLoop = (options: DispatchLoopOptions): DispatchLoop => {
  const { desired, client, registry } = options
  const log = options.logger ?? componentLogger('dispatch-loop')
  const intervalMs = options.intervalMs ?? DEFAULT_RECONCILE_INTERVAL_MS

  const runOnce = () =>
    desired.read(async (mesh): Promise<PassSummary> => {
      const summary: PassSummary = {
        skipped: true,
        namespaces: 0,
        pods: 0,
        deployments: 0,
        statefulSets: 0,
        failures: 0,
      }
      if (!mesh) {
        log.debug('no mesh description yet; skipping reconciliation pass')
        return summary
      }
      summary.skipped = false
      const context: ReconcileContext = {
        mesh,
        client,
        evaluator: options.evaluator,
        commands: options.commands,
        logger: log,
      }

      const attempt = async (what: Record<string, unknown>, fn: () => Promise<void>) => {
        try {
          await fn()
        } catch (error) {
          summary.failures += 1
          log.error({ err: error, ...what }, 'reconciliation step failed')
        }
      }

      const list = async <T>(namespace: string, kind: string, fn: () => Promise<T[]>) => {
        try {
          return await fn()
        } catch (error) {
          summary.failures += 1
          log.error({ err: error, namespace, kind }, 'failed to list workloads')
          return null
        }
      }

      const reconcileEach = async <T extends { kind?: string; metadata?: { name?: string; namespace?: string } }>(
        resources: T[],
        reconcilers: WorkloadReconciler<T>[],
      ) => {
        for (const resource of resources) {
          for (const reconcile of reconcilers) {
            await attempt({ resource: describeResource(resource) }, () => reconcile(resource, context))
          }
        }
      }

      const pods: V1Pod[] = []
      const unlistedPodNamespaces: string[] = []
      for (const namespace of mesh.watchNamespaces) {
        summary.namespaces += 1
        const namespacePods = await list(namespace, 'Pod', () => client.listPods(namespace))
        const deployments = (await list(namespace, 'Deployment', () => client.listDeployments(namespace))) ?? []
        const statefulSets = (await list(namespace, 'StatefulSet', () => client.listStatefulSets(namespace))) ?? []
        if (namespacePods === null) {
          unlistedPodNamespaces.push(namespace)
        } else {
          pods.push(...namespacePods)
          summary.pods += namespacePods.length
        }
        summary.deployments += deployments.length
        summary.statefulSets += statefulSets.length

        await reconcileEach(deployments, registry.deployments)
        await reconcileEach(statefulSets, registry.statefulSets)
      }
      if (unlistedPodNamespaces.length > 0 && registry.pods.length > 0) {
        // a partial pod set would shrink cluster-wide state such as the allowlist
        log.warn({ namespaces: unlistedPodNamespaces }, 'pod listing incomplete; skipping pod reconcilers')
        return summary
      }
      for (const reconcile of registry.pods) {
        await attempt({ kind: 'Pod', pods: pods.length }, () => reconcile(pods, context))
      }
      return summary
    })

  return {
    runOnce,
    run: async (signal) => {
      log.info({ intervalMs }, 'reconciliation loop started')
      while (!signal.aborted) {
        try {
          const summary = await runOnce()
          options.onPass?.(summary)
          if (!summary.skipped) log.debug(summary, 'reconciliation pass finished')
        } catch (error) {
          log.error({ err: error }, 'reconciliation pass failed')
        }
        await sleep(intervalMs, signal)
      }
      log.info('reconciliation loop stopped')
    },
  }
}
