import type { V1Deployment, V1Pod, V1StatefulSet } from '@kubernetes/client-node'

import type { ConfigEvaluator, MeshDescription } from '~/evaluator/evaluator'
import type { ClusterClient } from '~/kube/kube-client'
import type { Logger } from '~/logger'
import type { CommandDispatcher } from '~/mesh/commands'

export type ReconcileContext = {
  mesh: MeshDescription
  client: ClusterClient
  evaluator: ConfigEvaluator
  commands: CommandDispatcher
  logger: Logger
}

export type WorkloadReconciler<T> = (resource: T, context: ReconcileContext) => Promise<void>

/** Receives every pod listed during one pass, across all watched namespaces. */
export type PodSetReconciler = (pods: V1Pod[], context: ReconcileContext) => Promise<void>

export type ReconcilerRegistry = {
  deployments: WorkloadReconciler<V1Deployment>[]
  statefulSets: WorkloadReconciler<V1StatefulSet>[]
  pods: PodSetReconciler[]
}
