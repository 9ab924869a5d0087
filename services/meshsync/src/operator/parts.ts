import { join } from 'node:path'

import { createChangeSetEngine } from '~/change-set/change-set-engine'
import { createRedisSnapshotStore } from '~/change-set/snapshot-store'
import type { OperatorConfig } from '~/config'
import { createRenderedTreeEvaluator } from '~/evaluator/rendered-tree-evaluator'
import { createKubectlClient } from '~/kube/kube-client'
import { componentLogger, logger } from '~/logger'
import { createMeshCliExecutor, createMeshClient } from '~/mesh/command-queue'
import type { OperatorParts } from './operator'

/** Builds the production collaborators: Redis, kubectl, the mesh CLI and the checked-out tree. */
export const createOperatorParts = (config: OperatorConfig): OperatorParts => {
  const store = createRedisSnapshotStore({
    host: config.redis.host,
    port: config.redis.port,
    db: config.redis.db,
    username: config.redis.username ?? undefined,
    password: config.redis.password ?? undefined,
    logger: componentLogger('snapshot-store'),
  })
  const { imagePullSecret, operatorNamespace } = config.mesh

  return {
    git: config.git,
    reconcile: config.reconcile,
    mtlsEnabled: config.mesh.mtlsEnabled,
    imagePullSecret:
      imagePullSecret && operatorNamespace ? { name: imagePullSecret, namespace: operatorNamespace } : null,
    engine: createChangeSetEngine({ store, keys: config.stateKeys, logger: componentLogger('change-set') }),
    evaluator: createRenderedTreeEvaluator({
      root: join(config.git.localPath, config.git.treeSubdir),
      logger: componentLogger('evaluator'),
    }),
    client: createKubectlClient({ logger: componentLogger('kube-client') }),
    meshClient: createMeshClient({
      execute: createMeshCliExecutor({ binary: config.meshCli.binary, baseArgs: config.meshCli.baseArgs }),
      requeueDelayMs: config.meshCli.requeueDelayMs,
      maxAttempts: config.meshCli.maxAttempts,
      logger: componentLogger('mesh-client'),
    }),
    logger,
  }
}
