import type { ChangeSetEngine } from '~/change-set/change-set-engine'
import type { ConfigEvaluator, MeshDescription } from '~/evaluator/evaluator'
import type { ClusterClient } from '~/kube/kube-client'
import { describeResource, type WorkloadManifest } from '~/kube/workloads'
import { componentLogger, type Logger } from '~/logger'
import type { CommandDispatcher } from '~/mesh/commands'
import type { DesiredState } from '~/reconcile/desired-state'
import { asRecord } from '~/shared/records'

const CLUSTER_SCOPED_KINDS = new Set([
  'Namespace',
  'ClusterRole',
  'ClusterRoleBinding',
  'CustomResourceDefinition',
  'PersistentVolume',
  'StorageClass',
  'PriorityClass',
  'MutatingWebhookConfiguration',
  'ValidatingWebhookConfiguration',
])

export type ImagePullSecretSource = {
  name: string
  namespace: string
}

export type ApplyResult = {
  mesh: MeshDescription
  manifestsApplied: number
  manifestsDeleted: number
  configsApplied: number
  configsDeleted: number
  failures: number
}

export type DesiredStateApplier = {
  apply: () => Promise<ApplyResult>
  lastResult: () => (ApplyResult & { at: Date }) | null
}

export type DesiredStateApplierOptions = {
  evaluator: ConfigEvaluator
  desired: DesiredState
  engine: Pick<ChangeSetEngine, 'computeConfigDelta' | 'computeWorkloadDelta'>
  client: ClusterClient
  commands: CommandDispatcher
  imagePullSecret: ImagePullSecretSource | null
  logger?: Logger
}

export const withDefaultNamespace = (manifest: WorkloadManifest, namespace: string): WorkloadManifest => {
  if (manifest.metadata.namespace || CLUSTER_SCOPED_KINDS.has(manifest.kind)) return manifest
  return { ...manifest, metadata: { ...manifest.metadata, namespace } }
}

export const meshNamespaces = (mesh: MeshDescription) => [...new Set([mesh.installNamespace, ...mesh.watchNamespaces])]

export const createDesiredStateApplier = (options: DesiredStateApplierOptions): DesiredStateApplier => {
  const { evaluator, desired, engine, client, commands } = options
  const log = options.logger ?? componentLogger('desired-state')
  let last: (ApplyResult & { at: Date }) | null = null

  const readPullSecret = async () => {
    const source = options.imagePullSecret
    if (!source) return null
    const secret = await client.get({
      namespace: source.namespace,
      kind: { group: '', version: 'v1', kind: 'Secret' },
      name: source.name,
    })
    if (!secret) {
      log.warn({ secret: source.name, namespace: source.namespace }, 'image pull secret not found; not copying it')
    }
    return secret
  }

  const ensureNamespaces = async (mesh: MeshDescription) => {
    let failures = 0
    const secret = await readPullSecret().catch((error: unknown) => {
      failures += 1
      log.error({ err: error }, 'failed to read image pull secret')
      return null
    })
    for (const namespace of meshNamespaces(mesh)) {
      try {
        const namespaceResource = { apiVersion: 'v1', kind: 'Namespace', metadata: { name: namespace } }
        await client.apply(namespaceResource, 'getOrCreate')
        if (secret && options.imagePullSecret && namespace !== options.imagePullSecret.namespace) {
          const copy = {
            apiVersion: 'v1',
            kind: 'Secret',
            metadata: { name: options.imagePullSecret.name, namespace },
            type: secret.type,
            data: asRecord(secret.data) ?? {},
          }
          await client.apply(copy, 'getOrCreate')
        }
      } catch (error) {
        failures += 1
        log.error({ err: error, namespace }, 'failed to prepare namespace')
      }
    }
    return failures
  }

  const apply = async (): Promise<ApplyResult> => {
    const mesh = await evaluator.describeMesh()
    const rendered = await evaluator.renderAll()
    await desired.replace(mesh)
    log.info({ mesh: mesh.name, watchNamespaces: mesh.watchNamespaces }, 'applying desired state')

    let failures = await ensureNamespaces(mesh)

    const manifests = rendered.manifests.map((manifest) => withDefaultNamespace(manifest, mesh.installNamespace))
    const workloadDelta = engine.computeWorkloadDelta(manifests)
    for (const manifest of workloadDelta.changed) {
      try {
        await client.apply(manifest, 'createOrUpdate')
        log.info({ resource: describeResource(manifest) }, 'applied manifest')
      } catch (error) {
        failures += 1
        log.error({ err: error, resource: describeResource(manifest) }, 'failed to apply manifest')
      }
    }
    for (const ref of workloadDelta.deleted) {
      try {
        const existed = await client.delete(ref)
        log.info({ namespace: ref.namespace, kind: ref.kind.kind, name: ref.name, existed }, 'deleted manifest')
      } catch (error) {
        failures += 1
        log.error({ err: error, namespace: ref.namespace, name: ref.name }, 'failed to delete manifest')
      }
    }

    const configDelta = engine.computeConfigDelta(rendered.configs)
    const configsApplied = commands.applyAll(configDelta.changed, configDelta.changedKinds)
    const configsDeleted = commands.deleteAllByRefs(configDelta.deleted)

    const result: ApplyResult = {
      mesh,
      manifestsApplied: workloadDelta.changed.length,
      manifestsDeleted: workloadDelta.deleted.length,
      configsApplied,
      configsDeleted,
      failures,
    }
    last = { ...result, at: new Date() }
    log.info(
      {
        manifestsApplied: result.manifestsApplied,
        manifestsDeleted: result.manifestsDeleted,
        configsApplied,
        configsDeleted,
        failures,
      },
      'desired state applied',
    )
    return result
  }

  return { apply, lastResult: () => last }
}
