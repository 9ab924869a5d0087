import type { V1Deployment, V1Pod, V1StatefulSet } from '@kubernetes/client-node'

import { componentLogger, type Logger } from '~/logger'
import { asRecord, errorMessage } from '~/shared/records'
import { type CommandRunner, runCommand } from '~/shared/run-command'
import {
  describeResource,
  type GroupVersionKind,
  isDeployment,
  isPod,
  isStatefulSet,
  kubectlResourceName,
  parseGroupVersionKind,
} from './workloads'

export type ApplyMode = 'createOrUpdate' | 'getOrCreate'

/** Anything kubectl can take from stdin: a live object, a rendered manifest, a namespace or a secret. */
export type ClusterResource = {
  apiVersion?: string
  kind?: string
  metadata?: { name?: string; namespace?: string }
}

export type ResourceRef = {
  namespace: string
  kind: GroupVersionKind
  name: string
}

export type ClusterClient = {
  listPods: (namespace: string) => Promise<V1Pod[]>
  listDeployments: (namespace: string) => Promise<V1Deployment[]>
  listStatefulSets: (namespace: string) => Promise<V1StatefulSet[]>
  get: (ref: ResourceRef) => Promise<Record<string, unknown> | null>
  apply: (resource: ClusterResource, mode: ApplyMode) => Promise<void>
  /** Resolves false when the object did not exist. */
  delete: (ref: ResourceRef) => Promise<boolean>
}

const SERVER_METADATA_FIELDS = [
  'managedFields',
  'resourceVersion',
  'uid',
  'creationTimestamp',
  'generation',
  'selfLink',
]
const LAST_APPLIED_ANNOTATION = 'kubectl.kubernetes.io/last-applied-configuration'

export const parseJson = (raw: string, context: string) => {
  try {
    const parsed = asRecord(JSON.parse(raw))
    if (!parsed) throw new Error('expected a JSON object')
    return parsed
  } catch (error) {
    throw new Error(`${context} returned invalid JSON: ${errorMessage(error)}`)
  }
}

export const notFound = (error: unknown) => {
  const message = errorMessage(error)
  return message.includes('NotFound') || message.includes('(NotFound)')
}

/** Drops server-populated fields so a listed object can be fed back to `kubectl apply`. */
export const toApplyPayload = (resource: ClusterResource) => {
  const payload = parseJson(JSON.stringify(resource), 'resource')
  delete payload.status
  const metadata = asRecord(payload.metadata)
  if (metadata) {
    for (const field of SERVER_METADATA_FIELDS) {
      delete metadata[field]
    }
    const annotations = asRecord(metadata.annotations)
    if (annotations) {
      delete annotations[LAST_APPLIED_ANNOTATION]
    }
  }
  return payload
}

const refOf = (resource: ClusterResource): ResourceRef => ({
  namespace: resource.metadata?.namespace ?? '',
  kind: parseGroupVersionKind(resource.apiVersion ?? 'v1', resource.kind ?? ''),
  name: resource.metadata?.name ?? '',
})

const namespaceArgs = (namespace: string) => (namespace ? ['-n', namespace] : [])

export type KubectlClientOptions = {
  binary?: string
  runner?: CommandRunner
  logger?: Logger
}

export const createKubectlClient = (options: KubectlClientOptions = {}): ClusterClient => {
  const binary = options.binary ?? 'kubectl'
  const runner = options.runner ?? runCommand
  const log = options.logger ?? componentLogger('kube-client')

  const kubectl = async (args: string[], input?: string, context?: string) => {
    const result = await runner(binary, args, input)
    if (result.exitCode === 0) {
      return result.stdout.trim()
    }
    const details = result.stderr.trim() || result.stdout.trim()
    throw new Error(`${context ?? 'kubectl'} failed: ${details || `exit ${result.exitCode}`}`)
  }

  const listItems = async <T extends ClusterResource>(
    resource: string,
    namespace: string,
    typeMeta: { apiVersion: string; kind: string },
    guard: (value: unknown) => value is T,
  ) => {
    const output = await kubectl(['get', resource, '-n', namespace, '-o', 'json'], undefined, `kubectl get ${resource}`)
    const list = parseJson(output, `kubectl get ${resource}`)
    const items: unknown[] = Array.isArray(list.items) ? list.items : []
    // list items may omit their type meta
    return items.filter(guard).map((item) => {
      const resource: ClusterResource = item
      resource.apiVersion = resource.apiVersion ?? typeMeta.apiVersion
      resource.kind = resource.kind ?? typeMeta.kind
      return item
    })
  }

  const get = async (ref: ResourceRef) => {
    try {
      const output = await kubectl(
        ['get', kubectlResourceName(ref.kind), ref.name, ...namespaceArgs(ref.namespace), '-o', 'json'],
        undefined,
        'kubectl get',
      )
      return parseJson(output, 'kubectl get')
    } catch (error) {
      if (notFound(error)) return null
      throw error
    }
  }

  return {
    listPods: (namespace) => listItems('pods', namespace, { apiVersion: 'v1', kind: 'Pod' }, isPod),
    listDeployments: (namespace) =>
      listItems('deployments.apps', namespace, { apiVersion: 'apps/v1', kind: 'Deployment' }, isDeployment),
    listStatefulSets: (namespace) =>
      listItems('statefulsets.apps', namespace, { apiVersion: 'apps/v1', kind: 'StatefulSet' }, isStatefulSet),
    get,
    apply: async (resource, mode) => {
      const payload = JSON.stringify(toApplyPayload(resource))
      if (mode === 'createOrUpdate') {
        await kubectl(['apply', '-f', '-'], payload, 'kubectl apply')
        log.debug({ resource: describeResource(resource) }, 'applied resource')
        return
      }
      if (await get(refOf(resource))) return
      await kubectl(['create', '-f', '-'], payload, 'kubectl create')
      log.debug({ resource: describeResource(resource) }, 'created resource')
    },
    delete: async (ref) => {
      try {
        await kubectl(
          ['delete', kubectlResourceName(ref.kind), ref.name, ...namespaceArgs(ref.namespace), '--wait=false'],
          undefined,
          'kubectl delete',
        )
        return true
      } catch (error) {
        if (notFound(error)) return false
        throw error
      }
    },
  }
}
