import type {
  V1Container,
  V1Deployment,
  V1ObjectMeta,
  V1Pod,
  V1PodTemplateSpec,
  V1StatefulSet,
  V1Volume,
} from '@kubernetes/client-node'

import { asRecord } from '~/shared/records'
import { PROXY_PORT_NAME } from '~/wellknown'

export type ManifestMetadata = {
  name: string
  namespace?: string
  labels?: Record<string, string>
  annotations?: Record<string, string>
  [key: string]: unknown
}

/** A rendered cluster manifest, as produced by the configuration evaluator. */
export type WorkloadManifest = {
  apiVersion: string
  kind: string
  metadata: ManifestMetadata
  [key: string]: unknown
}

export type GroupVersionKind = {
  group: string
  version: string
  kind: string
}

export type PodTemplateWorkload = V1Deployment | V1StatefulSet

export type LiveWorkloadKind = 'Pod' | 'Deployment' | 'StatefulSet'

export const isWorkloadManifest = (value: unknown): value is WorkloadManifest => {
  const record = asRecord(value)
  if (!record) return false
  const metadata = asRecord(record.metadata)
  return (
    typeof record.apiVersion === 'string' &&
    typeof record.kind === 'string' &&
    metadata !== null &&
    typeof metadata.name === 'string'
  )
}

const hasObjectMeta = (value: unknown): value is { metadata: V1ObjectMeta } => {
  const record = asRecord(value)
  return record !== null && asRecord(record.metadata) !== null
}

export const isPod = (value: unknown): value is V1Pod => hasObjectMeta(value)

export const isDeployment = (value: unknown): value is V1Deployment => hasObjectMeta(value)

export const isStatefulSet = (value: unknown): value is V1StatefulSet => hasObjectMeta(value)

export const isContainer = (value: unknown): value is V1Container => typeof asRecord(value)?.name === 'string'

export const isVolume = (value: unknown): value is V1Volume => typeof asRecord(value)?.name === 'string'

export const parseGroupVersionKind = (apiVersion: string, kind: string): GroupVersionKind => {
  const separator = apiVersion.lastIndexOf('/')
  if (separator < 0) return { group: '', version: apiVersion, kind }
  return { group: apiVersion.slice(0, separator), version: apiVersion.slice(separator + 1), kind }
}

export const formatGroupVersionKind = (gvk: GroupVersionKind) => `${gvk.group}/${gvk.version}, Kind=${gvk.kind}`

export const formatApiVersion = (gvk: Pick<GroupVersionKind, 'group' | 'version'>) =>
  gvk.group ? `${gvk.group}/${gvk.version}` : gvk.version

/** Fully qualified resource argument for kubectl, e.g. `Deployment.v1.apps`. */
export const kubectlResourceName = (gvk: GroupVersionKind) =>
  gvk.group ? `${gvk.kind}.${gvk.version}.${gvk.group}` : gvk.kind

export const describeResource = (resource: { kind?: string; metadata?: { name?: string; namespace?: string } }) =>
  `${resource.kind ?? 'object'} ${resource.metadata?.namespace ?? ''}/${resource.metadata?.name ?? ''}`

export const podTemplateOf = (resource: PodTemplateWorkload): V1PodTemplateSpec | null =>
  resource.spec?.template ?? null

export const templateLabels = (template: V1PodTemplateSpec) => template.metadata?.labels ?? {}

export const templateAnnotations = (template: V1PodTemplateSpec) => template.metadata?.annotations ?? {}

export const setTemplateLabels = (template: V1PodTemplateSpec, labels: Record<string, string>) => {
  const metadata = template.metadata ?? {}
  metadata.labels = { ...(metadata.labels ?? {}), ...labels }
  template.metadata = metadata
}

export const hasProxyPort = (containers: V1Container[] | undefined) =>
  (containers ?? []).some((container) => (container.ports ?? []).some((port) => port.name === PROXY_PORT_NAME))
