import {
  formatGroupVersionKind,
  type GroupVersionKind,
  parseGroupVersionKind,
  type WorkloadManifest,
} from '~/kube/workloads'
import { CATALOG_KIND } from '~/wellknown'
import { hashSerialized, parseJsonObject, structuralHash } from './content-hash'

/** One mesh configuration object as rendered: its serialized JSON and its kind. */
export type ConfigCandidate = {
  raw: string
  kind: string
}

export type ConfigObjectRef = {
  zone: string
  kind: string
  id: string
  hash: string
}

export type WorkloadObjectRef = {
  namespace: string
  kind: GroupVersionKind
  name: string
  hash: string
}

export type MissingFieldHandler = (field: string, kind: string) => void

export const kindKeyField = (kind: string) => (kind === CATALOG_KIND ? 'service_id' : `${kind}_key`)

export const zoneField = (kind: string) => (kind === CATALOG_KIND ? 'mesh_id' : 'zone_key')

export const readField = (object: Record<string, unknown> | null, field: string) => {
  const value = object?.[field]
  if (value === undefined || value === null) return null
  if (typeof value === 'string') return value
  if (typeof value === 'number' || typeof value === 'boolean') return String(value)
  return JSON.stringify(value)
}

export const createConfigObjectRef = (candidate: ConfigCandidate, onMissing?: MissingFieldHandler): ConfigObjectRef => {
  const object = parseJsonObject(candidate.raw)
  const lookup = (field: string) => {
    const value = readField(object, field)
    if (value === null) {
      onMissing?.(field, candidate.kind)
      return ''
    }
    return value
  }
  return {
    zone: lookup(zoneField(candidate.kind)),
    kind: candidate.kind,
    id: lookup(kindKeyField(candidate.kind)),
    hash: hashSerialized(candidate.raw),
  }
}

export const configRefKey = (ref: Pick<ConfigObjectRef, 'zone' | 'kind' | 'id'>) => `${ref.zone}-${ref.kind}-${ref.id}`

export const createWorkloadObjectRef = (manifest: WorkloadManifest): WorkloadObjectRef => ({
  namespace: manifest.metadata.namespace ?? '',
  kind: parseGroupVersionKind(manifest.apiVersion, manifest.kind),
  name: manifest.metadata.name,
  hash: structuralHash(manifest),
})

export const workloadRefKey = (ref: Pick<WorkloadObjectRef, 'namespace' | 'kind' | 'name'>) =>
  `${ref.namespace}-${formatGroupVersionKind(ref.kind)}-${ref.name}`
