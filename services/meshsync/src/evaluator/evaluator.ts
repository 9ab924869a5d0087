import type { V1Container, V1Volume } from '@kubernetes/client-node'
import { z } from 'zod'

import type { ConfigCandidate } from '~/change-set/object-refs'
import type { WorkloadManifest } from '~/kube/workloads'

export const meshDescriptionSchema = z.object({
  name: z.string().min(1),
  zone: z.string().min(1),
  installNamespace: z.string().min(1),
  watchNamespaces: z.array(z.string().min(1)).default([]),
})

/** The desired-state description shared by the applier and the reconciliation loop. */
export type MeshDescription = z.infer<typeof meshDescriptionSchema>

export type SidecarFragment = {
  container: V1Container
  volumes: V1Volume[]
}

export type RenderedState = {
  manifests: WorkloadManifest[]
  configs: ConfigCandidate[]
}

export type ConfigEvaluator = {
  describeMesh: () => Promise<MeshDescription>
  renderAll: () => Promise<RenderedState>
  /** Null when the tree carries no sidecar template. */
  renderSidecarFor: (clusterLabel: string) => Promise<SidecarFragment | null>
  /** Serialized listener object admitting the given clusters, or null without a template. */
  renderAllowlist: (clusterLabels: string[]) => Promise<string | null>
  renderSidecarConfig: (clusterLabel: string, port: string) => Promise<ConfigCandidate[]>
}
